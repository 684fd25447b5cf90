/**
 * Source ontologies, namespace prefixes and the fixed source priority
 * @module types/source
 */

import { compareCanonical } from '../utils/strings.js'

/**
 * Ontologies the normalizer ingests. Closed set: ranking depends on it.
 */
export const SourceName = {
  NCIT: 'NCIt',
  MONDO: 'Mondo',
  OMIM: 'OMIM',
  ONCOTREE: 'OncoTree',
  DO: 'DO',
} as const

export type SourceName = (typeof SourceName)[keyof typeof SourceName]

export const SOURCE_NAMES: readonly SourceName[] = Object.values(SourceName)

/**
 * Source priority used for merge_ref and label selection.
 * Lower rank wins. Never reordered at runtime.
 */
export const SOURCE_PRIORITY: Readonly<Record<SourceName, number>> = {
  [SourceName.NCIT]: 1,
  [SourceName.MONDO]: 2,
  [SourceName.ONCOTREE]: 3,
  [SourceName.OMIM]: 4,
  [SourceName.DO]: 5,
}

/**
 * Namespace prefix each source writes in front of its local identifiers.
 */
export const SOURCE_PREFIXES: Readonly<Record<SourceName, string>> = {
  [SourceName.NCIT]: 'ncit',
  [SourceName.MONDO]: 'mondo',
  [SourceName.OMIM]: 'MIM',
  [SourceName.ONCOTREE]: 'oncotree',
  [SourceName.DO]: 'DOID',
}

/**
 * Namespaces of vocabularies that are referenced by the sources but never
 * ingested. References into them are kept as `associatedWith` values.
 */
export const EXTERNAL_PREFIXES: readonly string[] = [
  'efo',
  'gard',
  'icd9.cm',
  'icd10',
  'icd10.cm',
  'icdo',
  'imdrf',
  'kegg.disease',
  'meddra',
  'medgen',
  'mesh',
  'orphanet',
  'umls',
]

const SOURCE_BY_LOWER_NAME: ReadonlyMap<string, SourceName> = new Map(
  SOURCE_NAMES.map((name) => [name.toLowerCase(), name])
)

const SOURCE_BY_LOWER_PREFIX: ReadonlyMap<string, SourceName> = new Map(
  SOURCE_NAMES.map((name) => [SOURCE_PREFIXES[name].toLowerCase(), name])
)

/**
 * Type guard for the closed source set (exact casing)
 */
export function isSourceName(value: unknown): value is SourceName {
  return typeof value === 'string' && SOURCE_BY_LOWER_NAME.get(value.toLowerCase()) === value
}

/**
 * Resolves a source name written in any casing, e.g. `ncit` -> `NCIt`
 */
export function parseSourceName(value: string): SourceName | undefined {
  return SOURCE_BY_LOWER_NAME.get(value.trim().toLowerCase())
}

/**
 * Splits a CURIE into prefix and local id. Returns undefined when there is no
 * non-empty prefix or local part.
 */
export function splitConceptId(
  conceptId: string
): { prefix: string; localId: string } | undefined {
  const separator = conceptId.indexOf(':')
  if (separator <= 0 || separator === conceptId.length - 1) {
    return undefined
  }
  return {
    prefix: conceptId.slice(0, separator),
    localId: conceptId.slice(separator + 1),
  }
}

/**
 * Source that owns a concept id, judged by its namespace prefix
 */
export function sourceForConceptId(conceptId: string): SourceName | undefined {
  const parts = splitConceptId(conceptId)
  if (!parts) return undefined
  return SOURCE_BY_LOWER_PREFIX.get(parts.prefix.toLowerCase())
}

/**
 * Priority rank of a source. Unknown sources have no rank.
 */
export function sourceRank(sourceName: string): number | undefined {
  return isSourceName(sourceName) ? SOURCE_PRIORITY[sourceName] : undefined
}

/**
 * Orders records by source priority, then by concept id in canonical order.
 * Records from unranked sources sort last.
 */
export function compareSourcePriority(
  a: { sourceName: string; conceptId: string },
  b: { sourceName: string; conceptId: string }
): number {
  const rankA = sourceRank(a.sourceName) ?? Number.MAX_SAFE_INTEGER
  const rankB = sourceRank(b.sourceName) ?? Number.MAX_SAFE_INTEGER
  return rankA - rankB || compareCanonical(a.conceptId, b.conceptId)
}

/**
 * Licensing and version metadata for one ingested source
 */
export interface SourceMeta {
  dataLicense: string
  dataLicenseUrl: string
  version: string
  dataUrl: string
  rdpUrl?: string | null
  dataLicenseAttributes: {
    nonCommercial: boolean
    attribution: boolean
    shareAlike: boolean
  }
}
