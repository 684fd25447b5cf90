/**
 * Turns extracted terms into source records
 * @module etl/base-transformer
 */

import type { SourceRecord } from '../types/record.js'
import {
  EXTERNAL_PREFIXES,
  SOURCE_PREFIXES,
  sourceForConceptId,
  splitConceptId,
  type SourceMeta,
  type SourceName,
} from '../types/source.js'
import { createSilentLogger, type Logger } from '../utils/logger.js'
import { CaseInsensitiveSet, uniqueAsWritten } from '../utils/strings.js'
import { TransformError } from './etl-error.js'
import type { ExtractedTerm } from './source-file.js'

/** Terms with more aliases than this keep none of them */
export const MAX_ALIASES = 20

/**
 * Reference prefixes as written by the sources, upper-cased, mapped to the
 * namespace prefix used in stored concept ids
 */
const REFERENCE_PREFIXES: Readonly<Record<string, string>> = {
  NCI: 'ncit',
  NCIT: 'ncit',
  MONDO: 'mondo',
  DOID: 'DOID',
  MIM: 'MIM',
  OMIM: 'MIM',
  ONCOTREE: 'oncotree',
  EFO: 'efo',
  GARD: 'gard',
  ICDO: 'icdo',
  ICD9: 'icd9.cm',
  ICD9CM: 'icd9.cm',
  'ICD9.CM': 'icd9.cm',
  ICD10: 'icd10',
  ICD10CM: 'icd10.cm',
  'ICD10.CM': 'icd10.cm',
  IMDRF: 'imdrf',
  KEGG: 'kegg.disease',
  'KEGG.DISEASE': 'kegg.disease',
  MEDDRA: 'meddra',
  MEDGEN: 'medgen',
  MESH: 'mesh',
  ORDO: 'orphanet',
  ORPHANET: 'orphanet',
  UMLS: 'umls',
  UMLS_CUI: 'umls',
}

/**
 * Canonical namespace for a reference prefix written in any casing
 */
export function canonicalPrefix(prefix: string): string | undefined {
  const known = REFERENCE_PREFIXES[prefix.toUpperCase()]
  if (known) return known
  const lower = prefix.toLowerCase()
  return EXTERNAL_PREFIXES.find((external) => external === lower)
}

/**
 * Where a reference ends up on the record
 */
export type ReferenceRoute = 'xrefs' | 'associatedWith'

export interface TransformerOptions {
  logger?: Logger
}

/**
 * SourceTransformer - per-source rules for building records
 *
 * Subclasses name their source and metadata and may override
 * {@link routeReference} and the default flags.
 */
export abstract class SourceTransformer {
  abstract readonly sourceName: SourceName
  protected readonly logger: Logger

  constructor(options: TransformerOptions = {}) {
    this.logger = options.logger ?? createSilentLogger()
  }

  /**
   * Licensing and download metadata for a release of this source
   */
  abstract meta(version: string): SourceMeta

  /**
   * Builds one record. Unrecognized references are logged and dropped.
   *
   * @throws {TransformError} If the term id does not belong to this source
   */
  transform(term: ExtractedTerm): SourceRecord {
    const conceptId = this.conceptId(term.id)
    const label = term.label && term.label.length > 0 ? term.label : null

    const xrefs: string[] = []
    const associatedWith: string[] = []
    for (const reference of term.references) {
      const curie = this.normalizeReference(conceptId, reference)
      if (!curie) continue
      if (this.routeReference(curie) === 'xrefs') {
        xrefs.push(curie)
      } else {
        associatedWith.push(curie)
      }
    }

    return {
      conceptId,
      sourceName: this.sourceName,
      label,
      aliases: this.aliases(conceptId, label, term.synonyms),
      xrefs: uniqueAsWritten(xrefs),
      associatedWith: uniqueAsWritten(associatedWith),
      pediatricDisease: term.pediatricDisease ?? this.defaultPediatricDisease(),
      oncologicDisease: term.oncologicDisease ?? this.defaultOncologicDisease(),
    }
  }

  /**
   * References into ingested sources are xrefs; everything else is an
   * association
   */
  protected routeReference(curie: string): ReferenceRoute {
    return sourceForConceptId(curie) ? 'xrefs' : 'associatedWith'
  }

  /**
   * Source-specific cleanup of one synonym before it becomes an alias
   */
  protected cleanSynonym(synonym: string): string {
    return synonym
  }

  protected defaultPediatricDisease(): boolean | null {
    return null
  }

  protected defaultOncologicDisease(): boolean | null {
    return null
  }

  /**
   * Stored form of a term id. Bare local ids get the source prefix.
   */
  protected conceptId(termId: string): string {
    const parts = splitConceptId(termId)
    if (!parts) {
      if (termId.includes(':')) {
        throw new TransformError(termId, 'malformed identifier')
      }
      return `${SOURCE_PREFIXES[this.sourceName]}:${termId}`
    }

    const prefix = canonicalPrefix(parts.prefix)
    const conceptId = `${prefix ?? parts.prefix}:${parts.localId}`
    if (sourceForConceptId(conceptId) !== this.sourceName) {
      throw new TransformError(termId, `prefix does not belong to ${this.sourceName}`)
    }
    return conceptId
  }

  private normalizeReference(conceptId: string, reference: string): string | null {
    const parts = splitConceptId(reference.trim())
    const prefix = parts ? canonicalPrefix(parts.prefix) : undefined
    if (!parts || !prefix) {
      this.logger.warn('Unrecognized reference dropped', { conceptId, reference })
      return null
    }
    return `${prefix}:${parts.localId}`
  }

  private aliases(
    conceptId: string,
    label: string | null,
    synonyms: string[]
  ): string[] {
    const aliases = uniqueAsWritten(
      synonyms
        .map((synonym) => this.cleanSynonym(synonym))
        .filter((synonym) => synonym.length > 0 && synonym !== label)
    )
    const distinct = new CaseInsensitiveSet()
    distinct.addAll(aliases)
    if (distinct.size > MAX_ALIASES) {
      this.logger.debug(`${conceptId} has more than ${MAX_ALIASES} aliases; dropping them`, {
        conceptId,
        aliases: distinct.size,
      })
      return []
    }
    return aliases
  }
}
