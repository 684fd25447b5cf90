import type { MergedRecord, SourceRecord } from './record.js'
import type { SourceMeta, SourceName } from './source.js'

/**
 * Tier at which a query matched.
 * Evaluated top-down; the first tier with any hit wins.
 */
export const MatchType = {
  CONCEPT_ID: 'CONCEPT_ID',
  LABEL: 'LABEL',
  ALIAS: 'ALIAS',
  XREF: 'XREF',
  ASSOCIATED_WITH: 'ASSOCIATED_WITH',
  NO_MATCH: 'NO_MATCH',
} as const

export type MatchType = (typeof MatchType)[keyof typeof MatchType]

/**
 * Record fields that can be looked up case-insensitively
 */
export type LookupField =
  | 'concept_id'
  | 'label'
  | 'alias'
  | 'xref'
  | 'associated_with'

export const LOOKUP_FIELDS: readonly LookupField[] = [
  'concept_id',
  'label',
  'alias',
  'xref',
  'associated_with',
]

/**
 * Matching tiers in precedence order, paired with the field each one reads
 */
export const MATCH_TIERS: ReadonlyArray<{
  matchType: Exclude<MatchType, 'NO_MATCH'>
  field: LookupField
}> = [
  { matchType: MatchType.CONCEPT_ID, field: 'concept_id' },
  { matchType: MatchType.LABEL, field: 'label' },
  { matchType: MatchType.ALIAS, field: 'alias' },
  { matchType: MatchType.XREF, field: 'xref' },
  { matchType: MatchType.ASSOCIATED_WITH, field: 'associated_with' },
]

/**
 * Non-fatal condition attached to a query result
 */
export type QueryWarning =
  | {
      type: 'nbsp'
      message: string
    }
  | {
      type: 'ambiguous_match'
      message: string
      matchType: MatchType
      /** Competing merge refs, the chosen one first */
      candidates: string[]
    }
  | {
      type: 'merge_ref_missing'
      message: string
      conceptId: string
      mergeRef: string
    }

/**
 * One source record matched by `searchSource`
 */
export interface SourceMatch {
  record: SourceRecord
  matchType: MatchType
}

/**
 * Best matches contributed by one source to a search
 */
export interface SourceMatches {
  matchType: MatchType
  records: SourceRecord[]
  sourceMeta: SourceMeta | null
}

/**
 * Response to `search`
 */
export interface SearchResult {
  query: string
  warnings: QueryWarning[]
  sourceMatches: Partial<Record<SourceName, SourceMatches>>
}

/**
 * Response to `normalize`. Always returned, even when nothing matched.
 */
export interface NormalizationResult {
  query: string
  matchType: MatchType
  record: MergedRecord | null
  /** Metadata of every source named by the record's concept id or xrefs */
  sourceMeta: Partial<Record<SourceName, SourceMeta>>
  warnings: QueryWarning[]
}
