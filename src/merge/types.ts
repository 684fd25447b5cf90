/**
 * Merge rebuild type definitions
 * @module merge/types
 */

import type { MergeGroup } from '../types/record.js'

/**
 * Kinds of data-integrity problems found while grouping records.
 *
 * - `dangling_xref` - xref to a concept id that was never ingested
 * - `self_reference` - xref to the record's own concept id
 * - `unknown_source` - record whose source cannot be ranked
 * - `prefix_mismatch` - concept id prefix disagrees with the record's source
 * - `duplicate_concept_id` - same concept id (case-insensitive) seen twice
 * - `same_source_conflict` - two members of one group come from the same source
 */
export type DataIntegrityKind =
  | 'dangling_xref'
  | 'self_reference'
  | 'unknown_source'
  | 'prefix_mismatch'
  | 'duplicate_concept_id'
  | 'same_source_conflict'

/**
 * A non-fatal data-integrity problem. The offending edge or record is left
 * out of grouping and the rebuild continues.
 */
export interface DataIntegrityIssue {
  kind: DataIntegrityKind
  /** Record the problem was found on */
  conceptId: string
  /** Human-readable detail */
  detail: string
  /** The other concept id involved, when there is one */
  relatedId?: string
}

/**
 * Summary counts of integrity issues for one rebuild
 */
export interface IntegritySummary {
  total: number
  byKind: Record<DataIntegrityKind, number>
}

/**
 * Output of the cross-reference graph builder
 */
export interface GroupingResult {
  groups: MergeGroup[]
  issues: DataIntegrityIssue[]
}

/**
 * Outcome of a successful merge rebuild
 */
export interface RebuildResult {
  success: true
  /** Number of merge groups produced, singletons included */
  groupCount: number
  /** Number of groups with more than one member */
  multiMemberGroupCount: number
  /** Number of source records that belong to a multi-member group */
  mergedMemberCount: number
  integrity: IntegritySummary
  issues: DataIntegrityIssue[]
  durationMs: number
}

/**
 * Builds the per-kind summary of a list of issues
 */
export function summarizeIssues(issues: DataIntegrityIssue[]): IntegritySummary {
  const byKind: Record<DataIntegrityKind, number> = {
    dangling_xref: 0,
    self_reference: 0,
    unknown_source: 0,
    prefix_mismatch: 0,
    duplicate_concept_id: 0,
    same_source_conflict: 0,
  }
  for (const issue of issues) {
    byKind[issue.kind] += 1
  }
  return { total: issues.length, byKind }
}
