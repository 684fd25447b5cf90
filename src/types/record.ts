import type { SourceName } from './source.js'

/**
 * Tri-state disease flag. `null` means the source made no assertion.
 */
export type DiseaseFlag = boolean | null

/**
 * One concept as described by exactly one source ontology.
 * This is the primary data structure that flows into the merge rebuild.
 */
export interface SourceRecord {
  /** Namespaced identifier, `<prefix>:<local id>`, stored as written */
  conceptId: string
  /** Owning ontology */
  sourceName: SourceName
  /** Primary display string, if the source gives one */
  label?: string | null
  /** Alternate names */
  aliases: string[]
  /** Concept ids asserted to denote the identical concept in another source */
  xrefs: string[]
  /** Related but not identical concepts; never used for grouping */
  associatedWith: string[]
  pediatricDisease?: DiseaseFlag
  oncologicDisease?: DiseaseFlag
  /**
   * merge_ref of the record's group as of the last committed rebuild.
   * Populated by storage; ignored on input to a rebuild.
   */
  mergeRef?: string | null
}

/**
 * A connected component of the cross-reference graph
 */
export interface MergeGroup {
  /** Canonical member concept id */
  mergeRef: string
  /** All member concept ids, merge_ref included, in canonical order */
  memberIds: string[]
}

/**
 * The normalized, user-facing entity for one merge group
 */
export interface MergedRecord {
  /** Equal to the group's merge_ref */
  conceptId: string
  /** Chosen label; empty when no member has one */
  label: string
  aliases: string[]
  xrefs: string[]
  associatedWith: string[]
  pediatricDisease: DiseaseFlag
  oncologicDisease: DiseaseFlag
}

/**
 * One merged record together with the members that point at it.
 * Storage writes these as a single replacement set.
 */
export interface MergeCommit {
  record: MergedRecord
  memberIds: string[]
}
