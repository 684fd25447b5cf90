/**
 * Merge-group synthesis and rebuild
 * @module merge
 */

export type {
  DataIntegrityKind,
  DataIntegrityIssue,
  IntegritySummary,
  GroupingResult,
  RebuildResult,
} from './types.js'
export { summarizeIssues } from './types.js'

export {
  MergeError,
  MergeValidationError,
  RebuildFailure,
  type RebuildStage,
} from './merge-error.js'

export { preferNonEmpty, unionCaseInsensitive, anyTrue } from './strategies.js'
export { RecordMerger } from './record-merger.js'
export { MergeRebuilder, type MergeRebuilderOptions } from './merge-rebuilder.js'
