/**
 * Merge-specific error classes
 * @module merge/merge-error
 */

import { DiseaseNormalizerError, errorMessage } from '../utils/errors.js'

/**
 * Base error class for all merge-related errors
 */
export class MergeError extends DiseaseNormalizerError {
  constructor(
    message: string,
    code: string,
    context?: Record<string, unknown>
  ) {
    super(message, code, context)
    this.name = 'MergeError'
  }
}

/**
 * Error thrown when a merge is requested with inconsistent input
 */
export class MergeValidationError extends MergeError {
  constructor(
    field: string,
    reason: string,
    context?: Record<string, unknown>
  ) {
    super(
      `Merge validation failed for '${field}': ${reason}`,
      'MERGE_VALIDATION_ERROR',
      {
        field,
        reason,
        ...context,
      }
    )
    this.name = 'MergeValidationError'
  }
}

/**
 * Stage of a rebuild at which storage failed
 */
export type RebuildStage = 'load' | 'commit'

/**
 * Error thrown when a merge rebuild is aborted.
 * The previously committed merged set is left untouched.
 */
export class RebuildFailure extends MergeError {
  public readonly stage: RebuildStage
  public readonly storageError: unknown

  constructor(stage: RebuildStage, storageError: unknown) {
    super(
      `Merge rebuild failed while ${stage === 'load' ? 'loading source records' : 'committing merged records'}: ${errorMessage(storageError)}`,
      'REBUILD_FAILURE',
      { stage, error: errorMessage(storageError) }
    )
    this.name = 'RebuildFailure'
    this.stage = stage
    this.storageError = storageError
  }
}
