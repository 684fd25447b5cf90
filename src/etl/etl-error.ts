/**
 * Ingestion error classes
 * @module etl/etl-error
 */

import { DiseaseNormalizerError } from '../utils/errors.js'

/**
 * Base error class for ingestion errors
 */
export class EtlError extends DiseaseNormalizerError {
  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message, code, context)
    this.name = 'EtlError'
  }
}

/**
 * Error thrown when a source file cannot be read or does not have the
 * expected shape
 */
export class SourceFileError extends EtlError {
  public readonly filePath: string

  constructor(filePath: string, reason: string, context?: Record<string, unknown>) {
    super(`Cannot load source file '${filePath}': ${reason}`, 'SOURCE_FILE_ERROR', {
      filePath,
      reason,
      ...context,
    })
    this.name = 'SourceFileError'
    this.filePath = filePath
  }
}

/**
 * Error thrown when a term cannot be turned into a source record
 */
export class TransformError extends EtlError {
  public readonly termId: string

  constructor(termId: string, reason: string, context?: Record<string, unknown>) {
    super(`Cannot transform term '${termId}': ${reason}`, 'TRANSFORM_ERROR', {
      termId,
      reason,
      ...context,
    })
    this.name = 'TransformError'
    this.termId = termId
  }
}
