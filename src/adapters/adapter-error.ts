import { DiseaseNormalizerError } from '../utils/errors.js'

/**
 * Base error class for all storage-related errors.
 *
 * @example
 * ```typescript
 * if (error instanceof AdapterError) {
 *   console.error(error.code, error.context)
 * }
 * ```
 */
export class AdapterError extends DiseaseNormalizerError {
  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message, code, context)
    this.name = 'AdapterError'
    Object.setPrototypeOf(this, AdapterError.prototype)
  }
}

/**
 * Error thrown when the database cannot be reached.
 *
 * @example
 * ```typescript
 * throw new ConnectionError('Failed to connect to database', { host: 'localhost' })
 * ```
 */
export class ConnectionError extends AdapterError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONNECTION_ERROR', context)
    this.name = 'ConnectionError'
    Object.setPrototypeOf(this, ConnectionError.prototype)
  }
}

/**
 * Error thrown when a read or write statement fails.
 *
 * @example
 * ```typescript
 * throw new QueryError('Failed to look up alias', { value: 'nsclc' })
 * ```
 */
export class QueryError extends AdapterError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'QUERY_ERROR', context)
    this.name = 'QueryError'
    Object.setPrototypeOf(this, QueryError.prototype)
  }
}

/**
 * Error thrown when a transaction is rolled back.
 *
 * @example
 * ```typescript
 * throw new TransactionError('Merged record replacement rolled back', { commits: 12 })
 * ```
 */
export class TransactionError extends AdapterError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'TRANSACTION_ERROR', context)
    this.name = 'TransactionError'
    Object.setPrototypeOf(this, TransactionError.prototype)
  }
}

/**
 * Error thrown when a record handed to a store is malformed.
 */
export class ValidationError extends AdapterError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', context)
    this.name = 'ValidationError'
    Object.setPrototypeOf(this, ValidationError.prototype)
  }
}
