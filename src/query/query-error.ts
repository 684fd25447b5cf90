/**
 * Errors raised while validating query parameters
 * @module query/query-error
 */

import { InvalidParameterError } from '../utils/errors.js'
import { SOURCE_NAMES } from '../types/source.js'

/**
 * A source filter names a source that is not ingested by the normalizer
 */
export class UnknownSourceError extends InvalidParameterError {
  constructor(parameterName: string, value: string) {
    super(
      parameterName,
      value,
      `unknown source '${value}' (expected one of: ${SOURCE_NAMES.join(', ')})`
    )
    this.name = 'UnknownSourceError'
  }
}

/**
 * `include` and `exclude` were both given to a search
 */
export class ConflictingSourceFilterError extends InvalidParameterError {
  constructor(include: readonly string[], exclude: readonly string[]) {
    super('include', include, 'cannot be combined with exclude', { exclude })
    this.name = 'ConflictingSourceFilterError'
  }
}
