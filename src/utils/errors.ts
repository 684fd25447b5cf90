/**
 * Error base class and argument checks shared by the public API
 * @module utils/errors
 */

/**
 * Root of every error the normalizer throws. `code` is stable across
 * releases; `message` is for people.
 */
export class DiseaseNormalizerError extends Error {
  public readonly code: string
  public readonly context?: Record<string, unknown>

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message)
    this.name = 'DiseaseNormalizerError'
    this.code = code
    this.context = context

    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, this.constructor)
    }
  }
}

/**
 * An argument of a public call was missing or out of range
 */
export class InvalidParameterError extends DiseaseNormalizerError {
  public readonly parameterName: string
  public readonly value: unknown
  public readonly reason: string

  constructor(
    parameterName: string,
    value: unknown,
    reason: string,
    context?: Record<string, unknown>
  ) {
    super(`Invalid parameter '${parameterName}': ${reason}`, 'INVALID_PARAMETER', {
      parameterName,
      value,
      reason,
      ...context,
    })
    this.name = 'InvalidParameterError'
    this.parameterName = parameterName
    this.value = value
    this.reason = reason
  }
}

/**
 * A configuration file or environment value could not be used
 */
export class ConfigurationError extends DiseaseNormalizerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', context)
    this.name = 'ConfigurationError'
  }
}

/**
 * `build()` was called before a required collaborator was set
 */
export class NotConfiguredError extends DiseaseNormalizerError {
  public readonly feature: string

  constructor(feature: string, guidance: string) {
    super(`Feature '${feature}' is not configured. ${guidance}`, 'NOT_CONFIGURED', {
      feature,
      guidance,
    })
    this.name = 'NotConfiguredError'
    this.feature = feature
  }
}

/**
 * Guards builder arguments passed from untyped callers
 */
export function requireNonNull<T>(value: T | null | undefined, parameterName: string): T {
  if (value === null || value === undefined) {
    throw new InvalidParameterError(parameterName, value, 'is required')
  }
  return value
}

export function requireNonEmptyString(value: unknown, parameterName: string): string {
  if (typeof value !== 'string') {
    throw new InvalidParameterError(parameterName, value, 'must be a string')
  }
  if (value.trim().length === 0) {
    throw new InvalidParameterError(parameterName, value, 'must not be empty')
  }
  return value
}

export function requireOneOf<T>(
  value: unknown,
  allowedValues: readonly T[],
  parameterName: string
): T {
  const match = allowedValues.find((allowed) => allowed === value)
  if (match === undefined) {
    throw new InvalidParameterError(
      parameterName,
      value,
      `must be one of: ${allowedValues.join(', ')}`
    )
  }
  return match
}

/**
 * Message of a thrown value, whatever was thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
