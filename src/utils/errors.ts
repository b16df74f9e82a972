/**
 * Central error classes and validation utilities for the match engine
 * @module utils/errors
 */

/**
 * Base error class for all match engine errors
 */
export class MatchEngineError extends Error {
  /** Error code for programmatic error handling */
  public readonly code: string

  /** Additional error context */
  public readonly context?: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context?: Record<string, unknown>
  ) {
    super(message)
    this.name = 'MatchEngineError'
    this.code = code
    this.context = context

    // Maintains proper stack trace (Node.js specific)
    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, this.constructor)
    }
  }
}

/**
 * Error thrown when a referenced record identifier does not exist
 */
export class NotFoundError extends MatchEngineError {
  /** Kind of record that was looked up */
  public readonly entity: 'incoming' | 'reference'

  /** Identifier that was not found */
  public readonly recordId: string

  constructor(
    entity: 'incoming' | 'reference',
    recordId: string,
    context?: Record<string, unknown>
  ) {
    super(
      `${entity === 'incoming' ? 'Incoming' : 'Reference'} record '${recordId}' not found`,
      'NOT_FOUND',
      { entity, recordId, ...context }
    )
    this.name = 'NotFoundError'
    this.entity = entity
    this.recordId = recordId
  }
}

/**
 * Error thrown when a threshold configuration breaks the ordering invariant
 * `1 >= exact >= veryClose >= somewhatClose >= 0`
 */
export class InvalidConfigError extends MatchEngineError {
  public readonly field?: string

  constructor(message: string, field?: string, context?: Record<string, unknown>) {
    super(message, 'INVALID_CONFIG', { field, ...context })
    this.name = 'InvalidConfigError'
    this.field = field
  }
}

/**
 * Error thrown when the similarity provider fails or times out while a
 * record is being scored. The previous match result is left untouched.
 */
export class ProviderUnavailableError extends MatchEngineError {
  /** Operation that was aborted */
  public readonly operation: string

  /** Incoming record whose computation was aborted */
  public readonly recordId: string

  /** Underlying provider failure */
  public readonly cause?: unknown

  constructor(
    operation: string,
    recordId: string,
    cause?: unknown,
    context?: Record<string, unknown>
  ) {
    super(
      `Similarity provider unavailable during ${operation} for record '${recordId}'`,
      'PROVIDER_UNAVAILABLE',
      {
        operation,
        recordId,
        providerError: cause instanceof Error ? cause.message : String(cause),
        ...context,
      }
    )
    this.name = 'ProviderUnavailableError'
    this.operation = operation
    this.recordId = recordId
    this.cause = cause
  }
}

/**
 * Error thrown when a parameter value is invalid
 */
export class InvalidParameterError extends MatchEngineError {
  public readonly parameterName: string
  public readonly value: unknown
  public readonly reason: string

  constructor(
    parameterName: string,
    value: unknown,
    reason: string,
    context?: Record<string, unknown>
  ) {
    super(
      `Invalid parameter '${parameterName}': ${reason}`,
      'INVALID_PARAMETER',
      { parameterName, value, reason, ...context }
    )
    this.name = 'InvalidParameterError'
    this.parameterName = parameterName
    this.value = value
    this.reason = reason
  }
}

/**
 * Error thrown when the builder is missing a required collaborator
 */
export class NotConfiguredError extends MatchEngineError {
  public readonly feature: string

  constructor(feature: string, guidance: string, context?: Record<string, unknown>) {
    super(
      `Feature '${feature}' is not configured. ${guidance}`,
      'NOT_CONFIGURED',
      { feature, guidance, ...context }
    )
    this.name = 'NotConfiguredError'
    this.feature = feature
  }
}

// ==================== VALIDATION UTILITIES ====================

/**
 * Validates that a string has content other than whitespace
 */
export function requireNonEmptyString(
  value: string | null | undefined,
  parameterName: string
): string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new InvalidParameterError(parameterName, value, 'must not be empty')
  }
  return value
}

/**
 * Validates that a number is a positive integer
 */
export function requirePositiveInteger(value: number, parameterName: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new InvalidParameterError(parameterName, value, 'must be an integer')
  }
  if (value <= 0) {
    throw new InvalidParameterError(parameterName, value, 'must be positive (> 0)')
  }
  return value
}

/**
 * Validates that a number is within a specific range (inclusive)
 */
export function requireInRange(
  value: number,
  min: number,
  max: number,
  parameterName: string
): number {
  if (typeof value !== 'number' || isNaN(value)) {
    throw new InvalidParameterError(parameterName, value, 'must be a number')
  }
  if (value < min || value > max) {
    throw new InvalidParameterError(
      parameterName,
      value,
      `must be between ${min} and ${max} (inclusive)`
    )
  }
  return value
}

/**
 * Check if an error is a match engine error
 */
export function isMatchEngineError(error: unknown): error is MatchEngineError {
  return error instanceof MatchEngineError
}
