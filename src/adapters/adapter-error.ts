/**
 * Base error class for all adapter-related errors.
 * Extends Error with additional context and error codes.
 */
export class AdapterError extends Error {
  /**
   * Error code for programmatic error handling
   */
  readonly code: string

  /**
   * Additional context about the error
   */
  readonly context?: Record<string, unknown>

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message)
    this.name = 'AdapterError'
    this.code = code
    this.context = context

    Object.setPrototypeOf(this, AdapterError.prototype)
  }
}

/**
 * Error thrown when query execution fails.
 *
 * @example
 * ```typescript
 * throw new QueryError(
 *   'Failed to upsert match result',
 *   { testId: 'TEST_0001', table: 'customer_match_results' }
 * )
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
 * Error thrown when data handed to a store is invalid.
 *
 * @example
 * ```typescript
 * throw new ValidationError(
 *   'Reference record already loaded',
 *   { id: 'R1' }
 * )
 * ```
 */
export class ValidationError extends AdapterError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', context)
    this.name = 'ValidationError'
    Object.setPrototypeOf(this, ValidationError.prototype)
  }
}
