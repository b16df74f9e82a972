/**
 * Service-specific error classes for external services
 * @module services/service-error
 */

import type { ServiceErrorType } from './types'

/**
 * Base error class for all service-related errors
 */
export class ServiceError extends Error {
  /** Error code for programmatic handling */
  public readonly code: string

  /** Error type for categorization */
  public readonly type: ServiceErrorType

  /** Additional error context */
  public readonly context?: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    type: ServiceErrorType,
    context?: Record<string, unknown>
  ) {
    super(message)
    this.name = 'ServiceError'
    this.code = code
    this.type = type
    this.context = context

    // Maintains proper stack trace for where error was thrown (Node.js specific)
    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, this.constructor)
    }
  }
}

/**
 * Error thrown when a service call times out
 */
export class ServiceTimeoutError extends ServiceError {
  /** Timeout duration in milliseconds */
  public readonly timeoutMs: number

  /** Service name that timed out */
  public readonly serviceName: string

  constructor(
    serviceName: string,
    timeoutMs: number,
    context?: Record<string, unknown>
  ) {
    super(
      `Service '${serviceName}' timed out after ${timeoutMs}ms`,
      'SERVICE_TIMEOUT',
      'timeout',
      { serviceName, timeoutMs, ...context }
    )
    this.name = 'ServiceTimeoutError'
    this.serviceName = serviceName
    this.timeoutMs = timeoutMs
  }
}

/**
 * Error thrown when a service returns data the caller cannot use
 */
export class ServiceRejectedError extends ServiceError {
  /** Service name */
  public readonly serviceName: string

  /** Reason for rejection */
  public readonly reason: string

  constructor(
    serviceName: string,
    reason: string,
    context?: Record<string, unknown>
  ) {
    super(
      `Request rejected by service '${serviceName}': ${reason}`,
      'SERVICE_REJECTED',
      'rejected',
      { serviceName, reason, ...context }
    )
    this.name = 'ServiceRejectedError'
    this.serviceName = serviceName
    this.reason = reason
  }
}

/**
 * Checks if an error is a ServiceError
 */
export function isServiceError(error: unknown): error is ServiceError {
  return error instanceof ServiceError
}

/**
 * Creates a ServiceError from an unknown error
 */
export function toServiceError(
  error: unknown,
  serviceName: string,
  defaultType: ServiceErrorType = 'unknown'
): ServiceError {
  if (error instanceof ServiceError) {
    return error
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase()

    if (message.includes('timeout') || message.includes('timed out')) {
      return new ServiceTimeoutError(serviceName, 0, {
        originalError: error.message,
      })
    }

    if (
      message.includes('network') ||
      message.includes('econnrefused') ||
      message.includes('econnreset') ||
      message.includes('enotfound')
    ) {
      return new ServiceError(
        `Network error in service '${serviceName}': ${error.message}`,
        'SERVICE_NETWORK_ERROR',
        'network',
        { serviceName, originalError: error.message }
      )
    }

    return new ServiceError(
      `Service '${serviceName}' error: ${error.message}`,
      'SERVICE_ERROR',
      defaultType,
      { originalError: error.message, serviceName }
    )
  }

  return new ServiceError(
    `Service '${serviceName}' error: ${String(error)}`,
    'SERVICE_ERROR',
    defaultType,
    { originalError: String(error), serviceName }
  )
}
