/**
 * Timeout utility for wrapping async operations with a timeout
 * @module services/resilience/timeout
 */

import { ServiceTimeoutError } from '../service-error'

/**
 * Options for the timeout wrapper
 */
export interface TimeoutOptions {
  /** Timeout duration in milliseconds */
  timeoutMs: number

  /** Service name for error messages */
  serviceName?: string
}

/**
 * Wraps a promise with a timeout
 *
 * The wrapped promise keeps running after a timeout; only its result is
 * discarded.
 *
 * @param promise - The promise to wrap
 * @param options - Timeout options
 * @returns The result of the promise
 * @throws ServiceTimeoutError if the timeout is exceeded
 *
 * @example
 * ```typescript
 * const vector = await withTimeout(
 *   embeddings.embed('Alamo Elementary School'),
 *   { timeoutMs: 5000, serviceName: 'embeddings' }
 * )
 * ```
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  options: TimeoutOptions,
): Promise<T> {
  const { timeoutMs, serviceName = 'unknown' } = options

  if (timeoutMs <= 0) {
    throw new Error('Timeout must be a positive number')
  }

  return new Promise<T>((resolve, reject) => {
    let settled = false

    const timeoutId = setTimeout(() => {
      if (settled) return
      settled = true
      reject(new ServiceTimeoutError(serviceName, timeoutMs))
    }, timeoutMs)

    const cleanup = () => {
      clearTimeout(timeoutId)
    }

    promise.then(
      (value) => {
        if (settled) return
        settled = true
        cleanup()
        resolve(value)
      },
      (error: unknown) => {
        if (settled) return
        settled = true
        cleanup()
        reject(error)
      },
    )
  })
}
