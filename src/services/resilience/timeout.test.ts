/**
 * Tests for timeout utilities
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { withTimeout } from './timeout'
import { ServiceTimeoutError } from '../service-error'

describe('Timeout', () => {
  beforeEach(() => {
    vi.useFakeTimers()
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe('withTimeout', () => {
    it('resolves when operation completes within timeout', async () => {
      const promise = new Promise<string>((resolve) => {
        setTimeout(() => resolve('success'), 100)
      })

      const resultPromise = withTimeout(promise, { timeoutMs: 200 })

      await vi.advanceTimersByTimeAsync(100)

      expect(await resultPromise).toBe('success')
    })

    it('rejects with ServiceTimeoutError when exceeded', async () => {
      const promise = new Promise<string>((resolve) => {
        setTimeout(() => resolve('success'), 200)
      })

      const resultPromise = withTimeout(promise, { timeoutMs: 100, serviceName: 'embeddings' })
      const assertion = expect(resultPromise).rejects.toThrow(
        "Service 'embeddings' timed out after 100ms"
      )

      await vi.advanceTimersByTimeAsync(100)

      await assertion
    })

    it('uses "unknown" when no service name is given', async () => {
      const resultPromise = withTimeout(new Promise<never>(() => {}), { timeoutMs: 50 })
      const assertion = expect(resultPromise).rejects.toBeInstanceOf(ServiceTimeoutError)

      await vi.advanceTimersByTimeAsync(50)

      await assertion
      await expect(resultPromise).rejects.toThrow("Service 'unknown' timed out after 50ms")
    })

    it('propagates the original rejection', async () => {
      const failure = new Error('connect ECONNREFUSED')

      await expect(
        withTimeout(Promise.reject(failure), { timeoutMs: 100 })
      ).rejects.toBe(failure)
    })

    it('rejects a non-positive timeout', async () => {
      await expect(withTimeout(Promise.resolve(1), { timeoutMs: 0 })).rejects.toThrow(
        'Timeout must be a positive number'
      )
    })
  })
})
