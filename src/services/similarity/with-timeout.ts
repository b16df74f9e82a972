import type { SimilarityProvider } from '../types'
import { withTimeout } from '../resilience/timeout'

/**
 * Bounds every similarity call of a provider by a timeout.
 * An expired call rejects with `ServiceTimeoutError`.
 */
export function withSimilarityTimeout(
  provider: SimilarityProvider,
  options: { timeoutMs: number }
): SimilarityProvider {
  return {
    name: provider.name,
    similarity: (textA, textB) =>
      withTimeout(provider.similarity(textA, textB), {
        timeoutMs: options.timeoutMs,
        serviceName: provider.name,
      }),
  }
}
