import type { EmbeddingService, SimilarityProvider } from '../types'
import { ServiceRejectedError, toServiceError } from '../service-error'
import { cosineSimilarity, toSimilarityScore } from './cosine'

/**
 * Options for {@link EmbeddingSimilarityProvider}
 */
export interface EmbeddingSimilarityOptions {
  /** Maximum number of cached vectors (default: 10000). Least recently used entries are evicted first. */
  maxCacheSize?: number
}

/**
 * Similarity provider backed by an external embedding service.
 *
 * Vectors are cached per text so each reference representation is embedded
 * once; the cache belongs to the provider, never to the engine.
 *
 * @example
 * ```typescript
 * const provider = new EmbeddingSimilarityProvider({
 *   name: 'embeddings',
 *   embed: (text) => client.embed(text),
 * })
 * await provider.similarity('Fayetteville Creative Pre-Sch', 'Fayetteville Creative Pre-School')
 * ```
 */
export class EmbeddingSimilarityProvider implements SimilarityProvider {
  readonly name: string
  private readonly service: EmbeddingService
  private readonly maxCacheSize: number
  private readonly cache = new Map<string, number[]>()
  private readonly inFlight = new Map<string, Promise<number[]>>()

  constructor(service: EmbeddingService, options: EmbeddingSimilarityOptions = {}) {
    this.service = service
    this.name = service.name
    this.maxCacheSize = options.maxCacheSize ?? 10000
  }

  async similarity(textA: string, textB: string): Promise<number> {
    const [a, b] = await Promise.all([this.vectorFor(textA), this.vectorFor(textB)])

    if (a.length !== b.length) {
      throw new ServiceRejectedError(
        this.name,
        `embedding dimensions differ (${a.length} vs ${b.length})`
      )
    }

    return toSimilarityScore(cosineSimilarity(a, b))
  }

  /** Number of cached vectors */
  get cacheSize(): number {
    return this.cache.size
  }

  clearCache(): void {
    this.cache.clear()
  }

  private vectorFor(text: string): Promise<number[]> {
    const cached = this.cache.get(text)
    if (cached) {
      // move to the end so eviction drops the least recently used vector
      this.cache.delete(text)
      this.cache.set(text, cached)
      return Promise.resolve(cached)
    }

    const pending = this.inFlight.get(text)
    if (pending) {
      return pending
    }

    const request = this.service
      .embed(text)
      .then((vector) => {
        this.requireUsable(vector)
        this.remember(text, vector)
        return vector
      })
      .catch((error: unknown) => {
        throw toServiceError(error, this.name)
      })
      .finally(() => {
        this.inFlight.delete(text)
      })

    this.inFlight.set(text, request)
    return request
  }

  /**
   * @throws {ServiceRejectedError} If the vector is empty or has a
   *   non-finite component
   */
  private requireUsable(vector: number[]): void {
    if (vector.length === 0) {
      throw new ServiceRejectedError(this.name, 'embedding is empty')
    }
    if (!vector.every((component) => Number.isFinite(component))) {
      throw new ServiceRejectedError(this.name, 'embedding has non-finite components')
    }
  }

  private remember(text: string, vector: number[]): void {
    if (this.maxCacheSize <= 0) return

    if (this.cache.size >= this.maxCacheSize) {
      const oldest = this.cache.keys().next()
      if (!oldest.done) {
        this.cache.delete(oldest.value)
      }
    }
    this.cache.set(text, vector)
  }
}
