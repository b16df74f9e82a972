import { describe, it, expect, vi } from 'vitest'
import { EmbeddingSimilarityProvider } from './embedding-provider'
import { withSimilarityTimeout } from './with-timeout'
import { ServiceError, ServiceRejectedError, ServiceTimeoutError } from '../service-error'
import type { EmbeddingService } from '../types'

const VECTORS: Record<string, number[]> = {
  alamo: [1, 0, 0],
  'alamo elem': [1, 0, 0],
  fayetteville: [0, 1, 0],
  opposite: [-1, 0, 0],
  short: [1, 0],
  broken: [Number.NaN, Number.NaN, 0],
  blank: [],
}

function createService() {
  const embed = vi.fn(async (text: string): Promise<number[]> => {
    const vector = VECTORS[text]
    if (!vector) {
      throw new Error(`no vector for ${text}`)
    }
    return vector
  })
  return { name: 'embeddings', embed } satisfies EmbeddingService
}

describe('EmbeddingSimilarityProvider', () => {
  it('takes its name from the service', () => {
    expect(new EmbeddingSimilarityProvider(createService()).name).toBe('embeddings')
  })

  it('scores identical directions as 1', async () => {
    const provider = new EmbeddingSimilarityProvider(createService())

    expect(await provider.similarity('alamo', 'alamo elem')).toBe(1)
  })

  it('scores orthogonal vectors as 0', async () => {
    const provider = new EmbeddingSimilarityProvider(createService())

    expect(await provider.similarity('alamo', 'fayetteville')).toBe(0)
  })

  it('clamps opposing vectors to 0', async () => {
    const provider = new EmbeddingSimilarityProvider(createService())

    expect(await provider.similarity('alamo', 'opposite')).toBe(0)
  })

  it('embeds each text once', async () => {
    const service = createService()
    const provider = new EmbeddingSimilarityProvider(service)

    await provider.similarity('alamo', 'fayetteville')
    await provider.similarity('alamo elem', 'fayetteville')

    expect(service.embed).toHaveBeenCalledTimes(3)
    expect(provider.cacheSize).toBe(3)
  })

  it('shares an in-flight request between concurrent callers', async () => {
    const service = createService()
    const provider = new EmbeddingSimilarityProvider(service)

    await Promise.all([
      provider.similarity('alamo', 'fayetteville'),
      provider.similarity('alamo', 'fayetteville'),
    ])

    expect(service.embed).toHaveBeenCalledTimes(2)
  })

  it('evicts the least recently used vector when full', async () => {
    const service = createService()
    const provider = new EmbeddingSimilarityProvider(service, { maxCacheSize: 2 })

    await provider.similarity('alamo', 'fayetteville')
    await provider.similarity('alamo', 'alamo')
    await provider.similarity('alamo elem', 'alamo')
    service.embed.mockClear()

    await provider.similarity('alamo', 'alamo elem')

    expect(provider.cacheSize).toBe(2)
    expect(service.embed).not.toHaveBeenCalled()
  })

  it('clears the cache', async () => {
    const provider = new EmbeddingSimilarityProvider(createService())
    await provider.similarity('alamo', 'fayetteville')

    provider.clearCache()

    expect(provider.cacheSize).toBe(0)
  })

  it('rejects vectors of different dimensions', async () => {
    const provider = new EmbeddingSimilarityProvider(createService())

    await expect(provider.similarity('alamo', 'short')).rejects.toThrow(ServiceRejectedError)
    await expect(provider.similarity('alamo', 'short')).rejects.toThrow(
      "Request rejected by service 'embeddings': embedding dimensions differ (3 vs 2)"
    )
  })

  it('rejects an embedding with non-finite components', async () => {
    const provider = new EmbeddingSimilarityProvider(createService())

    await expect(provider.similarity('alamo', 'broken')).rejects.toThrow(
      "Request rejected by service 'embeddings': embedding has non-finite components"
    )
  })

  it('rejects an empty embedding', async () => {
    const provider = new EmbeddingSimilarityProvider(createService())

    await expect(provider.similarity('blank', 'blank')).rejects.toBeInstanceOf(
      ServiceRejectedError
    )
    await expect(provider.similarity('blank', 'blank')).rejects.toThrow(
      "Request rejected by service 'embeddings': embedding is empty"
    )
  })

  it('does not cache unusable embeddings', async () => {
    const service = createService()
    const provider = new EmbeddingSimilarityProvider(service)

    await expect(provider.similarity('broken', 'alamo')).rejects.toThrow()

    expect(provider.cacheSize).toBe(1)
  })

  it('wraps service failures in ServiceError', async () => {
    const provider = new EmbeddingSimilarityProvider(createService())

    await expect(provider.similarity('alamo', 'unknown text')).rejects.toBeInstanceOf(
      ServiceError
    )
    await expect(provider.similarity('alamo', 'unknown text')).rejects.toThrow(
      "Service 'embeddings' error: no vector for unknown text"
    )
  })

  it('does not cache failures', async () => {
    const service = createService()
    const provider = new EmbeddingSimilarityProvider(service)

    await expect(provider.similarity('unknown text', 'alamo')).rejects.toThrow()
    await expect(provider.similarity('unknown text', 'alamo')).rejects.toThrow()

    expect(service.embed.mock.calls.filter(([text]) => text === 'unknown text')).toHaveLength(2)
  })
})

describe('withSimilarityTimeout', () => {
  it('passes results through', async () => {
    const provider = withSimilarityTimeout(
      { name: 'fast', similarity: async () => 0.5 },
      { timeoutMs: 1000 }
    )

    expect(provider.name).toBe('fast')
    expect(await provider.similarity('a', 'b')).toBe(0.5)
  })

  it('rejects calls that exceed the timeout', async () => {
    vi.useFakeTimers()
    try {
      const provider = withSimilarityTimeout(
        { name: 'slow', similarity: () => new Promise<number>(() => {}) },
        { timeoutMs: 100 }
      )

      const result = provider.similarity('a', 'b')
      const assertion = expect(result).rejects.toBeInstanceOf(ServiceTimeoutError)
      await vi.advanceTimersByTimeAsync(100)

      await assertion
    } finally {
      vi.useRealTimers()
    }
  })
})
