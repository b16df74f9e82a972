import { describe, it, expect, beforeEach } from 'vitest'
import { TopKRetrieval, DEFAULT_TOP_K } from '../../../src/core/top-k'
import { ActiveThresholds } from '../../../src/core/thresholds'
import { LinearScanRetriever } from '../../../src/core/retrieval/linear-scan-retriever'
import { InMemoryRecordStore } from '../../../src/adapters/memory/memory-record-store'
import {
  InvalidParameterError,
  NotFoundError,
  ProviderUnavailableError,
} from '../../../src/utils/errors'
import { REFERENCE_RECORDS, R1_TEXT, R2_TEXT, R3_TEXT } from '../../fixtures/records'
import { ScriptedSimilarityProvider } from '../../fixtures/similarity'

const PRESCHOOL_TEXT = 'Fayetteville Creative Pre-Sch Fayetteville'

describe('TopKRetrieval', () => {
  let records: InMemoryRecordStore
  let provider: ScriptedSimilarityProvider
  let thresholds: ActiveThresholds
  let topK: TopKRetrieval

  beforeEach(async () => {
    records = new InMemoryRecordStore()
    await records.loadReferences(REFERENCE_RECORDS)
    await records.upsertIncoming({
      id: 'T2',
      sourceSystem: 'crm',
      name: 'Fayetteville Creative Pre-Sch',
      city: 'Fayetteville',
    })
    provider = new ScriptedSimilarityProvider()
      .set(PRESCHOOL_TEXT, R2_TEXT, 0.985)
      .set(PRESCHOOL_TEXT, R3_TEXT, 0.93)
      .set(PRESCHOOL_TEXT, R1_TEXT, 0.5)
    thresholds = new ActiveThresholds()
    topK = new TopKRetrieval(
      records,
      new LinearScanRetriever(records, provider),
      () => thresholds.value
    )
  })

  it('returns ranked candidates with categories', async () => {
    const ranked = await topK.topK('T2', 3)

    expect(ranked).toEqual([
      { rank: 1, refId: 'R2', refRepresentation: R2_TEXT, score: 0.985, category: 'VERY_CLOSE' },
      { rank: 2, refId: 'R3', refRepresentation: R3_TEXT, score: 0.93, category: 'SOMEWHAT_CLOSE' },
      { rank: 3, refId: 'R1', refRepresentation: R1_TEXT, score: 0.5, category: 'NOT_CLOSE' },
    ])
  })

  it('returns at most k candidates', async () => {
    const ranked = await topK.topK('T2', 2)

    expect(ranked.map((c) => c.refId)).toEqual(['R2', 'R3'])
  })

  it('returns every reference when k exceeds the reference count', async () => {
    expect(await topK.topK('T2', 50)).toHaveLength(3)
  })

  it(`defaults to k = ${DEFAULT_TOP_K}`, async () => {
    expect(DEFAULT_TOP_K).toBe(5)
    expect(await topK.topK('T2')).toHaveLength(3)
  })

  it('labels with the active thresholds', async () => {
    thresholds.replace({ exact: 0.98, veryClose: 0.95, somewhatClose: 0.9 })

    const [best] = await topK.topK('T2', 1)

    expect(best.category).toBe('EXACT')
  })

  it('rejects k that is not a positive integer', async () => {
    await expect(topK.topK('T2', 0)).rejects.toThrow(
      "Invalid parameter 'k': must be positive (> 0)"
    )
    await expect(topK.topK('T2', 1.5)).rejects.toThrow(
      "Invalid parameter 'k': must be an integer"
    )
    await expect(topK.topK('T2', -1)).rejects.toBeInstanceOf(InvalidParameterError)
    expect(provider.calls).toHaveLength(0)
  })

  it('rejects an invalid default k', () => {
    expect(
      () =>
        new TopKRetrieval(
          records,
          new LinearScanRetriever(records, provider),
          () => thresholds.value,
          0
        )
    ).toThrow(InvalidParameterError)
  })

  it('throws NotFoundError for an unknown record', async () => {
    await expect(topK.topK('T404', 3)).rejects.toBeInstanceOf(NotFoundError)
  })

  it('maps provider failures to ProviderUnavailableError', async () => {
    provider.failWhen()

    await expect(topK.topK('T2', 3)).rejects.toMatchObject({
      name: 'ProviderUnavailableError',
      operation: 'topK',
      recordId: 'T2',
    })
    await expect(topK.topK('T2', 3)).rejects.toBeInstanceOf(ProviderUnavailableError)
  })
})
