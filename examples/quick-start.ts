/**
 * Quick Start Example
 *
 * Classifies incoming customer records against a reference set entirely in
 * memory. It shows how to:
 * - Load reference records and submit incoming ones
 * - Plug in an embedding service as the similarity provider
 * - Read the category summary and a top-K list
 * - Change thresholds and watch categories move without re-scoring
 *
 * The embedding service here is a toy character-trigram hasher so the example
 * runs offline. In production, wrap your embedding API client instead.
 */

import {
  EmbeddingSimilarityProvider,
  InMemoryRecordStore,
  MatchEngineBuilder,
  defaultLogger,
  toNotification,
  type EmbeddingService,
} from '../src/index'

const DIMENSIONS = 64

// Hashes lowercase character trigrams into a fixed-size count vector
const trigramEmbeddings: EmbeddingService = {
  name: 'trigram-demo',
  async embed(text: string): Promise<number[]> {
    const vector = new Array<number>(DIMENSIONS).fill(0)
    const padded = `  ${text.toLowerCase()} `
    for (let i = 0; i + 3 <= padded.length; i++) {
      let hash = 0
      for (const char of padded.slice(i, i + 3)) {
        hash = (hash * 31 + char.charCodeAt(0)) % DIMENSIONS
      }
      vector[hash] += 1
    }
    return vector
  },
}

async function main(): Promise<void> {
  const records = new InMemoryRecordStore()
  await records.loadReferences([
    {
      id: 'R1',
      name: 'Alamo Elementary School',
      addressLine1: '12 Main St',
      city: 'Alamo',
      state: 'TX',
      postalCode: '78516',
      country: 'US',
    },
    {
      id: 'R2',
      name: 'Fayetteville Creative Pre-School',
      addressLine1: '410 Oak Ave',
      city: 'Fayetteville',
      state: 'AR',
      postalCode: '72701',
      country: 'US',
    },
  ])

  const engine = MatchEngineBuilder.create()
    .recordStore(records)
    .similarityProvider(new EmbeddingSimilarityProvider(trigramEmbeddings), { timeoutMs: 5000 })
    .logger(defaultLogger)
    .build()

  // A record identical to R1 scores 1.0
  const exact = await engine.submitRecord({
    sourceSystem: 'crm',
    name: 'Alamo Elementary School',
    addressLine1: '12 Main St',
    city: 'Alamo',
    state: 'TX',
    postalCode: '78516',
    country: 'US',
  })
  console.log('Identical record:', exact.result?.category, exact.result?.score)

  // An abbreviated name lands in a lower band
  const abbreviated = await engine.submitRecord({
    sourceSystem: 'erp',
    name: 'Fayetteville Creative Pre-Sch',
    addressLine1: '410 Oak Ave',
    city: 'Fayetteville',
    state: 'AR',
    postalCode: '72701',
    country: 'US',
  })
  console.log('Abbreviated record:', abbreviated.result?.category, abbreviated.result?.score)

  console.log('Summary:', await engine.aggregateCounts())
  console.log('Top 2 for the abbreviated record:', await engine.topK(abbreviated.record.id, 2))

  // Tightening thresholds only relabels stored rows
  const sweep = await engine.onThresholdsChanged({
    exact: 0.999,
    veryClose: 0.95,
    somewhatClose: 0.85,
  })
  console.log(`Recategorized ${sweep.updated} rows`)
  console.log('Summary after threshold change:', await engine.aggregateCounts())

  // Failures convert to user-facing messages
  try {
    await engine.topK('TEST_UNKNOWN', 3)
  } catch (error) {
    console.log(toNotification(error, 'topK', 'TEST_UNKNOWN').message)
  }
}

main().catch((error: unknown) => {
  console.error(error)
  process.exitCode = 1
})
