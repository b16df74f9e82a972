/**
 * PostgreSQL Example
 *
 * Persists the match index in PostgreSQL through drizzle-orm, so summaries
 * and threshold sweeps run against the `customer_match_results` table.
 *
 * Create the table first (or generate a migration from
 * `src/adapters/drizzle/schema.ts` with drizzle-kit):
 *
 *   CREATE TABLE customer_match_results (
 *     test_id                    varchar(50) PRIMARY KEY,
 *     valid_id                   varchar(50) NOT NULL,
 *     test_customer_full_detail  varchar(1000) NOT NULL,
 *     valid_customer_full_detail varchar(1000) NOT NULL,
 *     similarity_score           double precision NOT NULL,
 *     match_category             varchar(20) NOT NULL,
 *     created_timestamp          timestamptz NOT NULL DEFAULT now(),
 *     updated_timestamp          timestamptz NOT NULL DEFAULT now()
 *   );
 *
 * Run with DATABASE_URL set, e.g. postgres://localhost:5432/matching
 */

import { drizzle } from 'drizzle-orm/node-postgres'
import { Pool } from 'pg'
import {
  InMemoryRecordStore,
  MatchEngineBuilder,
  createPrefixedLogger,
  defaultLogger,
  drizzleMatchStore,
  type SimilarityProvider,
} from '../src/index'

// Stand-in provider; replace with EmbeddingSimilarityProvider over your embedding API
const demoProvider: SimilarityProvider = {
  name: 'demo',
  async similarity(textA: string, textB: string): Promise<number> {
    return textA === textB ? 1 : 0.5
  },
}

async function main(): Promise<void> {
  const pool = new Pool({ connectionString: process.env.DATABASE_URL })
  const db = drizzle(pool)

  const records = new InMemoryRecordStore()
  await records.loadReferences([
    { id: 'R1', name: 'Riverside Community Library', city: 'Riverside', state: 'CA' },
  ])
  await records.upsertIncoming({
    id: 'TEST_0001',
    sourceSystem: 'crm',
    name: 'Riverside Community Library',
    city: 'Riverside',
    state: 'CA',
  })

  const engine = MatchEngineBuilder.create()
    .recordStore(records)
    .similarityProvider(demoProvider)
    .matchStore(drizzleMatchStore(db))
    .logger(createPrefixedLogger('postgres-example', defaultLogger))
    .build()

  try {
    const outcome = await engine.backfill()
    console.log(`Scored ${outcome.scored}, skipped ${outcome.skipped}`)
    console.log(await engine.listMatches({ limit: 10 }))
  } finally {
    await pool.end()
  }
}

main().catch((error: unknown) => {
  console.error(error)
  process.exitCode = 1
})
