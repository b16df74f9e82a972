import type { NodePgDatabase } from 'drizzle-orm/node-postgres'
import type { MatchResultStore } from '../types'
import { DrizzleMatchResultStore } from './drizzle-match-store'

/**
 * Creates a Drizzle-backed match result store.
 *
 * @param db - Drizzle database instance (node-postgres driver)
 * @returns Configured match result store
 *
 * @example
 * ```typescript
 * import { drizzle } from 'drizzle-orm/node-postgres'
 * import { Pool } from 'pg'
 *
 * const db = drizzle(new Pool({ connectionString: process.env.DATABASE_URL }))
 *
 * const engine = MatchEngineBuilder.create()
 *   .recordStore(records)
 *   .similarityProvider(provider)
 *   .matchStore(drizzleMatchStore(db))
 *   .build()
 * ```
 */
export function drizzleMatchStore<TSchema extends Record<string, unknown>>(
  db: NodePgDatabase<TSchema>
): MatchResultStore {
  return new DrizzleMatchResultStore<TSchema>(db)
}

export { DrizzleMatchResultStore }
export { customerMatchResults, type CustomerMatchResultRow } from './schema'
