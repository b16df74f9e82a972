import { asc, count, desc, eq, sql } from 'drizzle-orm'
import type { NodePgDatabase } from 'drizzle-orm/node-postgres'
import type { MatchListOptions, MatchResultStore, MatchResultWrite } from '../types'
import type { MatchCategory, MatchResult } from '../../types/match'
import type { ThresholdConfig } from '../../types/config'
import { QueryError } from '../adapter-error'
import { customerMatchResults, type CustomerMatchResultRow } from './schema'

const table = customerMatchResults

/**
 * Match index storage in PostgreSQL through drizzle-orm.
 *
 * Upserts use `INSERT … ON CONFLICT (test_id) DO UPDATE`, and
 * recategorization is a single `UPDATE … SET match_category = CASE …`, so
 * each row changes atomically inside the database.
 *
 * @example
 * ```typescript
 * import { drizzle } from 'drizzle-orm/node-postgres'
 * import { Pool } from 'pg'
 *
 * const db = drizzle(new Pool({ connectionString }))
 * const store = new DrizzleMatchResultStore(db)
 * ```
 */
export class DrizzleMatchResultStore<
  TSchema extends Record<string, unknown> = Record<string, never>,
> implements MatchResultStore
{
  private readonly db: NodePgDatabase<TSchema>

  constructor(db: NodePgDatabase<TSchema>) {
    this.db = db
  }

  async get(testId: string): Promise<MatchResult | null> {
    try {
      const rows = await this.db
        .select()
        .from(table)
        .where(eq(table.testId, testId))
        .limit(1)
      return rows.length > 0 ? toMatchResult(rows[0]) : null
    } catch (error) {
      throw new QueryError('Failed to read match result', {
        testId,
        error: error instanceof Error ? error.message : String(error),
      })
    }
  }

  async upsert(write: MatchResultWrite): Promise<MatchResult> {
    let rows: CustomerMatchResultRow[]
    try {
      rows = await this.db
        .insert(table)
        .values({
          testId: write.testId,
          refId: write.refId,
          testRepresentation: write.testRepresentation,
          refRepresentation: write.refRepresentation,
          score: write.score,
          category: write.category,
          createdAt: write.writtenAt,
          updatedAt: write.writtenAt,
        })
        .onConflictDoUpdate({
          target: table.testId,
          set: {
            refId: write.refId,
            testRepresentation: write.testRepresentation,
            refRepresentation: write.refRepresentation,
            score: write.score,
            category: write.category,
            updatedAt: write.writtenAt,
          },
        })
        .returning()
    } catch (error) {
      throw new QueryError('Failed to upsert match result', {
        testId: write.testId,
        error: error instanceof Error ? error.message : String(error),
      })
    }

    if (rows.length === 0) {
      throw new QueryError('Upsert did not return a row', { testId: write.testId })
    }
    return toMatchResult(rows[0])
  }

  async recategorize(thresholds: ThresholdConfig, writtenAt: Date): Promise<number> {
    try {
      const rows = await this.db
        .update(table)
        .set({
          category: sql<MatchCategory>`CASE
            WHEN ${table.score} >= ${thresholds.exact} THEN 'EXACT'
            WHEN ${table.score} >= ${thresholds.veryClose} THEN 'VERY_CLOSE'
            WHEN ${table.score} >= ${thresholds.somewhatClose} THEN 'SOMEWHAT_CLOSE'
            ELSE 'NOT_CLOSE'
          END`,
          updatedAt: writtenAt,
        })
        .returning({ testId: table.testId })
      return rows.length
    } catch (error) {
      throw new QueryError('Failed to recategorize match results', {
        thresholds,
        error: error instanceof Error ? error.message : String(error),
      })
    }
  }

  async list(options: MatchListOptions = {}): Promise<MatchResult[]> {
    try {
      let query = this.db
        .select()
        .from(table)
        .where(options.category ? eq(table.category, options.category) : undefined)
        .orderBy(desc(table.score), asc(table.testId))
        .$dynamic()

      if (options.limit !== undefined) {
        query = query.limit(options.limit)
      }
      if (options.offset) {
        query = query.offset(options.offset)
      }

      const rows = await query
      return rows.map(toMatchResult)
    } catch (error) {
      throw new QueryError('Failed to list match results', {
        options,
        error: error instanceof Error ? error.message : String(error),
      })
    }
  }

  async countByCategory(): Promise<Partial<Record<MatchCategory, number>>> {
    try {
      const rows = await this.db
        .select({ category: table.category, count: count() })
        .from(table)
        .groupBy(table.category)

      const counts: Partial<Record<MatchCategory, number>> = {}
      for (const row of rows) {
        counts[row.category] = Number(row.count)
      }
      return counts
    } catch (error) {
      throw new QueryError('Failed to count match results by category', {
        error: error instanceof Error ? error.message : String(error),
      })
    }
  }

  async count(): Promise<number> {
    try {
      const rows = await this.db.select({ count: count() }).from(table)
      return rows.length > 0 ? Number(rows[0].count) : 0
    } catch (error) {
      throw new QueryError('Failed to count match results', {
        error: error instanceof Error ? error.message : String(error),
      })
    }
  }
}

function toMatchResult(row: CustomerMatchResultRow): MatchResult {
  return {
    testId: row.testId,
    refId: row.refId,
    testRepresentation: row.testRepresentation,
    refRepresentation: row.refRepresentation,
    score: row.score,
    category: row.category,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  }
}
