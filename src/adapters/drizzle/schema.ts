import { doublePrecision, pgTable, timestamp, varchar } from 'drizzle-orm/pg-core'
import { MATCH_CATEGORIES } from '../../types/match'

/**
 * Match index table: one row per scored incoming record.
 */
export const customerMatchResults = pgTable('customer_match_results', {
  testId: varchar('test_id', { length: 50 }).primaryKey(),
  refId: varchar('valid_id', { length: 50 }).notNull(),
  testRepresentation: varchar('test_customer_full_detail', { length: 1000 }).notNull(),
  refRepresentation: varchar('valid_customer_full_detail', { length: 1000 }).notNull(),
  score: doublePrecision('similarity_score').notNull(),
  category: varchar('match_category', { length: 20, enum: MATCH_CATEGORIES }).notNull(),
  createdAt: timestamp('created_timestamp', { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp('updated_timestamp', { withTimezone: true }).notNull().defaultNow(),
})

export type CustomerMatchResultRow = typeof customerMatchResults.$inferSelect
