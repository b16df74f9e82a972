import type { RecordId } from './record'

/**
 * Match-confidence buckets, highest first.
 *
 * - `EXACT`: score at or above the `exact` threshold
 * - `VERY_CLOSE`: score at or above `veryClose`
 * - `SOMEWHAT_CLOSE`: score at or above `somewhatClose`
 * - `NOT_CLOSE`: everything else
 */
export const MATCH_CATEGORIES = [
  'EXACT',
  'VERY_CLOSE',
  'SOMEWHAT_CLOSE',
  'NOT_CLOSE',
] as const

export type MatchCategory = (typeof MATCH_CATEGORIES)[number]

/**
 * The persisted best match for one incoming record.
 * Exactly one row exists per incoming record that has been scored.
 */
export interface MatchResult {
  /** Incoming record this row belongs to (row key) */
  testId: RecordId
  /** Highest-scoring reference record */
  refId: RecordId
  /** Incoming record text at the time of scoring */
  testRepresentation: string
  /** Reference record text at the time of scoring */
  refRepresentation: string
  /** Cosine similarity in [0, 1] */
  score: number
  /** Category derived from `score` and the thresholds active when last written */
  category: MatchCategory
  /** Set when the row is first written */
  createdAt: Date
  /** Advanced on every recomputation that touches the row */
  updatedAt: Date
}

/**
 * A reference record scored against one incoming record.
 */
export interface ScoredCandidate {
  refId: RecordId
  refRepresentation: string
  score: number
}

/**
 * Entry returned by top-K retrieval.
 */
export interface RankedMatch extends ScoredCandidate {
  /** 1-based position in the ranking */
  rank: number
  /** Category under the currently active thresholds (display only) */
  category: MatchCategory
}

/**
 * Count and share of rows in one category.
 */
export interface CategoryCount {
  count: number
  /** count / total, or 0 when the index is empty */
  fraction: number
}

/**
 * Dashboard summary of the match index.
 */
export interface CategorySummary {
  total: number
  categories: Record<MatchCategory, CategoryCount>
}

/**
 * Lifecycle of an incoming record's match.
 */
export type MatchState = 'UNSCORED' | 'SCORED'
