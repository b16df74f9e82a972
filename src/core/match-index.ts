import type { MatchListOptions, MatchResultStore, RecordStore } from '../adapters/types'
import type { ThresholdConfig } from '../types/config'
import type { RecordId } from '../types/record'
import {
  MATCH_CATEGORIES,
  type CategoryCount,
  type CategorySummary,
  type MatchCategory,
  type MatchResult,
} from '../types/match'
import { NotFoundError, requireInRange } from '../utils/errors'
import { classify } from './scoring/category-classifier'
import { validateThresholds } from './thresholds'

/**
 * Options for {@link MatchIndex}
 */
export interface MatchIndexOptions {
  /** Source of the currently active thresholds, read at write time */
  thresholds: () => Readonly<ThresholdConfig>
  /** Timestamp source (default: `() => new Date()`) */
  clock?: () => Date
}

/**
 * The engine-owned table of best matches, one row per scored incoming record.
 *
 * Rows refer to records by identifier only. All writes go through the
 * configured {@link MatchResultStore}, which replaces rows whole.
 */
export class MatchIndex {
  private readonly store: MatchResultStore
  private readonly records: RecordStore
  private readonly activeThresholds: () => Readonly<ThresholdConfig>
  private readonly clock: () => Date

  constructor(store: MatchResultStore, records: RecordStore, options: MatchIndexOptions) {
    this.store = store
    this.records = records
    this.activeThresholds = options.thresholds
    this.clock = options.clock ?? (() => new Date())
  }

  /**
   * Inserts or replaces the row for `testId`.
   *
   * The category is computed with the thresholds active at the time of the
   * write. `createdAt` survives replacement; `updatedAt` is advanced.
   *
   * @throws {NotFoundError} If either record does not exist; nothing is written
   * @throws {InvalidParameterError} If `score` is outside [0, 1]
   */
  async upsert(
    testId: RecordId,
    refId: RecordId,
    score: number,
    testRepresentation: string,
    refRepresentation: string
  ): Promise<MatchResult> {
    requireInRange(score, 0, 1, 'score')

    const [incoming, reference] = await Promise.all([
      this.records.getIncoming(testId),
      this.records.getReference(refId),
    ])
    if (!incoming) {
      throw new NotFoundError('incoming', testId)
    }
    if (!reference) {
      throw new NotFoundError('reference', refId)
    }

    return this.store.upsert({
      testId,
      refId,
      testRepresentation,
      refRepresentation,
      score,
      category: classify(score, this.activeThresholds()),
      writtenAt: this.clock(),
    })
  }

  /**
   * Recomputes every row's category from its stored score under `thresholds`.
   * Similarity is never recomputed; only labels move.
   *
   * @returns Number of rows touched
   * @throws {InvalidConfigError} If `thresholds` violates the ordering invariant
   */
  async recategorizeAll(thresholds: ThresholdConfig): Promise<number> {
    validateThresholds(thresholds)
    return this.store.recategorize(thresholds, this.clock())
  }

  async get(testId: RecordId): Promise<MatchResult | null> {
    return this.store.get(testId)
  }

  /**
   * Rows ordered by score descending (ties by `testId`), optionally
   * filtered by category and paginated.
   */
  async list(options?: MatchListOptions): Promise<MatchResult[]> {
    return this.store.list(options)
  }

  async size(): Promise<number> {
    return this.store.count()
  }

  /**
   * Count and fraction of rows per category.
   *
   * Every category is present in the summary, with zero counts where no
   * rows exist. Fractions are relative to the total number of rows.
   */
  async aggregateCounts(): Promise<CategorySummary> {
    const counts = await this.store.countByCategory()
    const total = MATCH_CATEGORIES.reduce((sum, category) => sum + (counts[category] ?? 0), 0)

    const entry = (category: MatchCategory): CategoryCount => {
      const count = counts[category] ?? 0
      return { count, fraction: total > 0 ? count / total : 0 }
    }

    return {
      total,
      categories: {
        EXACT: entry('EXACT'),
        VERY_CLOSE: entry('VERY_CLOSE'),
        SOMEWHAT_CLOSE: entry('SOMEWHAT_CLOSE'),
        NOT_CLOSE: entry('NOT_CLOSE'),
      },
    }
  }
}
