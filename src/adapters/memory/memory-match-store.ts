import type { MatchListOptions, MatchResultStore, MatchResultWrite } from '../types'
import type { MatchCategory, MatchResult } from '../../types/match'
import type { ThresholdConfig } from '../../types/config'
import { classify } from '../../core/scoring/category-classifier'
import { compareIds } from '../../utils/compare'

/**
 * In-process match index storage.
 *
 * Rows are frozen and replaced as whole objects. Every method body is
 * synchronous, so a write is never interleaved with another write or read.
 */
export class InMemoryMatchResultStore implements MatchResultStore {
  private readonly rows = new Map<string, Readonly<MatchResult>>()

  async get(testId: string): Promise<MatchResult | null> {
    return this.rows.get(testId) ?? null
  }

  async upsert(write: MatchResultWrite): Promise<MatchResult> {
    const existing = this.rows.get(write.testId)
    const row: MatchResult = Object.freeze({
      testId: write.testId,
      refId: write.refId,
      testRepresentation: write.testRepresentation,
      refRepresentation: write.refRepresentation,
      score: write.score,
      category: write.category,
      createdAt: existing?.createdAt ?? write.writtenAt,
      updatedAt: write.writtenAt,
    })
    this.rows.set(write.testId, row)
    return row
  }

  async recategorize(thresholds: ThresholdConfig, writtenAt: Date): Promise<number> {
    for (const [testId, row] of this.rows) {
      this.rows.set(
        testId,
        Object.freeze({
          ...row,
          category: classify(row.score, thresholds),
          updatedAt: writtenAt,
        })
      )
    }
    return this.rows.size
  }

  async list(options: MatchListOptions = {}): Promise<MatchResult[]> {
    const offset = options.offset ?? 0
    const rows = Array.from(this.rows.values())
      .filter((row) => !options.category || row.category === options.category)
      .sort((a, b) => b.score - a.score || compareIds(a.testId, b.testId))

    return options.limit === undefined
      ? rows.slice(offset)
      : rows.slice(offset, offset + options.limit)
  }

  async countByCategory(): Promise<Partial<Record<MatchCategory, number>>> {
    const counts: Partial<Record<MatchCategory, number>> = {}
    for (const row of this.rows.values()) {
      counts[row.category] = (counts[row.category] ?? 0) + 1
    }
    return counts
  }

  async count(): Promise<number> {
    return this.rows.size
  }
}
