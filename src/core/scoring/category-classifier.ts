import type { MatchCategory } from '../../types/match'
import type { ThresholdConfig } from '../../types/config'

/**
 * Classifies a similarity score into one of the four match categories.
 *
 * Evaluated top-down, first match wins:
 * - `score >= exact` → `'EXACT'`
 * - `score >= veryClose` → `'VERY_CLOSE'`
 * - `score >= somewhatClose` → `'SOMEWHAT_CLOSE'`
 * - otherwise → `'NOT_CLOSE'`
 *
 * Boundaries are inclusive, so a score equal to a threshold lands in the
 * higher category. `NaN` compares false everywhere and falls through to
 * `'NOT_CLOSE'`.
 *
 * @param score - Similarity score
 * @param thresholds - Active threshold configuration
 */
export function classify(score: number, thresholds: ThresholdConfig): MatchCategory {
  if (score >= thresholds.exact) {
    return 'EXACT'
  }

  if (score >= thresholds.veryClose) {
    return 'VERY_CLOSE'
  }

  if (score >= thresholds.somewhatClose) {
    return 'SOMEWHAT_CLOSE'
  }

  return 'NOT_CLOSE'
}

/** Position of a category from highest (0) to lowest (3) */
export function categoryRank(category: MatchCategory): number {
  switch (category) {
    case 'EXACT':
      return 0
    case 'VERY_CLOSE':
      return 1
    case 'SOMEWHAT_CLOSE':
      return 2
    case 'NOT_CLOSE':
      return 3
  }
}
