import type { ScoredCandidate } from '../../types/match'
import { compareIds } from '../../utils/compare'

/**
 * Sort order for candidates: higher score first, then lower reference id.
 */
export function compareCandidates(a: ScoredCandidate, b: ScoredCandidate): number {
  if (a.score !== b.score) {
    return a.score > b.score ? -1 : 1
  }
  return compareIds(a.refId, b.refId)
}
