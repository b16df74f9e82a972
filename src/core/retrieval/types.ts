import type { IncomingRecord } from '../../types/record'
import type { ScoredCandidate } from '../../types/match'

/**
 * Strategy that finds the best reference records for an incoming record.
 *
 * The default implementation scans every reference record; a
 * nearest-neighbour index can take its place without affecting the match
 * index or the classifier.
 */
export interface CandidateRetriever {
  /**
   * Scores reference records against `incoming`.
   *
   * Results are ordered by score descending, ties broken by ascending
   * reference id. Provider failures reject with a `ServiceError`.
   *
   * @param limit - Maximum number of candidates to return (all when omitted)
   */
  rank(incoming: IncomingRecord, limit?: number): Promise<ScoredCandidate[]>
}
