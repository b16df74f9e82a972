import type { CandidateRetriever } from './types'
import type { RecordStore } from '../../adapters/types'
import type { SimilarityProvider } from '../../services/types'
import type { IncomingRecord } from '../../types/record'
import type { ScoredCandidate } from '../../types/match'
import { ServiceRejectedError, toServiceError } from '../../services/service-error'
import { compareCandidates } from './ranking'

/**
 * Brute-force retrieval: one similarity call per reference record.
 *
 * Calls are made one after another. Cost is O(number of reference records)
 * per incoming record.
 */
export class LinearScanRetriever implements CandidateRetriever {
  private readonly records: RecordStore
  private readonly provider: SimilarityProvider

  constructor(records: RecordStore, provider: SimilarityProvider) {
    this.records = records
    this.provider = provider
  }

  async rank(incoming: IncomingRecord, limit?: number): Promise<ScoredCandidate[]> {
    const references = await this.records.listReferences()
    const scored: ScoredCandidate[] = []

    for (const reference of references) {
      const score = await this.score(incoming.representation, reference.representation)
      scored.push({
        refId: reference.id,
        refRepresentation: reference.representation,
        score,
      })
    }

    scored.sort(compareCandidates)
    return limit === undefined ? scored : scored.slice(0, limit)
  }

  private async score(textA: string, textB: string): Promise<number> {
    let score: number
    try {
      score = await this.provider.similarity(textA, textB)
    } catch (error) {
      throw toServiceError(error, this.provider.name)
    }

    if (typeof score !== 'number' || !Number.isFinite(score) || score < 0 || score > 1) {
      throw new ServiceRejectedError(
        this.provider.name,
        `similarity ${String(score)} is outside [0, 1]`
      )
    }
    return score
  }
}
