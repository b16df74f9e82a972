import type { RecordStore } from '../adapters/types'
import type { ThresholdConfig } from '../types/config'
import type { RankedMatch, ScoredCandidate } from '../types/match'
import type { RecordId } from '../types/record'
import type { CandidateRetriever } from './retrieval/types'
import { NotFoundError, requirePositiveInteger } from '../utils/errors'
import { asProviderFailure } from './retrieval/provider-failure'
import { classify } from './scoring/category-classifier'

export const DEFAULT_TOP_K = 5

/**
 * On-demand retrieval of the best K reference records for one incoming
 * record, for interactive inspection.
 *
 * Reads the record store and similarity provider directly; results are
 * neither cached nor persisted and the match index is never touched.
 */
export class TopKRetrieval {
  private readonly records: RecordStore
  private readonly retriever: CandidateRetriever
  private readonly activeThresholds: () => Readonly<ThresholdConfig>
  private readonly defaultK: number

  constructor(
    records: RecordStore,
    retriever: CandidateRetriever,
    thresholds: () => Readonly<ThresholdConfig>,
    defaultK: number = DEFAULT_TOP_K
  ) {
    this.records = records
    this.retriever = retriever
    this.activeThresholds = thresholds
    this.defaultK = requirePositiveInteger(defaultK, 'defaultK')
  }

  /**
   * @returns Up to `k` candidates by score descending, ties by ascending
   *   reference id, each labelled with its category under the active thresholds
   * @throws {NotFoundError} If the incoming record does not exist
   * @throws {InvalidParameterError} If `k` is not a positive integer
   * @throws {ProviderUnavailableError} If a similarity computation fails
   */
  async topK(testId: RecordId, k: number = this.defaultK): Promise<RankedMatch[]> {
    requirePositiveInteger(k, 'k')

    const incoming = await this.records.getIncoming(testId)
    if (!incoming) {
      throw new NotFoundError('incoming', testId)
    }

    let ranked: ScoredCandidate[]
    try {
      ranked = await this.retriever.rank(incoming, k)
    } catch (error) {
      throw asProviderFailure(error, 'topK', testId)
    }

    const thresholds = this.activeThresholds()
    return ranked.map((candidate, i) => ({
      ...candidate,
      rank: i + 1,
      category: classify(candidate.score, thresholds),
    }))
  }
}
