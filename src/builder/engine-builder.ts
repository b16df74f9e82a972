import type { MatchResultStore, RecordStore } from '../adapters/types'
import type { Logger, SimilarityProvider } from '../services/types'
import type { ThresholdConfig } from '../types/config'
import type { CandidateRetriever } from '../core/retrieval/types'
import { InMemoryMatchResultStore } from '../adapters/memory/memory-match-store'
import { LinearScanRetriever } from '../core/retrieval/linear-scan-retriever'
import { MatchIndex } from '../core/match-index'
import { RecomputationOrchestrator } from '../core/orchestrator'
import { TopKRetrieval, DEFAULT_TOP_K } from '../core/top-k'
import { ActiveThresholds, DEFAULT_THRESHOLDS, validateThresholds } from '../core/thresholds'
import { MatchEngine } from '../core/engine'
import { createPrefixedLogger, createSilentLogger } from '../services/execution-context'
import { withSimilarityTimeout } from '../services/similarity/with-timeout'
import { NotConfiguredError, requirePositiveInteger } from '../utils/errors'

/**
 * Fluent builder for configuring and creating a {@link MatchEngine}.
 *
 * Only the record store and a similarity provider (or a custom retriever)
 * are required; everything else has a default.
 *
 * @example
 * ```typescript
 * const engine = MatchEngineBuilder.create()
 *   .recordStore(records)
 *   .similarityProvider(new EmbeddingSimilarityProvider(embeddings), { timeoutMs: 5000 })
 *   .matchStore(drizzleMatchStore(db))
 *   .thresholds({ exact: 0.995, veryClose: 0.98, somewhatClose: 0.92 })
 *   .logger(defaultLogger)
 *   .build()
 * ```
 */
export class MatchEngineBuilder {
  private thresholdConfig: ThresholdConfig = DEFAULT_THRESHOLDS
  private records?: RecordStore
  private provider?: SimilarityProvider
  private store?: MatchResultStore
  private candidateRetriever?: CandidateRetriever
  private engineLogger?: Logger
  private topKDefault = DEFAULT_TOP_K
  private now?: () => Date

  static create(): MatchEngineBuilder {
    return new MatchEngineBuilder()
  }

  /**
   * Configure the initial thresholds (default: {@link DEFAULT_THRESHOLDS}).
   *
   * @throws {InvalidConfigError} If the ordering invariant is violated
   */
  thresholds(config: ThresholdConfig): this {
    validateThresholds(config)
    this.thresholdConfig = { ...config }
    return this
  }

  /**
   * Configure the store of reference and incoming records.
   */
  recordStore(store: RecordStore): this {
    this.records = store
    return this
  }

  /**
   * Configure the similarity provider used by the default linear-scan retriever.
   *
   * @param options.timeoutMs - Bound every similarity call by this timeout
   */
  similarityProvider(provider: SimilarityProvider, options?: { timeoutMs?: number }): this {
    this.provider =
      options?.timeoutMs !== undefined
        ? withSimilarityTimeout(provider, {
            timeoutMs: requirePositiveInteger(options.timeoutMs, 'timeoutMs'),
          })
        : provider
    return this
  }

  /**
   * Replace the candidate retrieval strategy (e.g. a nearest-neighbour index).
   * Takes precedence over {@link similarityProvider}.
   */
  retriever(retriever: CandidateRetriever): this {
    this.candidateRetriever = retriever
    return this
  }

  /**
   * Configure match index persistence (default: in-memory).
   */
  matchStore(store: MatchResultStore): this {
    this.store = store
    return this
  }

  /**
   * Configure logging (default: silent).
   */
  logger(logger: Logger): this {
    this.engineLogger = logger
    return this
  }

  /**
   * Default K for top-K retrieval (default: 5).
   */
  topK(k: number): this {
    this.topKDefault = requirePositiveInteger(k, 'topK')
    return this
  }

  /**
   * Timestamp source for match results (default: `() => new Date()`).
   */
  clock(now: () => Date): this {
    this.now = now
    return this
  }

  /**
   * Build the configured engine.
   *
   * @throws {NotConfiguredError} If the record store or the similarity
   *   provider/retriever is missing
   */
  build(): MatchEngine {
    if (!this.records) {
      throw new NotConfiguredError('recordStore', 'Call .recordStore() before .build().')
    }
    const records = this.records

    let retriever = this.candidateRetriever
    if (!retriever) {
      if (!this.provider) {
        throw new NotConfiguredError(
          'similarityProvider',
          'Call .similarityProvider() or .retriever() before .build().'
        )
      }
      retriever = new LinearScanRetriever(records, this.provider)
    }

    const baseLogger = this.engineLogger ?? createSilentLogger()
    const thresholds = new ActiveThresholds(this.thresholdConfig)
    const readThresholds = () => thresholds.value

    const index = new MatchIndex(this.store ?? new InMemoryMatchResultStore(), records, {
      thresholds: readThresholds,
      clock: this.now,
    })

    const orchestrator = new RecomputationOrchestrator({
      records,
      retriever,
      index,
      thresholds,
      logger: createPrefixedLogger('recompute', baseLogger),
    })

    const topK = new TopKRetrieval(records, retriever, readThresholds, this.topKDefault)

    return new MatchEngine({ records, index, orchestrator, topK })
  }
}
