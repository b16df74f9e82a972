import type { MatchListOptions, RecordStore } from '../adapters/types'
import type { ThresholdConfig } from '../types/config'
import type { IncomingRecordInput, RecordId, RecordTotals } from '../types/record'
import type { CategorySummary, MatchResult, MatchState, RankedMatch } from '../types/match'
import type { MatchIndex } from './match-index'
import type {
  BackfillOptions,
  BackfillResult,
  RecomputationOrchestrator,
  SubmissionResult,
  SweepResult,
} from './orchestrator'
import type { TopKRetrieval } from './top-k'

/**
 * Collaborators wired together by {@link MatchEngineBuilder}.
 */
export interface MatchEngineComponents {
  records: RecordStore
  index: MatchIndex
  orchestrator: RecomputationOrchestrator
  topK: TopKRetrieval
}

/**
 * Entry points available to the dashboard: summaries, threshold edits,
 * record submissions and top-K inspection.
 *
 * @example
 * ```typescript
 * const engine = MatchEngineBuilder.create()
 *   .recordStore(records)
 *   .similarityProvider(provider)
 *   .build()
 *
 * await engine.backfill()
 * await engine.onThresholdsChanged({ exact: 0.999, veryClose: 0.98, somewhatClose: 0.92 })
 * const summary = await engine.aggregateCounts()
 * ```
 */
export class MatchEngine {
  private readonly components: MatchEngineComponents

  constructor(components: MatchEngineComponents) {
    this.components = components
  }

  /** The active threshold configuration */
  get thresholds(): Readonly<ThresholdConfig> {
    return this.components.orchestrator.thresholds
  }

  /** The record store the engine reads from */
  get records(): RecordStore {
    return this.components.records
  }

  onRecordChanged(testId: RecordId): Promise<MatchResult | null> {
    return this.components.orchestrator.onRecordChanged(testId)
  }

  onThresholdsChanged(thresholds: ThresholdConfig): Promise<SweepResult> {
    return this.components.orchestrator.onThresholdsChanged(thresholds)
  }

  submitRecord(input: IncomingRecordInput): Promise<SubmissionResult> {
    return this.components.orchestrator.submitRecord(input)
  }

  backfill(options?: BackfillOptions): Promise<BackfillResult> {
    return this.components.orchestrator.backfill(options)
  }

  matchState(testId: RecordId): Promise<MatchState> {
    return this.components.orchestrator.matchState(testId)
  }

  topK(testId: RecordId, k?: number): Promise<RankedMatch[]> {
    return this.components.topK.topK(testId, k)
  }

  getMatch(testId: RecordId): Promise<MatchResult | null> {
    return this.components.index.get(testId)
  }

  listMatches(options?: MatchListOptions): Promise<MatchResult[]> {
    return this.components.index.list(options)
  }

  aggregateCounts(): Promise<CategorySummary> {
    return this.components.index.aggregateCounts()
  }

  /** Reference and incoming record counts shown beside the category summary */
  async recordTotals(): Promise<RecordTotals> {
    const [references, incoming] = await Promise.all([
      this.components.records.listReferences(),
      this.components.records.listIncoming(),
    ])
    return { references: references.length, incoming: incoming.length }
  }
}
