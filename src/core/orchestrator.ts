import type { RecordStore } from '../adapters/types'
import type { Logger } from '../services/types'
import type { ThresholdConfig } from '../types/config'
import type { IncomingRecord, IncomingRecordInput, RecordId } from '../types/record'
import type { MatchResult, MatchState, ScoredCandidate } from '../types/match'
import type { CandidateRetriever } from './retrieval/types'
import type { MatchIndex } from './match-index'
import type { ActiveThresholds } from './thresholds'
import { asProviderFailure } from './retrieval/provider-failure'
import { validateThresholds } from './thresholds'
import { createSilentLogger, generateCorrelationId } from '../services/execution-context'
import {
  isMatchEngineError,
  NotFoundError,
  requireNonEmptyString,
  type MatchEngineError,
} from '../utils/errors'

/**
 * Outcome of a threshold reconfiguration.
 */
export interface SweepResult {
  /** Version assigned to the configuration by this request */
  version: number
  /** Configuration requested */
  thresholds: Readonly<ThresholdConfig>
  /** Rows recategorized (0 when superseded) */
  updated: number
  /** True when a newer configuration arrived before this sweep started */
  superseded: boolean
}

/**
 * Outcome of a create-or-edit submission.
 */
export interface SubmissionResult {
  record: IncomingRecord
  /** New match result, or null when there are no reference records */
  result: MatchResult | null
}

/**
 * Options for {@link RecomputationOrchestrator.backfill}
 */
export interface BackfillOptions {
  /** Re-score records that already have a match result (default: false) */
  force?: boolean
}

/**
 * Outcome of a backfill run.
 */
export interface BackfillResult {
  /** Records scored in this run */
  scored: number
  /** Records left alone because they already had a match result */
  skipped: number
  /** Records whose computation failed; their previous state is unchanged */
  failures: Array<{ testId: RecordId; error: MatchEngineError }>
}

/**
 * Options for {@link RecomputationOrchestrator}
 */
export interface RecomputationOrchestratorOptions {
  records: RecordStore
  retriever: CandidateRetriever
  index: MatchIndex
  thresholds: ActiveThresholds
  logger?: Logger
}

/**
 * Drives (re)computation of the match index.
 *
 * Two entry points keep the index consistent:
 * - {@link onRecordChanged} re-scores one incoming record against the
 *   reference set after it is created or edited;
 * - {@link onThresholdsChanged} installs new thresholds and recategorizes
 *   every row without touching similarity scores.
 *
 * The orchestrator owns the active threshold configuration. Threshold
 * sweeps run one at a time; a sweep still waiting when a newer
 * configuration arrives is skipped.
 */
export class RecomputationOrchestrator {
  private readonly records: RecordStore
  private readonly retriever: CandidateRetriever
  private readonly index: MatchIndex
  private readonly active: ActiveThresholds
  private readonly logger: Logger
  private sweepQueue: Promise<unknown> = Promise.resolve()

  constructor(options: RecomputationOrchestratorOptions) {
    this.records = options.records
    this.retriever = options.retriever
    this.index = options.index
    this.active = options.thresholds
    this.logger = options.logger ?? createSilentLogger()
  }

  /** The active threshold configuration */
  get thresholds(): Readonly<ThresholdConfig> {
    return this.active.value
  }

  /**
   * Re-scores one incoming record and upserts its match result.
   *
   * The best reference is the highest score, ties going to the lowest
   * reference id. A provider failure aborts the computation and leaves the
   * previous result in place.
   *
   * @returns The stored result, or null when there are no reference records
   * @throws {NotFoundError} If the incoming record does not exist
   * @throws {ProviderUnavailableError} If a similarity computation fails
   */
  async onRecordChanged(testId: RecordId): Promise<MatchResult | null> {
    const correlationId = generateCorrelationId('rec')
    const incoming = await this.records.getIncoming(testId)
    if (!incoming) {
      throw new NotFoundError('incoming', testId)
    }

    this.logger.debug('Scoring incoming record', { correlationId, testId })

    let ranked: ScoredCandidate[]
    try {
      ranked = await this.retriever.rank(incoming, 1)
    } catch (error) {
      const failure = asProviderFailure(error, 'onRecordChanged', testId)
      this.logger.error('Scoring aborted', {
        correlationId,
        testId,
        error: failure instanceof Error ? failure.message : String(failure),
      })
      throw failure
    }

    if (ranked.length === 0) {
      this.logger.warn('No reference records to score against', { correlationId, testId })
      return null
    }

    const best = ranked[0]
    const result = await this.index.upsert(
      testId,
      best.refId,
      best.score,
      incoming.representation,
      best.refRepresentation
    )

    this.logger.info('Incoming record scored', {
      correlationId,
      testId,
      refId: result.refId,
      score: result.score,
      category: result.category,
    })
    return result
  }

  /**
   * Installs a new threshold configuration and recategorizes every row.
   *
   * The configuration is validated before anything changes. Once installed
   * it applies to all later writes immediately, including upserts that race
   * the sweep.
   *
   * @throws {InvalidConfigError} If the ordering invariant is violated
   */
  async onThresholdsChanged(next: ThresholdConfig): Promise<SweepResult> {
    validateThresholds(next)
    const version = this.active.replace(next)
    const thresholds = this.active.value

    this.logger.info('Thresholds changed', { version, ...thresholds })

    const sweep = this.sweepQueue.then(() => this.runSweep(version, thresholds))
    // failures reach the caller through `sweep`; the queue only orders sweeps
    this.sweepQueue = sweep.catch(() => undefined)
    return sweep
  }

  /**
   * Creates or edits an incoming record, then re-scores it.
   *
   * The record is saved even when scoring fails; its previous match result
   * is then left unchanged and the failure is thrown.
   *
   * @throws {InvalidParameterError} If `name` or `sourceSystem` is blank;
   *   nothing is saved
   */
  async submitRecord(input: IncomingRecordInput): Promise<SubmissionResult> {
    requireNonEmptyString(input.name, 'name')
    requireNonEmptyString(input.sourceSystem, 'sourceSystem')

    const record = await this.records.upsertIncoming(input)
    this.logger.debug(record.id === input.id ? 'Incoming record edited' : 'Incoming record created', {
      testId: record.id,
      sourceSystem: record.sourceSystem,
    })
    const result = await this.onRecordChanged(record.id)
    return { record, result }
  }

  /**
   * Scores every incoming record that has no match result yet (or every
   * record with `force`), one at a time.
   *
   * Engine errors for individual records are collected; store failures are
   * thrown.
   */
  async backfill(options: BackfillOptions = {}): Promise<BackfillResult> {
    const correlationId = generateCorrelationId('backfill')
    const incoming = await this.records.listIncoming()
    const outcome: BackfillResult = { scored: 0, skipped: 0, failures: [] }

    for (const record of incoming) {
      if (!options.force && (await this.index.get(record.id))) {
        outcome.skipped++
        continue
      }

      try {
        const result = await this.onRecordChanged(record.id)
        if (result) {
          outcome.scored++
        }
      } catch (error) {
        if (!isMatchEngineError(error)) {
          throw error
        }
        outcome.failures.push({ testId: record.id, error })
      }
    }

    this.logger.info('Backfill finished', {
      correlationId,
      scored: outcome.scored,
      skipped: outcome.skipped,
      failed: outcome.failures.length,
    })
    return outcome
  }

  /**
   * `SCORED` once the record has a match result, `UNSCORED` before.
   *
   * @throws {NotFoundError} If the incoming record does not exist
   */
  async matchState(testId: RecordId): Promise<MatchState> {
    const incoming = await this.records.getIncoming(testId)
    if (!incoming) {
      throw new NotFoundError('incoming', testId)
    }
    return (await this.index.get(testId)) ? 'SCORED' : 'UNSCORED'
  }

  private async runSweep(
    version: number,
    thresholds: Readonly<ThresholdConfig>
  ): Promise<SweepResult> {
    if (version !== this.active.version) {
      this.logger.debug('Sweep superseded', { version, latest: this.active.version })
      return { version, thresholds, updated: 0, superseded: true }
    }

    const updated = await this.index.recategorizeAll(thresholds)
    this.logger.info('Sweep finished', { version, updated })
    return { version, thresholds, updated, superseded: false }
  }
}
