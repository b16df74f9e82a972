// Main entry point
export { MatchEngineBuilder } from './builder/engine-builder'
export { MatchEngine, type MatchEngineComponents } from './core/engine'

// Core
export { classify, categoryRank } from './core/scoring/category-classifier'
export {
  DEFAULT_THRESHOLDS,
  validateThresholds,
  ActiveThresholds,
} from './core/thresholds'
export { buildRepresentation, REPRESENTATION_FIELDS } from './core/representation'
export { MatchIndex, type MatchIndexOptions } from './core/match-index'
export {
  RecomputationOrchestrator,
  type RecomputationOrchestratorOptions,
  type SweepResult,
  type SubmissionResult,
  type BackfillOptions,
  type BackfillResult,
} from './core/orchestrator'
export { TopKRetrieval, DEFAULT_TOP_K } from './core/top-k'
export { toNotification, type Notification } from './core/notifications'
export {
  LinearScanRetriever,
  compareCandidates,
  type CandidateRetriever,
} from './core/retrieval'

// Types
export type {
  RecordId,
  RecordFields,
  ReferenceRecord,
  IncomingRecord,
  ReferenceRecordInput,
  IncomingRecordInput,
  RecordTotals,
  MatchCategory,
  MatchResult,
  ScoredCandidate,
  RankedMatch,
  CategoryCount,
  CategorySummary,
  MatchState,
  ThresholdConfig,
} from './types'
export { MATCH_CATEGORIES } from './types'

// Storage
export {
  InMemoryRecordStore,
  InMemoryMatchResultStore,
  DrizzleMatchResultStore,
  drizzleMatchStore,
  customerMatchResults,
  generateIncomingId,
  AdapterError,
  QueryError,
  ValidationError,
  type RecordStore,
  type MatchResultStore,
  type MatchResultWrite,
  type MatchListOptions,
  type CustomerMatchResultRow,
} from './adapters'

// External services
export {
  EmbeddingSimilarityProvider,
  withSimilarityTimeout,
  cosineSimilarity,
  toSimilarityScore,
  withTimeout,
  defaultLogger,
  createSilentLogger,
  createPrefixedLogger,
  generateCorrelationId,
  ServiceError,
  ServiceTimeoutError,
  ServiceRejectedError,
  isServiceError,
  type Logger,
  type SimilarityProvider,
  type EmbeddingService,
  type EmbeddingSimilarityOptions,
  type TimeoutOptions,
} from './services'

// Errors
export {
  MatchEngineError,
  NotFoundError,
  InvalidConfigError,
  ProviderUnavailableError,
  InvalidParameterError,
  NotConfiguredError,
  isMatchEngineError,
} from './utils/errors'
