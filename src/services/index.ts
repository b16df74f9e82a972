/**
 * External service contracts, logging and provider implementations
 * @module services
 */

export type {
  Logger,
  SimilarityProvider,
  EmbeddingService,
  ServiceErrorType,
} from './types'

export {
  ServiceError,
  ServiceTimeoutError,
  ServiceRejectedError,
  isServiceError,
  toServiceError,
} from './service-error'

export {
  generateCorrelationId,
  defaultLogger,
  createSilentLogger,
  createPrefixedLogger,
} from './execution-context'

export { withTimeout, type TimeoutOptions } from './resilience/timeout'

export {
  cosineSimilarity,
  toSimilarityScore,
  EmbeddingSimilarityProvider,
  type EmbeddingSimilarityOptions,
  withSimilarityTimeout,
} from './similarity'
