/**
 * Contracts for the external services the engine depends on
 * @module services/types
 */

/**
 * Logger interface for engine and service diagnostics
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void
  info(message: string, context?: Record<string, unknown>): void
  warn(message: string, context?: Record<string, unknown>): void
  error(message: string, context?: Record<string, unknown>): void
}

/**
 * Computes the similarity of two text representations.
 *
 * Implementations are typically remote and slow; any rejection is treated
 * as the provider being unavailable for that computation.
 */
export interface SimilarityProvider {
  /** Name used in logs and error messages */
  readonly name: string

  /**
   * @returns Cosine similarity in [0, 1], where 1 means identical
   */
  similarity(textA: string, textB: string): Promise<number>
}

/**
 * External embedding service that turns text into a vector.
 * The engine never computes embeddings itself.
 */
export interface EmbeddingService {
  /** Name used in logs and error messages */
  readonly name: string

  embed(text: string): Promise<number[]>
}

/**
 * Error categorization for service failures
 */
export type ServiceErrorType =
  | 'timeout'
  | 'network'
  | 'rejected'
  | 'unknown'
