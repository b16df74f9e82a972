import type {
  IncomingRecord,
  IncomingRecordInput,
  RecordId,
  ReferenceRecord,
  ReferenceRecordInput,
} from '../types/record'
import type { MatchCategory, MatchResult } from '../types/match'
import type { ThresholdConfig } from '../types/config'

/**
 * Durable tables of reference and incoming records.
 *
 * The engine reads both sets by identifier and writes incoming records only
 * through {@link RecordStore.upsertIncoming}.
 *
 * @example
 * ```typescript
 * const store = new InMemoryRecordStore()
 * await store.loadReferences([{ id: 'R1', name: 'Alamo Elementary School' }])
 * const created = await store.upsertIncoming({ sourceSystem: 'crm', name: 'Alamo Elem' })
 * created.id // 'TEST_…'
 * ```
 */
export interface RecordStore {
  /**
   * Find a reference record by identifier.
   *
   * @returns The record, or null when absent
   */
  getReference(id: RecordId): Promise<ReferenceRecord | null>

  /**
   * All reference records.
   */
  listReferences(): Promise<ReferenceRecord[]>

  /**
   * Bulk-load reference records. Representations are derived from the fields.
   *
   * @throws {ValidationError} If an identifier is already loaded
   */
  loadReferences(records: ReferenceRecordInput[]): Promise<ReferenceRecord[]>

  /**
   * Find an incoming record by identifier.
   *
   * @returns The record, or null when absent
   */
  getIncoming(id: RecordId): Promise<IncomingRecord | null>

  /**
   * All incoming records.
   */
  listIncoming(): Promise<IncomingRecord[]>

  /**
   * Create or edit an incoming record.
   *
   * An existing identifier is edited in place; a new identifier is created
   * as given; a missing identifier is generated.
   */
  upsertIncoming(input: IncomingRecordInput): Promise<IncomingRecord>
}

/**
 * Values written by a match index upsert. Timestamps are managed by the store:
 * `createdAt` is kept from an existing row, `updatedAt` is set to `writtenAt`.
 */
export interface MatchResultWrite {
  testId: RecordId
  refId: RecordId
  testRepresentation: string
  refRepresentation: string
  score: number
  category: MatchCategory
  writtenAt: Date
}

/**
 * Options for listing match results.
 */
export interface MatchListOptions {
  /** Only rows in this category */
  category?: MatchCategory
  /** Maximum number of rows to return */
  limit?: number
  /** Number of rows to skip (for pagination) */
  offset?: number
}

/**
 * Persistence for match index rows, keyed by incoming record identifier.
 *
 * Every write replaces a whole row, so readers observe either the previous
 * or the new row and never a mix of the two.
 */
export interface MatchResultStore {
  /**
   * @returns The row for `testId`, or null when it has never been scored
   */
  get(testId: RecordId): Promise<MatchResult | null>

  /**
   * Insert or replace the single row for `write.testId`.
   *
   * @returns The stored row
   */
  upsert(write: MatchResultWrite): Promise<MatchResult>

  /**
   * Recompute every row's category from its stored score.
   * Scores and reference ids are never changed.
   *
   * @returns Number of rows touched
   */
  recategorize(thresholds: ThresholdConfig, writtenAt: Date): Promise<number>

  /**
   * Rows ordered by score descending, then `testId` ascending.
   */
  list(options?: MatchListOptions): Promise<MatchResult[]>

  /**
   * Row count per category. Categories without rows may be omitted.
   */
  countByCategory(): Promise<Partial<Record<MatchCategory, number>>>

  /**
   * Total number of rows.
   */
  count(): Promise<number>
}
