import { v4 as uuidv4 } from 'uuid'
import type { RecordStore } from '../types'
import type {
  IncomingRecord,
  IncomingRecordInput,
  ReferenceRecord,
  ReferenceRecordInput,
} from '../../types/record'
import { buildRepresentation } from '../../core/representation'
import { ValidationError } from '../adapter-error'

/**
 * Generates an identifier for a newly submitted incoming record,
 * e.g. `TEST_3F2A9C01B4D7`.
 */
export function generateIncomingId(): string {
  return `TEST_${uuidv4().replace(/-/g, '').toUpperCase().slice(0, 12)}`
}

/**
 * Record store held in process memory.
 * Used as the default store and as the stand-in for a database in tests.
 */
export class InMemoryRecordStore implements RecordStore {
  private readonly references = new Map<string, ReferenceRecord>()
  private readonly incoming = new Map<string, IncomingRecord>()

  async getReference(id: string): Promise<ReferenceRecord | null> {
    return this.references.get(id) ?? null
  }

  async listReferences(): Promise<ReferenceRecord[]> {
    return Array.from(this.references.values())
  }

  async loadReferences(records: ReferenceRecordInput[]): Promise<ReferenceRecord[]> {
    const seen = new Set<string>()
    for (const record of records) {
      if (!record.id || record.id.trim().length === 0) {
        throw new ValidationError('Reference record id cannot be empty', { record })
      }
      if (this.references.has(record.id) || seen.has(record.id)) {
        throw new ValidationError(`Reference record '${record.id}' is already loaded`, {
          id: record.id,
        })
      }
      seen.add(record.id)
    }

    const loaded = records.map((record) =>
      Object.freeze({ ...record, representation: buildRepresentation(record) })
    )
    for (const record of loaded) {
      this.references.set(record.id, record)
    }
    return loaded
  }

  async getIncoming(id: string): Promise<IncomingRecord | null> {
    return this.incoming.get(id) ?? null
  }

  async listIncoming(): Promise<IncomingRecord[]> {
    return Array.from(this.incoming.values())
  }

  async upsertIncoming(input: IncomingRecordInput): Promise<IncomingRecord> {
    // a blank id means create
    const id = input.id && input.id.trim().length > 0 ? input.id : generateIncomingId()
    const record: IncomingRecord = Object.freeze({
      ...input,
      id,
      representation: buildRepresentation(input),
    })
    this.incoming.set(id, record)
    return record
  }
}
