export type {
  RecordStore,
  MatchResultStore,
  MatchResultWrite,
  MatchListOptions,
} from './types'

export { AdapterError, QueryError, ValidationError } from './adapter-error'

export { InMemoryMatchResultStore } from './memory/memory-match-store'
export { InMemoryRecordStore, generateIncomingId } from './memory/memory-record-store'

export {
  DrizzleMatchResultStore,
  drizzleMatchStore,
  customerMatchResults,
  type CustomerMatchResultRow,
} from './drizzle'
