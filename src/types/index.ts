export type {
  RecordId,
  RecordFields,
  ReferenceRecord,
  IncomingRecord,
  ReferenceRecordInput,
  IncomingRecordInput,
  RecordTotals,
} from './record'
export type {
  MatchCategory,
  MatchResult,
  ScoredCandidate,
  RankedMatch,
  CategoryCount,
  CategorySummary,
  MatchState,
} from './match'
export { MATCH_CATEGORIES } from './match'
export type { ThresholdConfig } from './config'
