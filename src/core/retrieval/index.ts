export type { CandidateRetriever } from './types'
export { LinearScanRetriever } from './linear-scan-retriever'
export { compareCandidates } from './ranking'
export { asProviderFailure } from './provider-failure'
