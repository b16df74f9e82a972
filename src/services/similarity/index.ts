export { cosineSimilarity, toSimilarityScore } from './cosine'
export {
  EmbeddingSimilarityProvider,
  type EmbeddingSimilarityOptions,
} from './embedding-provider'
export { withSimilarityTimeout } from './with-timeout'
