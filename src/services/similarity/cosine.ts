/**
 * Cosine similarity of two equal-length vectors.
 *
 * Returns 0 when either vector has zero magnitude. The caller checks that
 * the dimensions agree.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  let dot = 0
  let normA = 0
  let normB = 0

  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i]
    normA += a[i] * a[i]
    normB += b[i] * b[i]
  }

  if (normA === 0 || normB === 0) {
    return 0
  }

  return dot / (Math.sqrt(normA) * Math.sqrt(normB))
}

/**
 * Clamps a cosine value into the [0, 1] similarity range.
 * Opposing vectors score 0; rounding overshoot above 1 is capped. `NaN` is
 * returned unchanged so the caller can reject it.
 */
export function toSimilarityScore(cosine: number): number {
  if (cosine < 0) return 0
  if (cosine > 1) return 1
  return cosine
}
