/**
 * Vector helpers shared by embedding clients and the zero-shot engine.
 */

/**
 * L2 normalize a vector to unit length.
 * Returns a new array; a zero vector is returned unchanged.
 */
export function normalizeL2(vector: number[]): number[] {
  const magnitude = Math.sqrt(vector.reduce((sum, val) => sum + val * val, 0));
  if (magnitude === 0) return vector;
  return vector.map((val) => val / magnitude);
}

/**
 * Cosine similarity of two L2-normalized vectors (their dot product).
 * Mismatched or empty vectors score 0.
 */
export function computeCosineSimilarity(vectorA: number[], vectorB: number[]): number {
  if (vectorA.length === 0 || vectorA.length !== vectorB.length) {
    return 0;
  }

  let dotProduct = 0;
  for (let i = 0; i < vectorA.length; i++) {
    dotProduct += (vectorA[i] ?? 0) * (vectorB[i] ?? 0);
  }
  return dotProduct;
}
