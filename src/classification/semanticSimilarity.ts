/**
 * Vector similarity helpers for embedding-based matching
 */

/**
 * Cosine similarity of two equal-length vectors
 *
 * 0 when either vector has zero magnitude.
 *
 * @throws {Error} When the vectors differ in length
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector length mismatch: ${a.length} vs ${b.length}`);
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Cosine similarity mapped to a 0-100 integer score (negative similarity scores 0)
 */
export function semanticScore(a: readonly number[], b: readonly number[]): number {
  return Math.round(Math.max(0, cosineSimilarity(a, b)) * 100);
}
