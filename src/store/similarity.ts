/**
 * Similarity helpers shared by the vector stores.
 */

/**
 * Cosine similarity of two equal-length vectors.
 * Returns 0 when either vector has zero magnitude.
 */
export function cosineSimilarity(a: ArrayLike<number>, b: ArrayLike<number>): number {
  const length = Math.min(a.length, b.length);
  let dot = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Keep the `k` best items by score, ties broken by id so results are
 * stable across runs.
 */
export function topK<T extends { score: number }>(
  items: T[],
  k: number,
  idOf: (item: T) => string
): T[] {
  return [...items]
    .sort((a, b) => b.score - a.score || compareIds(idOf(a), idOf(b)))
    .slice(0, Math.max(0, k));
}

function compareIds(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
