/**
 * Vector helpers shared by the embedding services and the vector store
 */

export function l2Norm(vector: number[]): number {
  let sum = 0;
  for (const value of vector) sum += value * value;
  return Math.sqrt(sum);
}

/** Unit-length copy; non-finite components become 0 */
export function normalizeVector(vector: number[]): number[] {
  const cleaned = vector.map(v => (Number.isFinite(v) ? v : 0));
  const norm = l2Norm(cleaned);
  return norm === 0 ? cleaned : cleaned.map(v => v / norm);
}

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length || a.length === 0) return 0;
  let dot = 0;
  for (let i = 0; i < a.length; i += 1) dot += a[i] * b[i];
  const denominator = l2Norm(a) * l2Norm(b);
  return denominator === 0 ? 0 : dot / denominator;
}

/** Highest scores first, ties broken by id for stable output */
export function topK<T extends { entityId: string; score: number }>(hits: T[], k: number): T[] {
  return [...hits]
    .sort((a, b) => b.score - a.score || (a.entityId < b.entityId ? -1 : a.entityId > b.entityId ? 1 : 0))
    .slice(0, k);
}
