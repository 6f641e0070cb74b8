// Embedding contract and similarity helpers for profile recall

export type Embedding = number[];

export interface Embedder {
  embed(text: string): Promise<Embedding>;
}

export function cosineSimilarity(a: Embedding, b: Embedding): number {
  if (a.length !== b.length || a.length === 0) return 0;
  let dot = 0;
  let na = 0;
  let nb = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    na += a[i] * a[i];
    nb += b[i] * b[i];
  }
  if (na === 0 || nb === 0) return 0;
  return dot / (Math.sqrt(na) * Math.sqrt(nb));
}

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/g)
    .filter(Boolean);
}

/** Items scoring at least `minScore` against the query, best first. */
export function rankBySimilarity<T extends { embedding: Embedding }>(
  query: Embedding,
  items: readonly T[],
  options: { minScore: number; topK: number },
): Array<T & { score: number }> {
  return items
    .map((item) => ({ ...item, score: cosineSimilarity(query, item.embedding) }))
    .filter((item) => item.score >= options.minScore)
    .sort((a, b) => b.score - a.score)
    .slice(0, options.topK);
}
