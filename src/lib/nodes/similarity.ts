import { normalizeText } from '../text';

export type TermVector = Map<string, number>;

/**
 * Character-trigram vector over the normalized text. Works the same for
 * every script and tolerates spelling variation in romanized input.
 */
export function trigramVector(text: string): TermVector {
  const chars = Array.from(` ${normalizeText(text)} `);
  const vector: TermVector = new Map();
  for (let i = 0; i + 3 <= chars.length; i++) {
    const gram = chars.slice(i, i + 3).join('');
    vector.set(gram, (vector.get(gram) ?? 0) + 1);
  }
  return vector;
}

export function cosine(a: TermVector, b: TermVector): number {
  if (a.size === 0 || b.size === 0) return 0;
  let dot = 0;
  for (const [gram, weight] of a) dot += weight * (b.get(gram) ?? 0);
  if (dot === 0) return 0;
  return dot / (norm(a) * norm(b));
}

function norm(vector: TermVector): number {
  let sum = 0;
  for (const weight of vector.values()) sum += weight * weight;
  return Math.sqrt(sum);
}

export interface Ranked<T> {
  item: T;
  score: number;
}

export function rankBySimilarity<T>(
  query: TermVector,
  candidates: ReadonlyArray<{ item: T; vector: TermVector }>,
  minScore: number,
  limit: number
): Ranked<T>[] {
  return candidates
    .map(({ item, vector }) => ({ item, score: cosine(query, vector) }))
    .filter(({ score }) => score >= minScore)
    .sort((a, b) => b.score - a.score)
    .slice(0, limit);
}
