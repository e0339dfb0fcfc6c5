/** exp(-(now - t) / timeConstant). Timestamps in the future count as fresh. */
export function recencyWeight(timestamp: number, now: number, timeConstantMs: number): number {
  if (timeConstantMs <= 0) return 0;
  const elapsed = Math.max(0, now - timestamp);
  return Math.exp(-elapsed / timeConstantMs);
}

export function beliefWeight(trust: number, confidence: number, alpha: number): number {
  return alpha * trust + (1 - alpha) * confidence;
}

export function retrievalScore(similarity: number, recency: number, belief: number): number {
  return similarity * recency * belief;
}

export interface Rankable {
  readonly score: number;
  readonly timestamp: number;
  readonly seq: number;
}

/** Score desc, then newer first, then insertion order. */
export function compareRanked(a: Rankable, b: Rankable): number {
  if (a.score !== b.score) return b.score - a.score;
  if (a.timestamp !== b.timestamp) return b.timestamp - a.timestamp;
  return a.seq - b.seq;
}

export function topK<T extends Rankable>(items: readonly T[], k: number): T[] {
  if (k <= 0) return [];
  return [...items].sort(compareRanked).slice(0, k);
}
