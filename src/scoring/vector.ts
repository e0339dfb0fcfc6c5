import type { Vector } from "./types.js";

/**
 * Cosine similarity in [-1, 1].
 * Mismatched dimensions, empty or zero-norm vectors carry no signal and score 0.
 */
export function similarity(a: Vector, b: Vector): number {
  if (a.length === 0 || a.length !== b.length) return 0;

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) return 0;

  const result = dot / Math.sqrt(normA * normB);
  if (!Number.isFinite(result)) return 0;
  return Math.max(-1, Math.min(1, result));
}

/** 1 - similarity. Practical range [0, 1], theoretical [0, 2]. */
export function drift(next: Vector, prior: Vector): number {
  return 1 - similarity(next, prior);
}

export function isZeroVector(v: Vector): boolean {
  return v.every((x) => x === 0);
}

/**
 * 1 - max similarity against everything stored.
 * An empty store makes anything fully novel; an empty or zero input has no novelty.
 */
export function novelty(vector: Vector, stored: Iterable<Vector>): number {
  if (vector.length === 0 || isZeroVector(vector)) return 0;

  let best: number | null = null;
  for (const other of stored) {
    const s = similarity(vector, other);
    if (best === null || s > best) best = s;
  }
  if (best === null) return 1;
  return Math.max(0, Math.min(1, 1 - best));
}
