import type { ScoringConfig } from "../config/types.js";
import type { Vector } from "../scoring/types.js";
import { similarity } from "../scoring/vector.js";
import type { AlignmentHit } from "./types.js";

const EXTRACTION_ALIGNMENT = 0.95;
const TOP_MEMORIES = 3;

/** Short answer found verbatim in one of the top memories. */
export function isShortExtraction(
  answerText: string,
  memoryTexts: readonly string[],
  config: ScoringConfig,
): boolean {
  const answer = answerText.trim().toLowerCase();
  if (!answer || answerText.length >= config.gates.shortAnswerMaxChars) return false;
  return memoryTexts
    .slice(0, TOP_MEMORIES)
    .some((text) => text.toLowerCase().includes(answer));
}

/**
 * Σ softmax(score_i) · sim(output, memory_i).
 * A short answer quoted from a top memory scores 0.95 outright.
 */
export function memoryAlignment(
  outputVector: Vector,
  hits: readonly AlignmentHit[],
  answerText: string,
  config: ScoringConfig,
): number {
  if (hits.length === 0) return 0;
  if (isShortExtraction(answerText, hits.map((h) => h.memory.text), config)) {
    return EXTRACTION_ALIGNMENT;
  }

  const max = Math.max(...hits.map((h) => h.score));
  const exps = hits.map((h) => Math.exp(h.score - max));
  const total = exps.reduce((a, b) => a + b, 0);
  return hits.reduce(
    (sum, hit, i) => sum + ((exps[i] ?? 0) / total) * similarity(outputVector, hit.memory.vector),
    0,
  );
}

/**
 * How much of the answer's wording the top memories support.
 * Word overlap, +0.2 for a quotation, -0.2 when the answer is over twice as long.
 */
export function groundingScore(answerText: string, memoryTexts: readonly string[]): number {
  if (!answerText || memoryTexts.length === 0) return 0;

  const memoryText = memoryTexts
    .slice(0, TOP_MEMORIES)
    .map((t) => t.toLowerCase())
    .join(" ");
  const answerWords = new Set(answerText.toLowerCase().split(/\s+/).filter(Boolean));
  if (answerWords.size === 0) return 0;

  const memoryWords = new Set(memoryText.split(/\s+/).filter(Boolean));
  let overlap = 0;
  for (const word of answerWords) {
    if (memoryWords.has(word)) overlap++;
  }

  const quoteBonus = /["']/.test(answerText) ? 0.2 : 0;
  const lengthPenalty = answerText.length / Math.max(memoryText.length, 1) > 2 ? 0.2 : 0;
  return Math.max(0, Math.min(1, overlap / answerWords.size + quoteBonus - lengthPenalty));
}
