import type { ScoringConfig, SignificanceWeights } from "../config/types.js";
import type { CompressionMode } from "./types.js";
import { clamp01 } from "./trust.js";

export interface SignificanceInput {
  readonly emotion: number;
  readonly novelty: number;
  readonly userMarked: boolean;
  readonly contradictionSignal: number;
  readonly futureRelevance: number;
}

export function significance(input: SignificanceInput, weights: SignificanceWeights): number {
  return clamp01(
    weights.emotion * input.emotion +
      weights.novelty * input.novelty +
      weights.userMark * (input.userMarked ? 1 : 0) +
      weights.contradiction * input.contradictionSignal +
      weights.future * input.futureRelevance,
  );
}

export function selectCompressionMode(score: number, config: ScoringConfig): CompressionMode {
  if (score >= config.losslessThreshold) return "lossless";
  if (score <= config.sketchThreshold) return "sketch";
  return "hybrid";
}

const EMOTION_WORDS = ["love", "hate", "fear", "angry", "happy", "sad", "excited", "worried"];
const PLANNING_WORDS = ["remember", "later", "tomorrow", "next", "plan", "will", "going to"];
const TIME_WORDS = ["when", "where", "how long", "until"];

/**
 * Rough emotional charge of a statement: exclamation marks,
 * share of capitals and emotion words, each capped.
 */
export function emotionIntensity(text: string): number {
  if (text.length === 0) return 0;

  const exclamations = (text.match(/!/g) ?? []).length;
  const capitals = (text.match(/[A-Z]/g) ?? []).length;
  const lower = text.toLowerCase();
  const emotionHits = EMOTION_WORDS.filter((w) => lower.includes(w)).length;

  const intensity =
    Math.min(exclamations * 0.1, 0.3) +
    Math.min((capitals / text.length) * 0.5, 0.3) +
    Math.min(emotionHits * 0.1, 0.4);
  return Math.min(intensity, 1);
}

/** Questions, plans and time references suggest the memory will be needed again. */
export function futureRelevance(text: string): number {
  const lower = text.toLowerCase();
  let relevance = 0;
  if (text.includes("?")) relevance += 0.3;
  if (PLANNING_WORDS.some((w) => lower.includes(w))) relevance += 0.2;
  if (TIME_WORDS.some((w) => lower.includes(w))) relevance += 0.2;
  return Math.min(relevance, 1);
}
