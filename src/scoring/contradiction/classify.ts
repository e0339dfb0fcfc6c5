import type { ContradictionType } from "../types.js";
import { phraseMatcher } from "../text.js";

const REVISION_MARKERS = phraseMatcher([
  "actually", "correction", "i meant", "i mean", "to clarify",
  "wrong", "mistake", "not", "no longer", "left", "quit",
]);

const TEMPORAL_MARKERS = phraseMatcher([
  "now", "currently", "recently", "promoted", "moved to",
  "started", "new", "changed to",
]);

// general place -> more specific place inside it
const PLACE_REFINEMENTS: ReadonlyArray<readonly [string, string]> = [
  ["seattle", "bellevue"],
  ["new york", "brooklyn"],
  ["los angeles", "santa monica"],
  ["san francisco", "oakland"],
];

/**
 * Explicit correction beats time progression, which beats refinement.
 * Anything else is a plain conflict.
 */
export function classifyFactChange(valueNew: string, valuePrior: string, textNew = ""): ContradictionType {
  if (REVISION_MARKERS.test(textNew)) return "revision";
  if (TEMPORAL_MARKERS.test(textNew)) return "temporal";

  const next = valueNew.trim().toLowerCase();
  const prior = valuePrior.trim().toLowerCase();
  if (prior && next.includes(prior)) return "refinement";
  if (PLACE_REFINEMENTS.some(([general, specific]) => prior === general && next.includes(specific))) {
    return "refinement";
  }
  return "conflict";
}

const TRANSIENT_SLOTS = new Set([
  "mood", "feeling", "emotion", "emotions", "status",
  "user.mood", "user.feeling", "user.emotion",
]);

const TRANSIENT_VALUES = phraseMatcher([
  "tired", "exhausted", "fatigued", "sleepy", "burned out",
  "sad", "down", "depressed", "depression", "anxious", "anxiety",
  "stressed", "overwhelmed", "okay", "ok", "fine", "good", "bad",
  "sick", "ill", "hurt", "hurting", "in pain", "recovering",
  "lonely", "upset", "angry", "frustrated", "confused",
]);

/** Mood and passing conditions change freely; they never contradict. */
export function isTransientUpdate(slot: string, valueNew: string, valuePrior: string): boolean {
  if (TRANSIENT_SLOTS.has(slot.toLowerCase())) return true;
  return TRANSIENT_VALUES.test(valueNew) || TRANSIENT_VALUES.test(valuePrior);
}

const SLOT_LABELS: Record<ContradictionType, string> = {
  conflict: "conflicts with",
  revision: "revises",
  temporal: "updates",
  refinement: "refines",
};

/** One-line, human-readable ledger summary. */
export function summarizeContradiction(params: {
  drift: number;
  confidenceDelta: number;
  type: ContradictionType;
  slot?: string;
  valueNew?: string;
  valuePrior?: string;
}): string {
  const strength = params.drift > 0.5 ? "Strong" : params.drift > 0.3 ? "Moderate" : "Mild";
  const parts = [`${strength} belief divergence (drift=${params.drift.toFixed(2)})`];
  if (params.slot && params.valueNew !== undefined && params.valuePrior !== undefined) {
    parts.push(`${params.slot}: '${params.valueNew}' ${SLOT_LABELS[params.type]} '${params.valuePrior}'`);
  }
  if (params.confidenceDelta > 0.2) {
    parts.push("confidence dropped");
  } else if (params.confidenceDelta < -0.2) {
    parts.push("confidence rose");
  }
  return parts.join("; ");
}
