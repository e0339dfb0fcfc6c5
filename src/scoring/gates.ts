import type { GateThresholds, ScoringConfig } from "../config/types.js";
import type { ResponseType, Severity } from "./types.js";

export interface GateInput {
  readonly intentAlignment: number;
  readonly memoryAlignment: number;
  readonly responseType: ResponseType;
  readonly groundingScore: number;
  readonly severity: Severity;
  /** Short factual answer quoted straight from a memory. */
  readonly shortExtraction?: boolean;
}

type GateCheck = "intent" | "memory" | "grounding";

export type GateReason =
  | "contradiction_fail"
  | `${ResponseType}_${GateCheck}_fail`
  | "gates_passed"
  | "gates_passed_with_contradiction_note";

export interface GateResult {
  readonly passed: boolean;
  readonly reason: GateReason;
  readonly detail?: string;
}

function thresholdsFor(input: GateInput, config: ScoringConfig): GateThresholds {
  const gates = config.gates;
  switch (input.responseType) {
    case "factual":
      return input.shortExtraction
        ? { ...gates.factual, grounding: Math.min(gates.factual.grounding, gates.extractionGrounding) }
        : gates.factual;
    case "explanatory":
      return gates.explanatory;
    case "conversational":
      return gates.conversational;
  }
}

/**
 * Response-type-aware admission thresholds.
 * A blocking contradiction fails before any score is looked at.
 */
export function checkGates(input: GateInput, config: ScoringConfig): GateResult {
  if (input.severity === "blocking") {
    return { passed: false, reason: "contradiction_fail" };
  }

  const thresholds = thresholdsFor(input, config);
  const checks: ReadonlyArray<readonly [GateCheck, number, string]> = [
    ["intent", input.intentAlignment, "align"],
    ["memory", input.memoryAlignment, "align"],
    ["grounding", input.groundingScore, "score"],
  ];
  for (const [check, value, label] of checks) {
    const min = thresholds[check];
    if (value < min) {
      return {
        passed: false,
        reason: `${input.responseType}_${check}_fail`,
        detail: `${label}=${value.toFixed(3)} < ${min}`,
      };
    }
  }

  if (input.severity === "note") {
    return { passed: true, reason: "gates_passed_with_contradiction_note" };
  }
  return { passed: true, reason: "gates_passed" };
}
