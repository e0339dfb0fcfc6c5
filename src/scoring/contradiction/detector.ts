import type { ScoringConfig } from "../../config/types.js";
import { builtinContradictionRules } from "./rules.js";
import type { ContradictionInput, ContradictionRule, ContradictionVerdict } from "./types.js";

/**
 * Runs the trigger rules in order and returns the first decisive outcome.
 * Pure: the same input and config always give the same verdict.
 */
export function detectContradiction(
  input: ContradictionInput,
  config: ScoringConfig,
  rules: readonly ContradictionRule[] = builtinContradictionRules,
): ContradictionVerdict {
  for (const rule of rules) {
    const outcome = rule.evaluate(input, config);
    if (outcome) {
      return { contradiction: outcome.contradiction, rule: rule.id, reason: outcome.reason };
    }
  }
  return { contradiction: false, rule: "none", reason: "No contradiction" };
}
