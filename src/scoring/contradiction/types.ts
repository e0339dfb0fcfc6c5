import type { MemorySource } from "../types.js";
import type { ScoringConfig } from "../../config/types.js";

/** Everything the trigger rules may look at for one (new, prior) pair. */
export interface ContradictionInput {
  readonly drift: number;
  readonly confidenceNew: number;
  readonly confidencePrior: number;
  readonly source: MemorySource;
  readonly textNew: string;
  readonly textPrior: string;
  readonly slot?: string;
  readonly valueNew?: string;
  readonly valuePrior?: string;
}

export type ContradictionRuleId =
  | "paraphrase"
  | "entity_swap"
  | "negation"
  | "preference_inversion"
  | "high_drift"
  | "confidence_drop"
  | "fallback_drift";

/** A decisive outcome ends evaluation; null passes to the next rule. */
export interface RuleOutcome {
  readonly contradiction: boolean;
  readonly reason: string;
}

export interface ContradictionRule {
  readonly id: ContradictionRuleId;
  evaluate(input: ContradictionInput, config: ScoringConfig): RuleOutcome | null;
}

export interface ContradictionVerdict {
  readonly contradiction: boolean;
  readonly rule: ContradictionRuleId | "none";
  readonly reason: string;
}
