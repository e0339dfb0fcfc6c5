import type { DisclosureConfig } from "../config/types.js";
import { DisclosureBudget } from "./budget.js";
import { clarificationPrompt } from "./prompts.js";
import type { DisclosureDecision } from "./types.js";

/**
 * Three zones by validity probability:
 *   green  (p >= greenThreshold)  accept
 *   yellow (in between)           clarify, budget permitting
 *   red    (p <  redThreshold)    reject
 * High-stakes slots are always clarified; they still count against the budget.
 */
export class DisclosurePolicy {
  private readonly highStakes: ReadonlySet<string>;

  constructor(
    private readonly config: DisclosureConfig,
    readonly budget: DisclosureBudget = new DisclosureBudget(config),
  ) {
    this.highStakes = new Set(config.highStakesSlots);
  }

  isHighStakes(slot: string): boolean {
    return this.highStakes.has(slot);
  }

  decide(pValid: number, slot: string, oldValue?: string, newValue?: string, now = Date.now()): DisclosureDecision {
    const p = pValid.toFixed(2);
    if (pValid >= this.config.greenThreshold) {
      return { action: "accept", zone: "green", pValid, reason: `High confidence (P=${p})` };
    }
    if (pValid < this.config.redThreshold) {
      return { action: "reject", zone: "red", pValid, reason: `Low confidence (P=${p})` };
    }

    const highStakes = this.isHighStakes(slot);
    if (this.config.enableBudget && !highStakes) {
      const check = this.budget.check(slot, now);
      if (!check.allowed) {
        return {
          action: "accept",
          zone: "yellow",
          pValid,
          reason: `Yellow zone but ${check.limit} budget exhausted (P=${p})`,
          budgetExhausted: true,
          limit: check.limit,
        };
      }
    }

    if (this.config.enableBudget) {
      this.budget.record(slot, now);
    }
    return {
      action: "clarify",
      zone: "yellow",
      pValid,
      reason: `Yellow zone, needs clarification (P=${p})`,
      prompt: clarificationPrompt(slot, oldValue, newValue),
      highStakes,
    };
  }

  resetBudget(): void {
    this.budget.reset();
  }
}
