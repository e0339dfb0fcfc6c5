export type DisclosureZone = "green" | "yellow" | "red";

export type BudgetLimit = "session" | "slot" | "cooldown";

export type DisclosureDecision =
  | {
      readonly action: "accept";
      readonly zone: "green";
      readonly pValid: number;
      readonly reason: string;
    }
  | {
      /** Yellow zone, but asking again would exceed the budget: fail open. */
      readonly action: "accept";
      readonly zone: "yellow";
      readonly pValid: number;
      readonly reason: string;
      readonly budgetExhausted: true;
      readonly limit: BudgetLimit;
    }
  | {
      readonly action: "clarify";
      readonly zone: "yellow";
      readonly pValid: number;
      readonly reason: string;
      readonly prompt: string;
      readonly highStakes: boolean;
    }
  | {
      readonly action: "reject";
      readonly zone: "red";
      readonly pValid: number;
      readonly reason: string;
    };

export type BudgetCheck =
  | { readonly allowed: true }
  | { readonly allowed: false; readonly limit: BudgetLimit; readonly retryAfterMs?: number };

export interface BudgetSnapshot {
  readonly sessionCount: number;
  readonly slotCounts: Readonly<Record<string, number>>;
}
