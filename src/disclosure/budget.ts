import type { DisclosureConfig } from "../config/types.js";
import type { BudgetCheck, BudgetSnapshot } from "./types.js";

/**
 * Clarification counters for one conversation.
 * Never shared between sessions; DisclosureSessions keeps one per key.
 */
export class DisclosureBudget {
  private sessionCount = 0;
  private readonly slotCounts = new Map<string, number>();
  private readonly lastAsked = new Map<string, number>();

  constructor(private readonly config: DisclosureConfig) {}

  check(slot: string, now = Date.now()): BudgetCheck {
    if (this.sessionCount >= this.config.maxPerSession) {
      return { allowed: false, limit: "session" };
    }
    if ((this.slotCounts.get(slot) ?? 0) >= this.config.maxPerSlot) {
      return { allowed: false, limit: "slot" };
    }
    const last = this.lastAsked.get(slot);
    if (last !== undefined && now - last < this.config.cooldownMs) {
      return { allowed: false, limit: "cooldown", retryAfterMs: last + this.config.cooldownMs - now };
    }
    return { allowed: true };
  }

  record(slot: string, now = Date.now()): void {
    this.sessionCount++;
    this.slotCounts.set(slot, (this.slotCounts.get(slot) ?? 0) + 1);
    this.lastAsked.set(slot, now);
  }

  snapshot(): BudgetSnapshot {
    return { sessionCount: this.sessionCount, slotCounts: Object.fromEntries(this.slotCounts) };
  }

  reset(): void {
    this.sessionCount = 0;
    this.slotCounts.clear();
    this.lastAsked.clear();
  }
}
