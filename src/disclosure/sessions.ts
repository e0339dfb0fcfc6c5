import type { DisclosureConfig } from "../config/types.js";
import type { BeliefBus } from "../events/bus.js";
import type { Logger } from "../logging/logger.js";
import { DisclosurePolicy } from "./policy.js";
import type { DisclosureDecision } from "./types.js";

/** One disclosure policy, and so one budget, per session key. */
export class DisclosureSessions {
  private readonly policies = new Map<string, DisclosurePolicy>();

  constructor(
    private readonly config: DisclosureConfig,
    private readonly bus: BeliefBus,
    private readonly logger: Logger,
  ) {}

  policyFor(sessionKey: string): DisclosurePolicy {
    let policy = this.policies.get(sessionKey);
    if (!policy) {
      policy = new DisclosurePolicy(this.config);
      this.policies.set(sessionKey, policy);
    }
    return policy;
  }

  decide(
    sessionKey: string,
    pValid: number,
    slot: string,
    oldValue?: string,
    newValue?: string,
  ): DisclosureDecision {
    const decision = this.policyFor(sessionKey).decide(pValid, slot, oldValue, newValue);
    this.bus.emit({ type: "disclosure_decided", sessionKey, slot, decision });

    if (decision.action === "clarify") {
      this.logger.info({ sessionKey, slot, highStakes: decision.highStakes }, "Clarification issued");
    } else if (decision.zone === "yellow") {
      this.logger.debug({ sessionKey, slot, limit: decision.limit }, "Clarification skipped, budget exhausted");
    }
    return decision;
  }

  end(sessionKey: string): boolean {
    return this.policies.delete(sessionKey);
  }

  get size(): number {
    return this.policies.size;
  }
}
