import { randomUUID } from "node:crypto";
import type { VaultDB } from "../vault/db.js";
import type { BeliefBus } from "../events/bus.js";
import type { BeliefEvent } from "../events/types.js";
import type { Logger } from "../logging/logger.js";
import type { LedgerConfig, ScoringConfig } from "../config/types.js";
import type { MemoryStore } from "../memory/store.js";
import { CONTRADICTION_TYPES, isLowProvenance, type ContradictionType } from "../scoring/types.js";
import { reflectionPriority, shouldReflect, volatility } from "../scoring/volatility.js";
import { ContradictionStore, normalizeSlots } from "./store.js";
import type {
  ConfirmOutcome,
  ContradictionEntry,
  ContradictionStatus,
  LedgerStats,
  RecordContradictionParams,
  RecordResult,
  ReflectionQueueItem,
  ResolutionDecision,
  ResolveResult,
} from "./types.js";

const STATUSES: readonly ContradictionStatus[] = ["open", "settling", "settled", "resolved"];
const UNRESOLVED: readonly ContradictionStatus[] = ["open", "settling", "settled"];
const ACTIVE: readonly ContradictionStatus[] = ["open", "settling"];

/**
 * Contradiction lifecycle.
 *
 * State machine:
 *   open     → settling | resolved
 *   settling → settled  | resolved
 *   settled  → resolved
 *   resolved (terminal)
 *
 * open → settling → settled happens by repeated confirmation of one side
 * or by age (sweep); resolved only through resolve().
 */
const TRANSITIONS: Record<ContradictionStatus, readonly ContradictionStatus[]> = {
  open: ["settling", "resolved"],
  settling: ["settled", "resolved"],
  settled: ["resolved"],
  resolved: [],
};

export class ContradictionLedger {
  private readonly store: ContradictionStore;

  constructor(
    private readonly vault: VaultDB,
    private readonly memories: MemoryStore,
    private readonly scoring: ScoringConfig,
    private readonly config: LedgerConfig,
    private readonly bus: BeliefBus,
    private readonly logger: Logger,
  ) {
    this.store = new ContradictionStore(vault);
  }

  /**
   * Degrade the older memory and append the entry, atomically.
   * A repeat with the same pair, drift and slots confirms the existing entry instead.
   */
  record(params: RecordContradictionParams): RecordResult {
    const slots = normalizeSlots(params.affectsSlots);
    const duplicate = this.findSignatureMatch(params, slots);
    if (duplicate) {
      this.confirmEntry(duplicate, params.newMemoryId);
      const entry = this.store.get(duplicate.id) ?? duplicate;
      this.logger.debug({ ledgerId: entry.id }, "Repeated contradiction counted as confirmation");
      return { ok: true, entry, created: false };
    }

    const result = this.vault.transaction((): RecordResult => {
      const newer = this.memories.getMemory(params.newMemoryId);
      if (!newer) return { ok: false, error: "not_found", memoryId: params.newMemoryId };
      if (!this.memories.getMemory(params.oldMemoryId)) {
        return { ok: false, error: "not_found", memoryId: params.oldMemoryId };
      }

      const id = randomUUID();
      this.memories.evolveTrustForContradiction(params.oldMemoryId, newer.vector, `contradiction:${id}`);

      const now = Date.now();
      const entry: ContradictionEntry = {
        id,
        timestamp: now,
        oldMemoryId: params.oldMemoryId,
        newMemoryId: params.newMemoryId,
        driftMean: params.driftMean,
        confidenceDelta: params.confidenceDelta,
        status: "open",
        contradictionType: params.contradictionType,
        affectsSlots: slots,
        summary: params.summary,
        confirmationCount: 0,
        confirmedMemoryId: null,
        volatility: volatility(
          {
            drift: params.driftMean,
            memoryAlignment: params.memoryAlignment ?? 1 - params.driftMean,
            isContradiction: true,
            isFallback: isLowProvenance(newer.source),
          },
          this.scoring,
        ),
        deferredAt: null,
        resolution: null,
        winnerMemoryId: null,
        resolvedAt: null,
        statusChangedAt: now,
      };
      this.store.insert(entry);
      return { ok: true, entry, created: true };
    });

    if (!result.ok) {
      this.logger.warn({ memoryId: result.memoryId }, "Contradiction references unknown memory");
      return result;
    }

    this.emit({ type: "contradiction_recorded", entry: result.entry });
    this.logger.info(
      {
        ledgerId: result.entry.id,
        oldMemoryId: params.oldMemoryId,
        newMemoryId: params.newMemoryId,
        type: params.contradictionType,
        slots,
      },
      "Contradiction recorded",
    );
    return result;
  }

  /**
   * A later turn resolved to this memory again.
   * Counts a confirmation on every unresolved entry it is a side of.
   */
  confirm(memoryId: string): ConfirmOutcome[] {
    const outcomes: ConfirmOutcome[] = [];
    for (const entry of this.store.listForMemory(memoryId)) {
      if (entry.status === "resolved") continue;
      outcomes.push(this.confirmEntry(entry, memoryId));
    }
    return outcomes;
  }

  /** Age-based settling: window for open → settling, twice that for settled. */
  sweep(now = Date.now()): ConfirmOutcome[] {
    const window = this.config.freshnessWindowMs;
    const outcomes: ConfirmOutcome[] = [];

    // settling first, so one sweep advances an entry by at most one step
    for (const entry of this.store.listByStatus(["settling"])) {
      if (now - entry.timestamp >= window * 2) {
        this.transition(entry, "settled", "age", now);
        outcomes.push({ ledgerId: entry.id, confirmationCount: entry.confirmationCount, from: "settling", to: "settled" });
      }
    }
    for (const entry of this.store.listByStatus(["open"])) {
      if (now - entry.timestamp >= window) {
        this.transition(entry, "settling", "age", now);
        outcomes.push({ ledgerId: entry.id, confirmationCount: entry.confirmationCount, from: "open", to: "settling" });
      }
    }

    this.logger.debug({ advanced: outcomes.length }, "Ledger sweep finished");
    return outcomes;
  }

  /**
   * Open and settling entries. With a slot filter, only those whose
   * affected slots intersect it; an empty filter matches nothing.
   */
  getOpenContradictions(slotFilter?: readonly string[]): ContradictionEntry[] {
    const entries = this.store.listByStatus(ACTIVE);
    if (slotFilter === undefined) return entries;
    const wanted = new Set(slotFilter);
    return entries.filter((e) => e.affectsSlots.some((s) => wanted.has(s)));
  }

  getUnresolvedCount(): number {
    return this.store.listByStatus(UNRESOLVED).length;
  }

  /** Unsettled entries worth reflecting on, most volatile first. */
  getReflectionQueue(now = Date.now()): ReflectionQueueItem[] {
    return this.store
      .listByStatus(ACTIVE)
      .filter((e) => !this.isDeferred(e, now) && shouldReflect(e.volatility, this.scoring))
      .sort((a, b) => b.volatility - a.volatility || a.timestamp - b.timestamp)
      .map((entry) => ({
        entry,
        volatility: entry.volatility,
        priority: reflectionPriority(entry.volatility),
      }));
  }

  getEntry(ledgerId: string): ContradictionEntry | null {
    return this.store.get(ledgerId);
  }

  getContradictionsForMemory(memoryId: string): ContradictionEntry[] {
    return this.store.listForMemory(memoryId);
  }

  isDeferred(entry: ContradictionEntry, now = Date.now()): boolean {
    return entry.deferredAt !== null && now - entry.deferredAt < this.config.deferralMs;
  }

  getStats(windowMs?: number): LedgerStats {
    const since = windowMs === undefined ? 0 : Date.now() - windowMs;
    const byStatus: Record<ContradictionStatus, number> = { open: 0, settling: 0, settled: 0, resolved: 0 };
    const byType: Record<ContradictionType, number> = { conflict: 0, revision: 0, temporal: 0, refinement: 0 };

    let total = 0;
    for (const { key, count } of this.store.countBy("status", since)) {
      const status = STATUSES.find((s) => s === key);
      if (status) {
        byStatus[status] = count;
        total += count;
      }
    }
    for (const { key, count } of this.store.countBy("contradiction_type", since)) {
      const type = CONTRADICTION_TYPES.find((t) => t === key);
      if (type) byType[type] = count;
    }
    return { total, byStatus, byType };
  }

  /**
   * Explicit decision on an entry.
   * override: chosen side wins, the other is degraded. preserve: both stand.
   * ask_user: status unchanged, deferred so it is not resurfaced every turn.
   */
  resolve(ledgerId: string, decision: ResolutionDecision, chosenMemoryId?: string): ResolveResult {
    const entry = this.store.get(ledgerId);
    if (!entry) {
      this.logger.warn({ ledgerId, decision }, "Resolve on unknown contradiction");
      return { ok: false, error: "not_found", ledgerId };
    }
    if (entry.status === "resolved") {
      this.logger.warn({ ledgerId, decision }, "Contradiction already resolved");
      return { ok: false, error: "already_resolved", ledgerId };
    }

    const now = Date.now();
    switch (decision) {
      case "ask_user": {
        const deferred = this.store.update(ledgerId, { deferredAt: now }) ?? entry;
        this.logger.info({ ledgerId }, "Contradiction deferred to user");
        return { ok: true, entry: deferred };
      }
      case "preserve": {
        const resolved = this.finish(entry, { resolution: "preserve", winnerMemoryId: null }, now);
        return { ok: true, entry: resolved };
      }
      case "override": {
        const winnerId = [entry.oldMemoryId, entry.newMemoryId].find((id) => id === chosenMemoryId);
        if (winnerId === undefined) {
          this.logger.warn({ ledgerId, chosenMemoryId }, "Override choice is not a side of the contradiction");
          return { ok: false, error: "invalid_choice", ledgerId };
        }
        const loserId = winnerId === entry.oldMemoryId ? entry.newMemoryId : entry.oldMemoryId;
        const resolved = this.vault.transaction(() => {
          const done = this.finish(entry, { resolution: "override", winnerMemoryId: winnerId }, now);
          const winner = this.memories.getMemory(winnerId);
          if (winner) {
            this.memories.evolveTrustForReinforcement(winnerId, winner.vector, `override_win:${ledgerId}`);
            this.memories.evolveTrustForContradiction(loserId, winner.vector, `override_lose:${ledgerId}`);
          }
          return done;
        });
        return { ok: true, entry: resolved };
      }
    }
  }

  private finish(
    entry: ContradictionEntry,
    outcome: { resolution: "override" | "preserve"; winnerMemoryId: string | null },
    now: number,
  ): ContradictionEntry {
    const resolved =
      this.store.update(entry.id, {
        status: "resolved",
        resolution: outcome.resolution,
        winnerMemoryId: outcome.winnerMemoryId,
        resolvedAt: now,
        statusChangedAt: now,
      }) ?? entry;
    this.emit({ type: "contradiction_resolved", entry: resolved });
    this.logger.info(
      { ledgerId: entry.id, resolution: outcome.resolution, winnerMemoryId: outcome.winnerMemoryId },
      "Contradiction resolved",
    );
    return resolved;
  }

  /** Listeners only hear about writes that committed. */
  private emit(event: BeliefEvent): void {
    this.vault.afterCommit(() => this.bus.emit(event));
  }

  private findSignatureMatch(
    params: RecordContradictionParams,
    slots: readonly string[],
  ): ContradictionEntry | null {
    const signature = slots.join("\u0000");
    for (const entry of this.store.listUnresolvedForPair(params.oldMemoryId, params.newMemoryId)) {
      const sameDrift = Math.abs(entry.driftMean - params.driftMean) <= this.config.signatureDriftEpsilon;
      if (sameDrift && entry.affectsSlots.join("\u0000") === signature) return entry;
    }
    return null;
  }

  private confirmEntry(entry: ContradictionEntry, memoryId: string): ConfirmOutcome {
    const count = entry.confirmedMemoryId === memoryId ? entry.confirmationCount + 1 : 1;
    this.store.update(entry.id, { confirmationCount: count, confirmedMemoryId: memoryId });
    this.emit({ type: "contradiction_confirmed", ledgerId: entry.id, memoryId, confirmationCount: count });

    let status = entry.status;
    if (status === "open" && count >= this.config.settlingConfirmations) {
      status = this.transition(entry, "settling", "confirmation");
    }
    if (status === "settling" && count >= this.config.settledConfirmations) {
      status = this.transition({ ...entry, status }, "settled", "confirmation");
    }
    return { ledgerId: entry.id, confirmationCount: count, from: entry.status, to: status };
  }

  private transition(
    entry: ContradictionEntry,
    to: ContradictionStatus,
    trigger: "confirmation" | "age",
    now = Date.now(),
  ): ContradictionStatus {
    if (!TRANSITIONS[entry.status].includes(to)) {
      this.logger.warn({ ledgerId: entry.id, from: entry.status, to }, "Invalid contradiction transition");
      return entry.status;
    }
    this.store.update(entry.id, { status: to, statusChangedAt: now });
    this.emit({ type: "contradiction_transitioned", ledgerId: entry.id, from: entry.status, to, trigger });
    this.logger.debug({ ledgerId: entry.id, from: entry.status, to, trigger }, "Contradiction transitioned");
    return to;
  }
}
