import type { ContradictionEntry } from "../ledger/types.js";
import type { Severity } from "../scoring/types.js";
import type { SeverityAssessment } from "./types.js";

const RANK: Record<Severity, number> = { none: 0, note: 1, blocking: 2 };

function entrySeverity(
  entry: ContradictionEntry,
  slots: ReadonlySet<string>,
  memoryIds: ReadonlySet<string>,
  now: number,
  deferralMs: number,
): Severity {
  if (entry.affectsSlots.some((s) => slots.has(s))) {
    switch (entry.status) {
      case "open": {
        const deferred = entry.deferredAt !== null && now - entry.deferredAt < deferralMs;
        return deferred ? "note" : "blocking";
      }
      case "settling":
        return "note";
      case "settled":
      case "resolved":
        return "none";
    }
  }
  if (entry.affectsSlots.length === 0 && entry.status !== "resolved" && entry.status !== "settled") {
    return memoryIds.has(entry.oldMemoryId) || memoryIds.has(entry.newMemoryId) ? "note" : "none";
  }
  return "none";
}

/**
 * Worst severity across the entries that touch this answer.
 * An entry scoped to other slots never contributes.
 */
export function contradictionSeverity(
  entries: readonly ContradictionEntry[],
  slots: readonly string[],
  memoryIds: readonly string[],
  now: number,
  deferralMs: number,
): SeverityAssessment {
  const slotSet = new Set(slots);
  const memorySet = new Set(memoryIds);
  let severity: Severity = "none";
  const contradictionIds: string[] = [];

  for (const entry of entries) {
    const s = entrySeverity(entry, slotSet, memorySet, now, deferralMs);
    if (s === "none") continue;
    contradictionIds.push(entry.id);
    if (RANK[s] > RANK[severity]) severity = s;
  }
  return { severity, contradictionIds };
}
