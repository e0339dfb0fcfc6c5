import type { ContradictionType } from "../scoring/types.js";
import type { ReflectionPriority } from "../scoring/volatility.js";

export type ContradictionStatus = "open" | "settling" | "settled" | "resolved";

export type UnresolvedStatus = Exclude<ContradictionStatus, "resolved">;

export type Resolution = "override" | "preserve";

export type ResolutionDecision = Resolution | "ask_user";

export interface ContradictionEntry {
  readonly id: string;
  readonly timestamp: number;
  readonly oldMemoryId: string;
  readonly newMemoryId: string;
  readonly driftMean: number;
  readonly confidenceDelta: number;
  readonly status: ContradictionStatus;
  readonly contradictionType: ContradictionType;
  readonly affectsSlots: readonly string[];
  readonly summary: string;
  readonly confirmationCount: number;
  /** Side currently being confirmed; null until the first confirmation. */
  readonly confirmedMemoryId: string | null;
  readonly volatility: number;
  readonly deferredAt: number | null;
  readonly resolution: Resolution | null;
  readonly winnerMemoryId: string | null;
  readonly resolvedAt: number | null;
  readonly statusChangedAt: number;
}

export interface RecordContradictionParams {
  oldMemoryId: string;
  newMemoryId: string;
  driftMean: number;
  confidenceDelta: number;
  contradictionType: ContradictionType;
  affectsSlots?: readonly string[];
  summary: string;
  /** Defaults to 1 - driftMean. */
  memoryAlignment?: number;
}

export type RecordResult =
  | { readonly ok: true; readonly entry: ContradictionEntry; readonly created: boolean }
  | { readonly ok: false; readonly error: "not_found"; readonly memoryId: string };

export type ResolveResult =
  | { readonly ok: true; readonly entry: ContradictionEntry }
  | {
      readonly ok: false;
      readonly error: "not_found" | "already_resolved" | "invalid_choice";
      readonly ledgerId: string;
    };

export interface ConfirmOutcome {
  readonly ledgerId: string;
  readonly confirmationCount: number;
  readonly from: ContradictionStatus;
  readonly to: ContradictionStatus;
}

export interface ReflectionQueueItem {
  readonly entry: ContradictionEntry;
  readonly volatility: number;
  readonly priority: ReflectionPriority;
}

export interface LedgerStats {
  readonly total: number;
  readonly byStatus: Record<ContradictionStatus, number>;
  readonly byType: Record<ContradictionType, number>;
}
