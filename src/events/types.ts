import type { MemoryRecord } from "../memory/types.js";
import type { ContradictionEntry, ContradictionStatus } from "../ledger/types.js";
import type { DisclosureDecision } from "../disclosure/types.js";

export type BeliefEvent =
  | { type: "memory_stored"; memory: MemoryRecord }
  | {
      type: "trust_changed";
      memoryId: string;
      oldTrust: number;
      newTrust: number;
      reason: string;
    }
  | { type: "contradiction_recorded"; entry: ContradictionEntry }
  | {
      type: "contradiction_confirmed";
      ledgerId: string;
      memoryId: string;
      confirmationCount: number;
    }
  | {
      type: "contradiction_transitioned";
      ledgerId: string;
      from: ContradictionStatus;
      to: ContradictionStatus;
      trigger: "confirmation" | "age";
    }
  | { type: "contradiction_resolved"; entry: ContradictionEntry }
  | {
      type: "disclosure_decided";
      sessionKey: string;
      slot: string;
      decision: DisclosureDecision;
    };
