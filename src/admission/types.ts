import type { GateReason } from "../scoring/gates.js";
import type { ResponseType, Severity } from "../scoring/types.js";

export type AdmissionVerdict = "belief" | "speech" | "reject";

export interface AdmissionInput {
  intentAlignment: number;
  memoryAlignment: number;
  responseType: ResponseType;
  groundingScore: number;
  /** Slots the answer depends on; scopes which contradictions can block it. */
  dependsOnSlots?: readonly string[];
  /** Memories the answer was built from. */
  memoryIds?: readonly string[];
  shortExtraction?: boolean;
  now?: number;
}

export interface SeverityAssessment {
  readonly severity: Severity;
  readonly contradictionIds: readonly string[];
}

export interface AdmissionDecision extends SeverityAssessment {
  readonly verdict: AdmissionVerdict;
  readonly reason: GateReason;
  readonly detail?: string;
}

/** The subset of a retrieval hit the alignment scorers read. */
export interface AlignmentHit {
  readonly memory: { readonly text: string; readonly vector: readonly number[] };
  readonly score: number;
}
