import type { Logger } from "../logging/logger.js";
import type { LedgerConfig, ScoringConfig } from "../config/types.js";
import type { ContradictionLedger } from "../ledger/ledger.js";
import { checkGates } from "../scoring/gates.js";
import { contradictionSeverity } from "./severity.js";
import type { AdmissionDecision, AdmissionInput, AdmissionVerdict } from "./types.js";

/**
 * Decides whether a generated answer is a belief, speech, or rejected.
 * Holds no state; contradictions are read from the ledger per call.
 */
export class AdmissionGate {
  constructor(
    private readonly ledger: ContradictionLedger,
    private readonly scoring: ScoringConfig,
    private readonly ledgerConfig: LedgerConfig,
    private readonly logger: Logger,
  ) {}

  evaluate(input: AdmissionInput): AdmissionDecision {
    const now = input.now ?? Date.now();
    const assessment = contradictionSeverity(
      this.ledger.getOpenContradictions(),
      input.dependsOnSlots ?? [],
      input.memoryIds ?? [],
      now,
      this.ledgerConfig.deferralMs,
    );

    const gate = checkGates(
      {
        intentAlignment: input.intentAlignment,
        memoryAlignment: input.memoryAlignment,
        responseType: input.responseType,
        groundingScore: input.groundingScore,
        severity: assessment.severity,
        shortExtraction: input.shortExtraction,
      },
      this.scoring,
    );

    let verdict: AdmissionVerdict;
    if (!gate.passed) verdict = "reject";
    else verdict = assessment.severity === "note" ? "speech" : "belief";

    const decision: AdmissionDecision = {
      verdict,
      reason: gate.reason,
      ...(gate.detail !== undefined ? { detail: gate.detail } : {}),
      severity: assessment.severity,
      contradictionIds: assessment.contradictionIds,
    };
    this.logger.debug(
      { verdict, reason: gate.reason, severity: assessment.severity, responseType: input.responseType },
      "Admission decided",
    );
    return decision;
  }
}
