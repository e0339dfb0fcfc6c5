export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface CredenceConfig {
  readonly logging: LoggingConfig;
  readonly scoring: ScoringConfig;
  readonly ledger: LedgerConfig;
  readonly disclosure: DisclosureConfig;
  readonly engine: EngineConfig;
}

export interface LoggingConfig {
  readonly level: LogLevel;
  readonly file?: string;
  readonly json?: boolean;
}

export interface SignificanceWeights {
  readonly emotion: number;
  readonly novelty: number;
  readonly userMark: number;
  readonly contradiction: number;
  readonly future: number;
}

export interface VolatilityWeights {
  readonly drift: number;
  readonly alignment: number;
  readonly contradiction: number;
  readonly fallback: number;
}

export interface ParaphraseConfig {
  readonly driftMin: number;
  readonly driftMax: number;
  readonly minOverlap: number;
}

export interface GateThresholds {
  readonly intent: number;
  readonly memory: number;
  readonly grounding: number;
}

export interface GateConfig {
  readonly factual: GateThresholds;
  readonly explanatory: GateThresholds;
  readonly conversational: GateThresholds;
  /** Grounding floor for a short factual answer quoted from a memory. */
  readonly extractionGrounding: number;
  readonly shortAnswerMaxChars: number;
}

/**
 * Every threshold and weight the scoring kernel reads.
 * Built once by parseConfig and frozen; kernel functions take it explicitly.
 */
export interface ScoringConfig {
  readonly etaPos: number;
  readonly etaReinforce: number;
  readonly etaNeg: number;
  readonly thetaContra: number;
  readonly thetaMin: number;
  readonly thetaDrop: number;
  readonly thetaFallback: number;
  readonly thetaReflect: number;
  readonly recencyTimeConstantMs: number;
  readonly alphaTrust: number;
  readonly tauBase: number;
  readonly tauFallbackCap: number;
  readonly tauTrainMin: number;
  readonly fallbackTrustFactor: number;
  readonly reflectionTrustBoost: number;
  readonly contestedDampening: number;
  readonly losslessThreshold: number;
  readonly sketchThreshold: number;
  readonly significance: SignificanceWeights;
  readonly volatility: VolatilityWeights;
  readonly paraphrase: ParaphraseConfig;
  readonly entitySwapMaxSimilarity: number;
  readonly gates: GateConfig;
}

export interface LedgerConfig {
  readonly settlingConfirmations: number;
  readonly settledConfirmations: number;
  readonly freshnessWindowMs: number;
  readonly signatureDriftEpsilon: number;
  readonly deferralMs: number;
}

export interface DisclosureConfig {
  readonly greenThreshold: number;
  readonly redThreshold: number;
  readonly enableBudget: boolean;
  readonly maxPerSession: number;
  readonly maxPerSlot: number;
  readonly cooldownMs: number;
  readonly highStakesSlots: readonly string[];
}

export interface EngineConfig {
  readonly priorCandidates: number;
  readonly minPriorSimilarity: number;
}
