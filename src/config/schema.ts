import { z } from "zod";
import type { CredenceConfig, ScoringConfig } from "./types.js";

const unit = () => z.number().min(0).max(1);

const loggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  file: z.string().optional(),
  json: z.boolean().optional(),
});

const gateThresholdsSchema = (intent: number, memory: number, grounding: number) =>
  z.object({
    intent: unit().default(intent),
    memory: unit().default(memory),
    grounding: unit().default(grounding),
  }).default({});

const scoringSchema = z.object({
  etaPos: unit().default(0.1),
  etaReinforce: unit().default(0.05),
  etaNeg: unit().default(0.15),
  thetaContra: z.number().min(0).max(2).default(0.28),
  thetaMin: z.number().min(0).max(2).default(0.3),
  thetaDrop: unit().default(0.3),
  thetaFallback: z.number().min(0).max(2).default(0.42),
  thetaReflect: z.number().min(0).default(0.5),
  recencyTimeConstantMs: z.number().positive().default(86_400_000),
  alphaTrust: unit().default(0.7),
  tauBase: unit().default(0.7),
  tauFallbackCap: unit().default(0.3),
  tauTrainMin: unit().default(0.6),
  fallbackTrustFactor: unit().default(0.6),
  reflectionTrustBoost: z.number().min(1).default(1.2),
  contestedDampening: unit().default(0.1),
  losslessThreshold: z.number().min(0).default(0.7),
  sketchThreshold: z.number().min(0).default(0.3),
  significance: z.object({
    emotion: z.number().min(0).default(0.2),
    novelty: z.number().min(0).default(0.25),
    userMark: z.number().min(0).default(0.3),
    contradiction: z.number().min(0).default(0.15),
    future: z.number().min(0).default(0.1),
  }).default({}),
  volatility: z.object({
    drift: z.number().min(0).default(0.3),
    alignment: z.number().min(0).default(0.25),
    contradiction: z.number().min(0).default(0.3),
    fallback: z.number().min(0).default(0.15),
  }).default({}),
  paraphrase: z.object({
    driftMin: z.number().min(0).max(2).default(0.25),
    driftMax: z.number().min(0).max(2).default(0.55),
    minOverlap: unit().default(0.7),
  }).default({}),
  entitySwapMaxSimilarity: unit().default(0.78),
  gates: z.object({
    factual: gateThresholdsSchema(0.35, 0.35, 0.3),
    explanatory: gateThresholdsSchema(0.4, 0.25, 0.25),
    conversational: gateThresholdsSchema(0.3, 0, 0),
    extractionGrounding: unit().default(0.15),
    shortAnswerMaxChars: z.number().int().positive().default(50),
  }).default({}),
}).refine((s) => s.sketchThreshold <= s.losslessThreshold, {
  message: "sketchThreshold must not exceed losslessThreshold",
  path: ["sketchThreshold"],
});

const ledgerSchema = z.object({
  settlingConfirmations: z.number().int().min(2).default(3),
  settledConfirmations: z.number().int().min(2).default(6),
  freshnessWindowMs: z.number().positive().default(604_800_000),
  signatureDriftEpsilon: z.number().min(0).default(0.01),
  deferralMs: z.number().min(0).default(3_600_000),
}).refine((l) => l.settledConfirmations > l.settlingConfirmations, {
  message: "settledConfirmations must exceed settlingConfirmations",
  path: ["settledConfirmations"],
});

const disclosureSchema = z.object({
  greenThreshold: unit().default(0.9),
  redThreshold: unit().default(0.4),
  enableBudget: z.boolean().default(true),
  maxPerSession: z.number().int().min(0).default(3),
  maxPerSlot: z.number().int().min(0).default(2),
  cooldownMs: z.number().min(0).default(300_000),
  highStakesSlots: z.array(z.string().min(1)).default([
    "name",
    "identity",
    "employer",
    "location",
    "medical",
    "medical_diagnosis",
    "legal",
    "legal_status",
    "account_status",
  ]),
}).refine((d) => d.redThreshold <= d.greenThreshold, {
  message: "redThreshold must not exceed greenThreshold",
  path: ["redThreshold"],
});

const engineSchema = z.object({
  priorCandidates: z.number().int().positive().default(8),
  minPriorSimilarity: unit().default(0.5),
});

export const credenceConfigSchema = z.object({
  logging: loggingSchema.default({}),
  scoring: scoringSchema.default({}),
  ledger: ledgerSchema.default({}),
  disclosure: disclosureSchema.default({}),
  engine: engineSchema.default({}),
});

export function parseConfig(raw: unknown): CredenceConfig {
  const parsed = credenceConfigSchema.parse(raw);
  return { ...parsed, scoring: freezeScoring(parsed.scoring) };
}

function freezeScoring(scoring: ScoringConfig): ScoringConfig {
  const { gates } = scoring;
  return Object.freeze({
    ...scoring,
    significance: Object.freeze({ ...scoring.significance }),
    volatility: Object.freeze({ ...scoring.volatility }),
    paraphrase: Object.freeze({ ...scoring.paraphrase }),
    gates: Object.freeze({
      ...gates,
      factual: Object.freeze({ ...gates.factual }),
      explanatory: Object.freeze({ ...gates.explanatory }),
      conversational: Object.freeze({ ...gates.conversational }),
    }),
  });
}

/** Defaults for every kernel threshold, for callers that do not load a file. */
export function defaultScoringConfig(): ScoringConfig {
  return parseConfig({}).scoring;
}
