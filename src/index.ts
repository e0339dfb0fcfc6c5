// Public API
export { openCredence, CALIBRATION_FILENAME } from "./core/lifecycle.js";
export type { CredenceContext, OpenOptions } from "./core/lifecycle.js";
export { BeliefEngine, DEFAULT_SESSION } from "./core/engine.js";
export type {
  AnswerEvaluation,
  BeliefEngineDeps,
  EvaluateAnswerParams,
  Facts,
  IngestParams,
  IngestResult,
} from "./core/engine.js";

// Config
export { loadConfig, substituteEnv } from "./config/loader.js";
export { credenceConfigSchema, defaultScoringConfig, parseConfig } from "./config/schema.js";
export { ensureDir, getConfigPath, getStateDir } from "./config/paths.js";
export type * from "./config/types.js";

// Logging and events
export { componentLogger, createLogger } from "./logging/logger.js";
export type { Logger } from "./logging/logger.js";
export { BeliefBus } from "./events/bus.js";
export type { BeliefEvent } from "./events/types.js";

// Storage
export { VaultDB, DB_FILENAME } from "./vault/db.js";
export { MemoryStore } from "./memory/store.js";
export type * from "./memory/types.js";
export { ContradictionLedger } from "./ledger/ledger.js";
export type * from "./ledger/types.js";

// Scoring kernel
export * from "./scoring/types.js";
export { similarity, drift, novelty, isZeroVector } from "./scoring/vector.js";
export { recencyWeight, beliefWeight, retrievalScore, topK } from "./scoring/retrieval.js";
export {
  significance,
  selectCompressionMode,
  emotionIntensity,
  futureRelevance,
} from "./scoring/significance.js";
export type { SignificanceInput } from "./scoring/significance.js";
export {
  evolveAligned,
  evolveReinforced,
  evolveContradicted,
  capFallbackTrust,
  initialTrust,
  canTrainOnMemory,
} from "./scoring/trust.js";
export type { TrainingVerdict } from "./scoring/trust.js";
export { volatility, shouldReflect, reflectionPriority } from "./scoring/volatility.js";
export type { ReflectionPriority, VolatilityInput } from "./scoring/volatility.js";
export { detectContradiction } from "./scoring/contradiction/detector.js";
export { builtinContradictionRules } from "./scoring/contradiction/rules.js";
export {
  classifyFactChange,
  isTransientUpdate,
  summarizeContradiction,
} from "./scoring/contradiction/classify.js";
export type * from "./scoring/contradiction/types.js";
export { checkGates } from "./scoring/gates.js";
export type { GateInput, GateReason, GateResult } from "./scoring/gates.js";

// Admission and disclosure
export { AdmissionGate } from "./admission/gate.js";
export { contradictionSeverity } from "./admission/severity.js";
export { groundingScore, isShortExtraction, memoryAlignment } from "./admission/alignment.js";
export type * from "./admission/types.js";
export { DisclosurePolicy } from "./disclosure/policy.js";
export { DisclosureBudget } from "./disclosure/budget.js";
export { DisclosureSessions } from "./disclosure/sessions.js";
export { clarificationPrompt, slotDisplayName } from "./disclosure/prompts.js";
export { loadCalibratedThresholds, withCalibration } from "./disclosure/calibration.js";
export type { CalibratedThresholds } from "./disclosure/calibration.js";
export type * from "./disclosure/types.js";

// Facts
export { RegexFactExtractor } from "./facts/extractor.js";
export type { SlotPattern } from "./facts/extractor.js";
export { HashingEmbedder } from "./facts/embedder.js";
export type * from "./facts/types.js";
