import type { ScoringConfig } from "../config/types.js";
import { isLowProvenance, type MemorySource } from "./types.js";

export function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.max(0, Math.min(1, value));
}

/** Answer grounded in the memory: trust + etaPos * (1 - drift). */
export function evolveAligned(trust: number, drift: number, config: ScoringConfig): number {
  return clamp01(trust + config.etaPos * (1 - drift));
}

/** Memory restated or confirmed: trust + etaReinforce * (1 - drift). */
export function evolveReinforced(trust: number, drift: number, config: ScoringConfig): number {
  return clamp01(trust + config.etaReinforce * (1 - drift));
}

/** Memory contradicted: trust * (1 - etaNeg * drift). */
export function evolveContradicted(trust: number, drift: number, config: ScoringConfig): number {
  return clamp01(trust * (1 - config.etaNeg * drift));
}

export function capFallbackTrust(trust: number, source: MemorySource, config: ScoringConfig): number {
  const clamped = clamp01(trust);
  return isLowProvenance(source) ? Math.min(clamped, config.tauFallbackCap) : clamped;
}

function baseTrust(source: MemorySource, config: ScoringConfig): number {
  switch (source) {
    case "fallback":
      return config.tauBase * config.fallbackTrustFactor;
    case "reflection":
      return config.tauBase * config.reflectionTrustBoost;
    case "user":
    case "system":
    case "external":
    case "model_output":
      return config.tauBase;
  }
}

/** Starting trust by provenance, clamped and capped for low-provenance sources. */
export function initialTrust(source: MemorySource, config: ScoringConfig): number {
  return capFallbackTrust(baseTrust(source, config), source, config);
}

export interface TrainingVerdict {
  readonly allowed: boolean;
  readonly reason: "trust_too_low" | "open_contradiction" | "unverified_source" | "safe";
}

/** Whether an offline training layer may learn from this memory. */
export function canTrainOnMemory(
  trust: number,
  hasOpenContradiction: boolean,
  source: MemorySource,
  config: ScoringConfig,
): TrainingVerdict {
  if (trust < config.tauTrainMin) return { allowed: false, reason: "trust_too_low" };
  if (hasOpenContradiction) return { allowed: false, reason: "open_contradiction" };
  if (isLowProvenance(source)) return { allowed: false, reason: "unverified_source" };
  return { allowed: true, reason: "safe" };
}
