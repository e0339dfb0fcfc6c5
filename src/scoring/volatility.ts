import type { ScoringConfig } from "../config/types.js";

export interface VolatilityInput {
  readonly drift: number;
  readonly memoryAlignment: number;
  readonly isContradiction: boolean;
  readonly isFallback: boolean;
}

export function volatility(input: VolatilityInput, config: ScoringConfig): number {
  const w = config.volatility;
  return (
    w.drift * input.drift +
    w.alignment * (1 - input.memoryAlignment) +
    w.contradiction * (input.isContradiction ? 1 : 0) +
    w.fallback * (input.isFallback ? 1 : 0)
  );
}

export function shouldReflect(score: number, config: ScoringConfig): boolean {
  return score >= config.thetaReflect;
}

export type ReflectionPriority = "high" | "medium" | "low";

export function reflectionPriority(score: number): ReflectionPriority {
  if (score >= 0.7) return "high";
  if (score >= 0.4) return "medium";
  return "low";
}
