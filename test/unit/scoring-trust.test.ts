import { describe, it, expect } from "vitest";
import { defaultScoringConfig } from "../../src/config/schema.js";
import {
  canTrainOnMemory,
  capFallbackTrust,
  clamp01,
  evolveAligned,
  evolveContradicted,
  evolveReinforced,
  initialTrust,
} from "../../src/scoring/trust.js";

const config = defaultScoringConfig();

describe("clamp01", () => {
  it("clamps to the unit interval", () => {
    expect(clamp01(-0.5)).toBe(0);
    expect(clamp01(1.5)).toBe(1);
    expect(clamp01(0.25)).toBe(0.25);
  });

  it("maps NaN to 0", () => {
    expect(clamp01(Number.NaN)).toBe(0);
  });
});

describe("trust evolution", () => {
  it("raises trust on alignment by etaPos * (1 - drift)", () => {
    expect(evolveAligned(0.5, 0.2, config)).toBeCloseTo(0.58);
  });

  it("raises trust on reinforcement by etaReinforce * (1 - drift)", () => {
    expect(evolveReinforced(0.5, 0, config)).toBeCloseTo(0.55);
  });

  it("scales trust down on contradiction by 1 - etaNeg * drift", () => {
    expect(evolveContradicted(0.8, 0.5, config)).toBeCloseTo(0.74);
  });

  it("never leaves [0, 1]", () => {
    expect(evolveAligned(0.99, 0, config)).toBe(1);
    expect(evolveContradicted(0.1, 2, config)).toBeCloseTo(0.07);
  });

  it("does not raise trust when drift is total", () => {
    expect(evolveAligned(0.5, 1, config)).toBe(0.5);
  });
});

describe("capFallbackTrust", () => {
  it("caps fallback and model output at tauFallbackCap", () => {
    expect(capFallbackTrust(0.9, "fallback", config)).toBe(0.3);
    expect(capFallbackTrust(0.9, "model_output", config)).toBe(0.3);
  });

  it("only clamps other sources", () => {
    expect(capFallbackTrust(0.9, "user", config)).toBe(0.9);
    expect(capFallbackTrust(1.5, "external", config)).toBe(1);
  });
});

describe("initialTrust", () => {
  it("starts user, system and external memories at tauBase", () => {
    expect(initialTrust("user", config)).toBe(0.7);
    expect(initialTrust("system", config)).toBe(0.7);
    expect(initialTrust("external", config)).toBe(0.7);
  });

  it("boosts reflection memories", () => {
    expect(initialTrust("reflection", config)).toBeCloseTo(0.84);
  });

  it("caps low-provenance sources", () => {
    expect(initialTrust("fallback", config)).toBe(0.3);
    expect(initialTrust("model_output", config)).toBe(0.3);
  });
});

describe("canTrainOnMemory", () => {
  it("refuses low trust first", () => {
    expect(canTrainOnMemory(0.5, true, "fallback", config)).toEqual({
      allowed: false,
      reason: "trust_too_low",
    });
  });

  it("refuses memories with an open contradiction", () => {
    expect(canTrainOnMemory(0.8, true, "user", config)).toEqual({
      allowed: false,
      reason: "open_contradiction",
    });
  });

  it("refuses unverified sources", () => {
    expect(canTrainOnMemory(0.8, false, "fallback", config)).toEqual({
      allowed: false,
      reason: "unverified_source",
    });
  });

  it("allows trusted, uncontested user memories at the threshold", () => {
    expect(canTrainOnMemory(0.6, false, "user", config)).toEqual({ allowed: true, reason: "safe" });
  });
});
