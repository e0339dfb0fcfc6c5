import { describe, it, expect } from "vitest";
import { defaultScoringConfig } from "../../src/config/schema.js";
import {
  emotionIntensity,
  futureRelevance,
  selectCompressionMode,
  significance,
} from "../../src/scoring/significance.js";
import {
  reflectionPriority,
  shouldReflect,
  volatility,
} from "../../src/scoring/volatility.js";

const config = defaultScoringConfig();

const quiet = {
  emotion: 0,
  novelty: 0,
  userMarked: false,
  contradictionSignal: 0,
  futureRelevance: 0,
};

describe("significance", () => {
  it("is 0 for an unremarkable statement", () => {
    expect(significance(quiet, config.significance)).toBe(0);
  });

  it("weights a user mark at 0.3", () => {
    expect(significance({ ...quiet, userMarked: true }, config.significance)).toBeCloseTo(0.3);
  });

  it("reaches 1 when every signal is maxed", () => {
    const score = significance(
      { emotion: 1, novelty: 1, userMarked: true, contradictionSignal: 1, futureRelevance: 1 },
      config.significance,
    );
    expect(score).toBeCloseTo(1);
  });
});

describe("selectCompressionMode", () => {
  it("keeps significant memories lossless", () => {
    expect(selectCompressionMode(0.7, config)).toBe("lossless");
  });

  it("sketches insignificant memories", () => {
    expect(selectCompressionMode(0.3, config)).toBe("sketch");
  });

  it("uses hybrid in between", () => {
    expect(selectCompressionMode(0.5, config)).toBe("hybrid");
  });
});

describe("emotionIntensity", () => {
  it("is 0 for empty text", () => {
    expect(emotionIntensity("")).toBe(0);
  });

  it("counts exclamations and emotion words", () => {
    expect(emotionIntensity("i love this!")).toBeCloseTo(0.2);
  });

  it("caps exclamations at 0.3", () => {
    expect(emotionIntensity("WOW!!!!")).toBeCloseTo(0.3 + 3 / 14);
  });
});

describe("futureRelevance", () => {
  it("scores questions and plans", () => {
    expect(futureRelevance("What will you do tomorrow?")).toBeCloseTo(0.5);
  });

  it("adds time references", () => {
    expect(futureRelevance("Remind me when the train leaves")).toBeCloseTo(0.2);
  });

  it("is 0 for a plain statement", () => {
    expect(futureRelevance("The sky is blue")).toBe(0);
  });
});

describe("volatility", () => {
  it("combines drift, misalignment, contradiction and fallback", () => {
    const score = volatility(
      { drift: 0.5, memoryAlignment: 0.5, isContradiction: true, isFallback: false },
      config,
    );
    expect(score).toBeCloseTo(0.575);
    expect(shouldReflect(score, config)).toBe(true);
    expect(reflectionPriority(score)).toBe("medium");
  });

  it("tops out at 1 with the default weights", () => {
    const score = volatility(
      { drift: 1, memoryAlignment: 0, isContradiction: true, isFallback: true },
      config,
    );
    expect(score).toBeCloseTo(1);
    expect(reflectionPriority(score)).toBe("high");
  });

  it("reflects at exactly thetaReflect", () => {
    expect(shouldReflect(0.5, config)).toBe(true);
    expect(shouldReflect(0.49, config)).toBe(false);
  });

  it("buckets priority at 0.7 and 0.4", () => {
    expect(reflectionPriority(0.7)).toBe("high");
    expect(reflectionPriority(0.4)).toBe("medium");
    expect(reflectionPriority(0.39)).toBe("low");
  });
});
