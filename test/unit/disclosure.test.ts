import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { writeFileSync } from "node:fs";
import { join } from "node:path";
import { DisclosureBudget } from "../../src/disclosure/budget.js";
import { DisclosurePolicy } from "../../src/disclosure/policy.js";
import { DisclosureSessions } from "../../src/disclosure/sessions.js";
import { clarificationPrompt, slotDisplayName } from "../../src/disclosure/prompts.js";
import { loadCalibratedThresholds, withCalibration } from "../../src/disclosure/calibration.js";
import { BeliefBus } from "../../src/events/bus.js";
import { makeConfig, makeTempDir, removeDir, silentLogger } from "../helpers/fixtures.js";

const config = makeConfig().disclosure;
const NOW = 1_700_000_000_000;

describe("DisclosureBudget", () => {
  it("allows the first clarification", () => {
    expect(new DisclosureBudget(config).check("favorite_color", NOW)).toEqual({ allowed: true });
  });

  it("enforces the per-slot limit", () => {
    const budget = new DisclosureBudget(config);
    budget.record("favorite_color", NOW);
    budget.record("favorite_color", NOW + 600_000);
    expect(budget.check("favorite_color", NOW + 1_200_000)).toEqual({ allowed: false, limit: "slot" });
  });

  it("enforces a cooldown per slot", () => {
    const budget = new DisclosureBudget(config);
    budget.record("favorite_color", NOW);
    expect(budget.check("favorite_color", NOW + 1_000)).toEqual({
      allowed: false,
      limit: "cooldown",
      retryAfterMs: 299_000,
    });
    expect(budget.check("favorite_color", NOW + 300_000)).toEqual({ allowed: true });
  });

  it("enforces the per-session limit across slots", () => {
    const budget = new DisclosureBudget(config);
    budget.record("a", NOW);
    budget.record("b", NOW);
    budget.record("c", NOW);
    expect(budget.check("d", NOW)).toEqual({ allowed: false, limit: "session" });
  });

  it("snapshots and resets", () => {
    const budget = new DisclosureBudget(config);
    budget.record("a", NOW);
    budget.record("a", NOW);
    expect(budget.snapshot()).toEqual({ sessionCount: 2, slotCounts: { a: 2 } });
    budget.reset();
    expect(budget.snapshot()).toEqual({ sessionCount: 0, slotCounts: {} });
  });
});

describe("DisclosurePolicy", () => {
  it("accepts in the green zone", () => {
    expect(new DisclosurePolicy(config).decide(0.95, "favorite_color", undefined, undefined, NOW)).toEqual({
      action: "accept",
      zone: "green",
      pValid: 0.95,
      reason: "High confidence (P=0.95)",
    });
  });

  it("rejects in the red zone", () => {
    expect(new DisclosurePolicy(config).decide(0.2, "favorite_color", undefined, undefined, NOW)).toEqual({
      action: "reject",
      zone: "red",
      pValid: 0.2,
      reason: "Low confidence (P=0.20)",
    });
  });

  it("treats the red threshold itself as yellow", () => {
    expect(new DisclosurePolicy(config).decide(0.4, "favorite_color", undefined, undefined, NOW).action).toBe(
      "clarify",
    );
  });

  it("asks for clarification in the yellow zone", () => {
    expect(new DisclosurePolicy(config).decide(0.6, "favorite_color", "blue", "green", NOW)).toEqual({
      action: "clarify",
      zone: "yellow",
      pValid: 0.6,
      reason: "Yellow zone, needs clarification (P=0.60)",
      prompt: "I noticed you mentioned green for your Favorite Color, but I previously had blue. Which one is correct?",
      highStakes: false,
    });
  });

  it("accepts when the budget is exhausted", () => {
    const policy = new DisclosurePolicy(config);
    policy.decide(0.6, "favorite_color", "blue", "green", NOW);
    expect(policy.decide(0.6, "favorite_color", "blue", "green", NOW + 1)).toEqual({
      action: "accept",
      zone: "yellow",
      pValid: 0.6,
      reason: "Yellow zone but cooldown budget exhausted (P=0.60)",
      budgetExhausted: true,
      limit: "cooldown",
    });
  });

  it("always clarifies high-stakes slots but counts them", () => {
    const policy = new DisclosurePolicy(config);
    for (let i = 0; i < 5; i++) {
      const decision = policy.decide(0.6, "employer", "Microsoft", "Amazon", NOW);
      expect(decision.action).toBe("clarify");
    }
    expect(policy.budget.snapshot()).toEqual({ sessionCount: 5, slotCounts: { employer: 5 } });
    expect(policy.decide(0.6, "favorite_color", undefined, "green", NOW)).toMatchObject({
      action: "accept",
      limit: "session",
    });
  });

  it("clarifies every time with the budget disabled", () => {
    const policy = new DisclosurePolicy({ ...config, enableBudget: false });
    for (let i = 0; i < 4; i++) {
      expect(policy.decide(0.6, "favorite_color", undefined, undefined, NOW).action).toBe("clarify");
    }
    expect(policy.budget.snapshot().sessionCount).toBe(0);
  });

  it("starts over after resetBudget", () => {
    const policy = new DisclosurePolicy(config);
    policy.decide(0.6, "favorite_color", undefined, undefined, NOW);
    policy.resetBudget();
    expect(policy.decide(0.6, "favorite_color", undefined, undefined, NOW).action).toBe("clarify");
  });
});

describe("clarification prompts", () => {
  it("formats slot names for display", () => {
    expect(slotDisplayName("remote_preference")).toBe("Remote Preference");
    expect(slotDisplayName("employer")).toBe("Employer");
  });

  it("asks to confirm a single new value", () => {
    expect(clarificationPrompt("location", undefined, "Bellevue")).toBe(
      "Just to confirm - is your Location Bellevue? I want to make sure I have this right.",
    );
  });

  it("falls back to a plain question", () => {
    expect(clarificationPrompt("title")).toBe("Can you confirm your Title?");
  });
});

describe("DisclosureSessions", () => {
  let bus: BeliefBus;
  let sessions: DisclosureSessions;

  beforeEach(() => {
    bus = new BeliefBus();
    sessions = new DisclosureSessions(config, bus, silentLogger());
  });

  afterEach(() => {
    bus.dispose();
  });

  it("keeps a separate budget per session", () => {
    expect(sessions.decide("s1", 0.6, "favorite_color").action).toBe("clarify");
    expect(sessions.decide("s1", 0.6, "favorite_color").action).toBe("accept");
    expect(sessions.decide("s2", 0.6, "favorite_color").action).toBe("clarify");
    expect(sessions.size).toBe(2);
  });

  it("emits disclosure_decided", () => {
    const handler = vi.fn();
    bus.on("disclosure_decided", handler);
    const decision = sessions.decide("s1", 0.95, "favorite_color");
    expect(handler).toHaveBeenCalledWith({
      type: "disclosure_decided",
      sessionKey: "s1",
      slot: "favorite_color",
      decision,
    });
  });

  it("forgets a session when it ends", () => {
    sessions.decide("s1", 0.6, "favorite_color");
    expect(sessions.end("s1")).toBe(true);
    expect(sessions.end("s1")).toBe(false);
    expect(sessions.decide("s1", 0.6, "favorite_color").action).toBe("clarify");
  });
});

describe("calibrated thresholds", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  function write(content: string): string {
    const path = join(dir, "calibrated_thresholds.json");
    writeFileSync(path, content);
    return path;
  }

  it("loads valid thresholds", () => {
    const path = write(JSON.stringify({ greenThreshold: 0.85, redThreshold: 0.35 }));
    expect(loadCalibratedThresholds(path, silentLogger())).toEqual({ greenThreshold: 0.85, redThreshold: 0.35 });
  });

  it("maps a zone file, rejecting below the yellow zone", () => {
    const path = write(JSON.stringify({ green_zone: 0.85, yellow_zone: 0.6, red_zone: 0.3 }));
    expect(loadCalibratedThresholds(path, silentLogger())).toEqual({ greenThreshold: 0.85, redThreshold: 0.6 });
  });

  it("falls back to red_zone when a zone file has no yellow_zone", () => {
    const path = write(JSON.stringify({ green_zone: 0.8, red_zone: 0.3 }));
    expect(loadCalibratedThresholds(path, silentLogger())).toEqual({ greenThreshold: 0.8, redThreshold: 0.3 });
  });

  it("returns null for a zone file with only a green zone", () => {
    expect(loadCalibratedThresholds(write('{"green_zone": 0.8}'), silentLogger())).toBeNull();
  });

  it("returns null when the file is missing", () => {
    expect(loadCalibratedThresholds(join(dir, "missing.json"), silentLogger())).toBeNull();
  });

  it("returns null for malformed JSON", () => {
    expect(loadCalibratedThresholds(write("{not json"), silentLogger())).toBeNull();
  });

  it("returns null for out-of-range or inverted thresholds", () => {
    expect(loadCalibratedThresholds(write('{"greenThreshold": 1.5, "redThreshold": 0.3}'), silentLogger())).toBeNull();
    expect(loadCalibratedThresholds(write('{"greenThreshold": 0.3, "redThreshold": 0.6}'), silentLogger())).toBeNull();
  });

  it("overrides only the zone thresholds", () => {
    const merged = withCalibration(config, { greenThreshold: 0.85, redThreshold: 0.35 });
    expect(merged).toEqual({ ...config, greenThreshold: 0.85, redThreshold: 0.35 });
    expect(withCalibration(config, null)).toBe(config);
  });
});
