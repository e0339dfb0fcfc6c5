import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { AdmissionGate } from "../../src/admission/gate.js";
import type { AdmissionInput } from "../../src/admission/types.js";
import type { MemoryRecord } from "../../src/memory/types.js";
import { atCosine, makeStores, silentLogger, type StoreHarness } from "../helpers/fixtures.js";

describe("AdmissionGate", () => {
  let h: StoreHarness;
  let gate: AdmissionGate;
  let older: MemoryRecord;
  let newer: MemoryRecord;

  function input(overrides: Partial<AdmissionInput> = {}): AdmissionInput {
    return {
      intentAlignment: 0.9,
      memoryAlignment: 0.9,
      responseType: "factual",
      groundingScore: 0.9,
      ...overrides,
    };
  }

  function recordEmployerConflict(slots: string[] = ["employer"]): string {
    const result = h.ledger.record({
      oldMemoryId: older.id,
      newMemoryId: newer.id,
      driftMean: 0.4,
      confidenceDelta: 0,
      contradictionType: "conflict",
      affectsSlots: slots,
      summary: "employer changed",
    });
    if (!result.ok) throw new Error("record failed");
    return result.entry.id;
  }

  beforeEach(() => {
    h = makeStores();
    gate = new AdmissionGate(h.ledger, h.config.scoring, h.config.ledger, silentLogger());
    older = h.memories.insert({ text: "I work at Microsoft", vector: [1, 0, 0], confidence: 0.9, source: "user" });
    newer = h.memories.insert({ text: "I work at Amazon", vector: atCosine(0.6), confidence: 0.9, source: "user" });
  });

  afterEach(() => {
    h.cleanup();
  });

  it("admits a grounded answer as belief", () => {
    expect(gate.evaluate(input({ dependsOnSlots: ["employer"] }))).toEqual({
      verdict: "belief",
      reason: "gates_passed",
      severity: "none",
      contradictionIds: [],
    });
  });

  it("rejects an answer that depends on an open contradiction", () => {
    const id = recordEmployerConflict();
    expect(gate.evaluate(input({ dependsOnSlots: ["employer"] }))).toEqual({
      verdict: "reject",
      reason: "contradiction_fail",
      severity: "blocking",
      contradictionIds: [id],
    });
  });

  it("is not blocked by contradictions in other slots", () => {
    recordEmployerConflict();
    expect(gate.evaluate(input({ dependsOnSlots: ["location"] })).verdict).toBe("belief");
  });

  it("downgrades to speech while the contradiction is settling", () => {
    recordEmployerConflict();
    for (let i = 0; i < 3; i++) h.ledger.confirm(newer.id);
    expect(gate.evaluate(input({ dependsOnSlots: ["employer"] }))).toMatchObject({
      verdict: "speech",
      reason: "gates_passed_with_contradiction_note",
      severity: "note",
    });
  });

  it("downgrades to speech after the user was asked", () => {
    const id = recordEmployerConflict();
    h.ledger.resolve(id, "ask_user");
    expect(gate.evaluate(input({ dependsOnSlots: ["employer"] })).verdict).toBe("speech");
  });

  it("notes a slotless contradiction on a memory the answer used", () => {
    recordEmployerConflict([]);
    expect(gate.evaluate(input({ memoryIds: [older.id] })).verdict).toBe("speech");
    expect(gate.evaluate(input({ memoryIds: [] })).verdict).toBe("belief");
  });

  it("rejects a poorly aligned answer with the failing check", () => {
    expect(gate.evaluate(input({ memoryAlignment: 0.1 }))).toEqual({
      verdict: "reject",
      reason: "factual_memory_fail",
      detail: "align=0.100 < 0.35",
      severity: "none",
      contradictionIds: [],
    });
  });

  it("admits again once the contradiction is resolved", () => {
    const id = recordEmployerConflict();
    h.ledger.resolve(id, "override", newer.id);
    expect(gate.evaluate(input({ dependsOnSlots: ["employer"] })).verdict).toBe("belief");
  });
});
