import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { MemoryStore } from "../../src/memory/store.js";
import { atCosine, makeStores, type StoreHarness } from "../helpers/fixtures.js";

describe("MemoryStore", () => {
  let h: StoreHarness;
  let store: MemoryStore;

  beforeEach(() => {
    h = makeStores();
    store = h.memories;
  });

  afterEach(() => {
    h.cleanup();
  });

  describe("insert", () => {
    it("starts user memories at tauBase and stores them", () => {
      const memory = store.insert({ text: "hello there?", vector: [1, 0, 0], confidence: 0.9, source: "user" });
      expect(memory.trust).toBe(0.7);
      expect(memory.confidence).toBe(0.9);
      expect(store.getMemory(memory.id)).toEqual(memory);
      expect(store.getMemoryCount()).toBe(1);
    });

    it("caps fallback trust", () => {
      const memory = store.insert({ text: "guess", vector: [1, 0, 0], confidence: 0.9, source: "fallback" });
      expect(memory.trust).toBe(0.3);
    });

    it("scores significance from novelty and future relevance", () => {
      const memory = store.insert({ text: "hello there?", vector: [1, 0, 0], confidence: 1, source: "user" });
      expect(memory.significance).toBeCloseTo(0.28);
      expect(memory.compressionMode).toBe("sketch");
    });

    it("keeps marked, contradicting memories lossless", () => {
      const marked = store.insert({
        text: "hello there?",
        vector: [1, 0, 0],
        confidence: 1,
        source: "user",
        userMarkedImportant: true,
      });
      expect(marked.compressionMode).toBe("hybrid");

      const contradicting = store.insert({
        text: "hello there?",
        vector: [0, 1, 0],
        confidence: 1,
        source: "user",
        userMarkedImportant: true,
        contradictionSignal: 1,
      });
      expect(contradicting.significance).toBeCloseTo(0.73);
      expect(contradicting.compressionMode).toBe("lossless");
    });

    it("gives a repeated vector no novelty", () => {
      store.insert({ text: "a", vector: [1, 0, 0], confidence: 1, source: "user" });
      const again = store.insert({ text: "a", vector: [1, 0, 0], confidence: 1, source: "user" });
      expect(again.significance).toBe(0);
    });

    it("round-trips context and tags", () => {
      const memory = store.insert({
        text: "note",
        vector: [0.25, -0.5, 1],
        confidence: 0.5,
        source: "system",
        context: { channel: "cli" },
        tags: ["work"],
      });
      const loaded = store.getMemory(memory.id);
      expect(loaded?.vector).toEqual([0.25, -0.5, 1]);
      expect(loaded?.context).toEqual({ channel: "cli" });
      expect(loaded?.tags).toEqual(["work"]);
    });

    it("requires provenance for external memories", () => {
      expect(() =>
        store.insert({ text: "fetched", vector: [1, 0, 0], confidence: 1, source: "external" }),
      ).toThrow(/^External memories require context\.provenance/);
      expect(store.getMemoryCount()).toBe(0);
    });

    it("accepts external memories with provenance", () => {
      const memory = store.insert({
        text: "fetched",
        vector: [1, 0, 0],
        confidence: 1,
        source: "external",
        context: { provenance: { tool: "search", retrievedAt: 1_700_000_000_000, source: "example.org" } },
      });
      expect(memory.trust).toBe(0.7);
    });

    it("emits memory_stored", () => {
      const handler = vi.fn();
      h.bus.on("memory_stored", handler);
      const memory = store.insert({ text: "a", vector: [1, 0, 0], confidence: 1, source: "user" });
      expect(handler).toHaveBeenCalledWith({ type: "memory_stored", memory });
    });
  });

  describe("listMemories", () => {
    it("lists newest first, filtered by source and limited", () => {
      const a = store.insert({ text: "a", vector: [1, 0, 0], confidence: 1, source: "user" });
      const b = store.insert({ text: "b", vector: [0, 1, 0], confidence: 1, source: "fallback" });
      const c = store.insert({ text: "c", vector: [0, 0, 1], confidence: 1, source: "user" });

      expect(store.listMemories().map((m) => m.id)).toEqual([c.id, b.id, a.id]);
      expect(store.listMemories({ source: "user" }).map((m) => m.id)).toEqual([c.id, a.id]);
      expect(store.listMemories({ limit: 1 }).map((m) => m.id)).toEqual([c.id]);
    });
  });

  describe("retrieve", () => {
    it("ranks by similarity, recency and belief", () => {
      const near = store.insert({ text: "near", vector: [1, 0, 0], confidence: 1, source: "user" });
      const far = store.insert({ text: "far", vector: atCosine(0.6), confidence: 1, source: "user" });

      const hits = store.retrieve([1, 0, 0], 2, { now: near.timestamp });
      expect(hits.map((hit) => hit.memory.id)).toEqual([near.id, far.id]);
      expect(hits[0]?.similarity).toBeCloseTo(1);
      expect(hits[0]?.score).toBeCloseTo(0.79);
      expect(hits[1]?.similarity).toBeCloseTo(0.6);
    });

    it("returns a lone memory as the only hit for its own vector", () => {
      const only = store.insert({ text: "only", vector: [0, 3, 4], confidence: 1, source: "user" });
      const hits = store.retrieve([0, 3, 4], 5);
      expect(hits).toHaveLength(1);
      expect(hits[0]?.memory.id).toBe(only.id);
      expect(hits[0]?.similarity).toBe(1);
    });

    it("returns nothing for k <= 0", () => {
      store.insert({ text: "a", vector: [1, 0, 0], confidence: 1, source: "user" });
      expect(store.retrieve([1, 0, 0], 0)).toEqual([]);
    });

    it("filters by minimum trust", () => {
      store.insert({ text: "guess", vector: [1, 0, 0], confidence: 1, source: "fallback" });
      const user = store.insert({ text: "fact", vector: [1, 0, 0], confidence: 1, source: "user" });
      expect(store.retrieve([1, 0, 0], 5, { minTrust: 0.5 }).map((hit) => hit.memory.id)).toEqual([user.id]);
    });
  });

  describe("trust evolution", () => {
    it("raises trust when an answer aligns", () => {
      const m = store.insert({ text: "a", vector: [1, 0, 0], confidence: 1, source: "user" });
      const result = store.evolveTrustForAlignment(m.id, [1, 0, 0]);
      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.oldTrust).toBe(0.7);
      expect(result.newTrust).toBeCloseTo(0.8);
      expect(result.drift).toBeCloseTo(0);
      expect(result.dampened).toBe(false);
      expect(store.getMemory(m.id)?.trust).toBeCloseTo(0.8);
    });

    it("lowers trust on contradiction by the drift", () => {
      const m = store.insert({ text: "a", vector: [1, 0, 0], confidence: 1, source: "user" });
      const result = store.evolveTrustForContradiction(m.id, [0, 1, 0]);
      expect(result.ok && result.newTrust).toBeCloseTo(0.595);
    });

    it("keeps fallback memories under the cap", () => {
      const m = store.insert({ text: "guess", vector: [1, 0, 0], confidence: 1, source: "fallback" });
      const result = store.evolveTrustForAlignment(m.id, [1, 0, 0]);
      expect(result.ok && result.newTrust).toBe(0.3);
    });

    it("logs every change with its reason", () => {
      const m = store.insert({ text: "a", vector: [1, 0, 0], confidence: 1, source: "user" });
      store.evolveTrustForReinforcement(m.id, [1, 0, 0], "restated:x");
      store.evolveTrustForAlignment(m.id, [1, 0, 0]);

      const history = store.getTrustHistory(m.id);
      expect(history.map((e) => e.reason)).toEqual(["restated:x", "aligned"]);
      expect(history[0]?.oldTrust).toBe(0.7);
      expect(history[0]?.newTrust).toBeCloseTo(0.75);
      expect(history[1]?.oldTrust).toBeCloseTo(0.75);
    });

    it("emits trust_changed", () => {
      const handler = vi.fn();
      h.bus.on("trust_changed", handler);
      const m = store.insert({ text: "a", vector: [1, 0, 0], confidence: 1, source: "user" });
      store.evolveTrustForAlignment(m.id, [1, 0, 0], "answer");
      expect(handler).toHaveBeenCalledTimes(1);
      expect(handler.mock.calls[0]?.[0]).toMatchObject({ type: "trust_changed", memoryId: m.id, reason: "answer" });
    });

    it("reports unknown memories", () => {
      expect(store.evolveTrustForAlignment("missing", [1, 0, 0])).toEqual({
        ok: false,
        error: "not_found",
        memoryId: "missing",
      });
    });
  });

  describe("belief and speech log", () => {
    it("counts beliefs against speech", () => {
      store.recordBelief("q1", "a1", ["m1", "m2"], 0.75);
      store.recordSpeech("q2", "a2", "speech:gates_passed_with_contradiction_note");
      store.recordSpeech("q3", "a3", "rejected:factual_memory_fail");

      const ratio = store.getBeliefSpeechRatio();
      expect(ratio.total).toBe(3);
      expect(ratio.beliefs).toBe(1);
      expect(ratio.speeches).toBe(2);
      expect(ratio.beliefRatio).toBeCloseTo(1 / 3);
      expect(ratio.speechRatio).toBeCloseTo(2 / 3);
    });

    it("reports an empty log as zero ratios", () => {
      expect(store.getBeliefSpeechRatio()).toEqual({
        total: 0,
        beliefs: 0,
        speeches: 0,
        beliefRatio: 0,
        speechRatio: 0,
      });
    });

    it("lists entries newest first", () => {
      store.recordBelief("q1", "a1", ["m1"], 0.8);
      store.recordSpeech("q2", "a2", "speech:x");

      const [latest, first] = store.listBeliefSpeech();
      expect(latest).toMatchObject({ query: "q2", isBelief: false, memoryIds: [], avgTrust: null, source: "speech:x" });
      expect(first).toMatchObject({ query: "q1", isBelief: true, memoryIds: ["m1"], avgTrust: 0.8, source: "belief" });
    });
  });
});
