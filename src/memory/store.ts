import { randomUUID } from "node:crypto";
import { z } from "zod";
import type { VaultDB } from "../vault/db.js";
import type { BeliefBus } from "../events/bus.js";
import type { BeliefEvent } from "../events/types.js";
import type { Logger } from "../logging/logger.js";
import type { ScoringConfig } from "../config/types.js";
import type { CompressionMode, MemorySource, Vector } from "../scoring/types.js";
import { drift as driftOf, novelty, similarity } from "../scoring/vector.js";
import { beliefWeight, recencyWeight, retrievalScore, topK } from "../scoring/retrieval.js";
import {
  emotionIntensity,
  futureRelevance,
  selectCompressionMode,
  significance,
} from "../scoring/significance.js";
import {
  capFallbackTrust,
  clamp01,
  evolveAligned,
  evolveContradicted,
  evolveReinforced,
  initialTrust,
} from "../scoring/trust.js";
import { decodeVector, encodeVector } from "./codec.js";
import type {
  BeliefSpeechEntry,
  BeliefSpeechRatio,
  InsertMemoryParams,
  ListMemoriesParams,
  MemoryRecord,
  RetrievalHit,
  RetrieveOptions,
  TrustLogEntry,
  TrustUpdateResult,
} from "./types.js";

interface MemoryRow {
  seq: number;
  id: string;
  text: string;
  vector: Buffer;
  created_at: number;
  confidence: number;
  trust: number;
  source: MemorySource;
  compression_mode: CompressionMode;
  significance: number;
  context: string | null;
  tags: string;
}

interface TrustLogRow {
  id: number;
  memory_id: string;
  timestamp: number;
  old_trust: number;
  new_trust: number;
  reason: string;
  drift: number | null;
}

interface BeliefSpeechRow {
  id: number;
  timestamp: number;
  query: string;
  response: string;
  is_belief: number;
  memory_ids: string | null;
  avg_trust: number | null;
  source: string;
}

const MEMORY_COLUMNS = "rowid AS seq, id, text, vector, created_at, confidence, trust, source, compression_mode, significance, context, tags";

const contextSchema = z.record(z.unknown());
const stringListSchema = z.array(z.string());

// External memories must say where they came from.
const provenanceSchema = z.object({
  provenance: z.object({
    tool: z.string().min(1),
    retrievedAt: z.union([z.string().min(1), z.number()]),
    source: z.string().min(1),
  }),
});

type TrustEvolution = "aligned" | "reinforced" | "contradicted";

/**
 * Persisted memories plus the two append-only audit logs.
 * Trust only moves through evolveTrustFor*; text and vector never change.
 */
export class MemoryStore {
  private readonly db;

  constructor(
    private readonly vault: VaultDB,
    private readonly config: ScoringConfig,
    private readonly bus: BeliefBus,
    private readonly logger: Logger,
  ) {
    this.db = vault.raw();
  }

  /** Listeners only hear about writes that committed. */
  private emit(event: BeliefEvent): void {
    this.vault.afterCommit(() => this.bus.emit(event));
  }

  // ── Memories ──

  insert(params: InsertMemoryParams): MemoryRecord {
    if (params.source === "external") {
      const check = provenanceSchema.safeParse(params.context ?? {});
      if (!check.success) {
        throw new Error(
          `External memories require context.provenance with tool, retrievedAt and source: ${check.error.issues[0]?.message ?? "invalid"}`,
        );
      }
    }

    const stored = this.allVectors();
    const score = significance(
      {
        emotion: emotionIntensity(params.text),
        novelty: novelty(params.vector, stored),
        userMarked: params.userMarkedImportant ?? false,
        contradictionSignal: clamp01(params.contradictionSignal ?? 0),
        futureRelevance: futureRelevance(params.text),
      },
      this.config.significance,
    );
    const compressionMode = selectCompressionMode(score, this.config);
    const trust = initialTrust(params.source, this.config);
    const confidence = clamp01(params.confidence);
    const id = randomUUID();
    const now = Date.now();
    const tags = params.tags ?? [];

    const info = this.db
      .prepare(
        `INSERT INTO memories (id, text, vector, dim, created_at, confidence, trust, source, compression_mode, significance, context, tags)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        id,
        params.text,
        encodeVector(params.vector),
        params.vector.length,
        now,
        confidence,
        trust,
        params.source,
        compressionMode,
        score,
        params.context ? JSON.stringify(params.context) : null,
        JSON.stringify(tags),
      );

    const memory: MemoryRecord = {
      id,
      seq: Number(info.lastInsertRowid),
      text: params.text,
      vector: [...params.vector],
      timestamp: now,
      confidence,
      trust,
      source: params.source,
      compressionMode,
      significance: score,
      context: params.context ?? null,
      tags,
    };

    this.emit({ type: "memory_stored", memory });
    this.logger.debug(
      { memoryId: id, source: params.source, trust, compressionMode, significance: score },
      "Memory stored",
    );
    return memory;
  }

  getMemory(id: string): MemoryRecord | null {
    const row = this.db
      .prepare(`SELECT ${MEMORY_COLUMNS} FROM memories WHERE id = ?`)
      .get(id) as MemoryRow | undefined;
    return row ? this.toMemory(row) : null;
  }

  listMemories(params: ListMemoriesParams = {}): MemoryRecord[] {
    const where = params.source ? "WHERE source = ?" : "";
    const values: unknown[] = params.source ? [params.source] : [];
    const rows = this.db
      .prepare(
        `SELECT ${MEMORY_COLUMNS} FROM memories ${where} ORDER BY created_at DESC, rowid DESC LIMIT ?`,
      )
      .all(...values, params.limit ?? 50) as MemoryRow[];
    return rows.map((r) => this.toMemory(r));
  }

  getMemoryCount(): number {
    const row = this.db.prepare("SELECT COUNT(*) AS count FROM memories").get() as { count: number };
    return row.count;
  }

  /**
   * Top-k memories by similarity x recency x belief weight.
   * Ties go to the newer memory, then to the earlier insert.
   */
  retrieve(queryVector: Vector, k: number, options: RetrieveOptions = {}): RetrievalHit[] {
    if (k <= 0) return [];
    const now = options.now ?? Date.now();
    const minTrust = options.minTrust ?? 0;

    const rows = this.db
      .prepare(`SELECT ${MEMORY_COLUMNS} FROM memories WHERE trust >= ?`)
      .all(minTrust) as MemoryRow[];

    const scored = rows.map((row) => {
      const memory = this.toMemory(row);
      const sim = similarity(queryVector, memory.vector);
      const score = retrievalScore(
        sim,
        recencyWeight(memory.timestamp, now, this.config.recencyTimeConstantMs),
        beliefWeight(memory.trust, memory.confidence, this.config.alphaTrust),
      );
      return { memory, score, similarity: sim, timestamp: memory.timestamp, seq: memory.seq };
    });

    const hits = topK(scored, k).map(({ memory, score, similarity: sim }) => ({
      memory,
      score,
      similarity: sim,
    }));
    this.logger.debug({ candidates: rows.length, returned: hits.length, k }, "Memories retrieved");
    return hits;
  }

  /** True while the memory is a side of an open or settling contradiction. */
  isContested(memoryId: string): boolean {
    const row = this.db
      .prepare(
        `SELECT 1 AS hit FROM contradictions
         WHERE status IN ('open','settling') AND (old_memory_id = ? OR new_memory_id = ?)
         LIMIT 1`,
      )
      .get(memoryId, memoryId);
    return row !== undefined;
  }

  // ── Trust ──

  evolveTrustForAlignment(memoryId: string, outputVector: Vector, reason?: string): TrustUpdateResult {
    return this.evolve(memoryId, outputVector, "aligned", reason);
  }

  evolveTrustForReinforcement(memoryId: string, vector: Vector, reason?: string): TrustUpdateResult {
    return this.evolve(memoryId, vector, "reinforced", reason);
  }

  evolveTrustForContradiction(memoryId: string, outputVector: Vector, reason?: string): TrustUpdateResult {
    return this.evolve(memoryId, outputVector, "contradicted", reason);
  }

  getTrustHistory(memoryId: string): TrustLogEntry[] {
    const rows = this.db
      .prepare("SELECT * FROM trust_log WHERE memory_id = ? ORDER BY id ASC")
      .all(memoryId) as TrustLogRow[];
    return rows.map((r) => ({
      id: r.id,
      memoryId: r.memory_id,
      timestamp: r.timestamp,
      oldTrust: r.old_trust,
      newTrust: r.new_trust,
      reason: r.reason,
      drift: r.drift,
    }));
  }

  private evolve(
    memoryId: string,
    vector: Vector,
    kind: TrustEvolution,
    reason?: string,
  ): TrustUpdateResult {
    const result = this.vault.transaction((): TrustUpdateResult => {
      const memory = this.getMemory(memoryId);
      if (!memory) return { ok: false, error: "not_found", memoryId };

      const d = driftOf(memory.vector, vector);
      const target = this.applyEvolution(kind, memory.trust, d);
      const dampened = this.isContested(memoryId);
      const raw = dampened
        ? memory.trust + (target - memory.trust) * this.config.contestedDampening
        : target;
      const newTrust = capFallbackTrust(raw, memory.source, this.config);
      const logReason = `${reason ?? kind}${dampened ? " (contested)" : ""}`;

      this.db.prepare("UPDATE memories SET trust = ? WHERE id = ?").run(newTrust, memoryId);
      this.db
        .prepare(
          `INSERT INTO trust_log (memory_id, timestamp, old_trust, new_trust, reason, drift)
           VALUES (?, ?, ?, ?, ?, ?)`,
        )
        .run(memoryId, Date.now(), memory.trust, newTrust, logReason, d);

      return { ok: true, memoryId, oldTrust: memory.trust, newTrust, drift: d, dampened };
    });

    if (!result.ok) {
      this.logger.warn({ memoryId, kind }, "Trust update for unknown memory");
      return result;
    }

    this.emit({
      type: "trust_changed",
      memoryId,
      oldTrust: result.oldTrust,
      newTrust: result.newTrust,
      reason: reason ?? kind,
    });
    this.logger.info(
      { memoryId, kind, oldTrust: result.oldTrust, newTrust: result.newTrust, dampened: result.dampened },
      "Trust updated",
    );
    return result;
  }

  private applyEvolution(kind: TrustEvolution, trust: number, d: number): number {
    switch (kind) {
      case "aligned":
        return evolveAligned(trust, d, this.config);
      case "reinforced":
        return evolveReinforced(trust, d, this.config);
      case "contradicted":
        return evolveContradicted(trust, d, this.config);
    }
  }

  // ── Belief / speech ──

  recordBelief(query: string, response: string, memoryIds: readonly string[], avgTrust: number): void {
    this.appendBeliefSpeech(query, response, true, memoryIds, avgTrust, "belief");
  }

  recordSpeech(query: string, response: string, source: string): void {
    this.appendBeliefSpeech(query, response, false, [], null, source);
  }

  getBeliefSpeechRatio(windowMs?: number): BeliefSpeechRatio {
    const since = windowMs === undefined ? 0 : Date.now() - windowMs;
    const row = this.db
      .prepare(
        `SELECT COUNT(*) AS total, COALESCE(SUM(is_belief), 0) AS beliefs
         FROM belief_speech WHERE timestamp >= ?`,
      )
      .get(since) as { total: number; beliefs: number };

    const speeches = row.total - row.beliefs;
    return {
      total: row.total,
      beliefs: row.beliefs,
      speeches,
      beliefRatio: row.total === 0 ? 0 : row.beliefs / row.total,
      speechRatio: row.total === 0 ? 0 : speeches / row.total,
    };
  }

  listBeliefSpeech(limit = 50): BeliefSpeechEntry[] {
    const rows = this.db
      .prepare("SELECT * FROM belief_speech ORDER BY id DESC LIMIT ?")
      .all(limit) as BeliefSpeechRow[];
    return rows.map((r) => ({
      id: r.id,
      timestamp: r.timestamp,
      query: r.query,
      response: r.response,
      isBelief: r.is_belief === 1,
      memoryIds: r.memory_ids ? stringListSchema.parse(JSON.parse(r.memory_ids)) : [],
      avgTrust: r.avg_trust,
      source: r.source,
    }));
  }

  private appendBeliefSpeech(
    query: string,
    response: string,
    isBelief: boolean,
    memoryIds: readonly string[],
    avgTrust: number | null,
    source: string,
  ): void {
    this.db
      .prepare(
        `INSERT INTO belief_speech (timestamp, query, response, is_belief, memory_ids, avg_trust, source)
         VALUES (?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        Date.now(),
        query,
        response,
        isBelief ? 1 : 0,
        memoryIds.length > 0 ? JSON.stringify(memoryIds) : null,
        avgTrust,
        source,
      );
    this.logger.debug({ isBelief, memoryIds, source }, "Belief/speech recorded");
  }

  // ── Helpers ──

  private allVectors(): number[][] {
    const rows = this.db.prepare("SELECT vector FROM memories").all() as Array<{ vector: Buffer }>;
    return rows.map((r) => decodeVector(r.vector));
  }

  private toMemory(row: MemoryRow): MemoryRecord {
    return {
      id: row.id,
      seq: row.seq,
      text: row.text,
      vector: decodeVector(row.vector),
      timestamp: row.created_at,
      confidence: row.confidence,
      trust: row.trust,
      source: row.source,
      compressionMode: row.compression_mode,
      significance: row.significance,
      context: row.context ? contextSchema.parse(JSON.parse(row.context)) : null,
      tags: stringListSchema.parse(JSON.parse(row.tags)),
    };
  }
}
