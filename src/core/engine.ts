import type { VaultDB } from "../vault/db.js";
import type { Logger } from "../logging/logger.js";
import type { CredenceConfig } from "../config/types.js";
import type { MemoryStore } from "../memory/store.js";
import type { MemoryRecord, RetrievalHit, TrustUpdateResult } from "../memory/types.js";
import type { ContradictionLedger } from "../ledger/ledger.js";
import type { ContradictionEntry, RecordContradictionParams } from "../ledger/types.js";
import type { AdmissionGate } from "../admission/gate.js";
import type { AdmissionDecision } from "../admission/types.js";
import { groundingScore, isShortExtraction, memoryAlignment } from "../admission/alignment.js";
import type { DisclosureSessions } from "../disclosure/sessions.js";
import type { DisclosureDecision } from "../disclosure/types.js";
import type { Embedder, ExtractedFact, FactExtractor } from "../facts/types.js";
import type { ContradictionType, MemorySource, ResponseType, Vector } from "../scoring/types.js";
import { drift as driftOf } from "../scoring/vector.js";
import { detectContradiction } from "../scoring/contradiction/detector.js";
import {
  classifyFactChange,
  isTransientUpdate,
  summarizeContradiction,
} from "../scoring/contradiction/classify.js";
import type { ContradictionVerdict } from "../scoring/contradiction/types.js";

export const DEFAULT_SESSION = "default";

function otherSide(entry: ContradictionEntry, memoryId: string): string {
  return entry.oldMemoryId === memoryId ? entry.newMemoryId : entry.oldMemoryId;
}

function sameSlots(a: readonly string[], b: readonly string[]): boolean {
  const set = new Set(a);
  return set.size === new Set(b).size && b.every((slot) => set.has(slot));
}

export interface IngestParams {
  text: string;
  confidence: number;
  source: MemorySource;
  context?: Record<string, unknown>;
  tags?: string[];
  userMarkedImportant?: boolean;
  sessionId?: string;
  /** Probability the extracted facts are valid; enables the disclosure check. */
  validity?: number;
}

export type Facts = Record<string, ExtractedFact>;

export type IngestResult =
  | {
      readonly status: "stored";
      readonly memory: MemoryRecord;
      readonly facts: Facts;
      readonly contradictions: readonly ContradictionEntry[];
      /** Prior memories this statement restated. */
      readonly restated: readonly string[];
      readonly disclosure?: DisclosureDecision;
    }
  | {
      readonly status: "clarify";
      readonly facts: Facts;
      readonly slot: string;
      readonly prompt: string;
      readonly disclosure: DisclosureDecision;
    }
  | {
      readonly status: "rejected";
      readonly facts: Facts;
      readonly slot: string;
      readonly reason: string;
      readonly disclosure: DisclosureDecision;
    };

export interface EvaluateAnswerParams {
  query: string;
  answer: string;
  /** Defaults to the embedder's vector for the answer. */
  answerVector?: Vector;
  responseType: ResponseType;
  intentAlignment: number;
  dependsOnSlots?: readonly string[];
  hits: readonly RetrievalHit[];
  /** Defaults to word-overlap grounding against the hits. */
  groundingScore?: number;
}

export interface AnswerEvaluation {
  readonly decision: AdmissionDecision;
  readonly memoryAlignment: number;
  readonly groundingScore: number;
  readonly trustUpdates: readonly TrustUpdateResult[];
}

/** One prior memory the new statement disagrees with. */
interface PendingConflict {
  readonly prior: MemoryRecord;
  readonly drift: number;
  readonly slots: readonly string[];
  readonly verdict: ContradictionVerdict;
  readonly valueNew?: string;
  readonly valuePrior?: string;
}

interface PriorComparison {
  readonly conflicts: PendingConflict[];
  readonly restated: MemoryRecord[];
}

export interface BeliefEngineDeps {
  vault: VaultDB;
  memories: MemoryStore;
  ledger: ContradictionLedger;
  gate: AdmissionGate;
  disclosure: DisclosureSessions;
  embedder: Embedder;
  extractor: FactExtractor;
  config: CredenceConfig;
  logger: Logger;
}

/**
 * Statement and answer flow over the store, ledger, gate and disclosure policy.
 * Synchronous; one engine per VaultDB.
 */
export class BeliefEngine {
  private readonly vault: VaultDB;
  private readonly memories: MemoryStore;
  private readonly ledger: ContradictionLedger;
  private readonly gate: AdmissionGate;
  private readonly disclosure: DisclosureSessions;
  private readonly embedder: Embedder;
  private readonly extractor: FactExtractor;
  private readonly config: CredenceConfig;
  private readonly logger: Logger;

  constructor(deps: BeliefEngineDeps) {
    this.vault = deps.vault;
    this.memories = deps.memories;
    this.ledger = deps.ledger;
    this.gate = deps.gate;
    this.disclosure = deps.disclosure;
    this.embedder = deps.embedder;
    this.extractor = deps.extractor;
    this.config = deps.config;
    this.logger = deps.logger;
  }

  ingest(params: IngestParams): IngestResult {
    const vector = this.embedder.embed(params.text);
    const facts = this.extractor.extract(params.text);
    const { conflicts, restated } = this.compareWithPriors(params, vector, facts);

    let disclosure: DisclosureDecision | undefined;
    const slotConflict = conflicts.find((c) => c.slots.length > 0);
    if (params.validity !== undefined && slotConflict) {
      const slot = slotConflict.slots[0] ?? "";
      disclosure = this.disclosure.decide(
        params.sessionId ?? DEFAULT_SESSION,
        params.validity,
        slot,
        slotConflict.valuePrior,
        slotConflict.valueNew,
      );
      if (disclosure.action === "reject") {
        this.logger.info({ slot, pValid: params.validity }, "Statement rejected by disclosure policy");
        return { status: "rejected", facts, slot, reason: disclosure.reason, disclosure };
      }
      if (disclosure.action === "clarify") {
        return { status: "clarify", facts, slot, prompt: disclosure.prompt, disclosure };
      }
    }

    const { memory, contradictions } = this.vault.transaction(() => {
      const stored = this.memories.insert({
        text: params.text,
        vector,
        confidence: params.confidence,
        source: params.source,
        context: params.context,
        tags: params.tags,
        userMarkedImportant: params.userMarkedImportant,
        contradictionSignal: conflicts.length > 0 ? 1 : 0,
      });

      const recorded: ContradictionEntry[] = [];
      for (const conflict of conflicts) {
        const result = this.ledger.record(this.toRecordParams(conflict, stored, params.text));
        if (result.ok) recorded.push(result.entry);
      }
      for (const prior of restated) {
        this.memories.evolveTrustForReinforcement(prior.id, vector, `restated:${stored.id}`);
        this.ledger.confirm(prior.id);
      }
      return { memory: stored, contradictions: recorded };
    });

    this.logger.info(
      {
        memoryId: memory.id,
        slots: Object.keys(facts),
        contradictions: contradictions.length,
        restated: restated.length,
      },
      "Statement ingested",
    );
    return {
      status: "stored",
      memory,
      facts,
      contradictions,
      restated: restated.map((m) => m.id),
      ...(disclosure ? { disclosure } : {}),
    };
  }

  /**
   * Gate an answer and apply the consequences:
   *   belief → align contributing memories, confirm the top one, log belief
   *   speech → confirm the top memory, log speech
   *   reject → log speech with the gate reason
   */
  evaluateAnswer(params: EvaluateAnswerParams): AnswerEvaluation {
    const answerVector = params.answerVector ?? this.embedder.embed(params.answer);
    const texts = params.hits.map((h) => h.memory.text);
    const memoryIds = params.hits.map((h) => h.memory.id);
    const scoring = this.config.scoring;

    const alignment = memoryAlignment(answerVector, params.hits, params.answer, scoring);
    const grounding = params.groundingScore ?? groundingScore(params.answer, texts);
    const decision = this.gate.evaluate({
      intentAlignment: params.intentAlignment,
      memoryAlignment: alignment,
      responseType: params.responseType,
      groundingScore: grounding,
      dependsOnSlots: params.dependsOnSlots,
      memoryIds,
      shortExtraction: isShortExtraction(params.answer, texts, scoring),
    });

    const trustUpdates = this.vault.transaction((): TrustUpdateResult[] => {
      const top = params.hits[0]?.memory;
      switch (decision.verdict) {
        case "belief": {
          const avgTrust =
            params.hits.length === 0
              ? 0
              : params.hits.reduce((sum, h) => sum + h.memory.trust, 0) / params.hits.length;
          const updates = memoryIds.map((id) =>
            this.memories.evolveTrustForAlignment(id, answerVector, `answer_aligned:${decision.reason}`),
          );
          if (top) this.ledger.confirm(top.id);
          this.memories.recordBelief(params.query, params.answer, memoryIds, avgTrust);
          return updates;
        }
        case "speech":
          if (top) this.ledger.confirm(top.id);
          this.memories.recordSpeech(params.query, params.answer, `speech:${decision.reason}`);
          return [];
        case "reject":
          this.memories.recordSpeech(params.query, params.answer, `rejected:${decision.reason}`);
          return [];
      }
    });

    this.logger.info(
      { verdict: decision.verdict, reason: decision.reason, severity: decision.severity },
      "Answer evaluated",
    );
    return { decision, memoryAlignment: alignment, groundingScore: grounding, trustUpdates };
  }

  /**
   * Pair the statement with slot-sharing priors, or with the closest prior
   * when the statement carries no slots.
   */
  private compareWithPriors(params: IngestParams, vector: Vector, facts: Facts): PriorComparison {
    const candidates = this.memories.retrieve(vector, this.config.engine.priorCandidates);
    const conflicts: PendingConflict[] = [];
    const restated: MemoryRecord[] = [];
    const slots = Object.keys(facts);

    if (slots.length === 0) {
      const closest = candidates.find((c) => c.similarity >= this.config.engine.minPriorSimilarity);
      if (!closest) return { conflicts, restated };
      const d = driftOf(vector, closest.memory.vector);
      const verdict = this.detect(params, closest.memory, d);
      if (verdict.contradiction) conflicts.push({ prior: closest.memory, drift: d, slots: [], verdict });
      return { conflicts, restated };
    }

    for (const { memory: prior } of candidates) {
      const priorFacts = this.extractor.extract(prior.text);
      const differing: string[] = [];
      let sameValue = false;

      for (const slot of slots) {
        const next = facts[slot];
        const before = priorFacts[slot];
        if (!next || !before) continue;
        if (next.normalized === before.normalized) {
          sameValue = true;
        } else if (!isTransientUpdate(slot, next.normalized, before.normalized)) {
          differing.push(slot);
        }
      }

      const firstSlot = differing[0];
      if (firstSlot !== undefined) {
        const valueNew = facts[firstSlot]?.value;
        const valuePrior = priorFacts[firstSlot]?.value;
        const d = driftOf(vector, prior.vector);
        const verdict = this.detect(params, prior, d, firstSlot, valueNew, valuePrior);
        if (verdict.contradiction) {
          conflicts.push({ prior, drift: d, slots: differing, verdict, valueNew, valuePrior });
        }
      } else if (sameValue) {
        restated.push(prior);
      }
    }

    // a restated prior that already contradicts this prior confirms that entry instead
    const restatedIds = new Set(restated.map((m) => m.id));
    const fresh = conflicts.filter((conflict) => {
      const entry = this.ledger
        .getContradictionsForMemory(conflict.prior.id)
        .find(
          (e) =>
            e.status !== "resolved" &&
            restatedIds.has(otherSide(e, conflict.prior.id)) &&
            sameSlots(e.affectsSlots, conflict.slots),
        );
      if (entry) {
        this.logger.debug({ ledgerId: entry.id, priorId: conflict.prior.id }, "Conflict already on the ledger");
      }
      return entry === undefined;
    });
    return { conflicts: fresh, restated };
  }

  private detect(
    params: IngestParams,
    prior: MemoryRecord,
    d: number,
    slot?: string,
    valueNew?: string,
    valuePrior?: string,
  ): ContradictionVerdict {
    const verdict = detectContradiction(
      {
        drift: d,
        confidenceNew: params.confidence,
        confidencePrior: prior.confidence,
        source: params.source,
        textNew: params.text,
        textPrior: prior.text,
        slot,
        valueNew,
        valuePrior,
      },
      this.config.scoring,
    );
    this.logger.debug({ priorId: prior.id, slot, rule: verdict.rule, reason: verdict.reason }, "Prior compared");
    return verdict;
  }

  private toRecordParams(
    conflict: PendingConflict,
    stored: MemoryRecord,
    text: string,
  ): RecordContradictionParams {
    const type: ContradictionType =
      conflict.valueNew !== undefined && conflict.valuePrior !== undefined
        ? classifyFactChange(conflict.valueNew, conflict.valuePrior, text)
        : "conflict";
    const confidenceDelta = conflict.prior.confidence - stored.confidence;
    return {
      oldMemoryId: conflict.prior.id,
      newMemoryId: stored.id,
      driftMean: conflict.drift,
      confidenceDelta,
      contradictionType: type,
      affectsSlots: conflict.slots,
      summary: summarizeContradiction({
        drift: conflict.drift,
        confidenceDelta,
        type,
        slot: conflict.slots[0],
        valueNew: conflict.valueNew,
        valuePrior: conflict.valuePrior,
      }),
    };
  }
}
