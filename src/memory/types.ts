import type { CompressionMode, MemorySource, Vector } from "../scoring/types.js";

export interface MemoryRecord {
  readonly id: string;
  /** Insertion order; only used to break ranking ties. */
  readonly seq: number;
  readonly text: string;
  readonly vector: Vector;
  readonly timestamp: number;
  readonly confidence: number;
  readonly trust: number;
  readonly source: MemorySource;
  readonly compressionMode: CompressionMode;
  readonly significance: number;
  readonly context: Record<string, unknown> | null;
  readonly tags: readonly string[];
}

export interface InsertMemoryParams {
  text: string;
  vector: Vector;
  confidence: number;
  source: MemorySource;
  context?: Record<string, unknown>;
  tags?: string[];
  userMarkedImportant?: boolean;
  /** 0..1, how strongly this statement contradicts what is stored. */
  contradictionSignal?: number;
}

export interface RetrieveOptions {
  minTrust?: number;
  now?: number;
}

export interface RetrievalHit {
  readonly memory: MemoryRecord;
  readonly score: number;
  readonly similarity: number;
}

export interface ListMemoriesParams {
  source?: MemorySource;
  limit?: number;
}

export interface TrustLogEntry {
  readonly id: number;
  readonly memoryId: string;
  readonly timestamp: number;
  readonly oldTrust: number;
  readonly newTrust: number;
  readonly reason: string;
  readonly drift: number | null;
}

export type TrustUpdateResult =
  | {
      readonly ok: true;
      readonly memoryId: string;
      readonly oldTrust: number;
      readonly newTrust: number;
      readonly drift: number;
      readonly dampened: boolean;
    }
  | { readonly ok: false; readonly error: "not_found"; readonly memoryId: string };

export interface BeliefSpeechEntry {
  readonly id: number;
  readonly timestamp: number;
  readonly query: string;
  readonly response: string;
  readonly isBelief: boolean;
  readonly memoryIds: readonly string[];
  readonly avgTrust: number | null;
  readonly source: string;
}

export interface BeliefSpeechRatio {
  readonly total: number;
  readonly beliefs: number;
  readonly speeches: number;
  readonly beliefRatio: number;
  readonly speechRatio: number;
}
