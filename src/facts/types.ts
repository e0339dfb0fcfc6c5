import type { Vector } from "../scoring/types.js";

export interface ExtractedFact {
  readonly value: string;
  readonly normalized: string;
}

/** Text in, slot facts out. Pure; the core never looks inside. */
export interface FactExtractor {
  extract(text: string): Record<string, ExtractedFact>;
}

/** Text in, fixed-dimension vector out. Pure; the core only compares outputs. */
export interface Embedder {
  embed(text: string): Vector;
}
