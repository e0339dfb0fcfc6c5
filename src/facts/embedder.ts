import { createHash } from "node:crypto";
import type { Vector } from "../scoring/types.js";
import type { Embedder } from "./types.js";

/**
 * Signed feature hashing of lower-cased word unigrams, L2-normalised.
 * Deterministic and dependency-free; swap in a model-backed Embedder for real use.
 */
export class HashingEmbedder implements Embedder {
  constructor(readonly dimensions = 256) {}

  embed(text: string): Vector {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const token of text.toLowerCase().match(/[a-z0-9]+/g) ?? []) {
      const digest = createHash("sha256").update(token).digest();
      const index = digest.readUInt32BE(0) % this.dimensions;
      vector[index] = (vector[index] ?? 0) + ((digest[4] ?? 0) & 1 ? 1 : -1);
    }

    const norm = Math.sqrt(vector.reduce((sum, x) => sum + x * x, 0));
    return norm === 0 ? vector : vector.map((x) => x / norm);
  }
}
