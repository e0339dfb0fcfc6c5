export const MEMORY_SOURCES = [
  "user",
  "system",
  "fallback",
  "external",
  "reflection",
  "model_output",
] as const;
export type MemorySource = (typeof MEMORY_SOURCES)[number];

export const COMPRESSION_MODES = ["lossless", "sketch", "hybrid"] as const;
export type CompressionMode = (typeof COMPRESSION_MODES)[number];

export const CONTRADICTION_TYPES = ["conflict", "revision", "temporal", "refinement"] as const;
export type ContradictionType = (typeof CONTRADICTION_TYPES)[number];

export type ResponseType = "factual" | "explanatory" | "conversational";

export type Severity = "none" | "note" | "blocking";

export type Vector = readonly number[];

/** Sources whose trust never rises above the fallback ceiling. */
export function isLowProvenance(source: MemorySource): boolean {
  switch (source) {
    case "fallback":
    case "model_output":
      return true;
    case "user":
    case "system":
    case "external":
    case "reflection":
      return false;
  }
}
