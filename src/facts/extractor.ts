import type { ExtractedFact, FactExtractor } from "./types.js";

export interface SlotPattern {
  readonly slot: string;
  readonly pattern: RegExp;
  readonly normalize?: (value: string) => string;
}

// capitalised words on a single line
const CAPITALISED_RUN = "([A-Z0-9][\\w&.'-]*(?:[ \\t]+[A-Z0-9][\\w&.'-]*)*)";

const SLOT_PATTERNS: readonly SlotPattern[] = [
  { slot: "name", pattern: new RegExp(`\\b[Mm]y name is ${CAPITALISED_RUN}`) },
  { slot: "name", pattern: new RegExp(`\\b(?:[Cc]all me|I'm called|I am called) ${CAPITALISED_RUN}`) },
  {
    slot: "employer",
    pattern: new RegExp(`\\b[Ii](?:\\s+(?:now|currently|still))?\\s+work\\s+(?:at|for)\\s+${CAPITALISED_RUN}`),
  },
  { slot: "employer", pattern: new RegExp(`\\b[Ii]\\s+(?:joined|left|quit)\\s+${CAPITALISED_RUN}`) },
  {
    slot: "location",
    pattern: new RegExp(`\\b[Ii](?:\\s+(?:now|currently|still))?\\s+live\\s+in\\s+${CAPITALISED_RUN}`),
  },
  { slot: "location", pattern: new RegExp(`\\b[Ii]\\s+moved\\s+to\\s+${CAPITALISED_RUN}`) },
  { slot: "title", pattern: /\b[Mm]y (?:job )?title is (?:an? )?([A-Za-z][A-Za-z -]*[A-Za-z])/ },
  { slot: "title", pattern: /\b[Ii] work as an? ([A-Za-z][A-Za-z -]*[A-Za-z])/ },
  { slot: "age", pattern: /\b[Ii](?:'m| am)\s+(\d{1,3})\s+years?\s+old\b/ },
  {
    slot: "remote_preference",
    pattern: /\b[Ii] prefer (working remotely|remote work|remote|working from home|the office|office|hybrid)\b/,
    normalize: (v) => (/remote|home/.test(v) ? "remote" : /office/.test(v) ? "office" : "hybrid"),
  },
  { slot: "favorite_color", pattern: /\b[Mm]y favou?rite colou?r is ([A-Za-z]+)/ },
];

// "FACT: employer = Microsoft" or "PREF: editor = vim", one per line
const EXPLICIT_FACT = /^\s*(?:FACT|PREF):\s*([a-zA-Z_][a-zA-Z0-9_]*)\s*=\s*(.+?)\s*$/gm;

/**
 * Regex slot extractor for a handful of personal facts.
 * First match per slot wins; explicit FACT lines override patterns.
 */
export class RegexFactExtractor implements FactExtractor {
  constructor(private readonly patterns: readonly SlotPattern[] = SLOT_PATTERNS) {}

  extract(text: string): Record<string, ExtractedFact> {
    const facts: Record<string, ExtractedFact> = {};

    for (const { slot, pattern, normalize } of this.patterns) {
      if (facts[slot]) continue;
      const value = pattern.exec(text)?.[1]?.trim().replace(/[.,;!?]+$/, "");
      if (!value) continue;
      const base = value.toLowerCase();
      facts[slot] = { value, normalized: normalize ? normalize(base) : base };
    }

    for (const match of text.matchAll(EXPLICIT_FACT)) {
      const slot = match[1]?.toLowerCase();
      const value = match[2];
      if (slot && value) facts[slot] = { value, normalized: value.toLowerCase() };
    }
    return facts;
  }
}
