const NUMBER_PATTERN = /\d+/g;
// Capitalised words that do not open the text or a sentence.
const PROPER_NOUN_PATTERN = /(?<!^)(?<!\. )[A-Z][a-z]+/g;
const ENTITY_TOKEN_PATTERN = /[A-Za-z][\w.&'-]*/g;

export function numbersIn(text: string): Set<string> {
  return new Set(text.match(NUMBER_PATTERN) ?? []);
}

/** Numbers and proper nouns: the parts a paraphrase has to keep. */
export function keyElements(text: string): Set<string> {
  return new Set([...(text.match(NUMBER_PATTERN) ?? []), ...(text.match(PROPER_NOUN_PATTERN) ?? [])]);
}

export function jaccard<T>(a: ReadonlySet<T>, b: ReadonlySet<T>): number {
  if (a.size === 0 && b.size === 0) return 0;
  let shared = 0;
  for (const item of a) {
    if (b.has(item)) shared++;
  }
  return shared / (a.size + b.size - shared);
}

export function sameSet<T>(a: ReadonlySet<T>, b: ReadonlySet<T>): boolean {
  if (a.size !== b.size) return false;
  for (const item of a) {
    if (!b.has(item)) return false;
  }
  return true;
}

function bigrams(value: string): string[] {
  const out: string[] = [];
  for (let i = 0; i < value.length - 1; i++) {
    out.push(value.slice(i, i + 2));
  }
  return out;
}

/** Sørensen–Dice coefficient over character bigrams, in [0, 1]. */
export function diceSimilarity(a: string, b: string): number {
  if (a === b) return 1;
  if (a.length < 2 || b.length < 2) return 0;

  const counts = new Map<string, number>();
  for (const gram of bigrams(a)) {
    counts.set(gram, (counts.get(gram) ?? 0) + 1);
  }
  let shared = 0;
  const other = bigrams(b);
  for (const gram of other) {
    const left = counts.get(gram) ?? 0;
    if (left > 0) {
      shared++;
      counts.set(gram, left - 1);
    }
  }
  return (2 * shared) / (a.length - 1 + other.length);
}

/** Proper noun or acronym somewhere in the value. */
export function looksLikeEntity(value: string): boolean {
  const tokens = value.match(ENTITY_TOKEN_PATTERN) ?? [];
  return tokens.some((t) => /^[A-Z]/.test(t) || t === t.toUpperCase());
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Builds a case-insensitive matcher for whole words or phrases. */
export function phraseMatcher(phrases: readonly string[]): RegExp {
  const body = phrases.map((p) => escapeRegExp(p).replace(/\s+/g, "\\s+")).join("|");
  return new RegExp(`\\b(?:${body})\\b`, "i");
}
