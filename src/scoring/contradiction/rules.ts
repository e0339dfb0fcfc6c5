import { isLowProvenance } from "../types.js";
import {
  diceSimilarity,
  jaccard,
  keyElements,
  looksLikeEntity,
  numbersIn,
  sameSet,
} from "../text.js";
import type { ContradictionRule } from "./types.js";

const fmt = (n: number): string => n.toFixed(3);

/**
 * Same key elements, moderate drift: a rewording, not a new claim.
 * Sits first so no later rule can flag a paraphrase.
 */
const paraphrase: ContradictionRule = {
  id: "paraphrase",
  evaluate(input, config) {
    const { driftMin, driftMax, minOverlap } = config.paraphrase;
    if (!input.textNew || !input.textPrior) return null;
    if (input.drift < driftMin || input.drift > driftMax) return null;

    const numsNew = numbersIn(input.textNew);
    const numsPrior = numbersIn(input.textPrior);
    if (numsNew.size > 0 && numsPrior.size > 0 && !sameSet(numsNew, numsPrior)) return null;

    const keysNew = keyElements(input.textNew);
    const keysPrior = keyElements(input.textPrior);
    if (keysNew.size === 0 || keysPrior.size === 0) return null;
    if (jaccard(keysNew, keysPrior) < minOverlap) return null;

    return { contradiction: false, reason: `Paraphrase detected (drift=${fmt(input.drift)})` };
  },
};

/** Same slot, two different named entities ("Microsoft" then "Amazon"). */
const entitySwap: ContradictionRule = {
  id: "entity_swap",
  evaluate(input, config) {
    if (!input.slot || input.valueNew === undefined || input.valuePrior === undefined) return null;
    const next = input.valueNew.trim();
    const prior = input.valuePrior.trim();
    if (!next || !prior) return null;
    if (next.toLowerCase() === prior.toLowerCase()) return null;
    if (!looksLikeEntity(next) || !looksLikeEntity(prior)) return null;
    if (diceSimilarity(next.toLowerCase(), prior.toLowerCase()) > config.entitySwapMaxSimilarity) {
      return null;
    }
    return {
      contradiction: true,
      reason: `Entity swap for slot '${input.slot}': '${prior}' -> '${next}'`,
    };
  },
};

const NEGATION_PATTERNS: readonly RegExp[] = [
  /(?:i\s+)?(?:don'?t|do\s+not|no\s+longer|not\s+anymore)\s+(\w+(?:\s+\w+){0,3})/g,
  /(?:i\s+)?(?:stopped|quit|left|no\s+longer)\s+(\w+(?:\s+\w+){0,3})/g,
  /(?:i'm\s+not|i\s+am\s+not)\s+(\w+(?:\s+\w+){0,3})/g,
];

function negatedItems(lower: string): string[] {
  const items: string[] = [];
  for (const pattern of NEGATION_PATTERNS) {
    for (const match of lower.matchAll(pattern)) {
      const item = match[1]?.trim();
      if (item) items.push(item);
    }
  }
  return items;
}

function negates(lower: string): boolean {
  return NEGATION_PATTERNS.some((p) => new RegExp(p.source).test(lower));
}

/** New text negates something the prior text states plainly. */
const negation: ContradictionRule = {
  id: "negation",
  evaluate(input) {
    if (!input.textNew || !input.textPrior) return null;
    const lowerNew = input.textNew.toLowerCase();
    const lowerPrior = input.textPrior.toLowerCase();

    const items = negatedItems(lowerNew);
    if (items.length === 0 || negates(lowerPrior)) return null;

    for (const item of items) {
      const words = item.split(/\s+/).slice(0, 3).map((w) => w.replace(/[.*+?^${}()|[\]\\]/g, "\\$&"));
      const affirmed = new RegExp(`\\b${words.join("\\s+")}\\b`);
      if (affirmed.test(lowerPrior)) {
        return {
          contradiction: true,
          reason: `Negation: '${item}' negated in new, affirmed in prior`,
        };
      }
    }
    return null;
  },
};

type Polarity = 1 | -1;

const PREFERENCE_PATTERNS: ReadonlyArray<readonly [RegExp, Polarity]> = [
  [/\bprefers?\s+([^.;,!?:\n]+)/g, 1],
  [/\blikes?\s+([^.;,!?:\n]+)/g, 1],
  [/\bloves?\s+([^.;,!?:\n]+)/g, 1],
  [/\benjoys?\s+([^.;,!?:\n]+)/g, 1],
  [/\bdislikes?\s+([^.;,!?:\n]+)/g, -1],
  [/\bhates?\s+([^.;,!?:\n]+)/g, -1],
  [/\bavoids?\s+([^.;,!?:\n]+)/g, -1],
];

const PREFERENCE_STOPWORDS = new Set([
  "a", "an", "the", "to", "in", "of", "on", "for", "with", "at",
  "my", "your", "our", "their", "his", "her",
]);

interface Preference {
  readonly polarity: Polarity;
  readonly target: string;
}

function normalizeTarget(raw: string): string {
  const head = raw.split(/\b(?:but|however|though|although)\b/)[0] ?? "";
  return head
    .replace(/[^a-z0-9 ]+/g, " ")
    .split(/\s+/)
    .filter((w) => w && !PREFERENCE_STOPWORDS.has(w))
    .join(" ");
}

function preferencesIn(text: string): Preference[] {
  const lower = text.toLowerCase();
  const found: Preference[] = [];
  for (const [pattern, polarity] of PREFERENCE_PATTERNS) {
    for (const match of lower.matchAll(pattern)) {
      const target = normalizeTarget(match[1] ?? "");
      if (target) found.push({ polarity, target });
    }
  }
  return found;
}

function sameTarget(a: string, b: string): boolean {
  return a === b || a.includes(b) || b.includes(a) || diceSimilarity(a, b) >= 0.75;
}

/** Like vs dislike of one target, or a different preferred target. */
const preferenceInversion: ContradictionRule = {
  id: "preference_inversion",
  evaluate(input) {
    if (!input.textNew || !input.textPrior) return null;
    const prefsNew = preferencesIn(input.textNew);
    const prefsPrior = preferencesIn(input.textPrior);

    for (const next of prefsNew) {
      for (const prior of prefsPrior) {
        const same = sameTarget(next.target, prior.target);
        if (same && next.polarity !== prior.polarity) {
          return { contradiction: true, reason: `Preference inversion on '${next.target}'` };
        }
        if (!same && next.polarity === 1 && prior.polarity === 1) {
          return {
            contradiction: true,
            reason: `Preference target changed: '${prior.target}' -> '${next.target}'`,
          };
        }
      }
    }
    return null;
  },
};

const highDrift: ContradictionRule = {
  id: "high_drift",
  evaluate(input, config) {
    if (input.drift <= config.thetaContra) return null;
    return { contradiction: true, reason: `High drift: ${fmt(input.drift)} > ${config.thetaContra}` };
  },
};

const confidenceDrop: ContradictionRule = {
  id: "confidence_drop",
  evaluate(input, config) {
    const delta = input.confidencePrior - input.confidenceNew;
    if (delta <= config.thetaDrop || input.drift <= config.thetaMin) return null;
    return {
      contradiction: true,
      reason: `Confidence drop: delta=${fmt(delta)}, drift=${fmt(input.drift)}`,
    };
  },
};

const fallbackDrift: ContradictionRule = {
  id: "fallback_drift",
  evaluate(input, config) {
    if (!isLowProvenance(input.source) || input.drift <= config.thetaFallback) return null;
    return {
      contradiction: true,
      reason: `Fallback drift: ${fmt(input.drift)} > ${config.thetaFallback}`,
    };
  },
};

/** Evaluation order is part of the contract: the first decisive rule wins. */
export const builtinContradictionRules: readonly ContradictionRule[] = [
  paraphrase,
  entitySwap,
  negation,
  preferenceInversion,
  highDrift,
  confidenceDrop,
  fallbackDrift,
];
