// impactscore-backend/src/services/keywords.ts

import lists from "../data/keyword-lists.json";
import { Keyword, KeywordTier } from "../types/scoring";

const STOP_WORDS: ReadonlySet<string> = new Set(lists.stop_words);
const DOMAIN_NOUNS: ReadonlySet<string> = new Set(lists.domain_nouns);
const GENERIC_TERMS: ReadonlySet<string> = new Set(lists.generic_terms);

const MIN_TOKEN_LENGTH = 3;

export const TIER_RANK: Record<KeywordTier, number> = {
  weak: 1,
  moderate: 2,
  strong: 3,
};

/**
 * Lower-cased alphanumeric runs, short tokens and stop words dropped.
 * Evidence text goes through the same tokenizer so terms line up.
 */
export function tokenize(text: string | null | undefined): string[] {
  if (!text) return [];
  return (text.toLowerCase().match(/[a-z0-9]+/g) ?? []).filter(
    (t) => t.length >= MIN_TOKEN_LENGTH && !STOP_WORDS.has(t)
  );
}

function tierFor(term: string, inTitle: boolean): KeywordTier {
  if (GENERIC_TERMS.has(term)) return "weak";
  if (inTitle || DOMAIN_NOUNS.has(term)) return "strong";
  return "moderate";
}

export function extractKeywords(
  title: string | null | undefined,
  description: string | null | undefined
): Keyword[] {
  const tiers = new Map<string, KeywordTier>();

  const add = (term: string, tier: KeywordTier) => {
    const current = tiers.get(term);
    if (!current || TIER_RANK[tier] > TIER_RANK[current]) {
      tiers.set(term, tier);
    }
  };

  for (const term of tokenize(title)) add(term, tierFor(term, true));
  for (const term of tokenize(description)) add(term, tierFor(term, false));

  return [...tiers.entries()]
    .map(([term, tier]) => ({ term, tier }))
    .sort((a, b) => TIER_RANK[b.tier] - TIER_RANK[a.tier] || (a.term < b.term ? -1 : a.term > b.term ? 1 : 0));
}
