// impactscore-backend/src/services/evidenceMatcher.ts

import {
  EvidenceItem,
  EvidenceMatch,
  Keyword,
  KeywordTier,
  MatchStrength,
  OWNERSHIP_SIGNALS,
  OwnershipSignal,
} from "../types/scoring";
import { TIER_RANK, tokenize } from "./keywords";

// ============================================================
// OWNERSHIP DETECTION
// ============================================================

export interface OwnershipDetector {
  label: string;
  patterns: RegExp[];
}

/**
 * One detector per ownership category. Text is lower-cased before matching.
 */
export const OWNERSHIP_DETECTORS: Record<OwnershipSignal, OwnershipDetector> = {
  independent_scoping: {
    label: "Scoped work independently",
    patterns: [
      /\bscop(e|ed|ing)\b/,
      /\b(rfc|proposal|proposed)\b/,
      /\bself[- ]initiated\b/,
      /\bown initiative\b/,
    ],
  },
  gap_identification: {
    label: "Identified a gap or root cause",
    patterns: [
      /\b(identified|noticed|discovered|uncovered)\b/,
      /\broot[- ]cause\b/,
      /\bgap\b/,
    ],
  },
  technical_decision: {
    label: "Drove a technical decision",
    patterns: [
      /\b(decided|decision|adr)\b/,
      /\barchitect(ed|ure)?\b/,
      /\btrade-?offs?\b/,
      /\bled the design\b/,
    ],
  },
  cross_team_coordination: {
    label: "Coordinated across teams",
    patterns: [
      /\bcross[- ]team\b/,
      /\bcoordinat(ed|ing|ion)\b/,
      /\bstakeholders?\b/,
      /\baligned with\b/,
    ],
  },
  mentoring: {
    label: "Mentored others",
    patterns: [
      /\bmentor(ed|ing|s)?\b/,
      /\bonboard(ed|ing)\b/,
      /\bpaired with\b/,
      /\bcoached\b/,
    ],
  },
};

export function detectOwnershipSignals(text: string | null | undefined): OwnershipSignal[] {
  const lower = (text ?? "").toLowerCase();
  if (!lower) return [];
  return OWNERSHIP_SIGNALS.filter((signal) =>
    OWNERSHIP_DETECTORS[signal].patterns.some((p) => p.test(lower))
  );
}

export function evidenceText(item: EvidenceItem): string {
  return item.body ? `${item.title}\n${item.body}` : item.title;
}

// ============================================================
// MATCHING
// ============================================================

export const MATCH_POINTS: Record<MatchStrength, number> = {
  none: 0,
  weak: 1,
  moderate: 2,
  strong: 3,
};

/**
 * Classifies a single item against a goal's keywords: strength is the
 * highest keyword tier found, ownership is declared or detected signals.
 */
export function matchEvidence(item: EvidenceItem, keywords: Keyword[]): EvidenceMatch {
  const text = evidenceText(item);
  const tokens = new Set(tokenize(text));

  let best: KeywordTier | null = null;
  const matchedTerms: string[] = [];

  for (const kw of keywords) {
    if (!tokens.has(kw.term)) continue;
    matchedTerms.push(kw.term);
    if (!best || TIER_RANK[kw.tier] > TIER_RANK[best]) best = kw.tier;
  }

  const declared = new Set<OwnershipSignal>(item.ownership_signals ?? []);
  for (const s of detectOwnershipSignals(text)) declared.add(s);
  const ownershipSignals = OWNERSHIP_SIGNALS.filter((s) => declared.has(s));

  const strength: MatchStrength = best ?? "none";

  return {
    evidence_id: item.id,
    strength,
    points: MATCH_POINTS[strength],
    matched_terms: matchedTerms,
    ownership_signals: ownershipSignals,
    has_ownership: ownershipSignals.length > 0,
  };
}
