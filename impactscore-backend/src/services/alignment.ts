// impactscore-backend/src/services/alignment.ts
// Deterministic Goal Alignment Engine

import {
  AlignmentFlag,
  AlignmentScore,
  AlignmentStatus,
  EvidenceItem,
  EvidenceMatch,
  EvidenceVolumeTier,
  Goal,
  KeyResult,
  KeyResultProgress,
  ScoringPolicy,
  TenureProfile,
} from "../types/scoring";
import { MalformedGoalError } from "../types/errors";
import { extractKeywords } from "./keywords";
import { matchEvidence } from "./evidenceMatcher";
import { bandFor, capBand, clampScore, demoteBand } from "./scoreBands";
import { calibrateForTenure } from "./tenure";

// ============================================================
// WEIGHTS
// ============================================================

export const KEYWORD_SCORE_MAX = 30;
export const KR_SCORE_MAX = 30;

/** Progress above target is capped here before bucketing. */
export const KR_PROGRESS_CAP = 1.25;

/**
 * Progress buckets (upper bound in percent, inclusive → points).
 * Above 100% scores the top bucket and is flagged as exceeded.
 */
const KR_BUCKETS: Array<{ upTo: number; points: number }> = [
  { upTo: 0, points: 0 },
  { upTo: 25, points: 8 },
  { upTo: 50, points: 15 },
  { upTo: 75, points: 22 },
  { upTo: 100, points: 30 },
];

const SENIOR_OWNERSHIP_CEILING: AlignmentStatus = "On Track";

export const GAP_NO_EVIDENCE = "No matching evidence for this goal";
export const GAP_NO_OWNERSHIP = "No ownership evidence among matching work";
export const GAP_NO_KR_PROGRESS = "No key-result progress recorded";
export const GAP_MALFORMED_GOAL = "Goal is missing a title or description; keyword relevance not scored";

export interface AlignmentOptions {
  exceptional_initiative?: boolean;
}

// ============================================================
// SUB-SCORES
// ============================================================

export function dedupeEvidence(items: EvidenceItem[]): EvidenceItem[] {
  const seen = new Set<string>();
  const out: EvidenceItem[] = [];
  for (const item of items) {
    if (seen.has(item.id)) continue;
    seen.add(item.id);
    out.push(item);
  }
  return out;
}

/**
 * Last tier whose min_count the count reaches. Ownership upgrades the
 * tier's points; without it the execution-only column applies.
 */
export function computeEvidenceScore(
  count: number,
  hasOwnership: boolean,
  table: ReadonlyArray<EvidenceVolumeTier>
): number {
  let tier: EvidenceVolumeTier | undefined;
  for (const t of table) {
    if (t.min_count <= count) tier = t;
  }
  if (!tier) return 0;
  return hasOwnership ? tier.with_ownership : tier.execution_only;
}

export function computeKeywordScore(matches: EvidenceMatch[]): number {
  const sum = matches.reduce((acc, m) => acc + m.points, 0);
  return Math.min(sum, KEYWORD_SCORE_MAX);
}

function assertFinite(goal: Goal, kr: KeyResult, index: number): void {
  for (const [field, value] of [["target", kr.target], ["achieved", kr.achieved]] as const) {
    if (value !== undefined && !Number.isFinite(value)) {
      throw new MalformedGoalError(goal.id, `key result ${index} has a non-numeric ${field}`);
    }
  }
}

export function keyResultProgress(kr: KeyResult, index: number): KeyResultProgress | null {
  if (kr.target === undefined || kr.target <= 0) return null;

  const ratio = Math.max(0, kr.achieved ?? 0) / kr.target;
  const percent = Math.min(ratio, KR_PROGRESS_CAP) * 100;
  const exceeded = percent > 100;
  const bucket = KR_BUCKETS.find((b) => percent <= b.upTo);

  return {
    index,
    description: kr.description,
    percent: Math.round(percent),
    points: bucket ? bucket.points : KR_SCORE_MAX,
    exceeded,
  };
}

/**
 * Average bucket points over quantitative KRs, 0 when there are none.
 */
export function computeKeyResultScore(goal: Goal): { score: number; progress: KeyResultProgress[] } {
  const progress: KeyResultProgress[] = [];
  goal.key_results.forEach((kr, i) => {
    assertFinite(goal, kr, i);
    const p = keyResultProgress(kr, i);
    if (p) progress.push(p);
  });

  if (progress.length === 0) return { score: 0, progress };

  const avg = progress.reduce((acc, p) => acc + p.points, 0) / progress.length;
  return { score: Math.round(avg), progress };
}

export function isMalformedGoal(goal: Goal): boolean {
  return !goal.title.trim() || !goal.description.trim();
}

// ============================================================
// AGGREGATION
// ============================================================

export function scoreGoalAlignment(
  goal: Goal,
  evidence: EvidenceItem[],
  tenure: TenureProfile,
  policy: ScoringPolicy,
  options: AlignmentOptions = {}
): AlignmentScore {
  const flags: AlignmentFlag[] = [];
  const gaps: string[] = [];

  const malformed = isMalformedGoal(goal);
  if (malformed) {
    flags.push("malformed_goal");
    gaps.push(GAP_MALFORMED_GOAL);
  }

  const keywords = extractKeywords(goal.title, goal.description);
  const matches = dedupeEvidence(evidence)
    .map((item) => matchEvidence(item, keywords))
    .filter((m) => m.strength !== "none");
  const hasOwnership = matches.some((m) => m.has_ownership);

  const evidenceScore = computeEvidenceScore(matches.length, hasOwnership, policy.evidence_volume);
  const keywordScore = malformed ? 0 : computeKeywordScore(matches);
  const kr = computeKeyResultScore(goal);

  const rawTotal = clampScore(evidenceScore + keywordScore + kr.score);

  if (tenure.defaulted) flags.push("tenure_defaulted");

  const calibrated = calibrateForTenure(rawTotal, tenure, {
    exceptional_initiative: options.exceptional_initiative,
    has_ownership: hasOwnership,
  });
  if (calibrated.cap_lifted) flags.push("exceptional_initiative");
  if (calibrated.capped) flags.push("tenure_capped");

  const table = policy.alignment_bands;
  let band = bandFor(table, calibrated.score).label;

  const top = table.bands[table.bands.length - 1].label;
  if (band === top && !hasOwnership) {
    band = demoteBand(table, band);
    flags.push("demoted_execution_only");
  }
  if (!calibrated.top_bands_eligible) {
    const held = capBand(table, band, SENIOR_OWNERSHIP_CEILING);
    if (held !== band) flags.push("senior_requires_ownership");
    band = held;
  }

  if (matches.length === 0) {
    gaps.push(GAP_NO_EVIDENCE);
  } else if (!hasOwnership) {
    gaps.push(GAP_NO_OWNERSHIP);
  }

  if (kr.progress.length === 0 || kr.progress.every((p) => p.points === 0)) {
    gaps.push(GAP_NO_KR_PROGRESS);
  }
  for (const p of kr.progress) {
    if (p.points === 0) gaps.push(`Key result "${p.description}" has no recorded progress`);
  }

  return {
    goal_id: goal.id,
    evidence_score: evidenceScore,
    keyword_score: keywordScore,
    kr_score: kr.score,
    raw_total: rawTotal,
    total: calibrated.score,
    status_band: band,
    matched_evidence: matches.length,
    has_ownership: hasOwnership,
    kr_progress: kr.progress,
    gaps,
    flags,
  };
}

/**
 * Zero score for a goal that could not be scored at all.
 */
export function buildDegradedAlignmentScore(
  goalId: string,
  policy: ScoringPolicy,
  reason: string
): AlignmentScore {
  return {
    goal_id: goalId,
    evidence_score: 0,
    keyword_score: 0,
    kr_score: 0,
    raw_total: 0,
    total: 0,
    status_band: policy.alignment_bands.bands[0].label,
    matched_evidence: 0,
    has_ownership: false,
    kr_progress: [],
    gaps: [`Goal could not be scored: ${reason}`],
    flags: ["degraded"],
  };
}
