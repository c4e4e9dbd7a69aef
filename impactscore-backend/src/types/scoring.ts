// impactscore-backend/src/types/scoring.ts
// Alignment & Competency Schema v1

// ============================================================
// INPUTS
// ============================================================

/**
 * Key result under a goal.
 * Without a positive target the KR is qualitative and does not count
 * towards the KR sub-score.
 */
export interface KeyResult {
  description: string;
  target?: number;
  achieved?: number;
}

export interface Goal {
  id: string;
  title: string;
  description: string;
  key_results: KeyResult[];
}

/**
 * Ownership indicators: the actor drove the work rather than executed it.
 */
export const OWNERSHIP_SIGNALS = [
  "independent_scoping",
  "gap_identification",
  "technical_decision",
  "cross_team_coordination",
  "mentoring",
] as const;

export type OwnershipSignal = (typeof OWNERSHIP_SIGNALS)[number];

export type EvidenceKind = "change" | "document" | "issue" | "review";

export interface EvidenceItem {
  id: string;
  title: string;
  body?: string;
  timestamp: string;                        // ISO 8601
  kind?: EvidenceKind;
  ownership_signals?: OwnershipSignal[];    // detected upstream, may be empty
  magnitude?: number;                       // narrative only, never scored
}

export type TenureBand = "new" | "established" | "senior";

export interface TenureProfile {
  months_in_role: number;
  tenure_band: TenureBand;
  defaulted: boolean;                       // true when months were missing
}

// ============================================================
// KEYWORDS & MATCHING
// ============================================================

export type KeywordTier = "strong" | "moderate" | "weak";

export interface Keyword {
  term: string;
  tier: KeywordTier;
}

export type MatchStrength = "none" | KeywordTier;

export interface EvidenceMatch {
  evidence_id: string;
  strength: MatchStrength;
  points: number;                           // 0..3
  matched_terms: string[];
  ownership_signals: OwnershipSignal[];
  has_ownership: boolean;
}

// ============================================================
// BANDS & POLICY
// ============================================================

/**
 * Closed integer interval [min, max] mapped to a label.
 */
export interface ScoreBand<L extends string = string> {
  min: number;
  max: number;
  label: L;
}

export interface ScoreBandTable<L extends string = string> {
  readonly bands: ReadonlyArray<ScoreBand<L>>;
}

export const ALIGNMENT_STATUSES = [
  "Needs Attention",
  "In Progress",
  "On Track",
  "Strong",
  "Exceeded",
] as const;

export type AlignmentStatus = (typeof ALIGNMENT_STATUSES)[number];

export const COMPETENCY_BANDS = [
  "Gap",
  "Developing",
  "Solid",
  "Strong",
  "Very Strong",
  "Exceptional",
] as const;

export type CompetencyBand = (typeof COMPETENCY_BANDS)[number];

export interface EvidenceVolumeTier {
  min_count: number;
  execution_only: number;
  with_ownership: number;
}

export interface ScoringPolicy {
  id: string;
  version: string;
  description: string;
  evidence_volume: ReadonlyArray<EvidenceVolumeTier>;
  alignment_bands: ScoreBandTable<AlignmentStatus>;
  competency_bands: ScoreBandTable<CompetencyBand>;
}

// ============================================================
// OUTPUTS
// ============================================================

export interface KeyResultProgress {
  index: number;
  description: string;
  percent: number;                          // capped progress, rounded
  points: number;
  exceeded: boolean;
}

export type AlignmentFlag =
  | "tenure_defaulted"
  | "tenure_capped"
  | "exceptional_initiative"
  | "demoted_execution_only"
  | "senior_requires_ownership"
  | "malformed_goal"
  | "degraded";

export interface AlignmentScore {
  goal_id: string;
  evidence_score: number;                   // 0..40
  keyword_score: number;                    // 0..30
  kr_score: number;                         // 0..30
  raw_total: number;                        // before tenure calibration
  total: number;                            // 0..100
  status_band: AlignmentStatus;
  matched_evidence: number;
  has_ownership: boolean;
  kr_progress: KeyResultProgress[];
  gaps: string[];
  flags: AlignmentFlag[];
}

export interface CompetencyScore {
  competency_id: string;
  raw_score: number;
  cap: number;                              // tenure-adjusted ceiling
  calibrated_band: CompetencyBand;
  adjustments: string[];
}

/**
 * Metadata for audit: which policy produced the numbers, and when.
 */
export interface ReportMeta {
  schema_version: string;
  policy_id: string;
  policy_version: string;
  determinism_mode: "STRICT";
  generated_at: string;                     // from the injected "now"
  tenure: TenureProfile;
  warnings: string[];
}

export interface AlignmentReport {
  meta: ReportMeta;
  goals: AlignmentScore[];
}

export interface CompetencyReport {
  meta: ReportMeta;
  competencies: CompetencyScore[];
}
