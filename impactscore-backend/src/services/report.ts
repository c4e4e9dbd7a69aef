// impactscore-backend/src/services/report.ts

import {
  AlignmentReport,
  AlignmentScore,
  CompetencyReport,
  EvidenceItem,
  Goal,
  ReportMeta,
  ScoringPolicy,
  TenureProfile,
} from "../types/scoring";
import { buildDegradedAlignmentScore, scoreGoalAlignment } from "./alignment";
import { recalibrateCompetencies, RawCompetencyInput } from "./competency";
import { analyzeCompetencies, EngineerLevel, VsTarget } from "./competencyAnalyzer";
import { resolveTenureProfile } from "./tenure";

export const SCHEMA_VERSION = "1.0.0";

/**
 * A goal that failed validation upstream; scored as degraded.
 */
export interface RejectedGoal {
  rejected: true;
  id: string;
  reason: string;
}

export type GoalEntry = Goal | RejectedGoal;

export interface AlignmentRequest {
  goals: GoalEntry[];
  evidence: EvidenceItem[];
  months_in_role?: number | null;
  exceptional_initiative?: boolean;
  now: Date;
}

export interface CompetencyRequest {
  scores?: RawCompetencyInput[];
  evidence?: EvidenceItem[];
  months_in_role?: number | null;
  level?: EngineerLevel;
  now: Date;
}

export interface CompetencyReportWithTargets extends CompetencyReport {
  vs_target: Record<string, VsTarget>;
}

function isRejected(entry: GoalEntry): entry is RejectedGoal {
  return "rejected" in entry && entry.rejected === true;
}

function buildMeta(policy: ScoringPolicy, now: Date, tenure: TenureProfile, warnings: string[]): ReportMeta {
  return {
    schema_version: SCHEMA_VERSION,
    policy_id: policy.id,
    policy_version: policy.version,
    determinism_mode: "STRICT",
    generated_at: now.toISOString(),
    tenure,
    warnings,
  };
}

function logWarning(scope: string, message: string): void {
  console.warn(`[${new Date().toISOString()}] ${scope} - ${message}`);
}

/**
 * Scores every goal on its own. A goal that throws is recorded as a
 * degraded zero score; the rest of the report is unaffected.
 */
export function buildAlignmentReport(request: AlignmentRequest, policy: ScoringPolicy): AlignmentReport {
  const { profile, warning } = resolveTenureProfile(request.months_in_role);
  const warnings: string[] = [];
  if (warning) warnings.push(warning);

  const goals: AlignmentScore[] = request.goals.map((entry) => {
    if (isRejected(entry)) {
      logWarning("alignment", `Goal "${entry.id}" rejected: ${entry.reason}`);
      return buildDegradedAlignmentScore(entry.id, policy, entry.reason);
    }
    try {
      return scoreGoalAlignment(entry, request.evidence, profile, policy, {
        exceptional_initiative: request.exceptional_initiative,
      });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      logWarning("alignment", `Goal "${entry.id}" degraded: ${reason}`);
      return buildDegradedAlignmentScore(entry.id, policy, reason);
    }
  });

  return {
    meta: buildMeta(policy, request.now, profile, warnings),
    goals,
  };
}

/**
 * Recalibrates supplied raw scores; without any, derives raw scores from
 * the evidence first.
 */
export function buildCompetencyReport(
  request: CompetencyRequest,
  policy: ScoringPolicy
): CompetencyReportWithTargets {
  const { profile, warning } = resolveTenureProfile(request.months_in_role);
  const warnings: string[] = [];
  if (warning) warnings.push(warning);

  let inputs: RawCompetencyInput[];
  const vsTarget: Record<string, VsTarget> = {};

  if (request.scores && request.scores.length > 0) {
    inputs = request.scores;
  } else {
    const analyzed = analyzeCompetencies(request.evidence ?? [], request.level);
    inputs = analyzed.map((a) => ({
      competency_id: a.competency_id,
      raw_score: a.raw_score,
      has_ownership: a.has_ownership,
    }));
    for (const a of analyzed) {
      if (a.vs_target) vsTarget[a.competency_id] = a.vs_target;
    }
    if (analyzed.every((a) => a.raw_score === 0)) {
      warnings.push("No competency signals found in evidence");
    }
  }

  return {
    meta: buildMeta(policy, request.now, profile, warnings),
    competencies: recalibrateCompetencies(inputs, profile, policy.competency_bands),
    vs_target: vsTarget,
  };
}
