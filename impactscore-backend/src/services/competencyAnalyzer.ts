// impactscore-backend/src/services/competencyAnalyzer.ts
// Raw competency scores from activity evidence.
// Scores trend high by construction; they are meant to go through
// recalibrateCompetency before anyone reads them.

import { EvidenceItem } from "../types/scoring";
import { detectOwnershipSignals, evidenceText } from "./evidenceMatcher";

export const COMPETENCIES = [
  "execution_delivery",
  "skills_knowledge",
  "teamwork_communication",
  "influence_leadership",
] as const;

export type CompetencyId = (typeof COMPETENCIES)[number];

export type EvidenceLevel = "strong" | "moderate" | "weak";

export type EngineerLevel = "P2" | "P3" | "P4" | "P5";

export type VsTarget = "Exceeding" | "Meeting" | "Developing" | "Gap";

export interface CompetencySignal {
  signal_type: "pattern" | "volume" | "review_activity";
  level: EvidenceLevel;
  reasoning: string;
  evidence_id?: string;
}

export interface AnalyzedCompetency {
  competency_id: CompetencyId;
  raw_score: number;
  signals: CompetencySignal[];
  has_ownership: boolean;
  vs_target?: VsTarget;
}

interface PatternRule {
  pattern: RegExp;
  reasoning: string;
  level: EvidenceLevel;
}

// First matching rule per competency per item wins
const COMPETENCY_PATTERNS: Record<CompetencyId, PatternRule[]> = {
  execution_delivery: [
    { pattern: /\b(fix|bug|patch|hotfix|resolve)\b/, reasoning: "Bug fixing", level: "moderate" },
    { pattern: /\b(implement|add|create|build|ship)\b/, reasoning: "Feature delivery", level: "moderate" },
    { pattern: /\b(refactor|optimize|improve|performance)\b/, reasoning: "Code improvement", level: "moderate" },
    { pattern: /\b(migrate|upgrade|update)\b/, reasoning: "System modernization", level: "moderate" },
    { pattern: /\b(release|deploy|rollout)\b/, reasoning: "Release management", level: "strong" },
  ],
  skills_knowledge: [
    { pattern: /\b(architecture|design|pattern)\b/, reasoning: "Architectural thinking", level: "strong" },
    { pattern: /\b(security|auth|encryption|vulnerability)\b/, reasoning: "Security expertise", level: "strong" },
    { pattern: /\b(test|testing|coverage|spec)\b/, reasoning: "Testing discipline", level: "moderate" },
    { pattern: /\b(api|endpoint|graphql|rest)\b/, reasoning: "API design", level: "moderate" },
    { pattern: /\b(database|query|index|schema)\b/, reasoning: "Database knowledge", level: "moderate" },
    { pattern: /\b(cache|redis|memcached)\b/, reasoning: "Caching knowledge", level: "moderate" },
    { pattern: /\b(docker|kubernetes|k8s|container)\b/, reasoning: "Container expertise", level: "strong" },
    { pattern: /\b(ci|cd|pipeline|workflow)\b/, reasoning: "Delivery pipeline skills", level: "moderate" },
  ],
  teamwork_communication: [
    { pattern: /\b(doc|docs|documentation|readme)\b/, reasoning: "Documentation", level: "moderate" },
    { pattern: /\b(review|feedback|suggestion)\b/, reasoning: "Review engagement", level: "weak" },
    { pattern: /\b(pair|collaborate|together)\b/, reasoning: "Collaboration", level: "moderate" },
  ],
  influence_leadership: [
    { pattern: /\b(rfc|proposal|design doc)\b/, reasoning: "Technical proposals", level: "strong" },
    { pattern: /\b(mentor|onboard|guide)\b/, reasoning: "Mentorship", level: "strong" },
    { pattern: /\b(initiative|project|epic)\b/, reasoning: "Project leadership", level: "moderate" },
    { pattern: /\b(standard|convention|pattern)\b/, reasoning: "Setting standards", level: "moderate" },
  ],
};

const HIGH_IMPACT_TITLE = /(architect|design|rfc|proposal)/;

const LEVEL_POINTS: Record<EvidenceLevel, number> = { strong: 20, moderate: 12, weak: 5 };

export const RAW_SCORE_CEILING = 85;
const SOFT_CAP_FROM = 60;

// Expected score per competency at each engineer level
export const LEVEL_EXPECTATIONS: Record<EngineerLevel, Record<CompetencyId, number>> = {
  P2: { execution_delivery: 35, skills_knowledge: 30, teamwork_communication: 30, influence_leadership: 15 },
  P3: { execution_delivery: 45, skills_knowledge: 40, teamwork_communication: 40, influence_leadership: 25 },
  P4: { execution_delivery: 55, skills_knowledge: 55, teamwork_communication: 50, influence_leadership: 45 },
  P5: { execution_delivery: 60, skills_knowledge: 65, teamwork_communication: 55, influence_leadership: 60 },
};

// ============================================================
// SCORING
// ============================================================

/**
 * Impact multiplier in tenths: 8 (0.8x) up to 12 (1.2x). Each item whose
 * title reads as design or proposal work adds two.
 */
export function computeImpactTenths(items: EvidenceItem[]): number {
  let signals = 0;
  for (const item of items) {
    if (HIGH_IMPACT_TITLE.test(item.title.toLowerCase())) signals += 2;
  }
  return 8 + Math.min(signals, 4);
}

/**
 * Diminishing returns per signal type (1, 0.77, 0.63, ...), a breadth
 * bonus per distinct type, then soft compression above 60 towards 85.
 */
export function computeRawCompetencyScore(signals: CompetencySignal[], impactTenths = 10): number {
  if (signals.length === 0) return 0;

  const perType = new Map<string, number>();
  let base = 0;
  for (const s of signals) {
    const n = (perType.get(s.signal_type) ?? 0) + 1;
    perType.set(s.signal_type, n);
    base += LEVEL_POINTS[s.level] / (1 + 0.3 * (n - 1));
  }

  const diversity = Math.min(perType.size * 3, 15);
  const raw = ((base + diversity) * impactTenths) / 10;

  if (raw > SOFT_CAP_FROM) {
    const compressed = SOFT_CAP_FROM + 25 * (1 - Math.exp(-(raw - SOFT_CAP_FROM) / 30));
    return Math.min(Math.floor(compressed), RAW_SCORE_CEILING);
  }
  return Math.min(Math.floor(raw), RAW_SCORE_CEILING);
}

export function vsTargetLabel(score: number, competency: CompetencyId, level?: EngineerLevel): VsTarget | undefined {
  if (!level) return undefined;
  const threshold = LEVEL_EXPECTATIONS[level][competency];
  if (score >= threshold + 15) return "Exceeding";
  if (score >= threshold) return "Meeting";
  if (score >= threshold - 15) return "Developing";
  return "Gap";
}

function volumeSignal(changeCount: number): CompetencySignal | null {
  if (changeCount >= 10) {
    return { signal_type: "volume", level: "strong", reasoning: `Delivered ${changeCount} changes` };
  }
  if (changeCount >= 5) {
    return { signal_type: "volume", level: "moderate", reasoning: `Delivered ${changeCount} changes` };
  }
  return null;
}

function reviewSignal(reviewCount: number): CompetencySignal | null {
  if (reviewCount >= 15) {
    return { signal_type: "review_activity", level: "strong", reasoning: `Gave ${reviewCount} reviews` };
  }
  if (reviewCount >= 5) {
    return { signal_type: "review_activity", level: "moderate", reasoning: `Gave ${reviewCount} reviews` };
  }
  return null;
}

export function analyzeCompetencies(items: EvidenceItem[], level?: EngineerLevel): AnalyzedCompetency[] {
  const signals = new Map<CompetencyId, CompetencySignal[]>(COMPETENCIES.map((c) => [c, []]));
  const ownership = new Set<CompetencyId>();

  for (const item of items) {
    const text = evidenceText(item).toLowerCase();
    const owned =
      (item.ownership_signals?.length ?? 0) > 0 || detectOwnershipSignals(text).length > 0;

    for (const competency of COMPETENCIES) {
      const rule = COMPETENCY_PATTERNS[competency].find((r) => r.pattern.test(text));
      if (!rule) continue;
      signals.get(competency)?.push({
        signal_type: "pattern",
        level: rule.level,
        reasoning: rule.reasoning,
        evidence_id: item.id,
      });
      if (owned) ownership.add(competency);
    }
  }

  const changes = items.filter((i) => i.kind === undefined || i.kind === "change").length;
  const volume = volumeSignal(changes);
  if (volume) signals.get("execution_delivery")?.push(volume);

  const reviews = items.filter((i) => i.kind === "review").length;
  const review = reviewSignal(reviews);
  if (review) signals.get("teamwork_communication")?.push(review);

  const impact = computeImpactTenths(items);

  return COMPETENCIES.map((competency) => {
    const list = signals.get(competency) ?? [];
    const raw = computeRawCompetencyScore(list, impact);
    const vs = vsTargetLabel(raw, competency, level);
    return {
      competency_id: competency,
      raw_score: raw,
      signals: list,
      has_ownership: ownership.has(competency),
      ...(vs ? { vs_target: vs } : {}),
    };
  });
}
