export * from "./types/scoring";
export * from "./types/errors";
export { resolveDateRange, isWithinRange } from "./services/dateRange";
export type { DateRange, DateRangeKind } from "./services/dateRange";
export { extractKeywords, tokenize } from "./services/keywords";
export { matchEvidence, detectOwnershipSignals, OWNERSHIP_DETECTORS } from "./services/evidenceMatcher";
export {
  scoreGoalAlignment,
  buildDegradedAlignmentScore,
  computeEvidenceScore,
  computeKeyResultScore,
} from "./services/alignment";
export {
  tenureBandFor,
  buildTenureProfile,
  resolveTenureProfile,
  calibrateForTenure,
} from "./services/tenure";
export { recalibrateCompetency, recalibrateCompetencies } from "./services/competency";
export type { RawCompetencyInput } from "./services/competency";
export { analyzeCompetencies, COMPETENCIES, LEVEL_EXPECTATIONS } from "./services/competencyAnalyzer";
export { buildScoreBandTable, bandFor } from "./services/scoreBands";
export { loadBundledPolicies, parsePolicyCatalog, selectPolicy } from "./services/policy";
export type { PolicyCatalog } from "./services/policy";
export { buildAlignmentReport, buildCompetencyReport } from "./services/report";
export type { AlignmentRequest, CompetencyRequest, GoalEntry, RejectedGoal } from "./services/report";
