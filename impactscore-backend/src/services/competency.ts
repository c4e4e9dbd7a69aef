// impactscore-backend/src/services/competency.ts
// Competency recalibration: inflation-prone raw scores → conservative bands

import {
  CompetencyBand,
  CompetencyScore,
  ScoreBandTable,
  TenureProfile,
} from "../types/scoring";
import { bandFor, bandIndex, capBand, clampScore, SCORE_MAX } from "./scoreBands";

/** Raw scores from here up need ownership evidence to stay above Strong. */
export const OWNERSHIP_REQUIRED_FROM = 78;
export const OWNERSHIP_CEILING: CompetencyBand = "Strong";
export const NEW_TENURE_CEILING: CompetencyBand = "Solid";

export interface RawCompetencyInput {
  competency_id: string;
  raw_score: number;
  has_ownership: boolean;
}

function ceilingScore(table: ScoreBandTable<CompetencyBand>, ceiling: CompetencyBand): number {
  return table.bands[bandIndex(table, ceiling)].max;
}

export function recalibrateCompetency(
  input: RawCompetencyInput,
  tenure: TenureProfile,
  table: ScoreBandTable<CompetencyBand>
): CompetencyScore {
  // bandFor rounds; the ownership threshold sees the unrounded score
  const raw = clampScore(input.raw_score);
  const adjustments: string[] = [];

  let band = bandFor(table, raw).label;

  if (raw >= OWNERSHIP_REQUIRED_FROM && !input.has_ownership) {
    const held = capBand(table, band, OWNERSHIP_CEILING);
    if (held !== band) {
      adjustments.push(`Held at ${OWNERSHIP_CEILING}: raw score ${raw} without ownership evidence`);
    }
    band = held;
  }

  const isNew = tenure.tenure_band === "new";
  if (isNew) {
    const held = capBand(table, band, NEW_TENURE_CEILING);
    if (held !== band) {
      adjustments.push(`Held at ${NEW_TENURE_CEILING}: tenure under 6 months`);
    }
    band = held;
  }

  return {
    competency_id: input.competency_id,
    raw_score: raw,
    cap: isNew ? ceilingScore(table, NEW_TENURE_CEILING) : SCORE_MAX,
    calibrated_band: band,
    adjustments,
  };
}

export function recalibrateCompetencies(
  inputs: RawCompetencyInput[],
  tenure: TenureProfile,
  table: ScoreBandTable<CompetencyBand>
): CompetencyScore[] {
  return inputs.map((input) => recalibrateCompetency(input, tenure, table));
}
