// impactscore-backend/src/services/tenure.ts

import { TenureBand, TenureProfile } from "../types/scoring";
import { MissingTenureError } from "../types/errors";
import { clampScore } from "./scoreBands";

export const NEW_TENURE_MONTHS = 6;
export const SENIOR_TENURE_MONTHS = 12;
export const NEW_TENURE_SCORE_CAP = 60;

export function tenureBandFor(monthsInRole: number): TenureBand {
  if (monthsInRole < NEW_TENURE_MONTHS) return "new";
  if (monthsInRole < SENIOR_TENURE_MONTHS) return "established";
  return "senior";
}

export function buildTenureProfile(monthsInRole: number | null | undefined): TenureProfile {
  if (monthsInRole === null || monthsInRole === undefined) {
    throw new MissingTenureError("months_in_role not provided");
  }
  if (!Number.isInteger(monthsInRole) || monthsInRole < 0) {
    throw new MissingTenureError(`months_in_role must be a non-negative integer, got ${monthsInRole}`);
  }
  return {
    months_in_role: monthsInRole,
    tenure_band: tenureBandFor(monthsInRole),
    defaulted: false,
  };
}

/**
 * Missing tenure falls back to the most conservative profile (senior):
 * the highest bands then require ownership evidence.
 */
export function resolveTenureProfile(monthsInRole: number | null | undefined): {
  profile: TenureProfile;
  warning: string | null;
} {
  try {
    return { profile: buildTenureProfile(monthsInRole), warning: null };
  } catch (err) {
    if (!(err instanceof MissingTenureError)) throw err;
    return {
      profile: { months_in_role: SENIOR_TENURE_MONTHS, tenure_band: "senior", defaulted: true },
      warning: `Tenure unavailable (${err.message}); scored as senior`,
    };
  }
}

export interface TenureCalibrationOptions {
  exceptional_initiative?: boolean;   // caller-supplied, never inferred
  has_ownership: boolean;
}

export interface TenureCalibration {
  score: number;
  capped: boolean;
  cap_lifted: boolean;   // exceptional initiative kept a new-tenure score above the cap
  top_bands_eligible: boolean;
}

export function calibrateForTenure(
  score: number,
  tenure: TenureProfile,
  options: TenureCalibrationOptions
): TenureCalibration {
  const s = clampScore(score);

  const overCap = tenure.tenure_band === "new" && s > NEW_TENURE_SCORE_CAP;
  if (overCap && !options.exceptional_initiative) {
    return { score: NEW_TENURE_SCORE_CAP, capped: true, cap_lifted: false, top_bands_eligible: true };
  }

  return {
    score: s,
    capped: false,
    cap_lifted: overCap,
    top_bands_eligible: tenure.tenure_band !== "senior" || options.has_ownership,
  };
}
