// impactscore-backend/src/services/scoreBands.ts

import { ScoreBand, ScoreBandTable } from "../types/scoring";
import { ScoreBandConfigError } from "../types/errors";

export const SCORE_MIN = 0;
export const SCORE_MAX = 100;

export function clampScore(value: number): number {
  if (Number.isNaN(value)) return SCORE_MIN;
  return Math.max(SCORE_MIN, Math.min(SCORE_MAX, value));
}

/**
 * Validates that the bands partition [0,100] as contiguous closed
 * integer intervals, in ascending order, each of non-zero length.
 */
export function buildScoreBandTable<L extends string>(
  bands: ReadonlyArray<ScoreBand<L>>
): ScoreBandTable<L> {
  if (bands.length === 0) {
    throw new ScoreBandConfigError("Band table is empty");
  }

  const seen = new Set<string>();
  let expectedMin = SCORE_MIN;

  for (const band of bands) {
    if (!Number.isInteger(band.min) || !Number.isInteger(band.max)) {
      throw new ScoreBandConfigError(
        `Band "${band.label}" has non-integer bounds ${band.min}-${band.max}`
      );
    }
    if (band.min !== expectedMin) {
      throw new ScoreBandConfigError(
        `Band "${band.label}" starts at ${band.min}, expected ${expectedMin}`
      );
    }
    if (band.max <= band.min) {
      throw new ScoreBandConfigError(
        `Band "${band.label}" has zero or negative length (${band.min}-${band.max})`
      );
    }
    if (seen.has(band.label)) {
      throw new ScoreBandConfigError(`Duplicate band label "${band.label}"`);
    }
    seen.add(band.label);
    expectedMin = band.max + 1;
  }

  const last = bands[bands.length - 1];
  if (last.max !== SCORE_MAX) {
    throw new ScoreBandConfigError(
      `Band table ends at ${last.max}, expected ${SCORE_MAX}`
    );
  }

  return { bands: bands.map((b) => ({ min: b.min, max: b.max, label: b.label })) };
}

export function bandFor<L extends string>(table: ScoreBandTable<L>, score: number): ScoreBand<L> {
  const s = Math.round(clampScore(score));
  const found = table.bands.find((b) => s >= b.min && s <= b.max);
  if (!found) {
    // unreachable for a table built by buildScoreBandTable
    throw new ScoreBandConfigError(`No band covers score ${s}`);
  }
  return found;
}

export function bandIndex<L extends string>(table: ScoreBandTable<L>, label: L): number {
  const idx = table.bands.findIndex((b) => b.label === label);
  if (idx < 0) {
    throw new ScoreBandConfigError(`Unknown band label "${label}"`);
  }
  return idx;
}

/**
 * Lowers `label` to `ceiling` when it ranks above it.
 */
export function capBand<L extends string>(table: ScoreBandTable<L>, label: L, ceiling: L): L {
  return bandIndex(table, label) > bandIndex(table, ceiling) ? ceiling : label;
}

/**
 * One band down, or the same band when already at the bottom.
 */
export function demoteBand<L extends string>(table: ScoreBandTable<L>, label: L): L {
  const idx = bandIndex(table, label);
  return idx === 0 ? label : table.bands[idx - 1].label;
}
