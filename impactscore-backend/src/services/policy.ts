// impactscore-backend/src/services/policy.ts
// Versioned scoring policies (volume tables + band tables)

import { z } from "zod";
import bundledPolicies from "../data/scoring-policies.json";
import {
  ALIGNMENT_STATUSES,
  COMPETENCY_BANDS,
  EvidenceVolumeTier,
  ScoringPolicy,
} from "../types/scoring";
import { ScoreBandConfigError } from "../types/errors";
import { buildScoreBandTable } from "./scoreBands";

export const EVIDENCE_SCORE_MAX = 40;

// ============================================================
// FILE SCHEMA
// ============================================================

const volumeTierSchema = z.object({
  min_count: z.number().int().min(0),
  execution_only: z.number().int(),
  with_ownership: z.number().int(),
});

const alignmentBandSchema = z.object({
  min: z.number(),
  max: z.number(),
  label: z.enum(ALIGNMENT_STATUSES),
});

const competencyBandSchema = z.object({
  min: z.number(),
  max: z.number(),
  label: z.enum(COMPETENCY_BANDS),
});

const policySchema = z.object({
  id: z.string().min(1),
  version: z.string().min(1),
  description: z.string().default(""),
  evidence_volume: z.array(volumeTierSchema).min(1),
  alignment_bands: z.array(alignmentBandSchema),
  competency_bands: z.array(competencyBandSchema),
});

export const policyCatalogSchema = z.object({
  default_policy: z.string().min(1),
  policies: z.array(policySchema).min(1),
});

export type RawScoringPolicy = z.infer<typeof policySchema>;

export interface PolicyCatalog {
  default_policy: string;
  policies: ScoringPolicy[];
}

// ============================================================
// VALIDATION
// ============================================================

/**
 * Volume tiers must start at zero evidence, grow strictly in count and
 * never lose points as count grows; ownership never scores below
 * execution-only.
 */
export function validateVolumeTable(
  tiers: ReadonlyArray<EvidenceVolumeTier>
): EvidenceVolumeTier[] {
  if (tiers.length === 0 || tiers[0].min_count !== 0) {
    throw new ScoreBandConfigError("Evidence volume table must start at min_count 0");
  }

  for (let i = 0; i < tiers.length; i++) {
    const t = tiers[i];
    for (const points of [t.execution_only, t.with_ownership]) {
      if (points < 0 || points > EVIDENCE_SCORE_MAX) {
        throw new ScoreBandConfigError(
          `Evidence volume tier ${i} has points ${points} outside 0-${EVIDENCE_SCORE_MAX}`
        );
      }
    }
    if (t.with_ownership < t.execution_only) {
      throw new ScoreBandConfigError(
        `Evidence volume tier ${i} scores ownership below execution-only`
      );
    }
    if (i === 0) continue;

    const prev = tiers[i - 1];
    if (t.min_count <= prev.min_count) {
      throw new ScoreBandConfigError(
        `Evidence volume tier ${i} min_count ${t.min_count} is not above ${prev.min_count}`
      );
    }
    if (t.execution_only < prev.execution_only || t.with_ownership < prev.with_ownership) {
      throw new ScoreBandConfigError(`Evidence volume tier ${i} decreases points`);
    }
  }

  return tiers.map((t) => ({ ...t }));
}

function assertCanonicalOrder(labels: string[], expected: readonly string[], table: string): void {
  const same =
    labels.length === expected.length && labels.every((label, i) => label === expected[i]);
  if (!same) {
    throw new ScoreBandConfigError(
      `${table} bands must be ${expected.join(" < ")}, got ${labels.join(" < ")}`
    );
  }
}

export function buildScoringPolicy(raw: RawScoringPolicy): ScoringPolicy {
  assertCanonicalOrder(
    raw.alignment_bands.map((b) => b.label),
    ALIGNMENT_STATUSES,
    `Policy "${raw.id}" alignment`
  );
  assertCanonicalOrder(
    raw.competency_bands.map((b) => b.label),
    COMPETENCY_BANDS,
    `Policy "${raw.id}" competency`
  );

  return {
    id: raw.id,
    version: raw.version,
    description: raw.description,
    evidence_volume: validateVolumeTable(raw.evidence_volume),
    alignment_bands: buildScoreBandTable(raw.alignment_bands),
    competency_bands: buildScoreBandTable(raw.competency_bands),
  };
}

/**
 * Parses and validates a whole policy file. Any problem is a
 * ScoreBandConfigError: a bad table must never reach scoring.
 */
export function parsePolicyCatalog(input: unknown): PolicyCatalog {
  const parsed = policyCatalogSchema.safeParse(input);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ScoreBandConfigError(`Invalid scoring policy file: ${detail}`);
  }

  const policies = parsed.data.policies.map(buildScoringPolicy);
  const ids = new Set<string>();
  for (const p of policies) {
    if (ids.has(p.id)) {
      throw new ScoreBandConfigError(`Duplicate scoring policy id "${p.id}"`);
    }
    ids.add(p.id);
  }

  const catalog: PolicyCatalog = {
    default_policy: parsed.data.default_policy,
    policies,
  };
  // default must exist
  selectPolicy(catalog);
  return catalog;
}

export function selectPolicy(catalog: PolicyCatalog, id?: string): ScoringPolicy {
  const wanted = id || catalog.default_policy;
  const policy = catalog.policies.find((p) => p.id === wanted);
  if (!policy) {
    throw new ScoreBandConfigError(
      `Unknown scoring policy "${wanted}" (available: ${catalog.policies.map((p) => p.id).join(", ")})`
    );
  }
  return policy;
}

export function loadBundledPolicies(): PolicyCatalog {
  return parsePolicyCatalog(bundledPolicies);
}
