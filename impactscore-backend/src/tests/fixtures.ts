// impactscore-backend/src/tests/fixtures.ts

import { EvidenceItem, Goal, ScoringPolicy, TenureProfile } from "../types/scoring";
import { loadBundledPolicies, selectPolicy } from "../services/policy";
import { buildTenureProfile } from "../services/tenure";

const catalog = loadBundledPolicies();

export const ownershipWeighted: ScoringPolicy = selectPolicy(catalog, "ownership-weighted");
export const linear: ScoringPolicy = selectPolicy(catalog, "linear");

export const established: TenureProfile = buildTenureProfile(8);
export const senior: TenureProfile = buildTenureProfile(24);
export const newHire: TenureProfile = buildTenureProfile(3);

export function evidence(id: string, title: string, extra: Partial<EvidenceItem> = {}): EvidenceItem {
  return { id, title, timestamp: "2026-10-05T10:00:00Z", ...extra };
}

// strong keywords: checkout, latency, service; weak: reduce
export const checkoutGoal: Goal = {
  id: "g1",
  title: "Checkout latency",
  description: "Reduce latency for the checkout service",
  key_results: [{ description: "Make checkout feel faster" }],
};

export const threeMatches: EvidenceItem[] = [
  evidence("e1", "Cache checkout totals"),
  evidence("e2", "Trim latency on cart page"),
  evidence("e3", "Service warmup tweaks"),
  evidence("e4", "Bump lodash"),
];

export function checkoutItems(count: number, extra: Partial<EvidenceItem> = {}): EvidenceItem[] {
  return Array.from({ length: count }, (_, i) => evidence(`c${i + 1}`, `Checkout cache layer ${i + 1}`, extra));
}
