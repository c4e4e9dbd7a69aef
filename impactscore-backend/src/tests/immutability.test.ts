import { scoreGoalAlignment } from "../services/alignment";
import { recalibrateCompetencies, RawCompetencyInput } from "../services/competency";
import { buildAlignmentReport } from "../services/report";
import { EvidenceItem, Goal } from "../types/scoring";
import { established, evidence, ownershipWeighted } from "./fixtures";

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object") {
    const children: unknown[] = Object.values(value);
    for (const child of children) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

describe("input immutability", () => {
  const goal: Goal = deepFreeze({
    id: "g1",
    title: "Checkout latency",
    description: "Reduce latency for the checkout service",
    key_results: [{ description: "p95 under 200ms", target: 10, achieved: 4 }],
  });

  const items: EvidenceItem[] = deepFreeze([
    evidence("e1", "Cache checkout totals", { ownership_signals: ["technical_decision"] }),
    evidence("e1", "Cache checkout totals again"),
    evidence("e2", "Trim latency on cart page", { body: "Coordinated with stakeholders" }),
  ]);

  const inputs: RawCompetencyInput[] = deepFreeze([
    { competency_id: "execution_delivery", raw_score: 90, has_ownership: false },
    { competency_id: "skills_knowledge", raw_score: 77.5, has_ownership: true },
  ]);

  const goalBefore = structuredClone(goal);
  const itemsBefore = structuredClone(items);
  const inputsBefore = structuredClone(inputs);

  afterEach(() => {
    expect(goal).toEqual(goalBefore);
    expect(items).toEqual(itemsBefore);
    expect(inputs).toEqual(inputsBefore);
  });

  it("should score a goal without touching its inputs", () => {
    const score = scoreGoalAlignment(goal, items, established, ownershipWeighted);
    expect(score.matched_evidence).toBe(2);
  });

  it("should build a report without touching its inputs", () => {
    const report = buildAlignmentReport(
      { goals: [goal], evidence: items, months_in_role: 8, now: new Date(Date.UTC(2026, 9, 19)) },
      ownershipWeighted
    );
    expect(report.goals).toHaveLength(1);
    expect(report.goals[0].flags).toEqual([]);
  });

  it("should recalibrate without touching its inputs", () => {
    const scores = recalibrateCompetencies(inputs, established, ownershipWeighted.competency_bands);
    expect(scores.map((s) => s.calibrated_band)).toEqual(["Strong", "Very Strong"]);
  });
});
