import { buildAlignmentReport, buildCompetencyReport, AlignmentRequest } from "../services/report";
import { checkoutGoal, evidence, ownershipWeighted, threeMatches } from "./fixtures";

describe("report", () => {
  const now = new Date(Date.UTC(2026, 9, 19));
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    warnSpy = jest.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    warnSpy.mockRestore();
  });

  const request = (overrides: Partial<AlignmentRequest> = {}): AlignmentRequest => ({
    goals: [checkoutGoal],
    evidence: threeMatches,
    months_in_role: 8,
    now,
    ...overrides,
  });

  describe("buildAlignmentReport", () => {
    it("should stamp report metadata", () => {
      expect(buildAlignmentReport(request(), ownershipWeighted).meta).toEqual({
        schema_version: "1.0.0",
        policy_id: "ownership-weighted",
        policy_version: "2.0.0",
        determinism_mode: "STRICT",
        generated_at: "2026-10-19T00:00:00.000Z",
        tenure: { months_in_role: 8, tenure_band: "established", defaulted: false },
        warnings: [],
      });
    });

    it("should produce identical output for identical input", () => {
      const first = JSON.stringify(buildAlignmentReport(request(), ownershipWeighted));
      const second = JSON.stringify(buildAlignmentReport(request(), ownershipWeighted));
      expect(second).toBe(first);
    });

    it("should isolate goals that cannot be scored", () => {
      const report = buildAlignmentReport(
        request({
          goals: [
            checkoutGoal,
            { ...checkoutGoal, id: "g2", key_results: [{ description: "kr", target: Number.NaN }] },
            { rejected: true, id: "goal-3", reason: "title: Expected string, received number" },
          ],
        }),
        ownershipWeighted
      );

      expect(report.goals.map((g) => [g.goal_id, g.total, g.flags])).toEqual([
        ["g1", 24, []],
        ["g2", 0, ["degraded"]],
        ["goal-3", 0, ["degraded"]],
      ]);
      expect(report.goals[1].gaps).toEqual([
        'Goal could not be scored: Goal "g2" is malformed: key result 0 has a non-numeric target',
      ]);
      expect(report.goals[2].gaps).toEqual([
        "Goal could not be scored: title: Expected string, received number",
      ]);
      expect(warnSpy).toHaveBeenCalledTimes(2);
    });

    it("should default missing tenure to senior and say so", () => {
      const report = buildAlignmentReport(request({ months_in_role: undefined }), ownershipWeighted);
      expect(report.meta.tenure).toEqual({ months_in_role: 12, tenure_band: "senior", defaulted: true });
      expect(report.meta.warnings).toEqual([
        "Tenure unavailable (months_in_role not provided); scored as senior",
      ]);
      expect(report.goals[0].flags).toEqual(["tenure_defaulted"]);
    });
  });

  describe("buildCompetencyReport", () => {
    it("should recalibrate supplied raw scores", () => {
      const report = buildCompetencyReport(
        {
          scores: [{ competency_id: "execution_delivery", raw_score: 90, has_ownership: false }],
          months_in_role: 8,
          now,
        },
        ownershipWeighted
      );
      expect(report.competencies.map((c) => c.calibrated_band)).toEqual(["Strong"]);
      expect(report.vs_target).toEqual({});
      expect(report.meta.warnings).toEqual([]);
    });

    it("should derive raw scores from evidence", () => {
      const report = buildCompetencyReport(
        { evidence: [evidence("1", "Fix login bug")], months_in_role: 8, level: "P2", now },
        ownershipWeighted
      );
      expect(report.competencies[0]).toEqual({
        competency_id: "execution_delivery",
        raw_score: 12,
        cap: 100,
        calibrated_band: "Gap",
        adjustments: [],
      });
      expect(report.vs_target).toEqual({
        execution_delivery: "Gap",
        skills_knowledge: "Gap",
        teamwork_communication: "Gap",
        influence_leadership: "Developing",
      });
    });

    it("should warn when evidence carries no competency signals", () => {
      const report = buildCompetencyReport(
        { evidence: [evidence("1", "Bump lodash")], months_in_role: 8, now },
        ownershipWeighted
      );
      expect(report.meta.warnings).toEqual(["No competency signals found in evidence"]);
      expect(report.competencies.every((c) => c.calibrated_band === "Gap")).toBe(true);
    });
  });
});
