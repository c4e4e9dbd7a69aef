import {
  detectOwnershipSignals,
  matchEvidence,
  OWNERSHIP_DETECTORS,
} from "../services/evidenceMatcher";
import { extractKeywords } from "../services/keywords";
import { OWNERSHIP_SIGNALS } from "../types/scoring";
import { evidence } from "./fixtures";

describe("evidenceMatcher", () => {
  // strong: checkout, latency, payments, service; moderate: p95; weak: improve, reduce
  const keywords = extractKeywords(
    "Improve checkout latency",
    "Reduce p95 latency of the payments service"
  );

  describe("matchEvidence", () => {
    it("should take the strongest matching tier", () => {
      expect(matchEvidence(evidence("c1", "Cache checkout totals to cut latency"), keywords)).toEqual({
        evidence_id: "c1",
        strength: "strong",
        points: 3,
        matched_terms: ["checkout", "latency"],
        ownership_signals: [],
        has_ownership: false,
      });
    });

    it("should score moderate and weak matches lower", () => {
      const match = matchEvidence(evidence("c2", "Improve p95 dashboards"), keywords);
      expect(match.strength).toBe("moderate");
      expect(match.points).toBe(2);
      expect(match.matched_terms).toEqual(["p95", "improve"]);
    });

    it("should report no match for unrelated work", () => {
      const match = matchEvidence(evidence("c3", "Bump lodash version"), keywords);
      expect(match.strength).toBe("none");
      expect(match.points).toBe(0);
      expect(match.matched_terms).toEqual([]);
    });

    it("should detect ownership in the body", () => {
      const match = matchEvidence(
        evidence("c4", "Payments retry", {
          body: "Identified the root cause and coordinated with the billing team",
        }),
        keywords
      );
      expect(match.strength).toBe("strong");
      expect(match.ownership_signals).toEqual(["gap_identification", "cross_team_coordination"]);
      expect(match.has_ownership).toBe(true);
    });

    it("should honour declared ownership signals", () => {
      const match = matchEvidence(
        evidence("c5", "Checkout cleanup", { ownership_signals: ["mentoring"] }),
        keywords
      );
      expect(match.ownership_signals).toEqual(["mentoring"]);
      expect(match.has_ownership).toBe(true);
    });
  });

  describe("detectOwnershipSignals", () => {
    it("should recognise each ownership category", () => {
      expect(detectOwnershipSignals("Wrote the RFC for the queue")).toEqual(["independent_scoping"]);
      expect(detectOwnershipSignals("Noticed a gap in alerting")).toEqual(["gap_identification"]);
      expect(detectOwnershipSignals("Decided on the trade-off between consistency and latency")).toEqual([
        "technical_decision",
      ]);
      expect(detectOwnershipSignals("Aligned with stakeholders across the org")).toEqual([
        "cross_team_coordination",
      ]);
      expect(detectOwnershipSignals("Mentored two new hires")).toEqual(["mentoring"]);
    });

    it("should find nothing in plain execution work", () => {
      expect(detectOwnershipSignals("Renamed a variable")).toEqual([]);
      expect(detectOwnershipSignals(undefined)).toEqual([]);
    });

    it("should have a detector for every ownership signal", () => {
      expect(Object.keys(OWNERSHIP_DETECTORS).sort()).toEqual([...OWNERSHIP_SIGNALS].sort());
    });
  });
});
