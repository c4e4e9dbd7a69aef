import {
  bandFor,
  buildScoreBandTable,
  capBand,
  clampScore,
  demoteBand,
} from "../services/scoreBands";
import { ScoreBandConfigError } from "../types/errors";

type Label = "low" | "mid" | "high";

describe("scoreBands", () => {
  const table = buildScoreBandTable<Label>([
    { min: 0, max: 39, label: "low" },
    { min: 40, max: 79, label: "mid" },
    { min: 80, max: 100, label: "high" },
  ]);

  describe("buildScoreBandTable", () => {
    it("should reject a gap between bands", () => {
      expect(() =>
        buildScoreBandTable([
          { min: 0, max: 39, label: "low" },
          { min: 41, max: 100, label: "high" },
        ])
      ).toThrow(ScoreBandConfigError);
    });

    it("should reject overlapping bands", () => {
      expect(() =>
        buildScoreBandTable([
          { min: 0, max: 40, label: "low" },
          { min: 40, max: 100, label: "high" },
        ])
      ).toThrow("starts at 40, expected 41");
    });

    it("should reject zero-length bands", () => {
      expect(() =>
        buildScoreBandTable([
          { min: 0, max: 0, label: "zero" },
          { min: 1, max: 100, label: "rest" },
        ])
      ).toThrow(ScoreBandConfigError);
    });

    it("should reject tables that do not cover 0-100", () => {
      expect(() => buildScoreBandTable([{ min: 0, max: 90, label: "all" }])).toThrow(
        "Band table ends at 90, expected 100"
      );
      expect(() => buildScoreBandTable([{ min: 5, max: 100, label: "all" }])).toThrow(
        ScoreBandConfigError
      );
      expect(() => buildScoreBandTable([])).toThrow("Band table is empty");
    });

    it("should reject duplicate labels", () => {
      expect(() =>
        buildScoreBandTable([
          { min: 0, max: 50, label: "same" },
          { min: 51, max: 100, label: "same" },
        ])
      ).toThrow('Duplicate band label "same"');
    });
  });

  describe("bandFor", () => {
    it("should map boundaries to the enclosing band", () => {
      expect(bandFor(table, 0).label).toBe("low");
      expect(bandFor(table, 39).label).toBe("low");
      expect(bandFor(table, 40).label).toBe("mid");
      expect(bandFor(table, 80).label).toBe("high");
      expect(bandFor(table, 100).label).toBe("high");
    });

    it("should round and clamp before lookup", () => {
      expect(bandFor(table, 39.6).label).toBe("mid");
      expect(bandFor(table, -12).label).toBe("low");
      expect(bandFor(table, 250).label).toBe("high");
    });
  });

  it("should cap and demote by band order", () => {
    expect(capBand(table, "high", "mid")).toBe("mid");
    expect(capBand(table, "low", "mid")).toBe("low");
    expect(demoteBand(table, "high")).toBe("mid");
    expect(demoteBand(table, "low")).toBe("low");
  });

  it("should clamp scores to 0-100", () => {
    expect(clampScore(-1)).toBe(0);
    expect(clampScore(101)).toBe(100);
    expect(clampScore(Number.NaN)).toBe(0);
    expect(clampScore(42.5)).toBe(42.5);
  });
});
