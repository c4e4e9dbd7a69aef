import { extractKeywords, tokenize } from "../services/keywords";

describe("keywords", () => {
  describe("tokenize", () => {
    it("should drop short tokens and stop words", () => {
      expect(tokenize("The API-v2 migration!")).toEqual(["api", "migration"]);
    });

    it("should return nothing for empty text", () => {
      expect(tokenize("")).toEqual([]);
      expect(tokenize(undefined)).toEqual([]);
    });
  });

  describe("extractKeywords", () => {
    const title = "Improve checkout latency";
    const description = "Reduce p95 latency of the payments service and document the runbook";

    it("should tier title terms, domain nouns and generic terms", () => {
      expect(extractKeywords(title, description)).toEqual([
        { term: "checkout", tier: "strong" },
        { term: "latency", tier: "strong" },
        { term: "payments", tier: "strong" },
        { term: "runbook", tier: "strong" },
        { term: "service", tier: "strong" },
        { term: "document", tier: "moderate" },
        { term: "p95", tier: "moderate" },
        { term: "improve", tier: "weak" },
        { term: "reduce", tier: "weak" },
      ]);
    });

    it("should be deterministic", () => {
      expect(extractKeywords(title, description)).toEqual(extractKeywords(title, description));
    });

    it("should keep the strongest tier for a repeated term", () => {
      const keywords = extractKeywords("Onboarding flow", "Shorten onboarding for new customers");
      expect(keywords.find((k) => k.term === "onboarding")).toEqual({
        term: "onboarding",
        tier: "strong",
      });
      expect(keywords.find((k) => k.term === "customers")).toEqual({
        term: "customers",
        tier: "moderate",
      });
    });

    it("should return nothing for a blank goal", () => {
      expect(extractKeywords("", undefined)).toEqual([]);
    });
  });
});
