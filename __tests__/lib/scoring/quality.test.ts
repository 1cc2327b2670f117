import { describe, it, expect } from "vitest";
import {
  QualityAssessor,
  classifyPublicationTypes,
  extractPublicationTypes,
  normalizeDesignLabel,
} from "../../../src/lib/scoring/quality";
import type { ChatMessage } from "../../../src/lib/llm/client";
import type { Item } from "../../../src/lib/model";
import { FakeLLMClient } from "../../helpers/fixtures";

function makeItem(overrides: Partial<Item> = {}): Item {
  return {
    id: 1,
    identifier: "10.1101/quality",
    title: "Outcomes after myocardial infarction",
    authors: [],
    abstract: "We followed 1,200 patients for five years.",
    url: "",
    source: "medrxiv",
    publishedDate: null,
    categories: ["Cardiovascular Medicine"],
    metadata: {},
    embedding: null,
    ingestedAt: 0,
    ...overrides,
  };
}

interface Responses {
  classify?: () => string | Promise<string>;
  assess?: () => string | Promise<string>;
}

function routedClient(responses: Responses): FakeLLMClient {
  return new FakeLLMClient((messages: ChatMessage[]) => {
    const handler = messages[0].content.startsWith("You classify") ? responses.classify : responses.assess;
    if (!handler) {
      throw new Error("unexpected call");
    }
    return handler();
  });
}

describe("extractPublicationTypes", () => {
  it("should combine pub_type metadata with categories", () => {
    expect(
      extractPublicationTypes({ metadata: { pub_type: ["Journal Article", 3, " Review "] }, categories: ["Oncology"] })
    ).toEqual(["Journal Article", "Review", "Oncology"]);
    expect(extractPublicationTypes({ metadata: { pub_type: "Editorial" }, categories: [] })).toEqual(["Editorial"]);
  });
});

describe("classifyPublicationTypes", () => {
  it("should prefer the most specific design when several match", () => {
    expect(classifyPublicationTypes(["Journal Article", "Systematic Review", "Meta-Analysis"]).design).toBe(
      "meta_analysis"
    );
  });

  it("should not read RCT into words that merely contain the letters", () => {
    expect(classifyPublicationTypes(["Myocardial Infarction"]).design).toBe("unclassified");
  });

  it("should map common publication types", () => {
    expect(classifyPublicationTypes(["Case Reports"]).design).toBe("case_report");
    expect(classifyPublicationTypes(["Review"]).design).toBe("narrative_review");
    expect(classifyPublicationTypes(["Observational Study", "Cohort Studies"]).design).toBe("cohort");
  });
});

describe("normalizeDesignLabel", () => {
  it("should accept taxonomy names and free-form labels", () => {
    expect(normalizeDesignLabel("meta-analysis")).toBe("meta_analysis");
    expect(normalizeDesignLabel("Randomized Controlled Trial")).toBe("rct");
    expect(normalizeDesignLabel("cohort study")).toBe("cohort");
    expect(normalizeDesignLabel("something else")).toBe("unclassified");
  });
});

describe("QualityAssessor", () => {
  describe("tier 1", () => {
    it("should classify a randomized controlled trial from metadata", async () => {
      const result = await new QualityAssessor().assess(
        makeItem({ metadata: { pub_type: ["Randomized Controlled Trial"] } })
      );

      expect(result.designLabel).toBe("rct");
      expect(result.tierLabel).toBe("TIER_4_EXPERIMENTAL");
      expect(result.qualityValue).toBeCloseTo(0.8, 10);
      expect(result.confidence).toBe(0.9);
      expect(result.assessmentTier).toBe(1);
    });

    it("should fall back to the unclassified score with zero confidence", async () => {
      const result = await new QualityAssessor().assess(makeItem());

      expect(result).toMatchObject({
        designLabel: "unclassified",
        tierLabel: "UNCLASSIFIED",
        qualityValue: 0.3,
        confidence: 0,
        assessmentTier: 1,
      });
    });

    it("should stay at tier 1 without a client even when a higher tier is requested", async () => {
      const result = await new QualityAssessor(null).assess(makeItem(), 3);
      expect(result.assessmentTier).toBe(1);
    });
  });

  describe("tier 2", () => {
    it("should classify unclassified items with the model", async () => {
      const llm = routedClient({ classify: () => '{"study_design": "cohort study", "confidence": 0.7}' });
      const result = await new QualityAssessor(llm).assess(makeItem(), 2);

      expect(result).toMatchObject({
        designLabel: "cohort",
        tierLabel: "TIER_3_CONTROLLED",
        qualityValue: 0.65,
        confidence: 0.7,
        assessmentTier: 2,
      });
    });

    it("should not call the model when metadata already classified the item", async () => {
      const llm = routedClient({ classify: () => '{"study_design": "case_report", "confidence": 0.9}' });
      const result = await new QualityAssessor(llm).assess(makeItem({ metadata: { pub_type: "Meta-Analysis" } }), 2);

      expect(llm.calls).toHaveLength(0);
      expect(result.designLabel).toBe("meta_analysis");
      expect(result.qualityValue).toBe(0.9);
    });

    it("should keep the tier 1 result when the call fails", async () => {
      const llm = routedClient({ classify: () => Promise.reject(new Error("rate limited")) });
      const result = await new QualityAssessor(llm).assess(makeItem(), 2);

      expect(result.assessmentTier).toBe(1);
      expect(result.designLabel).toBe("unclassified");
    });

    it("should keep the tier 1 result when the response is malformed", async () => {
      const llm = routedClient({ classify: () => "cohort, probably" });
      const result = await new QualityAssessor(llm).assess(makeItem(), 2);

      expect(result.assessmentTier).toBe(1);
      expect(result.qualityValue).toBe(0.3);
    });
  });

  describe("tier 3", () => {
    it("should use the direct quality score and keep the metadata design", async () => {
      const llm = routedClient({
        assess: () =>
          JSON.stringify({
            quality_score: 7.5,
            study_design: "cohort",
            risk_of_bias: "low",
            strengths: ["Large sample"],
            limitations: ["Single country"],
          }),
      });
      const result = await new QualityAssessor(llm).assess(
        makeItem({ metadata: { pub_type: "Randomized Controlled Trial" } }),
        3
      );

      expect(llm.calls).toHaveLength(1);
      expect(result).toMatchObject({
        designLabel: "rct",
        tierLabel: "TIER_4_EXPERIMENTAL",
        qualityValue: 0.75,
        qualityScore: 7.5,
        confidence: 0.9,
        assessmentTier: 3,
      });
      expect(result.detail).toMatchObject({ riskOfBias: "low", limitations: ["Single country"] });
    });

    it("should fill an unclassified design and use the tier table for a zero score", async () => {
      const llm = routedClient({
        classify: () => '{"study_design": "unknown", "confidence": 0.2}',
        assess: () => '{"quality_score": 0, "study_design": "case_report"}',
      });
      const result = await new QualityAssessor(llm).assess(makeItem(), 3);

      expect(result).toMatchObject({
        designLabel: "case_report",
        tierLabel: "TIER_1_ANECDOTAL",
        qualityValue: 0.3,
        confidence: 0.2,
        assessmentTier: 3,
      });
    });

    it("should keep the tier 2 result when the detailed assessment fails", async () => {
      const llm = routedClient({
        classify: () => '{"study_design": "cross_sectional", "confidence": 0.6}',
        assess: () => Promise.reject(new Error("timeout")),
      });
      const result = await new QualityAssessor(llm).assess(makeItem(), 3);

      expect(result).toMatchObject({
        designLabel: "cross_sectional",
        qualityValue: 0.5,
        assessmentTier: 2,
      });
      expect(result.qualityScore).toBeUndefined();
    });

    it("should cap direct scores at 10", async () => {
      const llm = routedClient({
        classify: () => '{"study_design": "rct", "confidence": 0.8}',
        assess: () => '{"quality_score": 14}',
      });
      const result = await new QualityAssessor(llm).assess(makeItem(), 3);

      expect(result.qualityValue).toBe(1);
      expect(result.qualityScore).toBe(10);
    });
  });
});
