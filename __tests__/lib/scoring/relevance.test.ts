import { describe, it, expect } from "vitest";
import { KeywordRelevanceScorer, keywordRelevance } from "../../../src/lib/scoring/relevance";
import type { Item, Profile } from "../../../src/lib/model";

function makeItem(title: string, abstract = ""): Item {
  return {
    id: 1,
    identifier: "10.1101/kw",
    title,
    authors: [],
    abstract,
    url: "",
    source: "medrxiv",
    publishedDate: null,
    categories: [],
    metadata: {},
    embedding: null,
    ingestedAt: 0,
  };
}

function makeProfile(interests: string[]): Profile {
  return { id: 1, name: "Reader", email: "reader@example.com", interests, minRelevance: 0.3, minQuality: 0.2 };
}

describe("keywordRelevance", () => {
  it("should score an exact phrase in the title above 0.5", () => {
    const score = keywordRelevance("A Cancer Immunotherapy Trial", "", ["cancer immunotherapy"]);
    expect(score).toBe(1);
  });

  it("should return 0 without interests", () => {
    expect(keywordRelevance("A Cancer Immunotherapy Trial", "Some abstract", [])).toBe(0);
  });

  it("should weight an abstract match at a third of a title match", () => {
    expect(keywordRelevance("Unrelated title", "Outcomes of sepsis in adults", ["sepsis"])).toBeCloseTo(1 / 3, 10);
  });

  it("should average partial token overlap and exact matches across interests", () => {
    // "cancer immunotherapy": half the tokens in the title → 0.5 * 3 * 0.6 / 3 = 0.3
    // "sepsis": exact phrase in the abstract → 1 / 3
    const score = keywordRelevance("Immunotherapy outcomes", "We studied sepsis in adults.", [
      "cancer immunotherapy",
      "sepsis",
    ]);
    expect(score).toBeCloseTo((0.3 + 1 / 3) / 2, 10);
  });

  it("should count interests without tokens toward the mean", () => {
    expect(keywordRelevance("Unrelated title", "sepsis", ["", "sepsis"])).toBeCloseTo(1 / 6, 10);
  });

  it("should keep Greek letters as tokens", () => {
    // {α, synuclein, aggregation}: two of three tokens in the title
    expect(keywordRelevance("Synuclein aggregation in neurons", "", ["α-synuclein aggregation"])).toBeCloseTo(0.4, 10);
  });

  it("should return 0 when nothing matches", () => {
    expect(keywordRelevance("Heart failure registry", "Cardiology outcomes", ["sepsis"])).toBe(0);
  });
});

describe("KeywordRelevanceScorer", () => {
  it("should score items against the profile interests", async () => {
    const scorer = new KeywordRelevanceScorer();
    const result = await scorer.score(makeItem("A Cancer Immunotherapy Trial"), makeProfile(["cancer immunotherapy"]));

    expect(result).toEqual({
      relevance: 1,
      summary: "",
      rationale: "",
      keyFindings: [],
      matchedTags: [],
    });
  });

  it("should not produce embeddings", async () => {
    expect(await new KeywordRelevanceScorer().embed()).toBeNull();
  });
});
