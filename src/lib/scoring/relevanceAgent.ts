/**
 * Delegated relevance scoring and summary generation
 */

import { z } from "zod";
import { generateEmbedding, type EmbeddingClient } from "../embeddings";
import type { LLMClient } from "../llm/client";
import { parseJsonResponse } from "../llm/json";
import { logger } from "../logger";
import type { Item, Profile, RelevanceResult } from "../model";
import { clamp01 } from "./combine";
import type { RelevanceScorer } from "./relevance";

const SYSTEM_PROMPT = `You are a biomedical research assistant who screens new preprints and articles for a reader.

Given a paper and the reader's research interests, judge how relevant the paper is to those interests and summarise it.

Return JSON with exactly this structure:
{
  "relevance_score": <number 0.0-1.0>,
  "summary": "<2-3 sentence plain-language summary>",
  "relevance_rationale": "<one sentence explaining the score>",
  "key_findings": ["<finding>", ...],
  "matched_tags": ["<interest the paper matches>", ...]
}

0.0 means unrelated, 0.5 tangentially related, 0.8+ directly addresses an interest.`;

// A number, or a plain decimal in a string; null and booleans are rejected
const ScoreValueSchema = z.union([
  z.number().finite(),
  z
    .string()
    .trim()
    .regex(/^-?\d+(\.\d+)?$/)
    .transform(Number),
]);

const RelevanceResponseSchema = z.object({
  relevance_score: ScoreValueSchema,
  summary: z.string().default(""),
  relevance_rationale: z.string().default(""),
  key_findings: z.array(z.string()).default([]),
  matched_tags: z.array(z.string()).default([]),
});

function buildPrompt(item: Item, interests: string[]): string {
  return `Reader interests: ${interests.join("; ") || "N/A"}

Title: ${item.title}
Categories: ${item.categories.join("; ") || "N/A"}
Abstract: ${item.abstract || "N/A"}`;
}

function parseErrorResult(): RelevanceResult {
  return {
    relevance: 0,
    summary: "",
    rationale: "Parse error",
    keyFindings: [],
    matchedTags: [],
    error: true,
  };
}

export class SemanticRelevanceScorer implements RelevanceScorer {
  readonly name = "agent" as const;

  constructor(
    private readonly llm: LLMClient,
    private readonly embeddings: EmbeddingClient | null = null
  ) {}

  /**
   * A malformed response degrades to relevance 0 with an error marker;
   * a failed call rejects so the caller can leave the item for a later run.
   */
  async score(item: Item, profile: Profile): Promise<RelevanceResult> {
    const response = await this.llm.complete(
      [
        { role: "system", content: SYSTEM_PROMPT },
        { role: "user", content: buildPrompt(item, profile.interests) },
      ],
      { json: true }
    );

    const parsed = parseJsonResponse(response, RelevanceResponseSchema);
    if (!parsed) {
      logger.warn(`Failed to parse relevance response for: ${item.title.substring(0, 80)}`);
      return parseErrorResult();
    }

    return {
      relevance: clamp01(parsed.relevance_score),
      summary: parsed.summary,
      rationale: parsed.relevance_rationale,
      keyFindings: parsed.key_findings,
      matchedTags: parsed.matched_tags,
    };
  }

  async embed(text: string): Promise<number[] | null> {
    if (!this.embeddings) {
      return null;
    }
    return generateEmbedding(this.embeddings, text);
  }
}
