/**
 * Scorer construction from settings
 */

import type { Settings } from "../../config/settings";
import { createEmbeddingClient } from "../embeddings";
import { createOpenAIClient } from "../llm/client";
import { logger } from "../logger";
import { QualityAssessor } from "./quality";
import { KeywordRelevanceScorer, type RelevanceScorer } from "./relevance";
import { SemanticRelevanceScorer } from "./relevanceAgent";

export { combinedScore, clamp01, RELEVANCE_WEIGHT, QUALITY_WEIGHT } from "./combine";
export { KeywordRelevanceScorer, keywordRelevance } from "./relevance";
export type { RelevanceScorer, ScorerName } from "./relevance";
export { SemanticRelevanceScorer } from "./relevanceAgent";
export { QualityAssessor, extractPublicationTypes, classifyPublicationTypes } from "./quality";

type ScoringSettings = Pick<Settings, "scorer" | "openaiApiKey" | "llmModel" | "embeddingModel" | "qualityMaxTier">;

/**
 * The scorer is chosen once per process
 */
export function createRelevanceScorer(settings: ScoringSettings): RelevanceScorer {
  if (settings.scorer === "keyword") {
    return new KeywordRelevanceScorer();
  }
  if (!settings.openaiApiKey) {
    throw new Error("SCORER=agent requires OPENAI_API_KEY");
  }
  return new SemanticRelevanceScorer(
    createOpenAIClient(settings.openaiApiKey, settings.llmModel),
    createEmbeddingClient(settings.openaiApiKey, settings.embeddingModel)
  );
}

export function createQualityAssessor(settings: ScoringSettings): QualityAssessor {
  if (settings.qualityMaxTier > 1 && !settings.openaiApiKey) {
    logger.warn(`QUALITY_MAX_TIER=${settings.qualityMaxTier} without OPENAI_API_KEY, using tier 1 only`);
    return new QualityAssessor();
  }
  return new QualityAssessor(
    settings.openaiApiKey ? createOpenAIClient(settings.openaiApiKey, settings.llmModel) : null
  );
}
