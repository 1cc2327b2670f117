/**
 * Score items for a profile and persist each result as soon as it is ready
 */

import type { RecordStore } from "../db/store";
import { errorMessage, logger } from "../logger";
import type { AssessmentTier, Item, Profile, Score } from "../model";
import type { QualityAssessor } from "../scoring/quality";
import type { RelevanceScorer } from "../scoring/relevance";
import { runPool } from "./pool";

export interface ScoringDeps {
  store: RecordStore;
  relevance: RelevanceScorer;
  quality: QualityAssessor;
}

export interface ScoreBatchOptions {
  concurrency?: number;
  maxTier?: AssessmentTier;
  /** 1-based count of completed items, in completion order */
  onProgress?: (completed: number, total: number) => void;
  onItemScored?: (itemId: number) => void;
}

function embeddingText(item: Item): string {
  return item.abstract ? `${item.title}\n\n${item.abstract}` : item.title;
}

async function scoreItem(
  deps: ScoringDeps,
  item: Item,
  profile: Profile,
  maxTier: AssessmentTier
): Promise<Score> {
  const relevance = await deps.relevance.score(item, profile);
  const quality = await deps.quality.assess(item, maxTier);

  if (!item.embedding) {
    const embedding = await deps.relevance.embed(embeddingText(item));
    if (embedding) {
      await deps.store.saveEmbedding(item.id, embedding);
    }
  }

  if (relevance.matchedTags.length > 0) {
    await deps.store.setTags(item.id, relevance.matchedTags);
  }

  // Written last: an item counts as scored only once its score row exists
  return deps.store.saveScore({
    itemId: item.id,
    profileId: profile.id,
    relevance: relevance.relevance,
    quality: quality.qualityValue,
    summary: relevance.summary,
    designLabel: quality.designLabel,
    tierLabel: quality.tierLabel,
    matchedTags: relevance.matchedTags,
    detail: {
      rationale: relevance.rationale,
      keyFindings: relevance.keyFindings,
      relevanceError: relevance.error ?? false,
      quality: {
        confidence: quality.confidence,
        assessmentTier: quality.assessmentTier,
        qualityScore: quality.qualityScore ?? null,
        ...quality.detail,
      },
    },
  });
}

/**
 * Score a batch of items; failed items are logged and left unscored
 *
 * Returns the persisted scores in completion order.
 */
export async function scoreBatch(
  deps: ScoringDeps,
  items: Item[],
  profile: Profile,
  options: ScoreBatchOptions = {}
): Promise<Score[]> {
  const { concurrency = 1, maxTier = 1, onProgress, onItemScored } = options;
  const scores: Score[] = [];

  if (items.length === 0) {
    return scores;
  }

  logger.info(`[SCORE] Scoring ${items.length} items for profile ${profile.id}`, {
    scorer: deps.relevance.name,
    concurrency,
    maxTier,
  });

  await runPool(items, concurrency, async (item) => {
    let score: Score;
    try {
      score = await scoreItem(deps, item, profile, maxTier);
    } catch (error) {
      logger.error(`[SCORE] Failed to score item ${item.id} (${item.title.substring(0, 60)})`, error);
      return;
    }

    scores.push(score);
    try {
      onProgress?.(scores.length, items.length);
      onItemScored?.(item.id);
    } catch (error) {
      // The score is already saved; a listener failure must not stop the batch
      logger.error(`[SCORE] Progress callback failed for item ${item.id}`, error);
    }
  });

  logger.info(`[SCORE] Scored ${scores.length}/${items.length} items`);
  return scores;
}

/**
 * Score up to `limit` items that have no score for the profile yet
 */
export async function scoreUnscored(
  deps: ScoringDeps,
  profile: Profile,
  limit: number,
  options: ScoreBatchOptions = {}
): Promise<number> {
  let items: Item[];
  try {
    items = await deps.store.listUnscored(profile.id, limit);
  } catch (error) {
    throw new Error(`Could not list unscored items: ${errorMessage(error)}`);
  }
  const scores = await scoreBatch(deps, items, profile, options);
  return scores.length;
}
