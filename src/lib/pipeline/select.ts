/**
 * Delivery selection
 * Pick the best-scoring items a profile has not yet received
 */

import type { RecordStore } from "../db/store";
import { logger } from "../logger";
import type { DeliveryOutcome, DeliveryRecord, DigestEntry, Profile, ScoredItem } from "../model";

export interface SelectionOptions {
  minRelevance?: number;
  minQuality?: number;
  limit?: number;
  excludeDelivered?: boolean;
}

/**
 * Candidates over both thresholds, best combined score first
 *
 * Items from any earlier delivery record of the profile are removed before
 * the limit is applied. Thresholds default to the profile's own.
 */
export async function selectForDelivery(
  store: RecordStore,
  profile: Profile,
  options: SelectionOptions = {}
): Promise<ScoredItem[]> {
  const {
    minRelevance = profile.minRelevance,
    minQuality = profile.minQuality,
    limit = 20,
    excludeDelivered = true,
  } = options;

  if (limit <= 0) {
    return [];
  }

  const selected = await store.listCandidates({
    profileId: profile.id,
    minRelevance,
    minQuality,
    excludeDelivered,
    limit,
  });

  logger.info(`[SELECT] Selected ${selected.length} items for profile ${profile.id}`, {
    minRelevance,
    minQuality,
    limit,
    excludeDelivered,
  });
  return selected;
}

/**
 * Record one delivery attempt; its items are excluded from later selections
 */
export async function recordDelivery(
  store: RecordStore,
  profile: Profile,
  itemIds: number[],
  outcome: DeliveryOutcome
): Promise<DeliveryRecord> {
  if (itemIds.length === 0) {
    throw new Error("Refusing to record a delivery with no items");
  }
  return store.insertDelivery(profile.id, itemIds, outcome);
}

export function toDigestEntry({ item, score }: ScoredItem): DigestEntry {
  return {
    title: item.title,
    url: item.url,
    authors: item.authors,
    publishedDate: item.publishedDate,
    source: item.source,
    summary: score.summary || item.abstract,
    relevance: score.relevance,
    tierLabel: score.tierLabel,
    designLabel: score.designLabel,
  };
}
