/**
 * Row decoding helpers shared by the store adapters
 *
 * pg returns BIGINT aggregates as strings and better-sqlite3 returns
 * INTEGER columns as numbers, so numeric columns go through toNumber.
 */

import type { DeliveryOutcome, DeliveryRecord, Item, Score } from "../model";

export type Row = Record<string, unknown>;

export function toNumber(value: unknown, fallback = 0): number {
  if (typeof value === "number") {
    return value;
  }
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isNaN(parsed) ? fallback : parsed;
  }
  if (typeof value === "bigint") {
    return Number(value);
  }
  return fallback;
}

export function toText(value: unknown): string {
  return typeof value === "string" ? value : "";
}

export function toNullableText(value: unknown): string | null {
  return typeof value === "string" ? value : null;
}

export function parseStringArray(value: unknown): string[] {
  if (typeof value !== "string" || value === "") {
    return [];
  }
  try {
    const parsed: unknown = JSON.parse(value);
    return Array.isArray(parsed) ? parsed.filter((v): v is string => typeof v === "string") : [];
  } catch {
    return [];
  }
}

export function parseNumberArray(value: unknown): number[] {
  if (typeof value !== "string" || value === "") {
    return [];
  }
  try {
    const parsed: unknown = JSON.parse(value);
    return Array.isArray(parsed) ? parsed.filter((v): v is number => typeof v === "number") : [];
  } catch {
    return [];
  }
}

export function parseObject(value: unknown): Record<string, unknown> {
  if (typeof value !== "string" || value === "") {
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(value);
    if (parsed !== null && typeof parsed === "object" && !Array.isArray(parsed)) {
      return { ...parsed };
    }
    return {};
  } catch {
    return {};
  }
}

/**
 * Map an items row; the adapter supplies embedding decoding
 */
export function rowToItem(row: Row, decodeEmbedding: (raw: unknown) => number[] | null): Item {
  return {
    id: toNumber(row.id),
    identifier: toNullableText(row.external_id),
    title: toText(row.title),
    authors: parseStringArray(row.authors),
    abstract: toText(row.abstract),
    url: toText(row.url),
    source: toText(row.source),
    publishedDate: toNullableText(row.published_date),
    categories: parseStringArray(row.categories),
    metadata: parseObject(row.metadata),
    embedding: row.embedding === null || row.embedding === undefined ? null : decodeEmbedding(row.embedding),
    ingestedAt: toNumber(row.ingested_at),
  };
}

export function rowToScore(row: Row): Score {
  return {
    itemId: toNumber(row.item_id),
    profileId: toNumber(row.profile_id),
    relevance: toNumber(row.relevance),
    quality: toNumber(row.quality),
    combined: toNumber(row.combined),
    summary: toText(row.summary),
    designLabel: toText(row.design_label),
    tierLabel: toText(row.tier_label),
    matchedTags: parseStringArray(row.matched_tags),
    detail: parseObject(row.detail),
    scoredAt: toNumber(row.scored_at),
  };
}

const OUTCOMES: DeliveryOutcome[] = ["delivered", "printed", "failed"];

export function rowToDelivery(row: Row): DeliveryRecord {
  const outcome = OUTCOMES.find((o) => o === row.outcome) ?? "failed";
  return {
    id: toNumber(row.id),
    profileId: toNumber(row.profile_id),
    itemIds: parseNumberArray(row.item_ids),
    outcome,
    createdAt: toNumber(row.created_at),
  };
}
