/**
 * Relevance scoring: how well an item matches the profile's interests
 *
 * Two strategies share the RelevanceScorer interface:
 * - KeywordRelevanceScorer: phrase and token matching against title/abstract
 * - SemanticRelevanceScorer (relevanceAgent.ts): delegated to a chat model
 */

import type { Item, Profile, RelevanceResult } from "../model";
import { clamp01 } from "./combine";

export type ScorerName = "keyword" | "agent";

export interface RelevanceScorer {
  readonly name: ScorerName;
  score(item: Item, profile: Profile): Promise<RelevanceResult>;
  /**
   * Dense embedding for similarity search, or null when unsupported
   */
  embed(text: string): Promise<number[] | null>;
}

const TITLE_WEIGHT = 3;
const ABSTRACT_WEIGHT = 1;
const PARTIAL_MATCH_DISCOUNT = 0.6;

// Letters and digits of any script, so "α-synuclein" yields "α" and "synuclein"
function tokenize(text: string): Set<string> {
  return new Set(text.match(/[\p{L}\p{N}_]+/gu) ?? []);
}

function overlapRatio(phraseTokens: Set<string>, textTokens: Set<string>): number {
  let shared = 0;
  for (const token of phraseTokens) {
    if (textTokens.has(token)) {
      shared++;
    }
  }
  return shared / phraseTokens.size;
}

/**
 * Mean per-interest contribution in [0, 1]
 *
 * Each interest takes the strongest of: exact phrase in title (3), exact
 * phrase in abstract (1), and token overlap with title/abstract at 0.6 of
 * those weights; the result is divided by the title weight.
 */
export function keywordRelevance(title: string, abstract: string, interests: string[]): number {
  if (interests.length === 0) {
    return 0;
  }

  const titleLower = title.toLowerCase();
  const abstractLower = abstract.toLowerCase();
  const titleTokens = tokenize(titleLower);
  const abstractTokens = tokenize(abstractLower);

  let total = 0;
  for (const interest of interests) {
    const phrase = interest.toLowerCase().trim();
    const phraseTokens = tokenize(phrase);
    if (phraseTokens.size === 0) {
      continue;
    }

    const signals = [
      titleLower.includes(phrase) ? TITLE_WEIGHT : 0,
      abstractLower.includes(phrase) ? ABSTRACT_WEIGHT : 0,
      overlapRatio(phraseTokens, titleTokens) * TITLE_WEIGHT * PARTIAL_MATCH_DISCOUNT,
      overlapRatio(phraseTokens, abstractTokens) * ABSTRACT_WEIGHT * PARTIAL_MATCH_DISCOUNT,
    ];

    total += clamp01(Math.max(...signals) / TITLE_WEIGHT);
  }

  return clamp01(total / interests.length);
}

export class KeywordRelevanceScorer implements RelevanceScorer {
  readonly name = "keyword" as const;

  async score(item: Item, profile: Profile): Promise<RelevanceResult> {
    return {
      relevance: keywordRelevance(item.title, item.abstract, profile.interests),
      summary: "",
      rationale: "",
      keyFindings: [],
      matchedTags: [],
    };
  }

  async embed(): Promise<number[] | null> {
    return null;
  }
}
