/**
 * Core data models for the preprint digest
 */

/**
 * Normalized record handed over by a fetcher
 */
export interface NormalizedRecord {
  identifier: string | null; // DOI or source-specific id
  title: string;
  authors: string[];
  abstract: string;
  url: string;
  source: string; // "medrxiv" | "biorxiv" | "europepmc" | ...
  publishedDate: string | null; // YYYY-MM-DD
  categories: string[];
  metadata: Record<string, unknown>;
}

export interface Item extends NormalizedRecord {
  id: number;
  embedding: number[] | null;
  ingestedAt: number; // Unix timestamp (seconds)
}

export type StudyDesign =
  | "systematic_review"
  | "meta_analysis"
  | "rct"
  | "cohort"
  | "case_control"
  | "cross_sectional"
  | "case_series"
  | "case_report"
  | "narrative_review"
  | "editorial"
  | "unclassified";

export type QualityTier =
  | "TIER_5_SYNTHESIS"
  | "TIER_4_EXPERIMENTAL"
  | "TIER_3_CONTROLLED"
  | "TIER_2_OBSERVATIONAL"
  | "TIER_1_ANECDOTAL"
  | "UNCLASSIFIED";

export type AssessmentTier = 1 | 2 | 3;

export interface Profile {
  id: number;
  name: string;
  email: string;
  interests: string[];
  minRelevance: number;
  minQuality: number;
}

export type ProfileInput = Omit<Profile, "id">;

export interface RelevanceResult {
  relevance: number; // 0–1
  summary: string;
  rationale: string;
  keyFindings: string[];
  matchedTags: string[];
  error?: boolean; // Set when the delegated response could not be parsed
}

export interface QualityResult {
  designLabel: StudyDesign;
  tierLabel: QualityTier;
  qualityValue: number; // 0–1
  confidence: number; // 0–1
  assessmentTier: AssessmentTier;
  qualityScore?: number; // 0–10, direct score from a detailed assessment
  detail: Record<string, unknown>;
}

export interface Score {
  itemId: number;
  profileId: number;
  relevance: number;
  quality: number;
  combined: number;
  summary: string;
  designLabel: string;
  tierLabel: string;
  matchedTags: string[];
  detail: Record<string, unknown>;
  scoredAt: number;
}

export type ScoreInput = Omit<Score, "combined" | "scoredAt">;

export interface ScoredItem {
  item: Item;
  score: Score;
}

export type DeliveryOutcome = "delivered" | "printed" | "failed";

export interface DeliveryRecord {
  id: number;
  profileId: number;
  itemIds: number[];
  outcome: DeliveryOutcome;
  createdAt: number;
}

export interface SimilarItem {
  item: Item;
  similarity: number;
}

/**
 * What the digest renderer consumes
 */
export interface DigestEntry {
  title: string;
  url: string;
  authors: string[];
  publishedDate: string | null;
  source: string;
  summary: string;
  relevance: number;
  tierLabel: string;
  designLabel: string;
}
