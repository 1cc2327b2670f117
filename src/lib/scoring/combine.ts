/**
 * Combined score weighting
 *
 * Relevance to the reader's interests outweighs evidentiary quality.
 */

export const RELEVANCE_WEIGHT = 0.6;
export const QUALITY_WEIGHT = 0.4;

export function clamp01(value: number): number {
  if (Number.isNaN(value)) {
    return 0;
  }
  return Math.min(1, Math.max(0, value));
}

export function combinedScore(relevance: number, quality: number): number {
  return RELEVANCE_WEIGHT * relevance + QUALITY_WEIGHT * quality;
}
