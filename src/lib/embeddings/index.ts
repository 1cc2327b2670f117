/**
 * Embedding utilities and vector operations
 */

export { generateEmbedding, createEmbeddingClient } from "./generate";
export type { EmbeddingClient } from "./generate";

/**
 * Cosine similarity: dot(a, b) / (|a| * |b|)
 * Returns 0 when either vector has zero magnitude.
 */
export function cosineSimilarity(vecA: number[], vecB: number[]): number {
  if (vecA.length !== vecB.length) {
    throw new Error(`Vector dimensions must match: ${vecA.length} vs ${vecB.length}`);
  }

  let dotProduct = 0;
  let magnitudeA = 0;
  let magnitudeB = 0;

  for (let i = 0; i < vecA.length; i++) {
    dotProduct += vecA[i] * vecB[i];
    magnitudeA += vecA[i] * vecA[i];
    magnitudeB += vecB[i] * vecB[i];
  }

  magnitudeA = Math.sqrt(magnitudeA);
  magnitudeB = Math.sqrt(magnitudeB);

  if (magnitudeA === 0 || magnitudeB === 0) {
    return 0;
  }

  return dotProduct / (magnitudeA * magnitudeB);
}

export interface SimilarityMatch<T> {
  candidate: T;
  similarity: number;
}

/**
 * Brute-force nearest neighbours by cosine similarity
 *
 * Candidates whose vector dimension differs from the query are skipped.
 * Ties are broken by the order of `candidates`.
 */
export function rankBySimilarity<T>(
  queryVector: number[],
  candidates: Array<{ candidate: T; vector: number[] }>,
  limit: number,
  threshold: number
): SimilarityMatch<T>[] {
  const matches: SimilarityMatch<T>[] = [];

  for (const { candidate, vector } of candidates) {
    if (vector.length !== queryVector.length) {
      continue;
    }
    const similarity = cosineSimilarity(queryVector, vector);
    if (similarity >= threshold) {
      matches.push({ candidate, similarity });
    }
  }

  // Array.prototype.sort is stable, so equal scores keep candidate order
  return matches.sort((a, b) => b.similarity - a.similarity).slice(0, Math.max(0, limit));
}

/**
 * Encode embedding vector to Float32 binary for BLOB storage
 */
export function encodeEmbedding(embedding: number[]): Buffer {
  const float32Array = new Float32Array(embedding);
  return Buffer.from(float32Array.buffer);
}

/**
 * Decode embedding vector from BLOB storage
 */
export function decodeEmbedding(buffer: Buffer): number[] {
  if (buffer.length === 0) {
    return [];
  }
  // Copy first: a Buffer may sit at an offset that is not 4-byte aligned
  const bytes = new Uint8Array(buffer.length);
  bytes.set(buffer);
  return Array.from(new Float32Array(bytes.buffer, 0, Math.floor(buffer.length / 4)));
}

/**
 * Format a vector as a pgvector literal: "[0.1,0.2,...]"
 */
export function toVectorLiteral(embedding: number[]): string {
  return `[${embedding.join(",")}]`;
}

/**
 * Parse a pgvector text representation back into numbers
 */
export function parseVectorLiteral(text: string): number[] {
  const parsed: unknown = JSON.parse(text);
  if (!Array.isArray(parsed) || !parsed.every((v) => typeof v === "number")) {
    throw new Error("Invalid vector literal");
  }
  return parsed;
}
