/**
 * Embedding generation with OpenAI text-embedding-3-small
 */

import OpenAI from "openai";
import { logger } from "../logger";

export interface EmbeddingClient {
  embed(text: string): Promise<number[]>;
}

// OpenAI caps input at 8192 tokens; truncate by characters to stay well below
const MAX_INPUT_CHARS = 8000;

/**
 * Create an embedding client backed by the OpenAI embeddings API
 */
export function createEmbeddingClient(
  apiKey: string,
  model: string = "text-embedding-3-small"
): EmbeddingClient {
  let client: OpenAI | null = null;

  return {
    async embed(text: string): Promise<number[]> {
      if (!client) {
        client = new OpenAI({ apiKey });
      }
      const response = await client.embeddings.create({
        model,
        input: text.substring(0, MAX_INPUT_CHARS),
      });
      return response.data[0]?.embedding ?? [];
    },
  };
}

/**
 * Generate an embedding, returning null for empty input or on API failure
 */
export async function generateEmbedding(
  client: EmbeddingClient,
  text: string
): Promise<number[] | null> {
  if (text.trim().length === 0) {
    logger.warn("Attempted to generate embedding for empty text");
    return null;
  }

  try {
    const embedding = await client.embed(text);
    if (embedding.length === 0) {
      return null;
    }
    logger.debug(`Generated embedding: ${embedding.length} dimensions`);
    return embedding;
  } catch (error) {
    logger.warn("Embedding generation failed", {
      error: error instanceof Error ? error.message : String(error),
    });
    return null;
  }
}
