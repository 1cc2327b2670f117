/**
 * SQLite adapter
 *
 * Embeddings are Float32 BLOBs; similarity search loads every embedded item
 * and ranks in-process.
 */

import { decodeEmbedding, encodeEmbedding, rankBySimilarity } from "../embeddings";
import { logger } from "../logger";
import type { SimilarItem } from "../model";
import type { DatabaseClient } from "./driver";
import { nowTimestamp } from "./driver";
import { SQLITE_SCHEMA } from "./schema-sqlite";
import { SqlRecordStore } from "./store";

export class SqliteRecordStore extends SqlRecordStore {
  protected readonly now = nowTimestamp("sqlite");
  protected readonly embeddingPlaceholder = "?";

  constructor(client: DatabaseClient) {
    super(client);
  }

  protected embeddingColumn(alias: string): string {
    return `${alias}.embedding`;
  }

  protected encodeEmbedding(embedding: number[]): Buffer {
    return encodeEmbedding(embedding);
  }

  protected decodeEmbedding(raw: unknown): number[] | null {
    return Buffer.isBuffer(raw) && raw.length > 0 ? decodeEmbedding(raw) : null;
  }

  async initialize(): Promise<void> {
    try {
      await this.client.exec(SQLITE_SCHEMA);
      logger.info("SQLite schema initialized successfully");
    } catch (error) {
      logger.error("Failed to initialize SQLite database schema", error);
      throw error;
    }
  }

  async findSimilar(queryVector: number[], limit: number, threshold: number): Promise<SimilarItem[]> {
    const result = await this.client.query(
      `SELECT ${this.itemColumns("i")} FROM items i WHERE i.embedding IS NOT NULL ORDER BY i.id ASC`
    );

    const candidates = result.rows
      .map((row) => this.toItem(row))
      .flatMap((item) => (item.embedding ? [{ candidate: item, vector: item.embedding }] : []));

    const matches = rankBySimilarity(queryVector, candidates, limit, threshold);
    logger.debug(`In-process similarity search matched ${matches.length}/${candidates.length} items`);

    return matches.map(({ candidate, similarity }) => ({ item: candidate, similarity }));
  }
}
