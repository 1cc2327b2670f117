/**
 * PostgreSQL adapter
 *
 * Embeddings live in a pgvector column; similarity search runs in the
 * database with the cosine-distance operator (<=>), similarity = 1 - distance.
 */

import { parseVectorLiteral, toVectorLiteral } from "../embeddings";
import { logger } from "../logger";
import type { SimilarItem } from "../model";
import type { DatabaseClient } from "./driver";
import { nowTimestamp } from "./driver";
import { toNumber } from "./rows";
import { getPostgresSchema } from "./schema-postgres";
import { SqlRecordStore } from "./store";

export class PostgresRecordStore extends SqlRecordStore {
  protected readonly now = nowTimestamp("postgres");
  protected readonly embeddingPlaceholder = "?::vector";

  constructor(client: DatabaseClient) {
    super(client);
  }

  protected embeddingColumn(alias: string): string {
    return `${alias}.embedding::text`;
  }

  protected encodeEmbedding(embedding: number[]): string {
    return toVectorLiteral(embedding);
  }

  protected decodeEmbedding(raw: unknown): number[] | null {
    if (typeof raw !== "string") {
      return null;
    }
    try {
      return parseVectorLiteral(raw);
    } catch (error) {
      logger.warn("Failed to parse stored embedding", {
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  async initialize(): Promise<void> {
    try {
      await this.client.exec(getPostgresSchema());
      logger.info("PostgreSQL schema initialized successfully");
    } catch (error) {
      logger.error("Failed to initialize PostgreSQL schema", error);
      throw error;
    }
  }

  async findSimilar(queryVector: number[], limit: number, threshold: number): Promise<SimilarItem[]> {
    // Zero-magnitude vectors score 0 and other dimensions are skipped, as in
    // the in-process path; the CASE order keeps <=> off mismatched vectors
    const result = await this.client.query(
      `WITH q AS (SELECT ?::vector AS v),
       scored AS (
         SELECT ${this.itemColumns("i")},
           CASE
             WHEN vector_dims(i.embedding) <> vector_dims(q.v) THEN NULL
             WHEN vector_norm(i.embedding) = 0 OR vector_norm(q.v) = 0 THEN 0
             ELSE 1 - (i.embedding <=> q.v)
           END AS similarity
         FROM items i, q
         WHERE i.embedding IS NOT NULL
           AND vector_dims(i.embedding) = vector_dims(q.v)
       )
       SELECT * FROM scored
       WHERE similarity >= ?
       ORDER BY similarity DESC, id ASC
       LIMIT ?`,
      [toVectorLiteral(queryVector), threshold, Math.max(0, limit)]
    );

    logger.debug(`pgvector similarity search returned ${result.rows.length} results`);

    return result.rows.map((row) => ({
      item: this.toItem(row),
      similarity: toNumber(row.similarity),
    }));
  }
}
