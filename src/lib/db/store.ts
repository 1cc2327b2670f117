/**
 * Record store: the storage abstraction the pipeline talks to
 *
 * Two adapters implement it (SQLite and PostgreSQL). Everything that is
 * plain SQL lives in SqlRecordStore; the adapters only supply embedding
 * encoding, the timestamp expression, schema setup and similarity search.
 */

import { logger } from "../logger";
import type {
  DeliveryOutcome,
  DeliveryRecord,
  Item,
  NormalizedRecord,
  Profile,
  ProfileInput,
  Score,
  ScoredItem,
  ScoreInput,
  SimilarItem,
} from "../model";
import { combinedScore } from "../scoring/combine";
import type { DatabaseClient, Statement } from "./driver";
import { rowToDelivery, rowToItem, rowToScore, toNumber, type Row } from "./rows";

export interface CandidateQuery {
  profileId: number;
  minRelevance: number;
  minQuality: number;
  /** Leave out every item in an earlier delivery record of the profile */
  excludeDelivered: boolean;
  limit: number;
}

export interface RecordStore {
  initialize(): Promise<void>;

  upsertItem(record: NormalizedRecord): Promise<number>;
  exists(identifier: string): Promise<boolean>;
  getItem(id: number): Promise<Item | null>;
  getItemByIdentifier(identifier: string): Promise<Item | null>;
  listUnscored(profileId: number, limit: number): Promise<Item[]>;
  countItems(): Promise<number>;

  saveScore(input: ScoreInput): Promise<Score>;
  getScore(itemId: number, profileId: number): Promise<Score | null>;
  countScores(profileId: number): Promise<number>;

  upsertProfile(input: ProfileInput): Promise<Profile>;

  listCandidates(query: CandidateQuery): Promise<ScoredItem[]>;
  insertDelivery(profileId: number, itemIds: number[], outcome: DeliveryOutcome): Promise<DeliveryRecord>;
  listDeliveries(profileId: number): Promise<DeliveryRecord[]>;

  setTags(itemId: number, tags: string[]): Promise<void>;
  getTags(itemId: number): Promise<string[]>;

  saveEmbedding(itemId: number, embedding: number[]): Promise<void>;
  findSimilar(queryVector: number[], limit: number, threshold: number): Promise<SimilarItem[]>;

  close(): Promise<void>;
}

/**
 * Treat blank identifiers as absent so they never deduplicate
 */
export function normalizeIdentifier(identifier: string | null | undefined): string | null {
  const trimmed = identifier?.trim() ?? "";
  return trimmed === "" ? null : trimmed;
}

const ITEM_COLUMNS = [
  "id",
  "external_id",
  "title",
  "authors",
  "abstract",
  "url",
  "source",
  "published_date",
  "categories",
  "metadata",
  "ingested_at",
];

const SCORE_COLUMNS = [
  "item_id",
  "profile_id",
  "relevance",
  "quality",
  "combined",
  "summary",
  "design_label",
  "tier_label",
  "matched_tags",
  "detail",
  "scored_at",
];

export abstract class SqlRecordStore implements RecordStore {
  constructor(protected readonly client: DatabaseClient) {}

  /** SQL expression for "now" as Unix seconds */
  protected abstract readonly now: string;

  /** Placeholder used when writing an embedding value */
  protected abstract readonly embeddingPlaceholder: string;

  /** Select expression that reads the embedding column of `alias` */
  protected abstract embeddingColumn(alias: string): string;

  protected abstract encodeEmbedding(embedding: number[]): unknown;
  protected abstract decodeEmbedding(raw: unknown): number[] | null;

  abstract initialize(): Promise<void>;
  abstract findSimilar(queryVector: number[], limit: number, threshold: number): Promise<SimilarItem[]>;

  protected itemColumns(alias: string): string {
    const columns = ITEM_COLUMNS.map((column) => `${alias}.${column}`);
    columns.push(`${this.embeddingColumn(alias)} AS embedding`);
    return columns.join(", ");
  }

  protected toItem(row: Row): Item {
    return rowToItem(row, (raw) => this.decodeEmbedding(raw));
  }

  async upsertItem(record: NormalizedRecord): Promise<number> {
    const identifier = normalizeIdentifier(record.identifier);
    const params = [
      identifier,
      record.title,
      JSON.stringify(record.authors),
      record.abstract,
      record.url,
      record.source,
      record.publishedDate,
      JSON.stringify(record.categories),
      JSON.stringify(record.metadata),
    ];

    const insert = `
      INSERT INTO items
      (external_id, title, authors, abstract, url, source, published_date, categories, metadata, ingested_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ${this.now}, ${this.now})`;

    // A duplicate identifier takes the update path; id, identifier, source
    // and ingestion time are left as they were
    const sql = identifier === null
      ? `${insert} RETURNING id`
      : `${insert}
      ON CONFLICT (external_id) DO UPDATE SET
        title = excluded.title,
        authors = excluded.authors,
        abstract = excluded.abstract,
        url = excluded.url,
        categories = excluded.categories,
        metadata = excluded.metadata,
        updated_at = ${this.now}
      RETURNING id`;

    const result = await this.client.query(sql, params);
    const row = result.rows[0];
    if (!row) {
      throw new Error(`Upsert returned no id for "${record.title}"`);
    }
    return toNumber(row.id);
  }

  async exists(identifier: string): Promise<boolean> {
    const normalized = normalizeIdentifier(identifier);
    if (normalized === null) {
      return false;
    }
    const result = await this.client.query("SELECT 1 AS found FROM items WHERE external_id = ? LIMIT 1", [
      normalized,
    ]);
    return result.rows.length > 0;
  }

  async getItem(id: number): Promise<Item | null> {
    const result = await this.client.query(`SELECT ${this.itemColumns("i")} FROM items i WHERE i.id = ?`, [id]);
    const row = result.rows[0];
    return row ? this.toItem(row) : null;
  }

  async getItemByIdentifier(identifier: string): Promise<Item | null> {
    const normalized = normalizeIdentifier(identifier);
    if (normalized === null) {
      return null;
    }
    const result = await this.client.query(
      `SELECT ${this.itemColumns("i")} FROM items i WHERE i.external_id = ?`,
      [normalized]
    );
    const row = result.rows[0];
    return row ? this.toItem(row) : null;
  }

  async listUnscored(profileId: number, limit: number): Promise<Item[]> {
    const result = await this.client.query(
      `SELECT ${this.itemColumns("i")}
       FROM items i
       WHERE NOT EXISTS (
         SELECT 1 FROM scores s WHERE s.item_id = i.id AND s.profile_id = ?
       )
       ORDER BY i.ingested_at DESC, i.id DESC
       LIMIT ?`,
      [profileId, limit]
    );
    return result.rows.map((row) => this.toItem(row));
  }

  async countItems(): Promise<number> {
    const result = await this.client.query("SELECT COUNT(*) AS count FROM items");
    return toNumber(result.rows[0]?.count);
  }

  async saveScore(input: ScoreInput): Promise<Score> {
    const combined = combinedScore(input.relevance, input.quality);

    const result = await this.client.query(
      `INSERT INTO scores
       (item_id, profile_id, relevance, quality, combined, summary, design_label, tier_label, matched_tags, detail, scored_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ${this.now})
       ON CONFLICT (item_id, profile_id) DO UPDATE SET
         relevance = excluded.relevance,
         quality = excluded.quality,
         combined = excluded.combined,
         summary = excluded.summary,
         design_label = excluded.design_label,
         tier_label = excluded.tier_label,
         matched_tags = excluded.matched_tags,
         detail = excluded.detail,
         scored_at = excluded.scored_at
       RETURNING ${SCORE_COLUMNS.join(", ")}`,
      [
        input.itemId,
        input.profileId,
        input.relevance,
        input.quality,
        combined,
        input.summary,
        input.designLabel,
        input.tierLabel,
        JSON.stringify(input.matchedTags),
        JSON.stringify(input.detail),
      ]
    );

    const row = result.rows[0];
    if (!row) {
      throw new Error(`Score write for item ${input.itemId} returned no row`);
    }
    return rowToScore(row);
  }

  async getScore(itemId: number, profileId: number): Promise<Score | null> {
    const result = await this.client.query(
      `SELECT ${SCORE_COLUMNS.join(", ")} FROM scores WHERE item_id = ? AND profile_id = ?`,
      [itemId, profileId]
    );
    const row = result.rows[0];
    return row ? rowToScore(row) : null;
  }

  async countScores(profileId: number): Promise<number> {
    const result = await this.client.query("SELECT COUNT(*) AS count FROM scores WHERE profile_id = ?", [
      profileId,
    ]);
    return toNumber(result.rows[0]?.count);
  }

  async upsertProfile(input: ProfileInput): Promise<Profile> {
    const result = await this.client.query(
      `INSERT INTO profiles (email, name, interests, min_relevance, min_quality, updated_at)
       VALUES (?, ?, ?, ?, ?, ${this.now})
       ON CONFLICT (email) DO UPDATE SET
         name = excluded.name,
         interests = excluded.interests,
         min_relevance = excluded.min_relevance,
         min_quality = excluded.min_quality,
         updated_at = excluded.updated_at
       RETURNING id`,
      [input.email, input.name, JSON.stringify(input.interests), input.minRelevance, input.minQuality]
    );
    const row = result.rows[0];
    if (!row) {
      throw new Error(`Profile upsert for ${input.email} returned no id`);
    }
    return { id: toNumber(row.id), ...input };
  }

  async listCandidates(query: CandidateQuery): Promise<ScoredItem[]> {
    const exclusion = query.excludeDelivered
      ? `AND NOT EXISTS (
           SELECT 1 FROM delivery_items di
           WHERE di.profile_id = s.profile_id AND di.item_id = s.item_id
         )`
      : "";
    const scoreColumns = SCORE_COLUMNS.map((column) => `s.${column}`).join(", ");

    const result = await this.client.query(
      `SELECT ${this.itemColumns("i")}, ${scoreColumns}
       FROM scores s
       JOIN items i ON i.id = s.item_id
       WHERE s.profile_id = ?
         AND s.relevance >= ?
         AND s.quality >= ?
         ${exclusion}
       ORDER BY s.combined DESC, i.id ASC
       LIMIT ?`,
      [query.profileId, query.minRelevance, query.minQuality, query.limit]
    );

    return result.rows.map((row) => ({
      item: this.toItem(row),
      score: rowToScore(row),
    }));
  }

  async insertDelivery(
    profileId: number,
    itemIds: number[],
    outcome: DeliveryOutcome
  ): Promise<DeliveryRecord> {
    const uniqueIds = [...new Set(itemIds)];
    const result = await this.client.query(
      `INSERT INTO delivery_records (profile_id, item_ids, outcome, created_at)
       VALUES (?, ?, ?, ${this.now})
       RETURNING id, profile_id, item_ids, outcome, created_at`,
      [profileId, JSON.stringify(uniqueIds), outcome]
    );
    const row = result.rows[0];
    if (!row) {
      throw new Error(`Delivery record for profile ${profileId} returned no row`);
    }
    const record = rowToDelivery(row);

    const statements: Statement[] = uniqueIds.map((itemId) => ({
      sql: "INSERT INTO delivery_items (delivery_id, profile_id, item_id) VALUES (?, ?, ?)",
      params: [record.id, profileId, itemId],
    }));
    try {
      await this.client.batch(statements);
    } catch (error) {
      // A record without its items would leave them selectable
      await this.client.run("DELETE FROM delivery_records WHERE id = ?", [record.id]);
      throw error;
    }
    return record;
  }

  async listDeliveries(profileId: number): Promise<DeliveryRecord[]> {
    const result = await this.client.query(
      `SELECT id, profile_id, item_ids, outcome, created_at
       FROM delivery_records
       WHERE profile_id = ?
       ORDER BY id ASC`,
      [profileId]
    );
    return result.rows.map(rowToDelivery);
  }

  async setTags(itemId: number, tags: string[]): Promise<void> {
    const unique = [...new Set(tags.map((tag) => tag.trim()).filter((tag) => tag !== ""))];
    const statements: Statement[] = [{ sql: "DELETE FROM item_tags WHERE item_id = ?", params: [itemId] }];
    for (const tag of unique) {
      statements.push({ sql: "INSERT INTO item_tags (item_id, tag) VALUES (?, ?)", params: [itemId, tag] });
    }
    await this.client.batch(statements);
    logger.debug(`Set ${unique.length} tags for item ${itemId}`);
  }

  async getTags(itemId: number): Promise<string[]> {
    const result = await this.client.query("SELECT tag FROM item_tags WHERE item_id = ? ORDER BY tag ASC", [
      itemId,
    ]);
    return result.rows.map((row) => String(row.tag));
  }

  async saveEmbedding(itemId: number, embedding: number[]): Promise<void> {
    await this.client.run(`UPDATE items SET embedding = ${this.embeddingPlaceholder} WHERE id = ?`, [
      this.encodeEmbedding(embedding),
      itemId,
    ]);
  }

  async close(): Promise<void> {
    await this.client.close();
  }
}
