/**
 * PostgreSQL schema definitions
 *
 * - pgvector for embeddings (cosine distance via <=>)
 * - Unix timestamps as INTEGER, matching the SQLite schema
 */

export const EXTENSIONS_SQL = `
CREATE EXTENSION IF NOT EXISTS vector;
`;

export const TABLES_SQL = `
CREATE TABLE IF NOT EXISTS items (
  id SERIAL PRIMARY KEY,
  external_id TEXT UNIQUE,
  title TEXT NOT NULL,
  authors TEXT NOT NULL DEFAULT '[]',
  abstract TEXT NOT NULL DEFAULT '',
  url TEXT NOT NULL DEFAULT '',
  source TEXT NOT NULL DEFAULT '',
  published_date TEXT,
  categories TEXT NOT NULL DEFAULT '[]',
  metadata TEXT NOT NULL DEFAULT '{}',
  embedding vector,
  ingested_at INTEGER NOT NULL DEFAULT EXTRACT(EPOCH FROM NOW())::INTEGER,
  updated_at INTEGER NOT NULL DEFAULT EXTRACT(EPOCH FROM NOW())::INTEGER
);

CREATE TABLE IF NOT EXISTS profiles (
  id SERIAL PRIMARY KEY,
  email TEXT NOT NULL UNIQUE,
  name TEXT NOT NULL,
  interests TEXT NOT NULL DEFAULT '[]',
  min_relevance REAL NOT NULL DEFAULT 0.3,
  min_quality REAL NOT NULL DEFAULT 0.2,
  updated_at INTEGER NOT NULL DEFAULT EXTRACT(EPOCH FROM NOW())::INTEGER
);

CREATE TABLE IF NOT EXISTS scores (
  id SERIAL PRIMARY KEY,
  item_id INTEGER NOT NULL REFERENCES items(id),
  profile_id INTEGER NOT NULL REFERENCES profiles(id),
  relevance DOUBLE PRECISION NOT NULL DEFAULT 0,
  quality DOUBLE PRECISION NOT NULL DEFAULT 0,
  combined DOUBLE PRECISION NOT NULL DEFAULT 0,
  summary TEXT NOT NULL DEFAULT '',
  design_label TEXT NOT NULL DEFAULT '',
  tier_label TEXT NOT NULL DEFAULT '',
  matched_tags TEXT NOT NULL DEFAULT '[]',
  detail TEXT NOT NULL DEFAULT '{}',
  scored_at INTEGER NOT NULL DEFAULT EXTRACT(EPOCH FROM NOW())::INTEGER,
  UNIQUE (item_id, profile_id)
);

CREATE TABLE IF NOT EXISTS delivery_records (
  id SERIAL PRIMARY KEY,
  profile_id INTEGER NOT NULL REFERENCES profiles(id),
  item_ids TEXT NOT NULL DEFAULT '[]',
  outcome TEXT NOT NULL,
  created_at INTEGER NOT NULL DEFAULT EXTRACT(EPOCH FROM NOW())::INTEGER
);

CREATE TABLE IF NOT EXISTS delivery_items (
  delivery_id INTEGER NOT NULL REFERENCES delivery_records(id),
  profile_id INTEGER NOT NULL REFERENCES profiles(id),
  item_id INTEGER NOT NULL,
  PRIMARY KEY (delivery_id, item_id)
);

CREATE TABLE IF NOT EXISTS item_tags (
  item_id INTEGER NOT NULL REFERENCES items(id),
  tag TEXT NOT NULL,
  PRIMARY KEY (item_id, tag)
);
`;

export const INDEXES_SQL = `
CREATE INDEX IF NOT EXISTS idx_items_ingested_at ON items(ingested_at);
CREATE INDEX IF NOT EXISTS idx_items_source ON items(source);
CREATE INDEX IF NOT EXISTS idx_scores_profile_combined ON scores(profile_id, combined);
CREATE INDEX IF NOT EXISTS idx_delivery_records_profile ON delivery_records(profile_id);
CREATE INDEX IF NOT EXISTS idx_delivery_items_profile_item ON delivery_items(profile_id, item_id);
`;

/**
 * Get complete PostgreSQL schema
 */
export function getPostgresSchema(): string {
  return [EXTENSIONS_SQL, TABLES_SQL, INDEXES_SQL].join("\n");
}
