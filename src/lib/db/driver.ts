/**
 * Database driver abstraction for SQLite (default) and PostgreSQL
 *
 * - better-sqlite3 when DATABASE_URL is unset (file under .data/ or ":memory:")
 * - pg when DATABASE_URL starts with "postgres"
 *
 * Queries are written with SQLite-style ? placeholders; the Postgres client
 * rewrites them to $1, $2, ...
 */

import { logger } from "../logger";

export type DatabaseDriver = "sqlite" | "postgres";

export interface DbResult {
  rows: Record<string, unknown>[];
  rowCount: number;
}

export interface Statement {
  sql: string;
  params?: unknown[];
}

export interface DatabaseClient {
  driver: DatabaseDriver;
  query(sql: string, params?: unknown[]): Promise<DbResult>;
  run(sql: string, params?: unknown[]): Promise<{ changes: number }>;
  exec(sql: string): Promise<void>;
  /**
   * Run all statements in one transaction (commit or rollback as a unit)
   */
  batch(statements: Statement[]): Promise<void>;
  close(): Promise<void>;
}

export interface DriverOptions {
  databaseUrl?: string;
  sqlitePath?: string;
}

/**
 * Detect which database driver to use for a connection string
 */
export function detectDriver(databaseUrl?: string): DatabaseDriver {
  if (databaseUrl?.startsWith("postgres")) {
    return "postgres";
  }
  return "sqlite";
}

/**
 * Create a database client for the configured backend
 */
export async function createDbClient(options: DriverOptions = {}): Promise<DatabaseClient> {
  const driver = detectDriver(options.databaseUrl);

  const client =
    driver === "postgres"
      ? await createPostgresClient(options.databaseUrl ?? "")
      : await createSqliteClient(options.sqlitePath ?? ".data/digest.db");

  logger.info(`Database initialized with ${driver} driver`);
  return client;
}

/**
 * Create SQLite client
 */
export async function createSqliteClient(dbPath: string): Promise<DatabaseClient> {
  const Database = (await import("better-sqlite3")).default;

  if (dbPath !== ":memory:") {
    const path = await import("path");
    const fs = await import("fs");
    const dataDir = path.dirname(path.resolve(dbPath));
    if (!fs.existsSync(dataDir)) {
      fs.mkdirSync(dataDir, { recursive: true });
    }
  }

  const sqlite = new Database(dbPath);
  sqlite.pragma("foreign_keys = ON");
  if (dbPath !== ":memory:") {
    sqlite.pragma("journal_mode = WAL");
  }

  return {
    driver: "sqlite",

    async query(sql: string, params?: unknown[]): Promise<DbResult> {
      const stmt = sqlite.prepare<unknown[], Record<string, unknown>>(sql);
      const rows = params ? stmt.all(...params) : stmt.all();
      return {
        rows,
        rowCount: rows.length,
      };
    },

    async run(sql: string, params?: unknown[]): Promise<{ changes: number }> {
      const stmt = sqlite.prepare(sql);
      const result = params ? stmt.run(...params) : stmt.run();
      return { changes: result.changes };
    },

    async exec(sql: string): Promise<void> {
      sqlite.exec(sql);
    },

    async batch(statements: Statement[]): Promise<void> {
      // better-sqlite3 is synchronous, so nothing else can interleave here
      const runAll = sqlite.transaction((list: Statement[]) => {
        for (const { sql, params } of list) {
          const stmt = sqlite.prepare(sql);
          if (params) {
            stmt.run(...params);
          } else {
            stmt.run();
          }
        }
      });
      runAll(statements);
    },

    async close(): Promise<void> {
      sqlite.close();
    },
  };
}

/**
 * Create PostgreSQL client
 */
export async function createPostgresClient(databaseUrl: string): Promise<DatabaseClient> {
  const { Pool } = await import("pg");

  if (!databaseUrl) {
    throw new Error("DATABASE_URL is required for PostgreSQL");
  }
  const needsSSL = process.env.NODE_ENV === "production" || databaseUrl.includes("sslmode=require");

  const pool = new Pool({
    connectionString: databaseUrl,
    ssl: needsSSL ? { rejectUnauthorized: false } : undefined,
    max: 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 10000,
    statement_timeout: 60000,
  });

  // Fail fast if the server is unreachable
  await pool.query("SELECT 1");

  return {
    driver: "postgres",

    async query(sql: string, params?: unknown[]): Promise<DbResult> {
      const result = await pool.query(convertPlaceholders(sql), params);
      return {
        rows: result.rows,
        rowCount: result.rowCount ?? 0,
      };
    },

    async run(sql: string, params?: unknown[]): Promise<{ changes: number }> {
      const result = await pool.query(convertPlaceholders(sql), params);
      return { changes: result.rowCount ?? 0 };
    },

    async exec(sql: string): Promise<void> {
      const statements = sql.split(";").filter((s) => s.trim());
      for (const stmt of statements) {
        await pool.query(stmt);
      }
    },

    async batch(statements: Statement[]): Promise<void> {
      const conn = await pool.connect();
      try {
        await conn.query("BEGIN");
        for (const { sql, params } of statements) {
          await conn.query(convertPlaceholders(sql), params);
        }
        await conn.query("COMMIT");
      } catch (error) {
        await conn.query("ROLLBACK");
        throw error;
      } finally {
        conn.release();
      }
    },

    async close(): Promise<void> {
      await pool.end();
    },
  };
}

/**
 * Convert SQLite ? placeholders to PostgreSQL $1, $2, etc.
 */
export function convertPlaceholders(sql: string): string {
  let index = 0;
  return sql.replace(/\?/g, () => `$${++index}`);
}

/**
 * Current Unix timestamp expression for the driver
 */
export function nowTimestamp(driver: DatabaseDriver): string {
  if (driver === "postgres") {
    return "EXTRACT(EPOCH FROM NOW())::INTEGER";
  }
  return "CAST(strftime('%s', 'now') AS INTEGER)";
}
