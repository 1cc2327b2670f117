/**
 * Record store construction
 *
 * The backend is chosen once, from the connection string; nothing above this
 * module branches on it.
 */

import { logger } from "../logger";
import { createDbClient, type DatabaseClient, type DriverOptions } from "./driver";
import { PostgresRecordStore } from "./postgres-store";
import { SqliteRecordStore } from "./sqlite-store";
import type { RecordStore } from "./store";

export type { RecordStore, CandidateQuery } from "./store";
export { normalizeIdentifier } from "./store";

/**
 * Wrap an open client in the adapter for its driver
 */
export function createRecordStore(client: DatabaseClient): RecordStore {
  return client.driver === "postgres" ? new PostgresRecordStore(client) : new SqliteRecordStore(client);
}

/**
 * Connect, pick the adapter and create tables if they don't exist
 */
export async function openRecordStore(options: DriverOptions = {}): Promise<RecordStore> {
  const client = await createDbClient(options);
  const store = createRecordStore(client);
  try {
    await store.initialize();
  } catch (error) {
    await client.close();
    throw error;
  }
  logger.info(`Record store ready (${client.driver})`);
  return store;
}
