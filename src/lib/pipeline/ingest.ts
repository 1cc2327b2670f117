/**
 * Store fetched records, deduplicating by identifier
 */

import type { RecordStore } from "../db/store";
import { logger } from "../logger";
import type { NormalizedRecord } from "../model";

/**
 * Upsert each record; a record that fails to store is logged and skipped
 *
 * Returns the number of records stored.
 */
export async function ingest(store: RecordStore, records: NormalizedRecord[]): Promise<number> {
  let stored = 0;
  for (const record of records) {
    try {
      await store.upsertItem(record);
      stored++;
    } catch (error) {
      logger.error(`[INGEST] Failed to store "${record.title.substring(0, 60)}"`, error);
    }
  }
  logger.info(`[INGEST] Stored ${stored}/${records.length} records`);
  return stored;
}
