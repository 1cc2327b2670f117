/**
 * Fetcher over a local JSON file of normalized records
 */

import { readFile } from "fs/promises";
import { logger } from "../logger";
import type { NormalizedRecord } from "../model";
import { NormalizedRecordSchema, toDateString, type Fetcher } from "./types";

export class JsonFileFetcher implements Fetcher {
  readonly source = "file";

  constructor(private readonly filePath: string) {}

  /**
   * Invalid entries are logged and skipped; records without a published
   * date are always included
   */
  async fetch(since: Date, until?: Date): Promise<NormalizedRecord[]> {
    const raw: unknown = JSON.parse(await readFile(this.filePath, "utf-8"));
    if (!Array.isArray(raw)) {
      throw new Error(`${this.filePath} must contain a JSON array of records`);
    }

    const from = toDateString(since);
    const to = until ? toDateString(until) : null;
    const records: NormalizedRecord[] = [];

    raw.forEach((entry: unknown, index) => {
      const parsed = NormalizedRecordSchema.safeParse(entry);
      if (!parsed.success) {
        logger.warn(`Skipping invalid record at index ${index} in ${this.filePath}`, {
          issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
        });
        return;
      }

      const record = parsed.data;
      if (record.publishedDate !== null) {
        if (record.publishedDate < from || (to !== null && record.publishedDate > to)) {
          return;
        }
      }
      records.push(record);
    });

    logger.info(`Loaded ${records.length} records from ${this.filePath}`);
    return records;
  }
}
