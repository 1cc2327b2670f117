/**
 * Fetcher contract and record validation
 */

import { z } from "zod";
import type { NormalizedRecord } from "../model";

export interface Fetcher {
  readonly source: string;
  /**
   * Records published between `since` and `until` (inclusive)
   */
  fetch(since: Date, until?: Date): Promise<NormalizedRecord[]>;
}

export const NormalizedRecordSchema = z.object({
  identifier: z.string().nullable().default(null),
  title: z.string().min(1),
  authors: z.array(z.string()).default([]),
  abstract: z.string().default(""),
  url: z.string().default(""),
  source: z.string().min(1),
  publishedDate: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD")
    .nullable()
    .default(null),
  categories: z.array(z.string()).default([]),
  metadata: z.record(z.unknown()).default({}),
});

/**
 * YYYY-MM-DD in UTC
 */
export function toDateString(date: Date): string {
  return date.toISOString().slice(0, 10);
}
