#!/usr/bin/env tsx
/**
 * Run the full pipeline once: fetch, store, score, select and deliver
 *
 * Usage:
 *   npx tsx scripts/run-pipeline.ts [options]
 *
 * Options:
 *   --records <path>   JSON file of normalized records (default: RECORDS_FILE)
 *   --skip-fetch       Score and deliver what is already stored
 *   --no-deliver       Stop after scoring
 */

import * as dotenv from "dotenv";
import * as path from "path";

dotenv.config({ path: path.resolve(process.cwd(), ".env.local") });
dotenv.config({ path: path.resolve(process.cwd(), ".env") });

import { loadSettings } from "../src/config/settings";
import { openRecordStore, type RecordStore } from "../src/lib/db";
import { errorMessage, logger } from "../src/lib/logger";
import { PipelineRunner } from "../src/lib/pipeline/run";
import { createQualityAssessor, createRelevanceScorer } from "../src/lib/scoring";
import { JsonFileFetcher } from "../src/lib/sources/file";

async function main(): Promise<number> {
  const args = process.argv.slice(2);
  const settings = loadSettings();

  let recordsFile = settings.recordsFile;
  const recordsIndex = args.indexOf("--records");
  if (recordsIndex !== -1 && recordsIndex + 1 < args.length) {
    recordsFile = args[recordsIndex + 1];
  }

  let store: RecordStore;
  try {
    store = await openRecordStore({ databaseUrl: settings.databaseUrl, sqlitePath: settings.sqlitePath });
  } catch (error) {
    logger.error("Storage is unreachable", error);
    return 1;
  }

  try {
    const runner = new PipelineRunner(
      {
        store,
        fetchers: [new JsonFileFetcher(recordsFile)],
        relevance: createRelevanceScorer(settings),
        quality: createQualityAssessor(settings),
      },
      {
        profile: {
          ...settings.profile,
          minRelevance: settings.minRelevance,
          minQuality: settings.minQuality,
        },
        lookbackDays: settings.lookbackDays,
        scoringBatchLimit: settings.scoringBatchLimit,
        digestLimit: settings.digestLimit,
        concurrency: settings.concurrency,
        qualityMaxTier: settings.qualityMaxTier,
      }
    );

    const result = await runner.run({
      skipFetch: args.includes("--skip-fetch"),
      skipDelivery: args.includes("--no-deliver"),
    });

    console.log("\n=== Pipeline Report ===\n");
    console.log(JSON.stringify(result, null, 2));
    return result.status === "ok" ? 0 : 1;
  } finally {
    await store.close();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(`Pipeline failed: ${errorMessage(error)}`);
    process.exitCode = 1;
  });
