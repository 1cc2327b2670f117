#!/usr/bin/env tsx
/**
 * List stored items most similar to a given item
 *
 * Usage:
 *   npx tsx scripts/find-similar.ts <item-id> [--limit <n>] [--threshold <0-1>]
 */

import * as dotenv from "dotenv";
import * as path from "path";

dotenv.config({ path: path.resolve(process.cwd(), ".env.local") });
dotenv.config({ path: path.resolve(process.cwd(), ".env") });

import { loadSettings } from "../src/config/settings";
import { openRecordStore } from "../src/lib/db";
import { errorMessage } from "../src/lib/logger";

function numberArg(args: string[], flag: string, fallback: number): number {
  const index = args.indexOf(flag);
  if (index === -1 || index + 1 >= args.length) {
    return fallback;
  }
  const value = Number(args[index + 1]);
  if (!Number.isFinite(value)) {
    throw new Error(`${flag} expects a number, got "${args[index + 1]}"`);
  }
  return value;
}

async function main(): Promise<number> {
  const args = process.argv.slice(2);
  const itemId = Number(args[0]);
  if (!Number.isInteger(itemId)) {
    console.error("Usage: tsx scripts/find-similar.ts <item-id> [--limit <n>] [--threshold <0-1>]");
    return 1;
  }
  const limit = numberArg(args, "--limit", 10);
  const threshold = numberArg(args, "--threshold", 0.5);

  const settings = loadSettings();
  const store = await openRecordStore({ databaseUrl: settings.databaseUrl, sqlitePath: settings.sqlitePath });

  try {
    const item = await store.getItem(itemId);
    if (!item) {
      console.error(`No item with id ${itemId}`);
      return 1;
    }
    if (!item.embedding) {
      console.error(`Item ${itemId} has no embedding yet; score it with SCORER=agent first`);
      return 1;
    }

    const matches = await store.findSimilar(item.embedding, limit + 1, threshold);
    const others = matches.filter((match) => match.item.id !== itemId).slice(0, limit);

    console.log(`\nSimilar to: ${item.title}\n`);
    if (others.length === 0) {
      console.log("  No items above the threshold");
    }
    for (const { item: match, similarity } of others) {
      console.log(`  ${similarity.toFixed(3)}  [${match.id}] ${match.title}`);
    }
    return 0;
  } finally {
    await store.close();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(`find-similar failed: ${errorMessage(error)}`);
    process.exitCode = 1;
  });
