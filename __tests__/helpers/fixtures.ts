/**
 * Shared test data and fakes
 */

import { createSqliteClient } from "../../src/lib/db/driver";
import { PostgresRecordStore } from "../../src/lib/db/postgres-store";
import { SqliteRecordStore } from "../../src/lib/db/sqlite-store";
import type { RecordStore } from "../../src/lib/db/store";
import type { ChatMessage, LLMClient } from "../../src/lib/llm/client";
import type { NormalizedRecord, ProfileInput } from "../../src/lib/model";
import { createPgvectorStandIn } from "./pgvector-stand-in";

export function makeRecord(overrides: Partial<NormalizedRecord> = {}): NormalizedRecord {
  return {
    identifier: "10.1101/2024.03.01.000001",
    title: "Untitled preprint",
    authors: ["A. Researcher"],
    abstract: "",
    url: "https://example.org/preprint",
    source: "medrxiv",
    publishedDate: "2024-03-01",
    categories: [],
    metadata: {},
    ...overrides,
  };
}

export function makeProfileInput(overrides: Partial<ProfileInput> = {}): ProfileInput {
  return {
    name: "Test Reader",
    email: "reader@example.com",
    interests: ["sepsis"],
    minRelevance: 0.3,
    minQuality: 0.2,
    ...overrides,
  };
}

export async function openSqliteStore(): Promise<RecordStore> {
  const store = new SqliteRecordStore(await createSqliteClient(":memory:"));
  await store.initialize();
  return store;
}

export async function openPostgresStore(): Promise<RecordStore> {
  const store = new PostgresRecordStore(createPgvectorStandIn());
  await store.initialize();
  return store;
}

type Responder = (messages: ChatMessage[]) => string | Promise<string>;

/**
 * Records every call and answers with the given responder
 */
export class FakeLLMClient implements LLMClient {
  readonly calls: ChatMessage[][] = [];

  constructor(private readonly respond: Responder) {}

  async complete(messages: ChatMessage[]): Promise<string> {
    this.calls.push(messages);
    return this.respond(messages);
  }
}

/**
 * Promise that resolves when `release` is called
 */
export function gate(): { wait: Promise<void>; release: () => void } {
  let release: () => void = () => undefined;
  const wait = new Promise<void>((resolve) => {
    release = resolve;
  });
  return { wait, release };
}
