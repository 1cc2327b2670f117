import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { JsonFileFetcher } from "../../../src/lib/sources/file";

describe("JsonFileFetcher", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "digest-records-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeRecords(records: unknown): string {
    const file = join(dir, "records.json");
    writeFileSync(file, JSON.stringify(records));
    return file;
  }

  it("should return valid records inside the date window", async () => {
    const file = writeRecords([
      { identifier: "in-range", title: "In range", source: "medrxiv", publishedDate: "2024-03-03" },
      { identifier: "too-old", title: "Too old", source: "medrxiv", publishedDate: "2024-02-20" },
      { identifier: "too-new", title: "Too new", source: "medrxiv", publishedDate: "2024-03-09" },
      { identifier: "undated", title: "Undated", source: "europepmc" },
      { identifier: "missing-title", source: "medrxiv", publishedDate: "2024-03-03" },
      { title: "Bad date", source: "medrxiv", publishedDate: "03/03/2024" },
    ]);

    const records = await new JsonFileFetcher(file).fetch(
      new Date("2024-03-01T00:00:00Z"),
      new Date("2024-03-07T00:00:00Z")
    );

    expect(records.map((record) => record.identifier)).toEqual(["in-range", "undated"]);
  });

  it("should fill defaults for optional fields", async () => {
    const file = writeRecords([{ title: "Minimal", source: "biorxiv" }]);

    const [record] = await new JsonFileFetcher(file).fetch(new Date("2024-03-01T00:00:00Z"));

    expect(record).toEqual({
      identifier: null,
      title: "Minimal",
      authors: [],
      abstract: "",
      url: "",
      source: "biorxiv",
      publishedDate: null,
      categories: [],
      metadata: {},
    });
  });

  it("should include the boundary dates", async () => {
    const file = writeRecords([
      { identifier: "start", title: "Start", source: "medrxiv", publishedDate: "2024-03-01" },
      { identifier: "end", title: "End", source: "medrxiv", publishedDate: "2024-03-07" },
    ]);

    const records = await new JsonFileFetcher(file).fetch(
      new Date("2024-03-01T12:00:00Z"),
      new Date("2024-03-07T23:00:00Z")
    );

    expect(records).toHaveLength(2);
  });

  it("should reject a file that is not an array", async () => {
    const file = writeRecords({ title: "Not a list" });

    await expect(new JsonFileFetcher(file).fetch(new Date("2024-03-01T00:00:00Z"))).rejects.toThrow(
      "must contain a JSON array of records"
    );
  });
});
