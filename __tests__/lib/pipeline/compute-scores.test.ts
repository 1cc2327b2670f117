import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { RecordStore } from "../../../src/lib/db/store";
import type { Item, Profile, RelevanceResult } from "../../../src/lib/model";
import { scoreBatch, scoreUnscored, type ScoringDeps } from "../../../src/lib/pipeline/compute-scores";
import { QualityAssessor } from "../../../src/lib/scoring/quality";
import { KeywordRelevanceScorer, type RelevanceScorer } from "../../../src/lib/scoring/relevance";
import { makeProfileInput, makeRecord, openSqliteStore } from "../../helpers/fixtures";

/**
 * Scripted scorer: relevance by title, optional failures, delays and tags
 */
class ScriptedScorer implements RelevanceScorer {
  readonly name = "agent" as const;
  readonly embedCalls: string[] = [];
  active = 0;
  maxActive = 0;

  constructor(
    private readonly options: {
      failOn?: string;
      delayMs?: (item: Item) => number;
      tags?: string[];
      embedding?: number[] | null;
    } = {}
  ) {}

  async score(item: Item): Promise<RelevanceResult> {
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      const delay = this.options.delayMs?.(item) ?? 0;
      if (delay > 0) {
        await new Promise((resolve) => setTimeout(resolve, delay));
      }
      if (item.title === this.options.failOn) {
        throw new Error("upstream unavailable");
      }
      return {
        relevance: 0.5,
        summary: `Summary of ${item.title}`,
        rationale: "scripted",
        keyFindings: [],
        matchedTags: this.options.tags ?? [],
      };
    } finally {
      this.active--;
    }
  }

  async embed(text: string): Promise<number[] | null> {
    this.embedCalls.push(text);
    return this.options.embedding ?? null;
  }
}

describe("scoreBatch", () => {
  let store: RecordStore;
  let profile: Profile;

  async function addItems(titles: string[]): Promise<Item[]> {
    const items: Item[] = [];
    for (const title of titles) {
      const id = await store.upsertItem(makeRecord({ identifier: title, title, abstract: `About ${title}` }));
      const item = await store.getItem(id);
      if (!item) {
        throw new Error(`missing item ${id}`);
      }
      items.push(item);
    }
    return items;
  }

  function deps(relevance: RelevanceScorer): ScoringDeps {
    return { store, relevance, quality: new QualityAssessor() };
  }

  beforeEach(async () => {
    store = await openSqliteStore();
    profile = await store.upsertProfile(makeProfileInput({ interests: ["sepsis"] }));
  });

  afterEach(async () => {
    await store.close();
  });

  it("should persist a score per item with the combined weighting", async () => {
    const items = await addItems(["Sepsis in the ICU", "Asthma in children"]);

    const scores = await scoreBatch(deps(new KeywordRelevanceScorer()), items, profile);

    expect(scores).toHaveLength(2);
    const sepsis = await store.getScore(items[0].id, profile.id);
    expect(sepsis?.relevance).toBe(1);
    expect(sepsis?.quality).toBe(0.3);
    expect(sepsis?.combined).toBeCloseTo(0.6 * 1 + 0.4 * 0.3, 10);
    expect(sepsis?.designLabel).toBe("unclassified");
    expect((await store.getScore(items[1].id, profile.id))?.relevance).toBe(0);
  });

  it("should process items in input order when sequential", async () => {
    const items = await addItems(["first", "second", "third"]);
    const progress: Array<[number, number]> = [];
    const scored: number[] = [];

    await scoreBatch(deps(new ScriptedScorer()), items, profile, {
      concurrency: 1,
      onProgress: (completed, total) => progress.push([completed, total]),
      onItemScored: (itemId) => scored.push(itemId),
    });

    expect(progress).toEqual([
      [1, 3],
      [2, 3],
      [3, 3],
    ]);
    expect(scored).toEqual(items.map((item) => item.id));
  });

  it("should skip failed items, keep going and leave them unscored", async () => {
    const items = await addItems(["first", "broken", "third"]);
    const scored: number[] = [];

    const scores = await scoreBatch(deps(new ScriptedScorer({ failOn: "broken" })), items, profile, {
      onItemScored: (itemId) => scored.push(itemId),
    });

    expect(scores.map((score) => score.itemId)).toEqual([items[0].id, items[2].id]);
    expect(scored).toEqual([items[0].id, items[2].id]);
    expect((await store.listUnscored(profile.id, 10)).map((item) => item.title)).toEqual(["broken"]);
  });

  it("should bound concurrency and report in completion order", async () => {
    const items = await addItems(["slow", "fast", "medium", "quick"]);
    const delays: Record<string, number> = { slow: 60, fast: 5, medium: 30, quick: 5 };
    const scorer = new ScriptedScorer({ delayMs: (item) => delays[item.title] ?? 0 });
    const completed: number[] = [];
    const order: number[] = [];

    await scoreBatch(deps(scorer), items, profile, {
      concurrency: 2,
      onProgress: (count) => completed.push(count),
      onItemScored: (itemId) => order.push(itemId),
    });

    expect(scorer.maxActive).toBe(2);
    expect(completed).toEqual([1, 2, 3, 4]);
    expect(order[0]).toBe(items[1].id);
    expect(order[order.length - 1]).toBe(items[0].id);
    expect(await store.countScores(profile.id)).toBe(4);
  });

  it("should finish the whole batch when a progress listener throws", async () => {
    const items = await addItems(["slow", "fast", "medium"]);
    const delays: Record<string, number> = { slow: 40, fast: 5, medium: 20 };
    const scorer = new ScriptedScorer({ delayMs: (item) => delays[item.title] ?? 0 });

    const scores = await scoreBatch(deps(scorer), items, profile, {
      concurrency: 2,
      onProgress: () => {
        throw new Error("listener failed");
      },
    });

    expect(scores).toHaveLength(3);
    expect(scorer.active).toBe(0);
    expect(await store.countScores(profile.id)).toBe(3);
  });

  it("should save tags and embeddings from the scorer", async () => {
    const [item] = await addItems(["Sepsis biomarkers"]);
    const scorer = new ScriptedScorer({ tags: ["sepsis", "biomarkers"], embedding: [1, 0, 0.5] });

    await scoreBatch(deps(scorer), [item], profile);

    expect(await store.getTags(item.id)).toEqual(["biomarkers", "sepsis"]);
    expect((await store.getItem(item.id))?.embedding).toEqual([1, 0, 0.5]);
    expect(scorer.embedCalls).toEqual(["Sepsis biomarkers\n\nAbout Sepsis biomarkers"]);
  });

  it("should not re-embed items that already have an embedding", async () => {
    const [stored] = await addItems(["Already embedded"]);
    await store.saveEmbedding(stored.id, [0, 1]);
    const item = await store.getItem(stored.id);
    const scorer = new ScriptedScorer({ embedding: [1, 0] });

    await scoreBatch(deps(scorer), item ? [item] : [], profile);

    expect(scorer.embedCalls).toEqual([]);
    expect((await store.getItem(stored.id))?.embedding).toEqual([0, 1]);
  });

  it("should return an empty list for an empty batch", async () => {
    expect(await scoreBatch(deps(new ScriptedScorer()), [], profile)).toEqual([]);
  });
});

describe("scoreUnscored", () => {
  it("should score only items without a score for the profile", async () => {
    const store = await openSqliteStore();
    const profile = await store.upsertProfile(makeProfileInput());
    const scoringDeps: ScoringDeps = {
      store,
      relevance: new KeywordRelevanceScorer(),
      quality: new QualityAssessor(),
    };

    await store.upsertItem(makeRecord({ identifier: "a", title: "Sepsis a" }));
    await store.upsertItem(makeRecord({ identifier: "b", title: "Sepsis b" }));

    expect(await scoreUnscored(scoringDeps, profile, 10)).toBe(2);
    expect(await scoreUnscored(scoringDeps, profile, 10)).toBe(0);

    await store.upsertItem(makeRecord({ identifier: "c", title: "Sepsis c" }));
    expect(await scoreUnscored(scoringDeps, profile, 10)).toBe(1);
    expect(await store.countScores(profile.id)).toBe(3);

    await store.close();
  });
});
