/**
 * End-to-end pipeline: fetch → ingest → score → select → deliver
 *
 * One run at a time per runner; a concurrent call returns { status: "busy" }.
 */

import type { RecordStore } from "../db/store";
import { renderTextDigest, type Renderer } from "../digest/render";
import type { Transport } from "../digest/transport";
import { errorMessage, logger } from "../logger";
import type { AssessmentTier, DeliveryOutcome, NormalizedRecord, Profile, ProfileInput } from "../model";
import type { QualityAssessor } from "../scoring/quality";
import type { RelevanceScorer } from "../scoring/relevance";
import type { Fetcher } from "../sources/types";
import { scoreBatch } from "./compute-scores";
import { ingest } from "./ingest";
import { recordDelivery, selectForDelivery, toDigestEntry } from "./select";
import { RunStatus, type RunStage } from "./status";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface PipelineConfig {
  profile: ProfileInput;
  lookbackDays: number;
  scoringBatchLimit: number;
  digestLimit: number;
  concurrency: number;
  qualityMaxTier: AssessmentTier;
}

export interface PipelineDeps {
  store: RecordStore;
  fetchers: Fetcher[];
  relevance: RelevanceScorer;
  quality: QualityAssessor;
  transport?: Transport | null;
  render?: Renderer;
  /** Output for digests when no transport is configured */
  print?: (document: string) => void;
}

export interface RunOptions {
  skipFetch?: boolean;
  skipDelivery?: boolean;
  now?: Date;
}

export interface RunReport {
  status: "ok" | "error";
  outcome: DeliveryOutcome | "none";
  fetched: number;
  stored: number;
  scored: number;
  failed: number;
  selected: number;
  delivered: number;
  stoppedAt: RunStage | null;
  message?: string;
  deliveryId?: number;
}

export type RunResult = RunReport | { status: "busy" };

class StageError extends Error {
  constructor(
    readonly stage: RunStage,
    cause: unknown
  ) {
    super(`${stage} failed: ${errorMessage(cause)}`);
    this.name = "StageError";
  }
}

async function stage<T>(name: RunStage, work: () => Promise<T>): Promise<T> {
  try {
    return await work();
  } catch (error) {
    throw new StageError(name, error);
  }
}

export class PipelineRunner {
  readonly status = new RunStatus();
  private active = false;

  constructor(
    private readonly deps: PipelineDeps,
    private readonly config: PipelineConfig
  ) {}

  get isRunning(): boolean {
    return this.active;
  }

  async run(options: RunOptions = {}): Promise<RunResult> {
    if (this.active) {
      logger.warn("[PIPELINE] Run requested while another run is active");
      return { status: "busy" };
    }

    this.active = true;
    this.status.start();
    const report: RunReport = {
      status: "ok",
      outcome: "none",
      fetched: 0,
      stored: 0,
      scored: 0,
      failed: 0,
      selected: 0,
      delivered: 0,
      stoppedAt: null,
    };

    try {
      await this.execute(report, options);
      this.status.finish("done", report.stoppedAt ? `stopped at ${report.stoppedAt}` : "");
      logger.info("[PIPELINE] Run complete", { ...report });
      return report;
    } catch (error) {
      const stoppedAt = error instanceof StageError ? error.stage : this.status.snapshot().stage;
      const message = errorMessage(error);
      logger.error(`[PIPELINE] Run aborted at ${stoppedAt}`, error);
      this.status.finish("error", message);
      return { ...report, status: "error", stoppedAt, message };
    } finally {
      this.active = false;
    }
  }

  private async execute(report: RunReport, options: RunOptions): Promise<void> {
    const { store } = this.deps;
    const now = options.now ?? new Date();

    this.status.update({ stage: "connect", message: "Checking storage" });
    await stage("connect", () => store.countItems());

    if (!options.skipFetch) {
      this.status.update({ stage: "fetch", message: "Fetching records" });
      const records = await this.fetchAll(new Date(now.getTime() - this.config.lookbackDays * DAY_MS), now);
      report.fetched = records.length;

      this.status.update({ stage: "ingest", message: `Storing ${records.length} records` });
      report.stored = await stage("ingest", () => ingest(store, records));
    }

    this.status.update({ stage: "profile", message: "Updating profile" });
    const profile = await stage("profile", () => store.upsertProfile(this.config.profile));

    this.status.update({ stage: "score", message: "Scoring" });
    const unscored = await stage("score", () => store.listUnscored(profile.id, this.config.scoringBatchLimit));
    this.status.update({ scored: 0, total: unscored.length });
    const scores = await scoreBatch(this.deps, unscored, profile, {
      concurrency: this.config.concurrency,
      maxTier: this.config.qualityMaxTier,
      onProgress: (completed, total) => {
        this.status.update({ scored: completed, total, message: `Scored ${completed}/${total}` });
      },
    });
    report.scored = scores.length;
    report.failed = unscored.length - scores.length;

    if (options.skipDelivery) {
      return;
    }

    this.status.update({ stage: "select", message: "Selecting items" });
    const selected = await stage("select", () =>
      selectForDelivery(store, profile, { limit: this.config.digestLimit })
    );
    report.selected = selected.length;
    if (selected.length === 0) {
      logger.info("[PIPELINE] Nothing new to deliver");
      report.stoppedAt = "select";
      return;
    }

    this.status.update({ stage: "deliver", message: `Delivering ${selected.length} items` });
    const render: Renderer = this.deps.render ?? renderTextDigest;
    const document = render(selected.map(toDigestEntry));
    const outcome = await this.deliver(document, profile);

    const record = await stage("deliver", () =>
      recordDelivery(
        store,
        profile,
        selected.map(({ item }) => item.id),
        outcome
      )
    );
    report.outcome = outcome;
    report.deliveryId = record.id;
    report.delivered = outcome === "failed" ? 0 : record.itemIds.length;
  }

  private async fetchAll(since: Date, until: Date): Promise<NormalizedRecord[]> {
    const records: NormalizedRecord[] = [];
    for (const fetcher of this.deps.fetchers) {
      try {
        const fetched = await fetcher.fetch(since, until);
        logger.info(`[FETCH] ${fetcher.source}: ${fetched.length} records`);
        records.push(...fetched);
      } catch (error) {
        logger.error(`[FETCH] ${fetcher.source} failed, skipping`, error);
      }
    }
    return records;
  }

  private async deliver(document: string, profile: Profile): Promise<DeliveryOutcome> {
    const { transport } = this.deps;
    if (!transport) {
      const print = this.deps.print ?? ((text: string) => process.stdout.write(`${text}\n`));
      print(document);
      return "printed";
    }

    try {
      return (await transport.send(document, profile.email)) ? "delivered" : "failed";
    } catch (error) {
      logger.error(`[DELIVER] Transport failed for ${profile.email}`, error);
      return "failed";
    }
  }
}
