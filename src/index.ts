export { loadSettings, parseInterests } from "./config/settings";
export type { Settings } from "./config/settings";

export { openRecordStore, createRecordStore, normalizeIdentifier } from "./lib/db";
export type { RecordStore, CandidateQuery } from "./lib/db";
export { createDbClient, createSqliteClient, createPostgresClient, detectDriver } from "./lib/db/driver";
export type { DatabaseClient, DatabaseDriver, DriverOptions } from "./lib/db/driver";

export { cosineSimilarity, createEmbeddingClient, generateEmbedding } from "./lib/embeddings";
export type { EmbeddingClient } from "./lib/embeddings";
export { createOpenAIClient } from "./lib/llm/client";
export type { LLMClient, ChatMessage } from "./lib/llm/client";

export {
  combinedScore,
  createQualityAssessor,
  createRelevanceScorer,
  KeywordRelevanceScorer,
  QualityAssessor,
  SemanticRelevanceScorer,
} from "./lib/scoring";
export type { RelevanceScorer, ScorerName } from "./lib/scoring";

export { ingest } from "./lib/pipeline/ingest";
export { scoreBatch, scoreUnscored } from "./lib/pipeline/compute-scores";
export type { ScoreBatchOptions, ScoringDeps } from "./lib/pipeline/compute-scores";
export { selectForDelivery, recordDelivery, toDigestEntry } from "./lib/pipeline/select";
export type { SelectionOptions } from "./lib/pipeline/select";
export { PipelineRunner } from "./lib/pipeline/run";
export type { PipelineConfig, PipelineDeps, RunOptions, RunReport, RunResult } from "./lib/pipeline/run";
export { RunStatus } from "./lib/pipeline/status";
export type { RunStage, RunStatusSnapshot } from "./lib/pipeline/status";

export { JsonFileFetcher } from "./lib/sources/file";
export { NormalizedRecordSchema } from "./lib/sources/types";
export type { Fetcher } from "./lib/sources/types";
export { renderTextDigest } from "./lib/digest/render";
export type { Renderer, RenderOptions } from "./lib/digest/render";
export { ConsoleTransport } from "./lib/digest/transport";
export type { Transport } from "./lib/digest/transport";

export type * from "./lib/model";
