/**
 * Runtime configuration from environment variables
 */

import { z } from "zod";
import type { AssessmentTier } from "../lib/model";
import type { ScorerName } from "../lib/scoring/relevance";

const numberFromEnv = (fallback: number) => z.coerce.number().finite().default(fallback);

const EnvSchema = z.object({
  DATABASE_URL: z.string().optional(),
  SQLITE_PATH: z.string().default(".data/digest.db"),
  RECORDS_FILE: z.string().default(".data/records.json"),

  SCORER: z.enum(["keyword", "agent"]).default("keyword"),
  SCORING_CONCURRENCY: z.coerce.number().int().min(1).default(1),
  QUALITY_MAX_TIER: z.coerce
    .number()
    .default(1)
    .pipe(z.union([z.literal(1), z.literal(2), z.literal(3)])),
  SCORING_BATCH_LIMIT: z.coerce.number().int().min(1).default(100),

  MIN_RELEVANCE: numberFromEnv(0.3).pipe(z.number().min(0).max(1)),
  MIN_QUALITY: numberFromEnv(0.2).pipe(z.number().min(0).max(1)),
  DIGEST_LIMIT: z.coerce.number().int().min(1).default(20),
  LOOKBACK_DAYS: z.coerce.number().int().min(1).default(7),

  PROFILE_NAME: z.string().default("Reader"),
  PROFILE_EMAIL: z.string().email().default("reader@example.com"),
  PROFILE_INTERESTS: z.string().default(""),

  OPENAI_API_KEY: z.string().optional(),
  LLM_MODEL: z.string().default("gpt-4o-mini"),
  EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
});

export interface Settings {
  databaseUrl?: string;
  sqlitePath: string;
  recordsFile: string;
  scorer: ScorerName;
  concurrency: number;
  qualityMaxTier: AssessmentTier;
  scoringBatchLimit: number;
  minRelevance: number;
  minQuality: number;
  digestLimit: number;
  lookbackDays: number;
  profile: {
    name: string;
    email: string;
    interests: string[];
  };
  openaiApiKey?: string;
  llmModel: string;
  embeddingModel: string;
}

/**
 * Split free-text interests on newlines and semicolons
 */
export function parseInterests(text: string): string[] {
  return text
    .split(/[\n;]/)
    .map((interest) => interest.trim())
    .filter((interest) => interest.length > 0);
}

/**
 * Blank variables count as unset so defaults apply
 */
function withoutBlanks(env: Record<string, string | undefined>): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") {
      cleaned[key] = value;
    }
  }
  return cleaned;
}

export function loadSettings(env: Record<string, string | undefined> = process.env): Settings {
  const parsed = EnvSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const values = parsed.data;
  return {
    databaseUrl: values.DATABASE_URL,
    sqlitePath: values.SQLITE_PATH,
    recordsFile: values.RECORDS_FILE,
    scorer: values.SCORER,
    concurrency: values.SCORING_CONCURRENCY,
    qualityMaxTier: values.QUALITY_MAX_TIER,
    scoringBatchLimit: values.SCORING_BATCH_LIMIT,
    minRelevance: values.MIN_RELEVANCE,
    minQuality: values.MIN_QUALITY,
    digestLimit: values.DIGEST_LIMIT,
    lookbackDays: values.LOOKBACK_DAYS,
    profile: {
      name: values.PROFILE_NAME,
      email: values.PROFILE_EMAIL,
      interests: parseInterests(values.PROFILE_INTERESTS),
    },
    openaiApiKey: values.OPENAI_API_KEY,
    llmModel: values.LLM_MODEL,
    embeddingModel: values.EMBEDDING_MODEL,
  };
}
