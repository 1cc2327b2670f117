/**
 * Parsing of JSON returned by chat models
 */

import type { z } from "zod";

/**
 * Pull the first {...} block out of a response (models sometimes wrap JSON
 * in markdown fences or prose) and parse it
 */
export function extractJsonObject(text: string): unknown {
  const match = text.match(/\{[\s\S]*\}/);
  if (!match) {
    throw new Error("No JSON object found in response");
  }
  return JSON.parse(match[0]);
}

/**
 * Parse and validate a response; null when it is not valid JSON or does not
 * match the schema
 */
export function parseJsonResponse<T extends z.ZodTypeAny>(text: string, schema: T): z.infer<T> | null {
  let raw: unknown;
  try {
    raw = extractJsonObject(text);
  } catch {
    return null;
  }
  const parsed = schema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}
