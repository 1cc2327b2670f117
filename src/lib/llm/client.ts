/**
 * Chat-completion client used by the delegated scoring tiers
 */

import OpenAI from "openai";
import { logger } from "../logger";

export interface ChatMessage {
  role: "system" | "user";
  content: string;
}

export interface LLMClient {
  /**
   * Send messages and return the raw text of the first choice
   */
  complete(messages: ChatMessage[], options?: { json?: boolean; maxTokens?: number }): Promise<string>;
}

/**
 * OpenAI-backed client; the SDK instance is created on first use
 */
export function createOpenAIClient(apiKey: string, model: string): LLMClient {
  let client: OpenAI | null = null;

  return {
    async complete(messages, options = {}) {
      if (!client) {
        client = new OpenAI({ apiKey });
      }

      const response = await client.chat.completions.create({
        model,
        max_completion_tokens: options.maxTokens ?? 1000,
        response_format: options.json ? { type: "json_object" } : undefined,
        messages: messages.map((message) =>
          message.role === "system"
            ? { role: "system" as const, content: message.content }
            : { role: "user" as const, content: message.content }
        ),
      });

      logger.debug(`${model} responded`, { usage: response.usage });
      return response.choices[0]?.message.content ?? "";
    },
  };
}
