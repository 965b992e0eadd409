import { Agent, errors, fetch } from "undici";
import { z } from "zod";
import { LLM_API_URL, LLM_CONNECT_TIMEOUT_MS, LLM_MODEL, LLM_TIMEOUT_MS } from "../config/env.js";
import logger from "../utils/logger.js";
import { errorMessage } from "../utils/errors.js";
import type { ChatMessage } from "../models/session.js";

/** Role-tagged messages in, generated text out. Never rejects. */
export type GenerationBackend = (messages: ChatMessage[]) => Promise<string>;

export interface GenerationBackendOptions {
  url?: string;
  model?: string;
  /** Time allowed to open the connection. */
  connectTimeoutMs?: number;
  /** Time allowed for the reply; generation can legitimately take minutes. */
  timeoutMs?: number;
}

const lmResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string() }),
      })
    )
    .min(1),
});

export function createGenerationBackend(opts: GenerationBackendOptions = {}): GenerationBackend {
  const {
    url = LLM_API_URL,
    model = LLM_MODEL,
    connectTimeoutMs = LLM_CONNECT_TIMEOUT_MS,
    timeoutMs = LLM_TIMEOUT_MS,
  } = opts;
  const dispatcher = new Agent({
    connect: { timeout: connectTimeoutMs },
    headersTimeout: timeoutMs,
    bodyTimeout: timeoutMs,
  });

  return async function generateAIResponse(messages: ChatMessage[]): Promise<string> {
    try {
      const lmResponse = await fetch(url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          model,
          messages: messages.map((m) => ({ role: m.role, content: m.content })),
          stream: false,
        }),
        dispatcher,
      });

      if (!lmResponse.ok) {
        logger.error(`Generation backend answered HTTP ${lmResponse.status}`);
        return `Error: request failed: HTTP ${lmResponse.status}`;
      }

      const parsed = lmResponseSchema.safeParse(await lmResponse.json());
      if (!parsed.success) {
        logger.warn("Generation backend returned an unexpected body", { issues: parsed.error.issues.length });
        return "Error: unexpected response format.";
      }
      return parsed.data.choices[0].message.content;
    } catch (err) {
      // fetch wraps transport errors in a TypeError; body reads reject with them directly
      const cause = err instanceof Error && err.cause instanceof Error ? err.cause : err;
      if (cause instanceof errors.ConnectTimeoutError) {
        logger.error(`Generation backend unreachable within ${connectTimeoutMs} ms`);
        return `Error: request failed: could not connect within ${connectTimeoutMs} ms`;
      }
      if (cause instanceof errors.HeadersTimeoutError || cause instanceof errors.BodyTimeoutError) {
        logger.error(`Generation backend timed out after ${timeoutMs} ms`);
        return "Error: request timed out (model is taking too long).";
      }
      logger.error(`Generation backend request failed: ${errorMessage(cause)}`);
      return `Error: request failed: ${errorMessage(cause)}`;
    }
  };
}
