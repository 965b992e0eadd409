import dotenv from "dotenv";
dotenv.config();

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function optionalFromEnv(name: string): string | undefined {
  const value = process.env[name]?.trim();
  return value ? value : undefined;
}

export const PORT = intFromEnv("PORT", 5050);
export const NODE_ENV = process.env.NODE_ENV || "development";
export const CORS_ORIGIN = process.env.CORS_ORIGIN || "*";
export const LOG_LEVEL = process.env.LOG_LEVEL || "info";

// Generation backend (OpenAI-compatible chat completions)
export const LLM_API_URL = process.env.LLM_API_URL || "http://localhost:11434/v1/chat/completions";
export const LLM_MODEL = process.env.LLM_MODEL || "qwen3:1.7b";
export const LLM_CONNECT_TIMEOUT_MS = intFromEnv("LLM_CONNECT_TIMEOUT_MS", 5_000);
export const LLM_TIMEOUT_MS = intFromEnv("LLM_TIMEOUT_MS", 120_000);

export const FETCH_TIMEOUT_MS = intFromEnv("FETCH_TIMEOUT_MS", 8_000);
export const LOOKUP_TIMEOUT_MS = intFromEnv("LOOKUP_TIMEOUT_MS", 6_000);
export const SEARCH_TIMEOUT_MS = intFromEnv("SEARCH_TIMEOUT_MS", 15_000);

export const REDIS_URL = process.env.REDIS_URL || "redis://localhost:6379";
export const HISTORY_TTL_SECONDS = intFromEnv("HISTORY_TTL_SECONDS", 60 * 60 * 24 * 7);

export const MAX_TOOL_ITERATIONS = intFromEnv("MAX_TOOL_ITERATIONS", 5);

export const GOOGLE_API_KEY = optionalFromEnv("GOOGLE_API_KEY");
export const GOOGLE_CSE_ID = optionalFromEnv("GOOGLE_CSE_ID");
