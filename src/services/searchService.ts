import fetch from "node-fetch";
import { setTimeout as sleep } from "node:timers/promises";
import { z } from "zod";
import { GOOGLE_API_KEY, GOOGLE_CSE_ID, SEARCH_TIMEOUT_MS } from "../config/env.js";
import { ConfigurationError, errorMessage } from "../utils/errors.js";
import logger from "../utils/logger.js";
import type { SearchItem, SearchOptions, SearchOutcome } from "../models/search.js";

const CSE_URL = "https://www.googleapis.com/customsearch/v1";
const PAGE_PAUSE_MS = 200;

export interface SearchCredentials {
  apiKey?: string;
  cseId?: string;
}

const csePageSchema = z.object({
  items: z
    .array(
      z.object({
        link: z.string().optional(),
        snippet: z.string().optional(),
      })
    )
    .optional(),
  queries: z.object({ nextPage: z.array(z.unknown()).optional() }).optional(),
});

const cseErrorSchema = z.object({
  error: z.object({ message: z.string() }),
});

async function describeHttpError(res: { status: number; text(): Promise<string> }): Promise<string> {
  const raw = await res.text();
  try {
    const parsed = cseErrorSchema.safeParse(JSON.parse(raw));
    if (parsed.success) return `Google API error: ${res.status} ${parsed.data.error.message}`;
  } catch {
    // body was not JSON; report the status alone
  }
  return `Google API error: ${res.status}`;
}

/**
 * Paginated Google Custom Search. Missing credentials throw a
 * ConfigurationError; provider and network failures come back as an error
 * outcome so the caller can report them as the answer.
 */
export async function googleSearch(
  query: string,
  opts: SearchOptions = {},
  credentials: SearchCredentials = { apiKey: GOOGLE_API_KEY, cseId: GOOGLE_CSE_ID }
): Promise<SearchOutcome> {
  const { apiKey, cseId } = credentials;
  if (!apiKey || !cseId) {
    throw new ConfigurationError("Missing GOOGLE_API_KEY or GOOGLE_CSE_ID");
  }

  const { num = 10, pages = 2, dateRestrict } = opts;
  const items: SearchItem[] = [];
  let start = 1;

  try {
    for (let page = 0; page < pages; page++) {
      const params = new URLSearchParams({
        key: apiKey,
        cx: cseId,
        q: query,
        num: String(num),
        start: String(start),
        hl: "en",
        gl: "us",
      });
      if (dateRestrict) params.set("dateRestrict", dateRestrict);

      const res = await fetch(`${CSE_URL}?${params.toString()}`, {
        signal: AbortSignal.timeout(SEARCH_TIMEOUT_MS),
      });
      if (!res.ok) return { ok: false, error: await describeHttpError(res) };

      const body = csePageSchema.parse(await res.json());
      for (const item of body.items ?? []) {
        if (item.link) items.push({ link: item.link, snippet: item.snippet });
      }
      if (!body.queries?.nextPage) break;

      start += num;
      if (page + 1 < pages) await sleep(PAGE_PAUSE_MS);
    }
  } catch (err) {
    logger.warn(`Web search failed for "${query}": ${errorMessage(err)}`);
    return { ok: false, error: `Search failed: ${errorMessage(err)}` };
  }

  return { ok: true, items };
}
