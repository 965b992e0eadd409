import logger from "../utils/logger.js";
import { ConfigurationError, errorMessage } from "../utils/errors.js";
import { detectIntent } from "../utils/intent.js";
import { DEFAULT_TOP_K, topPassages } from "../utils/ranking.js";
import { extractText } from "../utils/extract.js";
import { googleSearch } from "./searchService.js";
import {
  computeAge,
  fetchWikidataBirthDate,
  fetchWikipediaSummary,
  wikipediaPageUrl,
} from "./knowledgeService.js";
import type { SearchAnswer, SearchItem, SearchOptions, SearchOutcome } from "../models/search.js";

export const MAX_EXTRACTED_LINKS = 12;
const MAX_CITATIONS = 3;
const MAX_SNIPPETS = 5;
const SYNTHESIS_PASSAGES = 3;
const FRESH_WINDOW = "d7";
const WIKIDATA_CITATION = "https://www.wikidata.org/";

/** External collaborators of the resolver. Swapped for fakes in tests. */
export interface KnowledgeSources {
  summary(title: string, sentences: number): Promise<string | null>;
  birthDate(name: string): Promise<string | null>;
  search(query: string, opts: SearchOptions): Promise<SearchOutcome>;
  extract(url: string): Promise<string>;
  today(): Date;
}

export const webSources: KnowledgeSources = {
  summary: fetchWikipediaSummary,
  birthDate: fetchWikidataBirthDate,
  search: (query, opts) => googleSearch(query, opts),
  extract: extractText,
  today: () => new Date(),
};

export interface ResolveOptions {
  /** Sentence budget for encyclopedia summaries. */
  sentences?: number;
  topK?: number;
}

export function ageSubject(query: string): string {
  return query
    .replace(/\b(current|age|years old)\b/gi, "")
    .replace(/\s+/g, " ")
    .trim();
}

async function quietly<T>(label: string, work: () => Promise<T>): Promise<T | null> {
  try {
    return await work();
  } catch (err) {
    logger.warn(`${label} failed: ${errorMessage(err)}`);
    return null;
  }
}

async function entityFactFastPath(
  query: string,
  sentences: number,
  sources: KnowledgeSources
): Promise<SearchAnswer | null> {
  const summary = await quietly("Summary lookup", () => sources.summary(query, sentences));
  if (summary) {
    return { answer: summary, citations: [wikipediaPageUrl(query)] };
  }

  if (!query.toLowerCase().includes("age")) return null;

  const subject = ageSubject(query) || query;
  const dob = await quietly("Birth date lookup", () => sources.birthDate(subject));
  if (!dob) return null;

  const age = computeAge(dob, sources.today());
  return { answer: `${subject} is ${age} years old (born ${dob}).`, citations: [WIKIDATA_CITATION] };
}

export function uniqueLinks(items: SearchItem[]): string[] {
  const seen = new Set<string>();
  const links: string[] = [];
  for (const item of items) {
    if (item.link && !seen.has(item.link)) {
      seen.add(item.link);
      links.push(item.link);
    }
  }
  return links;
}

/** Extracts every link concurrently; a failing link contributes nothing. */
async function extractAll(links: string[], sources: KnowledgeSources): Promise<string[]> {
  const texts = await Promise.all(
    links.map(async (link) => (await quietly(`Extraction of ${link}`, () => sources.extract(link))) ?? "")
  );
  return texts.filter(Boolean);
}

/**
 * Answers a free-text query, trying the cheap structured fast paths first
 * and falling back to web search, extraction and passage ranking.
 */
export async function resolveKnowledge(
  query: string,
  opts: ResolveOptions = {},
  sources: KnowledgeSources = webSources
): Promise<SearchAnswer> {
  const { sentences = 3, topK = DEFAULT_TOP_K } = opts;
  const intent = detectIntent(query);
  logger.info(`Resolving "${query}" (intent: ${intent})`);

  if (intent === "entity_fact") {
    const fast = await entityFactFastPath(query, sentences, sources);
    if (fast) return fast;
  }

  let outcome: SearchOutcome;
  try {
    outcome = await sources.search(query, {
      num: 10,
      pages: 2,
      dateRestrict: intent === "fresh" ? FRESH_WINDOW : undefined,
    });
  } catch (err) {
    if (err instanceof ConfigurationError) return { answer: err.message, citations: [] };
    throw err;
  }
  if (!outcome.ok) return { answer: outcome.error, citations: [] };

  const links = uniqueLinks(outcome.items);
  const citations = links.slice(0, MAX_CITATIONS);
  const texts = await extractAll(links.slice(0, MAX_EXTRACTED_LINKS), sources);

  if (!texts.length) {
    const snippets = outcome.items.map((item) => item.snippet).filter((s): s is string => Boolean(s));
    const answer = snippets.length ? snippets.slice(0, MAX_SNIPPETS).join("\n\n") : "No useful text extracted.";
    return { answer, citations };
  }

  const passages = topPassages(query, texts, topK);
  const synthesis = passages.slice(0, SYNTHESIS_PASSAGES).join(" ");
  return { answer: synthesis || "No high-relevance passages found.", citations };
}
