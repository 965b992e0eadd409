import fetch from "node-fetch";
import { z } from "zod";
import { LOOKUP_TIMEOUT_MS } from "../config/env.js";
import { BROWSER_HEADERS } from "../utils/extract.js";

const WIKIPEDIA_SUMMARY_URL = "https://en.wikipedia.org/api/rest_v1/page/summary/";
const WIKIDATA_API_URL = "https://www.wikidata.org/w/api.php";
const WIKIDATA_ENTITY_URL = "https://www.wikidata.org/wiki/Special:EntityData/";
const DATE_OF_BIRTH = "P569";

const summarySchema = z.object({ type: z.string().optional(), extract: z.string().optional() });

const entitySearchSchema = z.object({
  search: z.array(z.object({ id: z.string() })).optional(),
});

const entityDataSchema = z.object({
  entities: z.record(
    z.object({
      claims: z.record(
        z.array(
          z.object({
            mainsnak: z.object({
              datavalue: z.object({ value: z.unknown() }).optional(),
            }),
          })
        )
      ),
    })
  ),
});

const timeValueSchema = z.object({ time: z.string() });

async function getJson(url: string): Promise<unknown> {
  const res = await fetch(url, { headers: BROWSER_HEADERS, signal: AbortSignal.timeout(LOOKUP_TIMEOUT_MS) });
  if (res.status !== 200) return null;
  return res.json();
}

export function wikipediaPageUrl(title: string): string {
  return `https://en.wikipedia.org/wiki/${title.replace(/ /g, "_")}`;
}

/** First `sentences` sentences of the encyclopedia summary for `title`, or null. */
export async function fetchWikipediaSummary(title: string, sentences: number = 3): Promise<string | null> {
  const body = await getJson(WIKIPEDIA_SUMMARY_URL + encodeURIComponent(title));
  const parsed = summarySchema.safeParse(body);
  // "X may refer to:" pages answer nothing; leave the question to web search
  if (!parsed.success || parsed.data.type === "disambiguation") return null;
  const extract = parsed.data.extract?.trim();
  if (!extract) return null;
  const parts = extract.split(". ");
  const head = parts.slice(0, sentences).join(". ");
  return parts.length > sentences ? `${head}.` : head;
}

/** Date of birth (`YYYY-MM-DD`) of the best knowledge-graph match for `name`, or null. */
export async function fetchWikidataBirthDate(name: string): Promise<string | null> {
  const params = new URLSearchParams({
    action: "wbsearchentities",
    language: "en",
    format: "json",
    search: name,
  });
  const search = entitySearchSchema.safeParse(await getJson(`${WIKIDATA_API_URL}?${params.toString()}`));
  const qid = search.success ? search.data.search?.[0]?.id : undefined;
  if (!qid) return null;

  const entity = entityDataSchema.safeParse(await getJson(`${WIKIDATA_ENTITY_URL}${qid}.json`));
  if (!entity.success) return null;
  const claim = entity.data.entities[qid]?.claims[DATE_OF_BIRTH]?.[0];
  const value = timeValueSchema.safeParse(claim?.mainsnak.datavalue?.value);
  if (!value.success) return null;

  // Wikidata times look like "+1961-08-04T00:00:00Z"
  const match = /^[+-]?(\d{4}-\d{2}-\d{2})/.exec(value.data.time);
  return match ? match[1] : null;
}

/**
 * Whole years between `dobIso` and `today` (UTC calendar date): one less
 * while this year's birthday is still ahead.
 */
export function computeAge(dobIso: string, today: Date): number {
  const [year, month, day] = dobIso.split("-").map(Number);
  const todayMonth = today.getUTCMonth() + 1;
  const todayDay = today.getUTCDate();
  const birthdayAhead = todayMonth < month || (todayMonth === month && todayDay < day);
  return today.getUTCFullYear() - year - (birthdayAhead ? 1 : 0);
}
