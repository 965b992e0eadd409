import fetch from "node-fetch";
import { JSDOM, VirtualConsole } from "jsdom";
import { Readability } from "@mozilla/readability";
import { FETCH_TIMEOUT_MS } from "../config/env.js";

export const BROWSER_HEADERS = {
  "User-Agent": "Mozilla/5.0 (Windows NT 10.0; Win64; x64) Chrome/124 Safari/537.36",
};

const MIN_ARTICLE_CHARS = 300;
const MIN_PARAGRAPH_CHARS = 80;
const MAX_FALLBACK_PARAGRAPHS = 6;

function cleanLine(line: string): string {
  return line.replace(/\s+/g, " ").trim();
}

function parse(html: string, url: string): JSDOM {
  // Page scripts and stylesheet errors are none of our business.
  return new JSDOM(html, { url, virtualConsole: new VirtualConsole() });
}

function articleText(html: string, url: string): string {
  const article = new Readability(parse(html, url).window.document).parse();
  const text = article?.textContent ?? "";
  return text
    .split("\n")
    .map(cleanLine)
    .filter(Boolean)
    .join("\n");
}

function paragraphText(html: string, url: string): string {
  const paragraphs = Array.from(parse(html, url).window.document.querySelectorAll("p"))
    .map((p) => cleanLine(p.textContent ?? ""))
    .filter((p) => p.length > MIN_PARAGRAPH_CHARS);
  return paragraphs.slice(0, MAX_FALLBACK_PARAGRAPHS).join("\n");
}

/**
 * Readable body text of an HTML page, one paragraph per line. Boilerplate
 * removal first; when that yields too little, long `<p>` blocks instead.
 */
export function extractReadableText(html: string, url: string): string {
  const primary = articleText(html, url);
  if (primary.length > MIN_ARTICLE_CHARS) return primary;
  return paragraphText(html, url);
}

export async function fetchPage(url: string, timeoutMs: number = FETCH_TIMEOUT_MS): Promise<string> {
  const res = await fetch(url, { headers: BROWSER_HEADERS, signal: AbortSignal.timeout(timeoutMs) });
  if (!res.ok) throw new Error(`HTTP ${res.status} for ${url}`);
  return res.text();
}

/** Fetches and extracts one link. Rejects on fetch failure; callers isolate it. */
export async function extractText(url: string): Promise<string> {
  const html = await fetchPage(url);
  return extractReadableText(html, url);
}
