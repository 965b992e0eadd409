export const MIN_PASSAGE_CHARS = 60;
export const DEFAULT_TOP_K = 6;
const PRESENCE_BONUS = 0.3;

interface ScoredPassage {
  text: string;
  score: number;
}

// ----------------------
// Query terms: lower-cased alphanumeric tokens longer than 2 chars, repeats kept
// ----------------------
export function queryTerms(query: string): string[] {
  const tokens = query.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
  return tokens.filter((t) => t.length > 2);
}

function countOccurrences(haystack: string, needle: string): number {
  let count = 0;
  let from = haystack.indexOf(needle);
  while (from !== -1) {
    count++;
    from = haystack.indexOf(needle, from + needle.length);
  }
  return count;
}

// ----------------------
// Score: occurrences of every term (once per repeat in the query), plus a
// bonus per distinct term present as a word
// ----------------------
export function scorePassage(terms: string[], text: string): number {
  const lower = text.toLowerCase();
  const words = new Set(lower.split(/\s+/));
  let score = 0;
  for (const term of terms) {
    score += countOccurrences(lower, term);
  }
  for (const term of new Set(terms)) {
    if (words.has(term)) score += PRESENCE_BONUS;
  }
  return score;
}

export function splitPassages(docs: string[]): string[] {
  return docs.flatMap((doc) =>
    doc
      .split("\n")
      .map((para) => para.trim())
      .filter((para) => para.length >= MIN_PASSAGE_CHARS)
  );
}

/**
 * Ranks every paragraph of every document against the query and keeps the
 * best `k`. The sort is stable, so equal scores keep first-seen order.
 */
export function topPassages(query: string, docs: string[], k: number = DEFAULT_TOP_K): string[] {
  const terms = queryTerms(query);
  const ranked: ScoredPassage[] = splitPassages(docs)
    .map((text) => ({ text, score: scorePassage(terms, text) }))
    .sort((a, b) => b.score - a.score);

  return ranked.slice(0, k).map((p) => p.text);
}
