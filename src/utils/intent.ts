import type { Intent } from "../models/search.js";

type ClassifiedIntent = Exclude<Intent, "general">;

const INTENT_ORDER: ClassifiedIntent[] = ["entity_fact", "fresh", "definition"];

const INTENT_KEYS: Record<ClassifiedIntent, string[]> = {
  entity_fact: ["age", "born", "birthdate", "date of birth", "founding date", "founded"],
  fresh: ["latest", "newest", "today", "this week", "just released", "video"],
  definition: ["what is", "define", "meaning of"],
};

/**
 * Keyword heuristic over the lower-cased query. A query matching keys from
 * more than one intent is ambiguous and falls back to `general`.
 */
export function detectIntent(query: string): Intent {
  const q = query.toLowerCase();
  const matched = INTENT_ORDER.filter((intent) =>
    INTENT_KEYS[intent].some((key) => q.includes(key))
  );
  return matched.length === 1 ? matched[0] : "general";
}
