export type Intent = "entity_fact" | "fresh" | "definition" | "general";

export interface SearchAnswer {
  answer: string;
  citations: string[];
}

export interface SearchItem {
  link: string;
  snippet?: string;
}

export interface SearchOptions {
  num?: number;
  pages?: number;
  /** Provider date restriction, e.g. `d7` for the last seven days. */
  dateRestrict?: string;
}

export type SearchOutcome =
  | { ok: true; items: SearchItem[] }
  | { ok: false; error: string };
