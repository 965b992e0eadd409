import { describe, it, expect } from "vitest";
import { queryTerms, scorePassage, splitPassages, topPassages } from "./ranking.js";

const SOLAR = "Solar panel efficiency has improved steadily over the last decade of research.";
const WIND = "This paragraph talks about wind turbines and nothing related to the query at all.";
const PANEL = "Panel makers report that solar output depends on temperature, shading and installation angle.";
const PASTA = "Another unrelated paragraph about cooking pasta and the best sauces for a weeknight dinner.";

const DOCS = [`Short line\n${SOLAR}\n${WIND}`, `${PANEL}\n   ${PASTA}   `];
const QUERY = "How does solar panel efficiency change?";

describe("queryTerms", () => {
  it("keeps lower-cased tokens longer than two characters, repeats included", () => {
    expect(queryTerms("Is the Solar panel, the SOLAR one, on?")).toEqual(["the", "solar", "panel", "the", "solar", "one"]);
  });
});

describe("scorePassage", () => {
  it("adds occurrences and a presence bonus per whole-word term", () => {
    expect(scorePassage(["solar", "panel", "efficiency"], SOLAR)).toBeCloseTo(3.9);
  });

  it("counts occurrences once per repeated term but the bonus once per term", () => {
    // "solar" appears twice in the query and once in the passage: 2 hits + one 0.3 bonus
    expect(scorePassage(["solar", "solar"], "solar farms")).toBeCloseTo(2.3);
    expect(scorePassage(queryTerms("solar solar"), "solar farms")).toBeCloseTo(2.3);
  });

  it("counts substring hits without the word bonus", () => {
    // "panels" contains "panel" but is not the word itself
    expect(scorePassage(["panel"], "panels and more panels")).toBe(2);
  });
});

describe("splitPassages", () => {
  it("drops paragraphs shorter than the minimum length", () => {
    expect(splitPassages(DOCS)).toEqual([SOLAR, WIND, PANEL, PASTA]);
  });
});

describe("topPassages", () => {
  it("orders by score and keeps first-seen order for ties", () => {
    expect(topPassages(QUERY, DOCS)).toEqual([SOLAR, PANEL, WIND, PASTA]);
  });

  it("honours k", () => {
    expect(topPassages(QUERY, DOCS, 1)).toEqual([SOLAR]);
  });

  it("is deterministic across calls", () => {
    expect(topPassages(QUERY, DOCS)).toEqual(topPassages(QUERY, DOCS));
  });

  it("returns nothing when no paragraph is long enough", () => {
    expect(topPassages(QUERY, ["tiny", "also tiny"])).toEqual([]);
  });
});
