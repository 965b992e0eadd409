import { describe, it, expect } from "vitest";
import { detectIntent } from "./intent.js";

describe("detectIntent", () => {
  it.each([
    ["Barack Obama current age", "entity_fact"],
    ["When was Purdue University founded", "entity_fact"],
    ["Newest Sidemen video", "fresh"],
    ["weather news today", "fresh"],
    ["What is quantum computing", "definition"],
    ["Define entropy", "definition"],
    ["best pizza in Chicago", "general"],
  ])("classifies %j as %s", (query, intent) => {
    expect(detectIntent(query)).toBe(intent);
  });

  it("falls back to general when keys from several intents match", () => {
    // "born" (entity_fact) and "today" (fresh)
    expect(detectIntent("who was born today")).toBe("general");
  });
});
