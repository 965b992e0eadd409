import { describe, it, expect } from "vitest";
import { scanForToolCall, stripReasoning } from "./toolCall.js";

describe("scanForToolCall", () => {
  it("parses a clean directive", () => {
    const text = '{"tool_call": {"name": "get_current_weather", "arguments": {"location": "Chicago, IL"}}}';
    expect(scanForToolCall(text)).toEqual({
      kind: "directive",
      directive: { name: "get_current_weather", arguments: { location: "Chicago, IL" } },
    });
  });

  it("recovers a directive wrapped in prose", () => {
    const text = 'Sure, let me check.\n{"tool_call": {"name": "search_web", "arguments": {"query": "mars rover"}}}\nOne moment.';
    expect(scanForToolCall(text)).toEqual({
      kind: "directive",
      directive: { name: "search_web", arguments: { query: "mars rover" } },
    });
  });

  it("treats plain text as no tool call", () => {
    expect(scanForToolCall("It is sunny today.")).toEqual({ kind: "none" });
  });

  it("treats valid JSON without the directive key as no tool call", () => {
    expect(scanForToolCall('{"answer": "tool_call is not here as a key"}')).toEqual({ kind: "none" });
  });

  it("reports prose that only mentions the token", () => {
    expect(scanForToolCall("I could emit a tool_call, but I already know this.")).toEqual({ kind: "mention" });
  });

  it("rejects a directive whose arguments are not an object", () => {
    expect(scanForToolCall('{"tool_call": {"name": "search_web", "arguments": "mars"}}')).toEqual({ kind: "none" });
  });
});

describe("stripReasoning", () => {
  it("removes reasoning blocks and trims", () => {
    expect(stripReasoning("<think>\nweigh options\n</think>\n\nParis is the capital.")).toBe("Paris is the capital.");
  });

  it("removes every block in a single pass", () => {
    expect(stripReasoning("<think>a</think>One <think>b</think>two")).toBe("One two");
  });

  it("leaves text without blocks untouched apart from trimming", () => {
    expect(stripReasoning("  plain answer ")).toBe("plain answer");
  });
});
