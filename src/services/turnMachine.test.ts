/**
 * Turn state machine tests
 *
 * Covers:
 * - plain answers end the turn after one generation
 * - directives run through the registry and feed results back
 * - unknown tools are reported to the model, not raised
 * - reasoning blocks are stripped before the answer is used
 * - the tool round bound stops a model that keeps calling tools
 * - the system instruction lists exactly the enabled tools
 * - an empty turn is a fatal TurnFailedError
 */

import { describe, it, expect, vi } from "vitest";
import { TurnStateMachine, toChatMessages } from "./turnMachine.js";
import { createSearchTool, ToolRegistry, weatherTool } from "./toolRegistry.js";
import { TurnFailedError } from "../utils/errors.js";
import type { GenerationBackend } from "./aiServices.js";
import type { ChatMessage, Message } from "../models/session.js";

// ============================================
// HELPERS
// ============================================

const WEATHER_CALL = '{"tool_call": {"name": "get_current_weather", "arguments": {"location": "Chicago, IL"}}}';

function scripted(...outputs: string[]) {
  let i = 0;
  return vi.fn<GenerationBackend>(async () => outputs[Math.min(i++, outputs.length - 1)]);
}

function makeRegistry(): ToolRegistry {
  let n = 0;
  const resolve = async (query: string) => ({ answer: `found ${query}`, citations: [] });
  return new ToolRegistry([weatherTool, createSearchTool(resolve)], () => `id-${++n}`);
}

const PROMPT: Message[] = [{ role: "user", text: "What's the weather in Chicago?" }];

function systemPromptOf(call: ChatMessage[]): string {
  const [system] = call;
  expect(system.role).toBe("system");
  return system.content;
}

// ============================================
// TESTS
// ============================================

describe("TurnStateMachine", () => {
  it("returns a plain answer after one generation", async () => {
    const generate = scripted("Hello there.");
    const machine = new TurnStateMachine({ generate, tools: makeRegistry() });

    const outcome = await machine.run(PROMPT, { search: false });

    expect(outcome).toEqual({
      answer: "Hello there.",
      truncated: false,
      toolRounds: 0,
      messages: [{ role: "assistant", text: "Hello there." }],
    });
    expect(generate).toHaveBeenCalledTimes(1);
  });

  it("executes a tool call and generates again with the result", async () => {
    const generate = scripted(WEATHER_CALL, "It's 75 and sunny in Chicago.");
    const machine = new TurnStateMachine({ generate, tools: makeRegistry() });

    const outcome = await machine.run(PROMPT, { search: false });

    expect(outcome.answer).toBe("It's 75 and sunny in Chicago.");
    expect(outcome.toolRounds).toBe(1);
    expect(outcome.messages).toEqual([
      { role: "assistant", text: WEATHER_CALL },
      {
        role: "tool",
        text: "It's 75 degrees Fahrenheit and sunny in Chicago, IL. There's a slight breeze.",
        tool_name: "get_current_weather",
        tool_call_id: "id-1",
      },
      { role: "assistant", text: "It's 75 and sunny in Chicago." },
    ]);

    const secondCall = generate.mock.calls[1][0];
    expect(secondCall.slice(1)).toEqual([
      { role: "user", content: "What's the weather in Chicago?" },
      { role: "assistant", content: WEATHER_CALL },
      {
        role: "user",
        content:
          "Tool result for get_current_weather: It's 75 degrees Fahrenheit and sunny in Chicago, IL. There's a slight breeze.",
      },
    ]);
  });

  it("reports an unknown tool back to the model and carries on", async () => {
    const generate = scripted('{"tool_call": {"name": "get_stock_price", "arguments": {}}}', "I can't check stocks.");
    const machine = new TurnStateMachine({ generate, tools: makeRegistry() });

    const outcome = await machine.run(PROMPT, { search: false });

    expect(outcome.messages[1]).toEqual({
      role: "tool",
      text: "Tool get_stock_price not found",
      tool_name: "get_stock_price",
      tool_call_id: "id-1",
    });
    expect(outcome.answer).toBe("I can't check stocks.");
  });

  it("strips reasoning blocks from generated text", async () => {
    const generate = scripted(`<think>they want weather</think>\n${WEATHER_CALL}`, "<think>done</think> Sunny.");
    const machine = new TurnStateMachine({ generate, tools: makeRegistry() });

    const outcome = await machine.run(PROMPT, { search: false });

    expect(outcome.messages[0]).toEqual({ role: "assistant", text: WEATHER_CALL });
    expect(outcome.answer).toBe("Sunny.");
  });

  it("stops at the tool round bound and flags truncation", async () => {
    const generate = scripted(WEATHER_CALL);
    const machine = new TurnStateMachine({ generate, tools: makeRegistry(), maxToolIterations: 5 });

    const outcome = await machine.run(PROMPT, { search: false });

    expect(outcome.truncated).toBe(true);
    expect(outcome.toolRounds).toBe(5);
    expect(outcome.answer).toBe(WEATHER_CALL);
    expect(generate).toHaveBeenCalledTimes(6);
  });

  it("honours a smaller bound", async () => {
    const generate = scripted(WEATHER_CALL);
    const machine = new TurnStateMachine({ generate, tools: makeRegistry(), maxToolIterations: 1 });

    const outcome = await machine.run(PROMPT, { search: true });
    expect(outcome.toolRounds).toBe(1);
    expect(generate).toHaveBeenCalledTimes(2);
  });

  it("ends the turn on prose that only mentions tool_call", async () => {
    const generate = scripted("You could send a tool_call for that, but the answer is 4.");
    const machine = new TurnStateMachine({ generate, tools: makeRegistry() });

    const outcome = await machine.run(PROMPT, { search: false });
    expect(outcome.answer).toBe("You could send a tool_call for that, but the answer is 4.");
    expect(outcome.toolRounds).toBe(0);
  });

  it("advertises web lookup only for calls that enable it", async () => {
    const generate = scripted("ok");
    const machine = new TurnStateMachine({ generate, tools: makeRegistry() });

    await machine.run(PROMPT, { search: false });
    await machine.run(PROMPT, { search: true });
    await machine.run(PROMPT, { search: false });

    const prompts = generate.mock.calls.map(([call]) => systemPromptOf(call));
    expect(prompts.map((p) => p.includes("search_web(query: str)"))).toEqual([false, true, false]);
    expect(prompts.every((p) => p.includes("get_current_weather(location: str)"))).toBe(true);
  });

  it("surfaces backend failure text as the answer", async () => {
    const generate = scripted("Error: request timed out (model is taking too long).");
    const machine = new TurnStateMachine({ generate, tools: makeRegistry() });

    const outcome = await machine.run(PROMPT, { search: false });
    expect(outcome.answer).toBe("Error: request timed out (model is taking too long).");
  });

  it("fails the turn when no text was generated at all", async () => {
    const generate = scripted("<think>nothing to say</think>");
    const machine = new TurnStateMachine({ generate, tools: makeRegistry() });

    await expect(machine.run(PROMPT, { search: false })).rejects.toBeInstanceOf(TurnFailedError);
  });
});

describe("toChatMessages", () => {
  it("maps tool messages onto user content", () => {
    expect(
      toChatMessages([{ role: "tool", text: "42", tool_name: "search_web", tool_call_id: "t1" }])
    ).toEqual([{ role: "user", content: "Tool result for search_web: 42" }]);
  });
});
