import logger from "../utils/logger.js";
import { TurnFailedError } from "../utils/errors.js";
import { buildSystemPrompt } from "../utils/prompt.js";
import { scanForToolCall, stripReasoning } from "../utils/toolCall.js";
import { MAX_TOOL_ITERATIONS } from "../config/env.js";
import type { GenerationBackend } from "./aiServices.js";
import type { ToolRegistry } from "./toolRegistry.js";
import type { AssistantMessage, ChatMessage, Message } from "../models/session.js";
import type { ToolCallDirective } from "../models/tool.js";

export type TurnState = "GENERATE" | "CHECK_FOR_TOOL_CALL" | "EXECUTE_TOOL" | "DONE";

export interface TurnOptions {
  /** Advertise the web lookup tool for this call only. */
  search: boolean;
}

export interface TurnOutcome {
  answer: string;
  /** The tool-call bound was hit; `answer` is the last text generated. */
  truncated: boolean;
  toolRounds: number;
  /** Messages produced during the turn, in order. */
  messages: Message[];
}

export interface TurnMachineOptions {
  generate: GenerationBackend;
  tools: ToolRegistry;
  maxToolIterations?: number;
}

export function toChatMessages(messages: Message[]): ChatMessage[] {
  return messages.map((m): ChatMessage => {
    switch (m.role) {
      case "user":
        return { role: "user", content: m.text };
      case "assistant":
        return { role: "assistant", content: m.text };
      case "tool":
        // the backend takes no tool role; results go back as user content
        return { role: "user", content: `Tool result for ${m.tool_name}: ${m.text}` };
    }
  });
}

/**
 * Drives one conversational turn: generate, look for a tool directive,
 * execute it and generate again, until plain text comes back or the tool
 * round bound is reached.
 */
export class TurnStateMachine {
  private readonly generate: GenerationBackend;
  private readonly tools: ToolRegistry;
  private readonly maxToolIterations: number;

  constructor({ generate, tools, maxToolIterations = MAX_TOOL_ITERATIONS }: TurnMachineOptions) {
    this.generate = generate;
    this.tools = tools;
    this.maxToolIterations = maxToolIterations;
  }

  async run(history: Message[], { search }: TurnOptions): Promise<TurnOutcome> {
    const systemPrompt = buildSystemPrompt(this.tools.enabled(search));
    const working: Message[] = [...history];
    const produced: Message[] = [];
    const append = (message: Message) => {
      working.push(message);
      produced.push(message);
    };

    let state: TurnState = "GENERATE";
    let last: AssistantMessage = { role: "assistant", text: "" };
    let pending: ToolCallDirective | null = null;
    let toolRounds = 0;
    let truncated = false;

    while (state !== "DONE") {
      logger.debug(`Turn state ${state}`, { toolRounds });

      switch (state) {
        case "GENERATE": {
          const raw = await this.generate([{ role: "system", content: systemPrompt }, ...toChatMessages(working)]);
          last = { role: "assistant", text: stripReasoning(raw) };
          append(last);
          state = "CHECK_FOR_TOOL_CALL";
          break;
        }

        case "CHECK_FOR_TOOL_CALL": {
          const scan = scanForToolCall(last.text);
          if (scan.kind === "mention") {
            logger.warn("Output mentions tool_call but carries no parsable directive; treating it as the answer");
          }
          if (scan.kind !== "directive") {
            state = "DONE";
          } else if (toolRounds >= this.maxToolIterations) {
            logger.warn(`Tool call bound of ${this.maxToolIterations} reached; returning last output`);
            truncated = true;
            state = "DONE";
          } else {
            pending = scan.directive;
            state = "EXECUTE_TOOL";
          }
          break;
        }

        case "EXECUTE_TOOL": {
          if (!pending) throw new Error("EXECUTE_TOOL entered without a directive");
          const result = await this.tools.dispatch(pending);
          append({ role: "tool", text: result.content, tool_name: result.name, tool_call_id: result.tool_call_id });
          pending = null;
          toolRounds++;
          state = "GENERATE";
          break;
        }
      }
    }

    const answer = last.text || [...produced].reverse().find((m) => m.role === "assistant" && m.text)?.text;
    if (!answer) {
      throw new TurnFailedError("The generation backend produced no answer text for this turn");
    }
    return { answer, truncated, toolRounds, messages: produced };
  }
}
