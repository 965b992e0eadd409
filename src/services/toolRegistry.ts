import { randomUUID } from "node:crypto";
import logger from "../utils/logger.js";
import { errorMessage } from "../utils/errors.js";
import { normalize, optionalPositiveInt, requireString } from "./validationService.js";
import { resolveKnowledge } from "./knowledgeResolver.js";
import type { SearchAnswer } from "../models/search.js";
import type { ToolArguments, ToolCallDirective, ToolCapability, ToolName, ToolResult } from "../models/tool.js";

// ------------------ Weather (canned stub) ------------------
const CANNED_WEATHER: Array<{ match: string; report: string }> = [
  { match: "chicago, il", report: "It's 75 degrees Fahrenheit and sunny in Chicago, IL. There's a slight breeze." },
  { match: "new york, ny", report: "It's 80 degrees Fahrenheit and humid in New York, NY." },
];

export function currentWeather(location: string): string {
  const key = normalize(location);
  const hit = CANNED_WEATHER.find((entry) => key.includes(entry.match));
  return hit ? hit.report : `Weather information not available for ${location}.`;
}

export const weatherTool: ToolCapability = {
  name: "get_current_weather",
  signature: "get_current_weather(location: str)",
  description: 'current weather for a city and state, e.g. "Chicago, IL"',
  requiresSearch: false,
  async invoke(args: ToolArguments) {
    return currentWeather(requireString(args, "location"));
  },
};

// ------------------ Web lookup ------------------
export type Resolve = (query: string, opts: { sentences: number }) => Promise<SearchAnswer>;

export function formatAnswer({ answer, citations }: SearchAnswer): string {
  if (!citations.length) return answer;
  return `${answer}\n\nSources:\n${citations.map((c) => `- ${c}`).join("\n")}`;
}

export function createSearchTool(resolve: Resolve = (q, opts) => resolveKnowledge(q, opts)): ToolCapability {
  return {
    name: "search_web",
    signature: "search_web(query: str)",
    description:
      "look up current information, recent events, real-time data or facts about people, places and organisations that may have changed since training",
    requiresSearch: true,
    async invoke(args: ToolArguments) {
      const query = requireString(args, "query");
      const sentences = optionalPositiveInt(args, "sentences", 3);
      return formatAnswer(await resolve(query, { sentences }));
    },
  };
}

// ------------------ Registry ------------------
const REQUIRED_TOOLS: ToolName[] = ["get_current_weather", "search_web"];

/**
 * Fixed name → capability mapping, validated once at construction. Dispatch
 * never throws: unknown names and capability failures become result text.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, ToolCapability>();

  constructor(capabilities: ToolCapability[], private readonly newCallId: () => string = randomUUID) {
    for (const capability of capabilities) {
      if (!capability.name.trim()) throw new Error("Tool name must not be empty");
      if (this.tools.has(capability.name)) throw new Error(`Duplicate tool: ${capability.name}`);
      this.tools.set(capability.name, capability);
    }
    const missing = REQUIRED_TOOLS.filter((name) => !this.tools.has(name));
    if (missing.length) throw new Error(`Missing required tools: ${missing.join(", ")}`);
  }

  /** Capabilities to advertise for one call. */
  enabled(search: boolean): ToolCapability[] {
    return [...this.tools.values()].filter((tool) => search || !tool.requiresSearch);
  }

  async dispatch(directive: ToolCallDirective): Promise<ToolResult> {
    const tool_call_id = this.newCallId();
    const { name } = directive;
    const tool = this.tools.get(name);

    if (!tool) {
      logger.warn(`Model asked for unknown tool "${name}"`);
      return { name, tool_call_id, content: `Tool ${name} not found` };
    }

    logger.info(`Dispatching tool ${name}`, { tool_call_id, args: Object.keys(directive.arguments) });
    try {
      return { name, tool_call_id, content: await tool.invoke(directive.arguments) };
    } catch (err) {
      logger.warn(`Tool ${name} failed: ${errorMessage(err)}`);
      return { name, tool_call_id, content: `Tool ${name} failed: ${errorMessage(err)}` };
    }
  }
}

export function createToolRegistry(resolve?: Resolve): ToolRegistry {
  return new ToolRegistry([weatherTool, createSearchTool(resolve)]);
}
