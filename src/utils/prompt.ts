import type { ToolCapability } from "../models/tool.js";

/**
 * System instruction advertising exactly `tools`, with the reply format the
 * turn loop knows how to parse.
 */
export function buildSystemPrompt(tools: ToolCapability[]): string {
  const listing = tools.map((tool) => `  • ${tool.signature}: ${tool.description}`).join("\n");
  const searchEnabled = tools.some((tool) => tool.requiresSearch);
  const intro =
    tools.length === 1 ? "You are a helpful AI assistant with access to an external tool:" : `You are a helpful AI assistant with access to ${tools.length} external tools:`;

  const lines = [
    intro,
    listing,
    "",
    "Call a tool whenever the answer depends on information that is current, real-time or likely to have changed since your training.",
  ];

  if (searchEnabled) {
    lines.push(
      "Use search_web for news, recent events, people's current status and biographical details. When unsure whether what you know is still current, search.",
      "Make search queries specific to what the user asked."
    );
  }

  lines.push(
    "",
    "To call a tool, reply with only a JSON object of exactly this form and nothing around it:",
    "",
    '{"tool_call": {"name": "<tool_name>", "arguments": {"<parameter>": "<value>"}}}',
    "",
    "After the tool result arrives, answer the user in natural language.",
    "If no tool is needed (arithmetic, stable general knowledge), answer directly."
  );
  return lines.join("\n");
}
