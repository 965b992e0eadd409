import { z } from "zod";
import type { ToolCallDirective } from "../models/tool.js";

const TOOL_CALL_TOKEN = "tool_call";

const directiveSchema = z.object({
  tool_call: z.object({
    name: z.string().min(1),
    arguments: z.record(z.unknown()),
  }),
});

function parseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

function toDirective(value: unknown): ToolCallDirective | null {
  const parsed = directiveSchema.safeParse(value);
  return parsed.success ? { name: parsed.data.tool_call.name, arguments: parsed.data.tool_call.arguments } : null;
}

export type DirectiveScan =
  | { kind: "none" }
  | { kind: "directive"; directive: ToolCallDirective }
  /** The token appeared but no directive could be recovered from the text. */
  | { kind: "mention" };

/**
 * Looks for `{"tool_call": {"name": ..., "arguments": {...}}}` in model output.
 *
 * The whole text is parsed strictly first. Only if that is not JSON at all
 * does the looser check run: the literal token anywhere in the text, then
 * the outermost `{...}` span parsed on its own. Prose that merely mentions
 * the token is reported as a `mention`.
 */
export function scanForToolCall(text: string): DirectiveScan {
  const strict = parseJson(text.trim());
  if (strict.ok) {
    const directive = toDirective(strict.value);
    return directive ? { kind: "directive", directive } : { kind: "none" };
  }

  if (!text.includes(TOOL_CALL_TOKEN)) return { kind: "none" };

  const open = text.indexOf("{");
  const close = text.lastIndexOf("}");
  if (open !== -1 && close > open) {
    const embedded = parseJson(text.slice(open, close + 1));
    const directive = embedded.ok ? toDirective(embedded.value) : null;
    if (directive) return { kind: "directive", directive };
  }
  return { kind: "mention" };
}

const THINK_BLOCK = /<think>[\s\S]*?<\/think>\s*/g;

/** Drops private `<think>…</think>` reasoning blocks in one pass. */
export function stripReasoning(text: string): string {
  return text.replace(THINK_BLOCK, "").trim();
}
