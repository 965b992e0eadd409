export type ToolArguments = Record<string, unknown>;

/** Parsed `{"tool_call": {...}}` instruction emitted by the model. */
export interface ToolCallDirective {
  name: string;
  arguments: ToolArguments;
}

export interface ToolResult {
  name: string;
  tool_call_id: string;
  content: string;
}

export type ToolName = "get_current_weather" | "search_web";

export interface ToolCapability {
  name: ToolName;
  /** Signature line advertised in the system instruction. */
  signature: string;
  description: string;
  /** Advertised only when the caller enabled web lookup for this call. */
  requiresSearch: boolean;
  invoke(args: ToolArguments): Promise<string>;
}
