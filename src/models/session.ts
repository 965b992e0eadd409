export type Role = "user" | "assistant" | "tool";

export interface UserMessage {
  role: "user";
  text: string;
}

export interface AssistantMessage {
  role: "assistant";
  text: string;
}

export interface ToolMessage {
  role: "tool";
  text: string;
  tool_name: string;
  tool_call_id: string;
}

/** One turn of conversation. Order within a session is append-only. */
export type Message = UserMessage | AssistantMessage | ToolMessage;

/** Shape returned by the raw history query. */
export interface HistoryEntry {
  role: Role;
  text: string;
}

/** Message shape accepted by the generation backend. */
export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}
