import type { HistoryStore } from "./historyStore.js";
import type { HistoryEntry, Message, Role } from "../models/session.js";

/**
 * One user's conversation log. The only way the rest of the system touches
 * stored history; which store backs it is not visible from here.
 */
export class ConversationSession {
  constructor(
    private readonly store: HistoryStore,
    readonly userId: string
  ) {}

  /** Appends a plain user or assistant message. */
  async add(role: Exclude<Role, "tool">, text: string): Promise<void> {
    await this.store.append(this.userId, [{ role, text }]);
  }

  /** Appends a finished turn's messages in one atomic write. */
  async commit(messages: Message[]): Promise<void> {
    await this.store.append(this.userId, messages);
  }

  async read(): Promise<Message[]> {
    return this.store.read(this.userId);
  }

  async clear(): Promise<void> {
    await this.store.clear(this.userId);
  }

  /** Copy of the user-role messages, used to seed the next turn's prompt. */
  async userPrompts(): Promise<Message[]> {
    return (await this.read()).filter((m) => m.role === "user").map((m): Message => ({ role: "user", text: m.text }));
  }

  async entries(): Promise<HistoryEntry[]> {
    return (await this.read()).map(({ role, text }) => ({ role, text }));
  }
}
