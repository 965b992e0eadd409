import logger from "../utils/logger.js";
import { ConversationSession } from "./sessionService.js";
import type { HistoryStore } from "./historyStore.js";
import type { TurnStateMachine } from "./turnMachine.js";
import type { HistoryEntry, Message } from "../models/session.js";

export const DEFAULT_USER_ID = "default";

export interface HandleOptions {
  search: boolean;
  userId?: string;
}

export interface ChatReply {
  response: string;
}

export class Agent {
  constructor(
    private readonly store: HistoryStore,
    private readonly machine: TurnStateMachine
  ) {}

  private session(userId: string): ConversationSession {
    return new ConversationSession(this.store, userId);
  }

  /**
   * Runs one turn for `userId`. The prompt and everything the turn produced
   * are written to history only once the turn has an answer.
   */
  async handle(prompt: string, { search, userId = DEFAULT_USER_ID }: HandleOptions): Promise<ChatReply> {
    const session = this.session(userId);
    const userMessage: Message = { role: "user", text: prompt };
    const history = [...(await session.userPrompts()), userMessage];

    const outcome = await this.machine.run(history, { search });
    if (outcome.truncated) {
      logger.warn(`Turn for ${userId} stopped at the tool call bound after ${outcome.toolRounds} rounds`);
    }

    await session.commit([userMessage, ...outcome.messages]);
    return { response: outcome.answer };
  }

  async getHistory(userId: string = DEFAULT_USER_ID): Promise<HistoryEntry[]> {
    return this.session(userId).entries();
  }

  async clearHistory(userId: string = DEFAULT_USER_ID): Promise<void> {
    await this.session(userId).clear();
  }
}
