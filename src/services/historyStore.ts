import { Redis } from "ioredis";
import { z } from "zod";
import { HISTORY_TTL_SECONDS } from "../config/env.js";
import logger from "../utils/logger.js";
import { errorMessage } from "../utils/errors.js";
import type { Message } from "../models/session.js";

/**
 * Append-only per-user message log with an expiry refreshed on every append.
 * Both backends below implement it identically.
 */
export interface HistoryStore {
  /** Appends all entries as one atomic operation. */
  append(userId: string, entries: Message[]): Promise<void>;
  read(userId: string): Promise<Message[]>;
  clear(userId: string): Promise<void>;
}

const messageSchema = z.discriminatedUnion("role", [
  z.object({ role: z.literal("user"), text: z.string() }),
  z.object({ role: z.literal("assistant"), text: z.string() }),
  z.object({
    role: z.literal("tool"),
    text: z.string(),
    tool_name: z.string(),
    tool_call_id: z.string(),
  }),
]);

function decodeEntry(entry: string): Message | null {
  try {
    const parsed = messageSchema.safeParse(JSON.parse(entry));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

// ----------------------
// Redis
// ----------------------

/** The list commands the Redis store needs. */
export interface RedisListClient {
  appendWithExpiry(key: string, values: string[], ttlSeconds: number): Promise<void>;
  range(key: string): Promise<string[]>;
  remove(key: string): Promise<void>;
}

/** The parts of an ioredis client and its MULTI chain used below. */
export interface ListTransaction {
  rpush(key: string, ...values: string[]): ListTransaction;
  expire(key: string, seconds: number): ListTransaction;
  exec(): Promise<[error: Error | null, result: unknown][] | null>;
}

export interface IoredisLike {
  multi(): ListTransaction;
  lrange(key: string, start: number, stop: number): Promise<string[]>;
  del(key: string): Promise<number>;
}

export function ioredisListClient(client: IoredisLike): RedisListClient {
  return {
    async appendWithExpiry(key, values, ttlSeconds) {
      const replies = await client
        .multi()
        .rpush(key, ...values)
        .expire(key, ttlSeconds)
        .exec();
      const failed = replies?.find(([err]) => err);
      if (!replies || failed) {
        throw new Error(`Redis append to ${key} failed: ${failed?.[0]?.message ?? "transaction aborted"}`);
      }
    },
    range: (key) => client.lrange(key, 0, -1),
    async remove(key) {
      await client.del(key);
    },
  };
}

export class RedisHistoryStore implements HistoryStore {
  private readonly baseKey = "conversation";

  constructor(
    private readonly client: RedisListClient,
    private readonly ttlSeconds: number = HISTORY_TTL_SECONDS
  ) {}

  private key(userId: string): string {
    return `${this.baseKey}:${userId}`;
  }

  async append(userId: string, entries: Message[]): Promise<void> {
    if (!entries.length) return;
    await this.client.appendWithExpiry(
      this.key(userId),
      entries.map((e) => JSON.stringify(e)),
      this.ttlSeconds
    );
  }

  async read(userId: string): Promise<Message[]> {
    const raw = await this.client.range(this.key(userId));
    const messages: Message[] = [];
    for (const entry of raw) {
      const message = decodeEntry(entry);
      if (message) messages.push(message);
      else logger.warn(`Skipping malformed history entry for ${userId}`);
    }
    return messages;
  }

  async clear(userId: string): Promise<void> {
    await this.client.remove(this.key(userId));
  }
}

// ----------------------
// In-process fallback
// ----------------------
interface MemoryEntry {
  messages: Message[];
  expiresAt: number;
}

export class InMemoryHistoryStore implements HistoryStore {
  private readonly logs = new Map<string, MemoryEntry>();

  constructor(
    private readonly ttlSeconds: number = HISTORY_TTL_SECONDS,
    private readonly now: () => number = Date.now
  ) {}

  private live(userId: string): MemoryEntry | undefined {
    const entry = this.logs.get(userId);
    if (entry && entry.expiresAt <= this.now()) {
      this.logs.delete(userId);
      return undefined;
    }
    return entry;
  }

  async append(userId: string, entries: Message[]): Promise<void> {
    if (!entries.length) return;
    const entry = this.live(userId) ?? { messages: [], expiresAt: 0 };
    entry.messages.push(...entries.map((e) => ({ ...e })));
    entry.expiresAt = this.now() + this.ttlSeconds * 1000;
    this.logs.set(userId, entry);
  }

  async read(userId: string): Promise<Message[]> {
    return (this.live(userId)?.messages ?? []).map((m) => ({ ...m }));
  }

  async clear(userId: string): Promise<void> {
    this.logs.delete(userId);
  }

  /** Drops every expired log; returns how many were removed. */
  sweep(): number {
    let removed = 0;
    for (const userId of [...this.logs.keys()]) {
      if (!this.live(userId)) removed++;
    }
    return removed;
  }
}

/**
 * Redis when it answers a ping, otherwise the in-process store. Nothing
 * downstream can tell which one it got.
 */
export async function createHistoryStore(url: string): Promise<HistoryStore> {
  const client = new Redis(url, { lazyConnect: true, maxRetriesPerRequest: 1 });
  client.on("error", (err: Error) => logger.debug(`Redis: ${err.message}`));
  try {
    await client.connect();
    await client.ping();
    logger.info(`Conversation history stored in Redis at ${url}`);
    return new RedisHistoryStore(ioredisListClient(client));
  } catch (err) {
    logger.warn(`Redis unavailable (${errorMessage(err)}); keeping conversation history in memory`);
    client.disconnect();
    return new InMemoryHistoryStore();
  }
}
