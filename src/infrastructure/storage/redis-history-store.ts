/**
 * Redis-backed history storage.
 */

import type { IHistoryStore } from "../../core/interfaces/storage.js";
import type { SessionMessage } from "../../core/types/session.js";
import type { RedisListClient } from "./redis-client.js";
import { createMessage, decodeMessage, encodeMessage } from "./message-codec.js";
import logger from "../../utils/logger.js";

export interface RedisHistoryStoreOptions {
  client: RedisListClient;
  maxTurns: number;
  ttlSeconds: number;
  /** Namespace for keys, normally the environment name */
  keyPrefix: string;
}

/**
 * History stored as one Redis list per session.
 *
 * Each element is a JSON-encoded message. Every append trims the list to the
 * newest `maxTurns` elements and resets the key's expiry. Errors are not
 * caught here; see FallbackHistoryStore.
 */
export class RedisHistoryStore implements IHistoryStore {
  readonly label = "redis";

  private client: RedisListClient;
  private maxTurns: number;
  private ttlSeconds: number;
  private keyPrefix: string;

  constructor(options: RedisHistoryStoreOptions) {
    this.client = options.client;
    this.maxTurns = options.maxTurns;
    this.ttlSeconds = options.ttlSeconds;
    this.keyPrefix = options.keyPrefix;
  }

  /**
   * Key holding a session's messages.
   */
  keyFor(sessionId: string): string {
    return `${this.keyPrefix}:session:${sessionId}:messages`;
  }

  async append(sessionId: string, role: string, content: string): Promise<void> {
    const key = this.keyFor(sessionId);
    await this.client.rpush(key, encodeMessage(createMessage(role, content)));
    await this.client.ltrim(key, -this.maxTurns, -1);
    await this.client.expire(key, this.ttlSeconds);
  }

  async read(sessionId: string): Promise<SessionMessage[]> {
    const items = await this.client.lrange(this.keyFor(sessionId), 0, -1);
    const messages: SessionMessage[] = [];

    for (const item of items) {
      const message = decodeMessage(item);
      if (message) {
        messages.push(message);
      } else {
        logger.debug({ sessionId }, "Skipping malformed history entry");
      }
    }

    return messages;
  }

  async clear(sessionId: string): Promise<void> {
    await this.client.del(this.keyFor(sessionId));
  }

  async count(sessionId: string): Promise<number> {
    return this.client.llen(this.keyFor(sessionId));
  }

  async removeLast(sessionId: string): Promise<SessionMessage | null> {
    const raw = await this.client.rpop(this.keyFor(sessionId));
    return raw === null ? null : decodeMessage(raw);
  }

  async ttl(sessionId: string): Promise<number | null> {
    // -2: no key, -1: key without expiry
    const seconds = await this.client.ttl(this.keyFor(sessionId));
    return seconds < 0 ? null : seconds;
  }

  async isHealthy(): Promise<boolean> {
    try {
      return (await this.client.ping()) === "PONG";
    } catch (error) {
      logger.debug({ error }, "Redis ping failed");
      return false;
    }
  }

  takeWarning(): string | null {
    return null;
  }

  async close(): Promise<void> {
    this.client.disconnect();
  }
}
