/**
 * Redis connection factory.
 */

import { Redis } from "ioredis";
import logger from "../../utils/logger.js";

/**
 * The subset of Redis list commands the history store issues.
 */
export interface RedisListClient {
  rpush(key: string, ...values: string[]): Promise<number>;
  ltrim(key: string, start: number, stop: number): Promise<unknown>;
  expire(key: string, seconds: number): Promise<number>;
  lrange(key: string, start: number, stop: number): Promise<string[]>;
  llen(key: string): Promise<number>;
  rpop(key: string): Promise<string | null>;
  del(...keys: string[]): Promise<number>;
  ttl(key: string): Promise<number>;
  ping(): Promise<string>;
  disconnect(): void;
}

/**
 * Create a client that fails fast instead of reconnecting.
 *
 * Commands issued while the first connection attempt is in flight are
 * queued; once that attempt fails they are rejected and the client stays
 * closed, which the fallback store treats as a permanent switch to memory.
 */
export function createRedisClient(url: string): RedisListClient {
  const client = new Redis(url, {
    connectTimeout: 2000,
    commandTimeout: 2000,
    maxRetriesPerRequest: 0,
    retryStrategy: () => null,
  });

  client.on("error", (error: Error) => {
    logger.debug({ error: error.message }, "Redis client error");
  });

  return client;
}
