/**
 * Storage infrastructure exports.
 */

import type { IHistoryStore } from "../../core/interfaces/storage.js";
import type { Config } from "../../core/types/config.js";
import { getKeyPrefix } from "../config/schema.js";
import { MemoryHistoryStore } from "./memory-history-store.js";
import { RedisHistoryStore } from "./redis-history-store.js";
import { FallbackHistoryStore } from "./fallback-history-store.js";
import { createRedisClient, type RedisListClient } from "./redis-client.js";

export { MemoryHistoryStore, type MemoryHistoryStoreOptions } from "./memory-history-store.js";
export { RedisHistoryStore, type RedisHistoryStoreOptions } from "./redis-history-store.js";
export { FallbackHistoryStore, FALLBACK_WARNING, type BackendState } from "./fallback-history-store.js";
export { createRedisClient, type RedisListClient } from "./redis-client.js";
export { normalizeRole, createMessage, encodeMessage, decodeMessage } from "./message-codec.js";

/**
 * Build the history store for a configuration.
 *
 * Without a Redis URL history lives in memory and no warning is raised.
 */
export function createHistoryStore(
  config: Config,
  connect: (url: string) => RedisListClient = createRedisClient,
): IHistoryStore {
  const { redisUrl, maxTurns, ttlSeconds } = config.history;
  const memory = new MemoryHistoryStore({ maxTurns, ttlSeconds });

  if (!redisUrl) {
    return memory;
  }

  const redis = new RedisHistoryStore({
    client: connect(redisUrl),
    maxTurns,
    ttlSeconds,
    keyPrefix: getKeyPrefix(config),
  });
  return new FallbackHistoryStore(redis, memory);
}
