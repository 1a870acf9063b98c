/**
 * In-process history storage.
 */

import type { IHistoryStore } from "../../core/interfaces/storage.js";
import type { SessionMessage } from "../../core/types/session.js";
import { createMessage } from "./message-codec.js";

export interface MemoryHistoryStoreOptions {
  maxTurns: number;
  ttlSeconds: number;
  /** Clock in epoch milliseconds */
  now?: () => number;
}

/** Minimum time between sweeps of expired sessions. */
const SWEEP_INTERVAL_MS = 60_000;

interface MemoryEntry {
  messages: SessionMessage[];
  expiresAt: number;
}

/**
 * History kept in a map owned by this instance.
 *
 * Used when no Redis URL is configured and as the fallback when Redis is
 * unreachable. Expired sessions are dropped on access, and appends sweep
 * out every expired session at most once per minute.
 */
export class MemoryHistoryStore implements IHistoryStore {
  readonly label = "memory";

  private entries: Map<string, MemoryEntry> = new Map();
  private maxTurns: number;
  private ttlMs: number;
  private now: () => number;
  private lastSweep: number;

  constructor(options: MemoryHistoryStoreOptions) {
    this.maxTurns = options.maxTurns;
    this.ttlMs = options.ttlSeconds * 1000;
    this.now = options.now ?? Date.now;
    this.lastSweep = this.now();
  }

  private sweep(): void {
    const now = this.now();
    if (now - this.lastSweep < SWEEP_INTERVAL_MS) {
      return;
    }
    this.lastSweep = now;
    for (const [sessionId, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(sessionId);
      }
    }
  }

  private live(sessionId: string): MemoryEntry | undefined {
    const entry = this.entries.get(sessionId);
    if (entry && entry.expiresAt <= this.now()) {
      this.entries.delete(sessionId);
      return undefined;
    }
    return entry;
  }

  async append(sessionId: string, role: string, content: string): Promise<void> {
    this.sweep();
    const entry = this.live(sessionId) ?? { messages: [], expiresAt: 0 };
    entry.messages.push(createMessage(role, content, new Date(this.now())));

    const overflow = entry.messages.length - this.maxTurns;
    if (overflow > 0) {
      entry.messages.splice(0, overflow);
    }

    entry.expiresAt = this.now() + this.ttlMs;
    this.entries.set(sessionId, entry);
  }

  async read(sessionId: string): Promise<SessionMessage[]> {
    const entry = this.live(sessionId);
    return entry ? entry.messages.map((message) => ({ ...message })) : [];
  }

  async clear(sessionId: string): Promise<void> {
    this.entries.delete(sessionId);
  }

  async count(sessionId: string): Promise<number> {
    return this.live(sessionId)?.messages.length ?? 0;
  }

  async removeLast(sessionId: string): Promise<SessionMessage | null> {
    const entry = this.live(sessionId);
    const message = entry?.messages.pop() ?? null;
    if (entry && entry.messages.length === 0) {
      this.entries.delete(sessionId);
    }
    return message;
  }

  async ttl(sessionId: string): Promise<number | null> {
    const entry = this.live(sessionId);
    if (!entry) {
      return null;
    }
    return Math.ceil((entry.expiresAt - this.now()) / 1000);
  }

  async isHealthy(): Promise<boolean> {
    return true;
  }

  takeWarning(): string | null {
    return null;
  }

  async close(): Promise<void> {
    this.entries.clear();
  }

  /**
   * Number of sessions currently held.
   */
  get size(): number {
    return this.entries.size;
  }
}
