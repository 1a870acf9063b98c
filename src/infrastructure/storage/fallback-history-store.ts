/**
 * Backend selection between Redis and process memory.
 */

import type { IHistoryStore } from "../../core/interfaces/storage.js";
import type { SessionMessage } from "../../core/types/session.js";
import logger from "../../utils/logger.js";

export const FALLBACK_WARNING =
  "Redis is configured but unreachable; using in-memory history for this session.";

export type BackendState = "pending" | "primary" | "fallback";

/**
 * Routes history operations to a primary store, switching to a fallback
 * store for the rest of the process once the primary fails.
 *
 * The primary is probed on first use. A failed probe, or any later error
 * from the primary, makes the switch; there is no way back. The warning for
 * the UI is handed out once through takeWarning().
 */
export class FallbackHistoryStore implements IHistoryStore {
  private primary: IHistoryStore;
  private fallback: IHistoryStore;
  private _state: BackendState = "pending";
  private selection: Promise<IHistoryStore> | null = null;
  private pendingWarning: string | null = null;

  constructor(primary: IHistoryStore, fallback: IHistoryStore) {
    this.primary = primary;
    this.fallback = fallback;
  }

  get state(): BackendState {
    return this._state;
  }

  get label(): string {
    switch (this._state) {
      case "primary":
        return this.primary.label;
      case "fallback":
        return `${this.fallback.label} (fallback)`;
      default:
        return "pending";
    }
  }

  /**
   * Resolve the active backend, probing the primary the first time.
   */
  async select(): Promise<IHistoryStore> {
    if (this._state === "primary") return this.primary;
    if (this._state === "fallback") return this.fallback;

    if (!this.selection) {
      this.selection = this.probe();
    }
    return this.selection;
  }

  private async probe(): Promise<IHistoryStore> {
    const healthy = await this.primary.isHealthy();
    if (this._state === "fallback") {
      return this.fallback;
    }
    if (healthy) {
      this._state = "primary";
      logger.info({ backend: this.primary.label }, "History backend selected");
      return this.primary;
    }
    this.degrade("probe failed");
    return this.fallback;
  }

  private degrade(reason: string, error?: unknown): void {
    if (this._state === "fallback") return;

    this._state = "fallback";
    this.pendingWarning = FALLBACK_WARNING;
    logger.warn(
      { backend: this.primary.label, fallback: this.fallback.label, reason, error },
      "History backend unavailable, switching to fallback",
    );
  }

  private async run<T>(operation: (store: IHistoryStore) => Promise<T>): Promise<T> {
    const store = await this.select();
    if (store === this.fallback) {
      return operation(this.fallback);
    }

    try {
      return await operation(store);
    } catch (error) {
      this.degrade("operation failed", error);
      return operation(this.fallback);
    }
  }

  append(sessionId: string, role: string, content: string): Promise<void> {
    return this.run((store) => store.append(sessionId, role, content));
  }

  read(sessionId: string): Promise<SessionMessage[]> {
    return this.run((store) => store.read(sessionId));
  }

  clear(sessionId: string): Promise<void> {
    return this.run((store) => store.clear(sessionId));
  }

  count(sessionId: string): Promise<number> {
    return this.run((store) => store.count(sessionId));
  }

  removeLast(sessionId: string): Promise<SessionMessage | null> {
    return this.run((store) => store.removeLast(sessionId));
  }

  ttl(sessionId: string): Promise<number | null> {
    return this.run((store) => store.ttl(sessionId));
  }

  async isHealthy(): Promise<boolean> {
    const store = await this.select();
    return store.isHealthy();
  }

  takeWarning(): string | null {
    const warning = this.pendingWarning;
    this.pendingWarning = null;
    return warning;
  }

  async close(): Promise<void> {
    await Promise.all([this.primary.close(), this.fallback.close()]);
  }
}
