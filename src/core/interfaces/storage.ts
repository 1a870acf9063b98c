/**
 * Storage interfaces.
 */

import type { SessionMessage } from "../types/session.js";

/**
 * Interface for session-scoped chat history.
 *
 * Every write trims the session to the configured maximum number of
 * messages and refreshes its time-to-live.
 */
export interface IHistoryStore {
  /**
   * Backend name shown in status output.
   */
  readonly label: string;

  /**
   * Append a message, trim to the newest entries and refresh the TTL.
   */
  append(sessionId: string, role: string, content: string): Promise<void>;

  /**
   * Read the session's messages in conversation order.
   */
  read(sessionId: string): Promise<SessionMessage[]>;

  /**
   * Delete the session's history.
   */
  clear(sessionId: string): Promise<void>;

  /**
   * Number of stored messages.
   */
  count(sessionId: string): Promise<number>;

  /**
   * Remove and return the newest message.
   */
  removeLast(sessionId: string): Promise<SessionMessage | null>;

  /**
   * Remaining lifetime in seconds, null when nothing is stored.
   */
  ttl(sessionId: string): Promise<number | null>;

  /**
   * Check whether the backend is reachable.
   */
  isHealthy(): Promise<boolean>;

  /**
   * Hand out a pending degradation warning once.
   */
  takeWarning(): string | null;

  /**
   * Release connections.
   */
  close(): Promise<void>;
}
