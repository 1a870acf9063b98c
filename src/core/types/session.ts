/**
 * Session types for conversation history.
 */

/**
 * Roles a stored message may carry.
 */
export const MESSAGE_ROLES = ["user", "assistant", "system"] as const;

export type MessageRole = (typeof MESSAGE_ROLES)[number];

/**
 * A message in the session history.
 */
export interface SessionMessage {
  role: MessageRole;
  content: string;
  /** ISO-8601 instant of the write */
  timestamp: string;
}

/**
 * Result of resolving a browser-supplied session token.
 */
export interface ResolvedSession {
  /** Session id, also the history partition key */
  sid: string;
  /** True when `sid` differs from the supplied token and the client must adopt it */
  created: boolean;
}

/**
 * Snapshot of the chat runtime for status displays.
 */
export interface ChatStatus {
  env: string;
  model: string;
  backend: string;
  keyPrefix: string;
  /** One-time degradation notice, null once it has been handed out */
  warning: string | null;
}
