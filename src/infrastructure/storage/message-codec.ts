/**
 * Conversion between stored entries and session messages.
 */

import { z } from "zod";
import { MESSAGE_ROLES, type MessageRole, type SessionMessage } from "../../core/types/session.js";

const StoredMessageSchema = z.object({
  role: z.enum(MESSAGE_ROLES),
  content: z.string(),
  timestamp: z.string(),
});

/**
 * Unknown roles are stored as user messages.
 */
export function normalizeRole(role: string): MessageRole {
  return MESSAGE_ROLES.find((known) => known === role) ?? "user";
}

export function createMessage(role: string, content: string, now: Date = new Date()): SessionMessage {
  return {
    role: normalizeRole(role),
    content,
    timestamp: now.toISOString(),
  };
}

export function encodeMessage(message: SessionMessage): string {
  return JSON.stringify(message);
}

/**
 * Parse a stored entry, or null when it is malformed.
 */
export function decodeMessage(raw: string): SessionMessage | null {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return null;
  }
  const result = StoredMessageSchema.safeParse(value);
  return result.success ? result.data : null;
}
