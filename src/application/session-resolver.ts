/**
 * Session identity for browser conversations.
 *
 * The session id travels in the `sid` URL parameter. A missing or unusable
 * token is a normal first visit, never an error: a fresh id is issued and the
 * caller is expected to echo it back to the client.
 */

import { randomUUID } from "crypto";
import type { ResolvedSession } from "../core/types/session.js";

/** Name of the URL parameter carrying the session id. */
export const SESSION_PARAM = "sid";

const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;

/**
 * Issue a new random session id (32 hex characters).
 */
export function createSessionId(): string {
  return randomUUID().replace(/-/g, "");
}

/**
 * Check whether a token can be used as a session id.
 */
export function isValidSessionId(token: string): boolean {
  return SESSION_ID_PATTERN.test(token);
}

/**
 * Return the supplied token when usable, otherwise a new id.
 *
 * A token that only needed surrounding whitespace removed is reported as
 * created, so the caller sends the normalized id back.
 *
 * Accepts whatever a query string parser produced; arrays use their first
 * string element.
 */
export function resolveSession(token?: unknown): ResolvedSession {
  const candidate = Array.isArray(token) ? token.find((item) => typeof item === "string") : token;

  if (typeof candidate === "string") {
    const trimmed = candidate.trim();
    if (isValidSessionId(trimmed)) {
      return { sid: trimmed, created: trimmed !== candidate };
    }
  }

  return { sid: createSessionId(), created: true };
}
