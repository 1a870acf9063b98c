import { describe, expect, it } from "vitest";
import {
  createSessionId,
  isValidSessionId,
  resolveSession,
} from "../src/application/session-resolver.js";

describe("resolveSession", () => {
  it("keeps a supplied token", () => {
    expect(resolveSession("3f2a9c")).toEqual({ sid: "3f2a9c", created: false });
  });

  it("maps the same token to the same session every time", () => {
    expect(resolveSession("abc-123").sid).toBe(resolveSession("abc-123").sid);
  });

  it("reports a token trimmed of surrounding whitespace as a new id", () => {
    expect(resolveSession("  abc  ")).toEqual({ sid: "abc", created: true });
  });

  it("issues a new id when no token is supplied", () => {
    const session = resolveSession(undefined);

    expect(session.created).toBe(true);
    expect(session.sid).toMatch(/^[0-9a-f]{32}$/);
  });

  it("issues a new id for unusable tokens", () => {
    for (const token of ["", "   ", "a b", "../etc", "x".repeat(129), 42, {}]) {
      expect(resolveSession(token).created).toBe(true);
    }
  });

  it("uses the first string of a repeated parameter", () => {
    expect(resolveSession(["first", "second"])).toEqual({ sid: "first", created: false });
  });

  it("issues distinct ids", () => {
    const ids = new Set(Array.from({ length: 50 }, () => createSessionId()));
    expect(ids.size).toBe(50);
  });
});

describe("isValidSessionId", () => {
  it("accepts url-safe tokens up to 128 characters", () => {
    expect(isValidSessionId("A-z_09")).toBe(true);
    expect(isValidSessionId("x".repeat(128))).toBe(true);
    expect(isValidSessionId("x".repeat(129))).toBe(false);
    expect(isValidSessionId("a:b")).toBe(false);
  });
});
