import { describe, expect, it } from "vitest";
import { APICallError, LoadAPIKeyError, RetryError } from "ai";
import { ChatError, ConfigValidationError } from "../src/core/errors.js";
import {
  classifyError,
  humanizeError,
  invalidInputError,
  toChatError,
} from "../src/application/error-humanizer.js";

function apiError(statusCode: number, message = "Request failed"): APICallError {
  return new APICallError({
    message,
    url: "https://api.example.test/v1/chat/completions",
    requestBodyValues: {},
    statusCode,
  });
}

describe("classifyError", () => {
  it.each([
    [401, "auth"],
    [403, "permission"],
    [429, "rate_limit"],
    [408, "timeout"],
    [504, "timeout"],
    [503, "connection"],
  ])("maps status %i to %s", (status, category) => {
    expect(classifyError(apiError(status))).toBe(category);
  });

  it("treats a missing api key as an auth error", () => {
    expect(classifyError(new LoadAPIKeyError({ message: "OpenAI API key is missing." }))).toBe("auth");
  });

  it("looks through retry wrappers", () => {
    const error = new RetryError({
      message: "Failed after 3 attempts",
      reason: "maxRetriesExceeded",
      errors: [apiError(500), apiError(429)],
    });
    expect(classifyError(error)).toBe("rate_limit");
  });

  it("recognizes network failures from the cause chain", () => {
    const socketError = Object.assign(new Error("connect ECONNREFUSED 10.0.0.1:443"), {
      code: "ECONNREFUSED",
    });
    expect(classifyError(new TypeError("fetch failed", { cause: socketError }))).toBe("connection");
  });

  it("recognizes timeouts by code", () => {
    const error = Object.assign(new Error("socket hang"), { code: "ETIMEDOUT" });
    expect(classifyError(error)).toBe("timeout");
  });

  it("falls back to message keywords", () => {
    expect(classifyError(new Error("Incorrect API key provided"))).toBe("auth");
    expect(classifyError(new Error("Rate limit reached for requests"))).toBe("rate_limit");
  });

  it("reports config and unknown errors", () => {
    expect(classifyError(new ConfigValidationError("missing key"))).toBe("config");
    expect(classifyError(new Error("boom"))).toBe("unknown");
    expect(classifyError("a string")).toBe("unknown");
  });
});

describe("humanizeError", () => {
  it("gives a retry-later message for rate limits", () => {
    expect(humanizeError(apiError(429, "Too Many Requests"))).toEqual({
      category: "rate_limit",
      title: "Rate limit exceeded",
      message: "The model API is receiving too many requests right now. Wait a minute and try again.",
    });
  });

  it("gives an actionable message for auth failures", () => {
    const result = humanizeError(apiError(401, "Incorrect API key provided: sk-test"));

    expect(result.title).toBe("Authentication error");
    expect(result.message).toBe(
      "The model API rejected the API key. Check that OPENAI_API_KEY is correct and still active.",
    );
  });

  it("never includes raw error text for unknown failures", () => {
    const result = humanizeError(new Error("TypeError at internal/module.js:42"));

    expect(result).toEqual({
      category: "unknown",
      title: "Unexpected error",
      message: "Something went wrong while generating a reply. Please try again.",
    });
  });

  it("shows configuration messages as written", () => {
    expect(humanizeError(new ConfigValidationError("OpenAI API key is required.")).message).toBe(
      "OpenAI API key is required.",
    );
  });
});

describe("toChatError", () => {
  it("keeps the original failure as the cause", () => {
    const original = apiError(403);
    const error = toChatError(original);

    expect(error).toBeInstanceOf(ChatError);
    expect(error.category).toBe("permission");
    expect(error.cause).toBe(original);
  });

  it("returns chat errors unchanged", () => {
    const error = invalidInputError();
    expect(toChatError(error)).toBe(error);
    expect(error.toJSON()).toEqual({
      category: "invalid_input",
      title: "Invalid message",
      message: "Type a message before sending.",
    });
  });
});
