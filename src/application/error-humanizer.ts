/**
 * Maps technical failures to short, user-facing messages.
 */

import { APICallError, LoadAPIKeyError, RetryError } from "ai";
import {
  ChatError,
  ConfigValidationError,
  type ErrorCategory,
  type HumanizedError,
} from "../core/errors.js";

const MESSAGES: Record<ErrorCategory, { title: string; message: string }> = {
  auth: {
    title: "Authentication error",
    message:
      "The model API rejected the API key. Check that OPENAI_API_KEY is correct and still active.",
  },
  permission: {
    title: "Permission denied",
    message:
      "This API key may not use the requested model or resource. Check the key's permissions and your account status.",
  },
  rate_limit: {
    title: "Rate limit exceeded",
    message: "The model API is receiving too many requests right now. Wait a minute and try again.",
  },
  connection: {
    title: "Connection error",
    message: "Could not reach the model API. Check your network connection and try again.",
  },
  timeout: {
    title: "Request timed out",
    message: "The model API took too long to respond. Try again, perhaps with a shorter message.",
  },
  config: {
    title: "Configuration error",
    message: "The chat service is not configured correctly.",
  },
  invalid_input: {
    title: "Invalid message",
    message: "Type a message before sending.",
  },
  unknown: {
    title: "Unexpected error",
    message: "Something went wrong while generating a reply. Please try again.",
  },
};

const CONNECTION_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "EPIPE",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
]);

const TIMEOUT_CODES = new Set(["ETIMEDOUT", "UND_ERR_HEADERS_TIMEOUT", "UND_ERR_BODY_TIMEOUT"]);

/**
 * The error and its causes, outermost first.
 */
function causeChain(error: unknown): unknown[] {
  const chain: unknown[] = [];
  let current: unknown = error;
  while (current !== undefined && current !== null && chain.length < 5 && !chain.includes(current)) {
    chain.push(current);
    current = current instanceof Error ? current.cause : undefined;
  }
  return chain;
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    const { code } = error;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

function fromStatus(statusCode: number | undefined): ErrorCategory | undefined {
  switch (statusCode) {
    case 401:
      return "auth";
    case 403:
      return "permission";
    case 429:
      return "rate_limit";
    case 408:
    case 504:
      return "timeout";
    case 502:
    case 503:
      return "connection";
    default:
      return undefined;
  }
}

function fromText(name: string, text: string): ErrorCategory | undefined {
  if (/authentication|invalid.?api.?key|incorrect api key|unauthorized/.test(text) || name === "AuthenticationError") {
    return "auth";
  }
  if (/rate.?limit|too many requests|quota/.test(text)) {
    return "rate_limit";
  }
  if (/permission|forbidden/.test(text)) {
    return "permission";
  }
  if (/timed? ?out|timeout/.test(text) || name === "TimeoutError") {
    return "timeout";
  }
  if (/connection|cannot connect|network|fetch failed|socket/.test(text)) {
    return "connection";
  }
  return undefined;
}

/**
 * Decide which category a failure belongs to.
 */
export function classifyError(error: unknown): ErrorCategory {
  if (error instanceof ChatError) {
    return error.category;
  }
  if (error instanceof ConfigValidationError) {
    return "config";
  }

  for (const link of causeChain(error)) {
    if (RetryError.isInstance(link)) {
      return classifyError(link.lastError);
    }
    if (LoadAPIKeyError.isInstance(link)) {
      return "auth";
    }
    if (APICallError.isInstance(link)) {
      const category = fromStatus(link.statusCode);
      if (category) return category;
    }

    const code = errorCode(link);
    if (code && CONNECTION_CODES.has(code)) return "connection";
    if (code && TIMEOUT_CODES.has(code)) return "timeout";
  }

  for (const link of causeChain(error)) {
    if (link instanceof Error) {
      const category = fromText(link.name, link.message.toLowerCase());
      if (category) return category;
    }
  }

  return "unknown";
}

/**
 * Convert a failure into a category, title and message safe for display.
 */
export function humanizeError(error: unknown): HumanizedError {
  if (error instanceof ChatError) {
    return error.toJSON();
  }

  const category = classifyError(error);
  const { title, message } = MESSAGES[category];

  if (category === "config" && error instanceof ConfigValidationError) {
    return { category, title, message: error.message };
  }
  return { category, title, message };
}

/**
 * Wrap any failure in a ChatError, keeping the original as its cause.
 */
export function toChatError(error: unknown): ChatError {
  if (error instanceof ChatError) {
    return error;
  }
  return new ChatError(humanizeError(error), { cause: error });
}

/**
 * The error for empty user input.
 */
export function invalidInputError(): ChatError {
  return new ChatError({ category: "invalid_input", ...MESSAGES.invalid_input });
}
