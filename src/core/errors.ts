/**
 * Error types shared across layers.
 */

export type ErrorCategory =
  | "auth"
  | "permission"
  | "rate_limit"
  | "connection"
  | "timeout"
  | "config"
  | "invalid_input"
  | "unknown";

/**
 * A failure reduced to something safe to show an end user.
 */
export interface HumanizedError {
  category: ErrorCategory;
  title: string;
  message: string;
}

export class ConfigValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigValidationError";
  }
}

/**
 * Error raised by the chat service. The original failure stays on `cause`
 * for logging and never reaches the user.
 */
export class ChatError extends Error {
  readonly category: ErrorCategory;
  readonly title: string;

  constructor(details: HumanizedError, options?: { cause?: unknown }) {
    super(details.message, options);
    this.name = "ChatError";
    this.category = details.category;
    this.title = details.title;
  }

  toJSON(): HumanizedError {
    return { category: this.category, title: this.title, message: this.message };
  }
}
