/**
 * LLM-related types.
 */

import type { MessageRole } from "./session.js";

/**
 * A message sent to the model.
 */
export interface PromptMessage {
  role: MessageRole;
  content: string;
}

/**
 * Per-request generation settings. Unset fields use the provider defaults.
 */
export interface CompletionOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
}

/**
 * LLM response structure.
 */
export interface LLMResponse {
  content: string;
  finishReason: string;
  usage: {
    promptTokens: number;
    completionTokens: number;
  };
}
