/**
 * LLM Provider interface.
 */

import type { CompletionOptions, LLMResponse, PromptMessage } from "../types/llm.js";

/**
 * Interface for LLM providers.
 */
export interface ILLMProvider {
  /**
   * Send a chat completion request and wait for the full reply.
   */
  complete(messages: PromptMessage[], options?: CompletionOptions): Promise<LLMResponse>;

  /**
   * Stream the reply as text fragments. Iteration ends when the model finishes.
   */
  streamComplete(messages: PromptMessage[], options?: CompletionOptions): AsyncIterable<string>;

  /**
   * Get the default model.
   */
  getDefaultModel(): string;
}
