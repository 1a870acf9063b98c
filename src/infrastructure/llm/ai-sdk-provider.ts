/**
 * LLM provider backed by the Vercel AI SDK.
 */

import { generateText, streamText, type CoreMessage, type LanguageModel } from "ai";
import { createOpenAI } from "@ai-sdk/openai";
import type { ILLMProvider } from "../../core/interfaces/llm-provider.js";
import type { CompletionOptions, LLMResponse, PromptMessage } from "../../core/types/llm.js";
import type { Config } from "../../core/types/config.js";
import { getApiBase, getApiKey } from "../config/schema.js";
import logger from "../../utils/logger.js";

export interface AIProviderOptions {
  config: Config;
  /** Model id used when a request does not name one */
  defaultModel?: string;
  /** Resolve a model id to a language model; defaults to the OpenAI chat API */
  resolveModel?: (modelId: string) => LanguageModel;
}

/**
 * Chat provider over any AI SDK language model.
 *
 * Retries are disabled: rate limits and outages surface to the caller on
 * the first failure.
 */
export class AIProvider implements ILLMProvider {
  private defaultModel: string;
  private temperature: number;
  private maxTokens: number | undefined;
  private resolveModel: (modelId: string) => LanguageModel;

  constructor(options: AIProviderOptions) {
    const { config } = options;
    this.defaultModel = options.defaultModel || config.openai.model;
    this.temperature = config.openai.temperature;
    this.maxTokens = config.openai.maxTokens;

    if (options.resolveModel) {
      this.resolveModel = options.resolveModel;
    } else {
      const openai = createOpenAI({
        apiKey: getApiKey(config),
        baseURL: getApiBase(config),
      });
      this.resolveModel = (modelId) => openai.chat(modelId);
    }
  }

  getDefaultModel(): string {
    return this.defaultModel;
  }

  private toCoreMessages(messages: PromptMessage[]): CoreMessage[] {
    return messages.map((message): CoreMessage => {
      switch (message.role) {
        case "system":
          return { role: "system", content: message.content };
        case "assistant":
          return { role: "assistant", content: message.content };
        default:
          return { role: "user", content: message.content };
      }
    });
  }

  async complete(messages: PromptMessage[], options: CompletionOptions = {}): Promise<LLMResponse> {
    const model = options.model || this.defaultModel;
    logger.debug({ model, messages: messages.length }, "Requesting completion");

    const result = await generateText({
      model: this.resolveModel(model),
      messages: this.toCoreMessages(messages),
      temperature: options.temperature ?? this.temperature,
      maxTokens: options.maxTokens ?? this.maxTokens,
      maxRetries: 0,
      abortSignal: options.signal,
    });

    return {
      content: result.text,
      finishReason: result.finishReason,
      usage: {
        promptTokens: result.usage.promptTokens,
        completionTokens: result.usage.completionTokens,
      },
    };
  }

  async *streamComplete(
    messages: PromptMessage[],
    options: CompletionOptions = {},
  ): AsyncIterable<string> {
    const model = options.model || this.defaultModel;
    logger.debug({ model, messages: messages.length }, "Requesting streamed completion");

    const result = streamText({
      model: this.resolveModel(model),
      messages: this.toCoreMessages(messages),
      temperature: options.temperature ?? this.temperature,
      maxTokens: options.maxTokens ?? this.maxTokens,
      maxRetries: 0,
      abortSignal: options.signal,
      // Errors are rethrown from the part loop below
      onError: ({ error }) => {
        logger.debug({ error }, "Stream reported an error");
      },
    });

    for await (const part of result.fullStream) {
      if (part.type === "text-delta") {
        if (part.textDelta) {
          yield part.textDelta;
        }
      } else if (part.type === "error") {
        throw part.error;
      }
    }
  }
}
