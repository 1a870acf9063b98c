/**
 * Chat turns over a history store and an LLM provider.
 */

import type { ILLMProvider } from "../core/interfaces/llm-provider.js";
import type { IHistoryStore } from "../core/interfaces/storage.js";
import type { Config } from "../core/types/config.js";
import type { PromptMessage } from "../core/types/llm.js";
import type { ChatStatus, SessionMessage } from "../core/types/session.js";
import type { ChatError } from "../core/errors.js";
import { getKeyPrefix } from "../infrastructure/config/schema.js";
import { invalidInputError, toChatError } from "./error-humanizer.js";
import logger from "../utils/logger.js";

export interface ChatServiceOptions {
  config: Config;
  history: IHistoryStore;
  provider: ILLMProvider;
}

export interface StreamOptions {
  /** Aborting this signal stops the stream and keeps the partial reply */
  signal?: AbortSignal;
  /** Called with every fragment as it arrives */
  onChunk?: (text: string) => void;
}

export interface StreamResult {
  /** Text committed as the assistant message */
  content: string;
  /** True when the stream ended because of a stop request */
  stopped: boolean;
}

interface ActiveStream {
  controller: AbortController;
  settled: Promise<void>;
}

/**
 * Short form of a session id for logs.
 */
function shortId(sessionId: string): string {
  return sessionId.slice(0, 8);
}

/**
 * Runs conversational turns for browser sessions.
 *
 * A turn appends the user message, asks the provider for a reply over the
 * whole stored conversation and commits the reply as one assistant message.
 * When the provider fails the user message is removed again so the stored
 * conversation is left as it was. Each session has at most one active
 * stream; starting another stops the previous one first. A request that is
 * itself replaced while waiting for its predecessor never starts, and
 * stores nothing.
 */
export class ChatService {
  private config: Config;
  private history: IHistoryStore;
  private provider: ILLMProvider;
  private activeStreams: Map<string, ActiveStream> = new Map();

  constructor(options: ChatServiceOptions) {
    this.config = options.config;
    this.history = options.history;
    this.provider = options.provider;
  }

  async getHistory(sessionId: string): Promise<SessionMessage[]> {
    return this.history.read(sessionId);
  }

  async countMessages(sessionId: string): Promise<number> {
    return this.history.count(sessionId);
  }

  async clearHistory(sessionId: string): Promise<void> {
    this.stop(sessionId);
    await this.history.clear(sessionId);
    logger.info({ session: shortId(sessionId) }, "Conversation cleared");
  }

  /**
   * Describe the runtime. Selects the history backend if that has not happened yet.
   */
  async getStatus(): Promise<ChatStatus> {
    await this.history.isHealthy();
    return {
      env: this.config.env,
      model: this.provider.getDefaultModel(),
      backend: this.history.label,
      keyPrefix: getKeyPrefix(this.config),
      warning: this.history.takeWarning(),
    };
  }

  /**
   * Run a turn and wait for the complete reply.
   */
  async sendMessage(sessionId: string, content: string): Promise<SessionMessage> {
    const text = this.validate(content);
    await this.history.append(sessionId, "user", text);

    let reply: string;
    try {
      const response = await this.provider.complete(await this.buildPrompt(sessionId));
      reply = response.content;
      logger.debug(
        { session: shortId(sessionId), finishReason: response.finishReason, usage: response.usage },
        "Completion received",
      );
    } catch (error) {
      throw await this.failTurn(sessionId, error);
    }

    await this.history.append(sessionId, "assistant", reply);
    return this.lastMessage(sessionId, reply);
  }

  /**
   * Run a turn, forwarding reply fragments as they arrive.
   *
   * Completion and stop both commit the text received so far as a single
   * assistant message; an empty reply commits nothing.
   */
  async streamMessage(
    sessionId: string,
    content: string,
    options: StreamOptions = {},
  ): Promise<StreamResult> {
    const text = this.validate(content);

    // Registered before any await so a later request always finds and stops this one
    const previous = this.activeStreams.get(sessionId);
    previous?.controller.abort();
    const controller = new AbortController();
    const turn = this.runAfter(previous, sessionId, text, controller, options);
    this.activeStreams.set(sessionId, {
      controller,
      settled: turn.then(
        () => undefined,
        () => undefined,
      ),
    });

    try {
      return await turn;
    } finally {
      if (this.activeStreams.get(sessionId)?.controller === controller) {
        this.activeStreams.delete(sessionId);
      }
    }
  }

  /**
   * Stop the session's active stream. Returns false when none was running.
   */
  stop(sessionId: string): boolean {
    const active = this.activeStreams.get(sessionId);
    if (!active || active.controller.signal.aborted) {
      return false;
    }
    active.controller.abort();
    logger.info({ session: shortId(sessionId) }, "Stream stop requested");
    return true;
  }

  private async runAfter(
    previous: ActiveStream | undefined,
    sessionId: string,
    text: string,
    controller: AbortController,
    options: StreamOptions,
  ): Promise<StreamResult> {
    if (previous) {
      await previous.settled;
    }
    if (controller.signal.aborted) {
      logger.debug({ session: shortId(sessionId) }, "Stream superseded before it started");
      return { content: "", stopped: true };
    }
    return this.runStream(sessionId, text, controller, options);
  }

  private async runStream(
    sessionId: string,
    text: string,
    controller: AbortController,
    options: StreamOptions,
  ): Promise<StreamResult> {
    const { signal } = controller;
    const forwardAbort = () => controller.abort();
    if (options.signal?.aborted) {
      controller.abort();
    } else {
      options.signal?.addEventListener("abort", forwardAbort, { once: true });
    }

    let buffer = "";
    try {
      await this.history.append(sessionId, "user", text);
      const prompt = await this.buildPrompt(sessionId);

      for await (const chunk of this.provider.streamComplete(prompt, { signal })) {
        if (signal.aborted) break;
        buffer += chunk;
        options.onChunk?.(chunk);
        if (signal.aborted) break;
      }
    } catch (error) {
      if (!signal.aborted) {
        throw await this.failTurn(sessionId, error);
      }
      logger.debug({ session: shortId(sessionId), error }, "Stream ended by stop request");
    } finally {
      options.signal?.removeEventListener("abort", forwardAbort);
    }

    const stopped = signal.aborted;
    if (buffer) {
      await this.history.append(sessionId, "assistant", buffer);
    }
    logger.info(
      { session: shortId(sessionId), chars: buffer.length, stopped },
      stopped ? "Stream stopped, partial reply committed" : "Stream completed",
    );
    return { content: buffer, stopped };
  }

  private validate(content: string): string {
    const text = content.trim();
    if (!text) {
      throw invalidInputError();
    }
    return text;
  }

  private async buildPrompt(sessionId: string): Promise<PromptMessage[]> {
    const messages = await this.history.read(sessionId);
    return messages.map(({ role, content }) => ({ role, content }));
  }

  private async lastMessage(sessionId: string, fallbackContent: string): Promise<SessionMessage> {
    const messages = await this.history.read(sessionId);
    const last = messages[messages.length - 1];
    if (last && last.role === "assistant") {
      return last;
    }
    return { role: "assistant", content: fallbackContent, timestamp: new Date().toISOString() };
  }

  /**
   * Undo the user message of a failed turn and convert the failure.
   */
  private async failTurn(sessionId: string, error: unknown): Promise<ChatError> {
    const removed = await this.history.removeLast(sessionId);
    if (removed?.role !== "user") {
      logger.warn({ session: shortId(sessionId), removed: removed?.role }, "Rollback removed an unexpected entry");
    }

    const chatError = toChatError(error);
    logger.error(
      { session: shortId(sessionId), category: chatError.category, error },
      "Chat turn failed",
    );
    return chatError;
  }
}
