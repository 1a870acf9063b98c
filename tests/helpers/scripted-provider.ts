import type { ILLMProvider } from "../../src/core/interfaces/llm-provider.js";
import type { CompletionOptions, LLMResponse, PromptMessage } from "../../src/core/types/llm.js";

export type StreamScript = (signal?: AbortSignal) => AsyncIterable<string>;

/**
 * Provider that replies from fixed data and records every prompt.
 */
export class ScriptedProvider implements ILLMProvider {
  readonly prompts: PromptMessage[][] = [];
  reply = "Hello there";
  chunks: string[] = ["Hello", " there"];
  /** Thrown by complete(), and by streams after `failAfterChunks` fragments */
  failure: unknown = null;
  failAfterChunks = 0;
  /** One-off stream behaviours, used in call order before falling back to `chunks` */
  readonly streamScripts: StreamScript[] = [];

  getDefaultModel(): string {
    return "test-model";
  }

  async complete(messages: PromptMessage[]): Promise<LLMResponse> {
    this.prompts.push(messages.map((message) => ({ ...message })));
    if (this.failure) {
      throw this.failure;
    }
    return {
      content: this.reply,
      finishReason: "stop",
      usage: { promptTokens: 1, completionTokens: 1 },
    };
  }

  streamComplete(messages: PromptMessage[], options: CompletionOptions = {}): AsyncIterable<string> {
    this.prompts.push(messages.map((message) => ({ ...message })));
    const script = this.streamScripts.shift();
    if (script) {
      return script(options.signal);
    }
    return this.defaultStream();
  }

  private async *defaultStream(): AsyncIterable<string> {
    for (const [index, chunk] of this.chunks.entries()) {
      if (this.failure && index === this.failAfterChunks) {
        throw this.failure;
      }
      yield chunk;
    }
    if (this.failure) {
      throw this.failure;
    }
  }
}

/**
 * A stream that yields one fragment and then waits until it is aborted.
 */
export function hangingStream(first: string): StreamScript {
  return async function* (signal?: AbortSignal) {
    yield first;
    await new Promise<void>((resolve) => {
      if (!signal || signal.aborted) {
        resolve();
        return;
      }
      signal.addEventListener("abort", () => resolve(), { once: true });
    });
  };
}
