import type { GenerateOptions, LlmProvider } from "./provider.js";

// ---------------------------------------------------------------------------
// Mock Provider — for testing and keyless development
// ---------------------------------------------------------------------------

export interface MockLlmOptions {
  /** Fixed reply, or a function of the prompt */
  reply?: string | ((prompt: string) => string);
  /** Milliseconds before replying */
  delayMs?: number;
  /** When set, generate() rejects with this message */
  failWith?: string;
}

export class MockLlmProvider implements LlmProvider {
  readonly name = "mock";
  readonly prompts: string[] = [];

  constructor(private readonly options: MockLlmOptions = {}) {}

  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    this.prompts.push(prompt);

    if (this.options.delayMs) {
      await sleep(this.options.delayMs, options.signal);
    }
    if (this.options.failWith) {
      throw new Error(this.options.failWith);
    }

    const reply = this.options.reply ?? "This is a mock response.";
    return typeof reply === "function" ? reply(prompt) : reply;
  }
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(resolve, ms);
    signal?.addEventListener(
      "abort",
      () => {
        clearTimeout(timer);
        reject(new Error("aborted"));
      },
      { once: true }
    );
  });
}
