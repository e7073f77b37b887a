import { createLogger } from "../core/logger.js";
import { errorMessage } from "../core/errors.js";
import type { LlmConfig } from "../config/types.js";
import { GeminiProvider } from "./gemini-provider.js";
import type { LlmProvider } from "./provider.js";
import { buildChatPrompt, buildNarrativePrompt } from "./prompts.js";
import { executiveSummary, ruleBasedInsights } from "./rules.js";
import type { InsightSections } from "./rules.js";
import type { ReadonlySnapshot } from "./snapshot.js";
import { TimeoutError, withTimeout } from "./timeout.js";

// ---------------------------------------------------------------------------
// Insight service
// ---------------------------------------------------------------------------
// Rule-based sections are always available. Free-form questions and the
// narrative go to the LLM provider when one is configured; failures come
// back as text and are never thrown to the caller.
// ---------------------------------------------------------------------------

const log = createLogger("insights");

export const NOT_CONFIGURED_MESSAGE =
  "AI insights are not configured. Set GOOGLE_API_KEY to enable questions about your data.";

export interface InsightServiceOptions {
  timeoutMs: number;
  maxOutputTokens?: number;
  temperature?: number;
}

export interface InsightAnswer {
  text: string;
  /** "llm" when the provider answered */
  source: "llm" | "fallback";
}

export class InsightService {
  constructor(
    private readonly provider: LlmProvider | null,
    private readonly options: InsightServiceOptions
  ) {}

  get configured(): boolean {
    return this.provider !== null;
  }

  insights(snapshot: ReadonlySnapshot): InsightSections {
    return ruleBasedInsights(snapshot.summary);
  }

  async ask(question: string, snapshot: ReadonlySnapshot): Promise<InsightAnswer> {
    if (!this.provider) {
      return { text: NOT_CONFIGURED_MESSAGE, source: "fallback" };
    }
    if (!question.trim()) {
      return { text: "Please ask a question about your marketing data.", source: "fallback" };
    }

    try {
      const text = await this.generate(this.provider, buildChatPrompt(question, snapshot));
      return { text, source: "llm" };
    } catch (err) {
      return { text: this.reportFailure(err), source: "fallback" };
    }
  }

  /** Executive narrative; the template summary when the provider is absent or fails */
  async narrate(snapshot: ReadonlySnapshot): Promise<InsightAnswer> {
    const fallback = executiveSummary(snapshot.summary);
    if (!this.provider) {
      return { text: fallback, source: "fallback" };
    }

    try {
      const text = await this.generate(this.provider, buildNarrativePrompt(snapshot));
      return { text, source: "llm" };
    } catch (err) {
      this.reportFailure(err);
      return { text: fallback, source: "fallback" };
    }
  }

  private generate(provider: LlmProvider, prompt: string): Promise<string> {
    return withTimeout(
      (signal) =>
        provider.generate(prompt, {
          signal,
          maxOutputTokens: this.options.maxOutputTokens,
          temperature: this.options.temperature,
        }),
      this.options.timeoutMs,
      `${provider.name} request timed out`
    );
  }

  private reportFailure(err: unknown): string {
    if (err instanceof TimeoutError) {
      log.warn("LLM request timed out", { timeoutMs: err.timeoutMs });
      return "The AI assistant took too long to respond. Please try again.";
    }
    log.error("LLM request failed", err);
    return `The AI assistant is unavailable right now: ${errorMessage(err)}`;
  }
}

/** Service for the configured provider; rules only when there is no key or provider is "none" */
export function createInsightService(config: LlmConfig): InsightService {
  const options: InsightServiceOptions = {
    timeoutMs: config.timeoutMs,
    maxOutputTokens: config.maxOutputTokens,
    temperature: config.temperature,
  };

  if (config.provider === "none" || !config.apiKey) {
    if (config.provider !== "none") {
      log.info("No LLM API key configured; insights use template rules only");
    }
    return new InsightService(null, options);
  }

  return new InsightService(new GeminiProvider({ apiKey: config.apiKey, model: config.model }), options);
}
