// ---------------------------------------------------------------------------
// LLM provider interface
// ---------------------------------------------------------------------------

export interface GenerateOptions {
  /** Aborted when the caller's timeout fires */
  signal?: AbortSignal;
  maxOutputTokens?: number;
  temperature?: number;
}

export interface LlmProvider {
  readonly name: string;
  /** Free text for a prompt. Rejects on transport or API errors. */
  generate(prompt: string, options?: GenerateOptions): Promise<string>;
}
