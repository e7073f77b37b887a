import { GoogleGenAI } from "@google/genai";
import type { GenerateOptions, LlmProvider } from "./provider.js";

// ---------------------------------------------------------------------------
// Gemini provider
// ---------------------------------------------------------------------------

export interface GeminiProviderConfig {
  apiKey: string;
  model: string;
}

export class GeminiProvider implements LlmProvider {
  readonly name = "gemini";
  private readonly client: GoogleGenAI;

  constructor(private readonly config: GeminiProviderConfig) {
    if (!config.apiKey) {
      throw new Error("GeminiProvider requires an API key");
    }
    this.client = new GoogleGenAI({ apiKey: config.apiKey });
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    const response = await this.client.models.generateContent({
      model: this.config.model,
      contents: prompt,
      config: {
        maxOutputTokens: options.maxOutputTokens,
        temperature: options.temperature,
        abortSignal: options.signal,
      },
    });

    const text = response.text;
    if (!text) {
      throw new Error(`Gemini model ${this.config.model} returned no text`);
    }
    return text;
  }
}
