import { z } from "zod";

// ---------------------------------------------------------------------------
// Dashboard configuration
// ---------------------------------------------------------------------------

export const LLM_PROVIDERS = ["gemini", "none"] as const;

export type LlmProviderName = (typeof LLM_PROVIDERS)[number];

export const llmConfigSchema = z.object({
  /** "none" keeps the insight layer on its template rules */
  provider: z.enum(LLM_PROVIDERS).default("gemini"),
  /** API key, or "$ENV_VAR" to read it from the environment */
  apiKey: z.string().optional(),
  model: z.string().min(1).default("gemini-2.5-flash"),
  maxOutputTokens: z.number().int().positive().default(1000),
  temperature: z.number().min(0).max(2).default(0.7),
  /** Upper bound for one LLM call */
  timeoutMs: z.number().int().positive().default(30_000),
});

const marketingFilesSchema = z
  .object({
    Facebook: z.string().min(1),
    Google: z.string().min(1),
    TikTok: z.string().min(1),
  })
  .partial();

export const dashboardConfigSchema = z.object({
  /** Folder holding the CSV exports */
  dataFolder: z.string().min(1).default("dataset"),
  businessFile: z.string().min(1).default("business.csv"),
  /** Export file per platform; a platform left out is not loaded */
  marketingFiles: marketingFilesSchema.default({
    Facebook: "Facebook.csv",
    Google: "Google.csv",
    TikTok: "TikTok.csv",
  }),
  /** Blank numeric cells become 0 (true) or reject their row (false) */
  coerceMissingNumeric: z.boolean().default(true),
  /** Extra date-fns patterns tried before the built-in ones */
  dateFormats: z.array(z.string().min(1)).default([]),
  delimiter: z.string().length(1).default(","),
  llm: llmConfigSchema.default({}),
});

/** Config as written in JSON, before defaults and env resolution */
export type RawDashboardConfig = z.input<typeof dashboardConfigSchema>;

export type DashboardConfig = z.output<typeof dashboardConfigSchema>;

export type LlmConfig = z.output<typeof llmConfigSchema>;
