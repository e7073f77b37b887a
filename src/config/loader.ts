import { readFileSync } from "node:fs";
import { ZodError } from "zod";
import { dashboardConfigSchema } from "./types.js";
import type { DashboardConfig, RawDashboardConfig } from "./types.js";
import type { LoadOptions } from "../ingest/loader.js";
import type { FileLayout } from "../sources/file-source.js";
import { createLogger } from "../core/logger.js";

// ---------------------------------------------------------------------------
// Config Loader
// ---------------------------------------------------------------------------
// Loads dashboard configuration from a JSON file or builds it at runtime.
// Credential fields can reference environment variables with the
// "$ENV_VAR_NAME" syntax; every other string is taken literally. An unset
// variable leaves the credential empty, which disables the LLM.
// ---------------------------------------------------------------------------

const log = createLogger("config");

/** Config paths whose "$NAME" values are read from the environment */
const ENV_REF_PATHS = new Set(["llm.apiKey"]);

/**
 * Load a DashboardConfig from a JSON file.
 */
export function loadConfig(filePath: string): DashboardConfig {
  const raw: unknown = JSON.parse(readFileSync(filePath, "utf-8"));
  return parseConfig(raw, filePath);
}

/**
 * Build a DashboardConfig at runtime from a partial config object.
 * Applies defaults for omitted fields.
 */
export function buildConfig(partial: RawDashboardConfig = {}): DashboardConfig {
  return parseConfig(partial, "runtime config");
}

function parseConfig(raw: unknown, origin: string): DashboardConfig {
  const resolved = resolveEnvRefs(raw, "");
  try {
    return dashboardConfigSchema.parse(resolved);
  } catch (err) {
    if (err instanceof ZodError) {
      const issues = err.issues
        .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
        .join("; ");
      throw new Error(`Invalid dashboard config (${origin}): ${issues}`, { cause: err });
    }
    throw err;
  }
}

function resolveEnvRefs(value: unknown, path: string): unknown {
  if (typeof value === "string") {
    return ENV_REF_PATHS.has(path) && value.startsWith("$")
      ? resolveEnvVar(value.slice(1), path)
      : value;
  }
  if (Array.isArray(value)) {
    return value.map((v, i) => resolveEnvRefs(v, `${path}[${i}]`));
  }
  if (value !== null && typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [key, v] of Object.entries(value)) {
      const resolved = resolveEnvRefs(v, path ? `${path}.${key}` : key);
      if (resolved !== undefined) out[key] = resolved;
    }
    return out;
  }
  return value;
}

function resolveEnvVar(name: string, path: string): string | undefined {
  const envValue = process.env[name];
  if (envValue) return envValue;

  log.warn(`Environment variable "${name}" is not set; ${path} left empty`);
  return undefined;
}

// ---------------------------------------------------------------------------
// Views consumed by other modules
// ---------------------------------------------------------------------------

export function toLoadOptions(config: DashboardConfig): LoadOptions {
  return {
    coerceMissingNumeric: config.coerceMissingNumeric,
    dateFormats: config.dateFormats,
    delimiter: config.delimiter,
  };
}

export function toFileLayout(config: DashboardConfig): FileLayout {
  return {
    dataFolder: config.dataFolder,
    businessFile: config.businessFile,
    marketingFiles: config.marketingFiles,
  };
}
