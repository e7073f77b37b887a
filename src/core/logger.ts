// ---------------------------------------------------------------------------
// Logger
// ---------------------------------------------------------------------------
// Leveled console logger. LOG_LEVEL selects the threshold
// ("debug" | "info" | "warn" | "error" | "silent"); without it, production
// and test runs log warnings and errors only.
// ---------------------------------------------------------------------------

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

type ActiveLevel = Exclude<LogLevel, "silent">;

const LEVEL_WEIGHT: Record<ActiveLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const REDACTED_KEYS = new Set(["apiKey", "token", "accessToken", "authorization", "password"]);

function normalizeLevel(value: unknown): LogLevel | undefined {
  if (typeof value !== "string") return undefined;
  const v = value.trim().toLowerCase();
  if (v === "debug" || v === "info" || v === "warn" || v === "error" || v === "silent") return v;
  return undefined;
}

function configuredLevel(): LogLevel {
  const fromEnv = normalizeLevel(process.env.LOG_LEVEL);
  if (fromEnv) return fromEnv;
  const nodeEnv = process.env.NODE_ENV;
  return nodeEnv === "production" || nodeEnv === "test" ? "warn" : "info";
}

function shouldLog(level: ActiveLevel): boolean {
  const configured = configuredLevel();
  if (configured === "silent") return false;
  return LEVEL_WEIGHT[level] >= LEVEL_WEIGHT[configured];
}

export function redact(context?: Record<string, unknown>): Record<string, unknown> | undefined {
  if (!context) return undefined;
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(context)) {
    out[k] = REDACTED_KEYS.has(k) ? "[REDACTED]" : v;
  }
  return out;
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, err?: unknown, context?: Record<string, unknown>): void;
}

/** Create a logger whose lines are prefixed with `[scope]` */
export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    debug(message, context) {
      if (!shouldLog("debug")) return;
      console.debug(prefix, message, redact(context) ?? "");
    },
    info(message, context) {
      if (!shouldLog("info")) return;
      console.info(prefix, message, redact(context) ?? "");
    },
    warn(message, context) {
      if (!shouldLog("warn")) return;
      console.warn(prefix, message, redact(context) ?? "");
    },
    error(message, err, context) {
      if (!shouldLog("error")) return;
      const safe = redact(context);
      if (err instanceof Error) {
        console.error(prefix, message, { ...safe, name: err.name, message: err.message, stack: err.stack });
        return;
      }
      console.error(prefix, message, { ...safe, err });
    },
  };
}
