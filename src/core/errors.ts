// ---------------------------------------------------------------------------
// Pipeline errors
// ---------------------------------------------------------------------------
// Fatal conditions only. Rejected rows and join mismatches are reported as
// data on the result, not thrown.
// ---------------------------------------------------------------------------

export type PipelineErrorCode = "SOURCE_MISSING" | "PARSE_ERROR" | "EMPTY_RESULT";

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PipelineError";
    this.code = code;
  }
}

/** A required source is absent, unreadable, or has no header row */
export class SourceMissingError extends PipelineError {
  readonly source: string;

  constructor(source: string, detail: string, options?: { cause?: unknown }) {
    super("SOURCE_MISSING", `Source "${source}" is missing: ${detail}`, options);
    this.name = "SourceMissingError";
    this.source = source;
  }
}

/** A source's structure cannot be read (e.g. required columns absent) */
export class ParseError extends PipelineError {
  readonly source: string;

  constructor(source: string, detail: string) {
    super("PARSE_ERROR", `Cannot parse source "${source}": ${detail}`);
    this.name = "ParseError";
    this.source = source;
  }
}

/** Sources were read but produced no usable business days */
export class EmptyResultError extends PipelineError {
  constructor(detail: string) {
    super("EMPTY_RESULT", `No data: ${detail}`);
    this.name = "EmptyResultError";
  }
}

export function isPipelineError(err: unknown): err is PipelineError {
  return err instanceof PipelineError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
