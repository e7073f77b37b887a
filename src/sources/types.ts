import type { Platform } from "../core/types.js";

// ---------------------------------------------------------------------------
// Data source interface
// ---------------------------------------------------------------------------

export interface DataSource {
  /** Name used in errors and rejection reports */
  readonly name: string;
  /** Full text of the source. Throws SourceMissingError when unreadable. */
  read(): Promise<string>;
  /** Changes whenever the content may have changed */
  fingerprint(): Promise<string>;
}

/** The business export plus one export per platform */
export interface SourceSet {
  business: DataSource;
  marketing: Partial<Record<Platform, DataSource>>;
}
