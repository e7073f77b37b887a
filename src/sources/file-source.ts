import { readFile, stat } from "node:fs/promises";
import { join } from "node:path";
import { PLATFORMS } from "../core/types.js";
import type { Platform } from "../core/types.js";
import { SourceMissingError, errorMessage } from "../core/errors.js";
import type { DataSource, SourceSet } from "./types.js";

// ---------------------------------------------------------------------------
// File-backed sources
// ---------------------------------------------------------------------------
// Fingerprint is path + mtime + size, so replacing an export invalidates
// cached results without hashing the file on every request.
// ---------------------------------------------------------------------------

export class FileSource implements DataSource {
  constructor(
    readonly name: string,
    readonly path: string
  ) {}

  async read(): Promise<string> {
    try {
      return await readFile(this.path, "utf-8");
    } catch (err) {
      throw new SourceMissingError(this.name, `cannot read ${this.path} (${errorMessage(err)})`, {
        cause: err,
      });
    }
  }

  async fingerprint(): Promise<string> {
    try {
      const info = await stat(this.path);
      return `${this.path}:${info.mtimeMs}:${info.size}`;
    } catch (err) {
      throw new SourceMissingError(this.name, `cannot stat ${this.path} (${errorMessage(err)})`, {
        cause: err,
      });
    }
  }
}

export interface FileLayout {
  dataFolder: string;
  businessFile: string;
  marketingFiles: Partial<Record<Platform, string>>;
}

/** Build a SourceSet from a data folder layout */
export function createFileSources(layout: FileLayout): SourceSet {
  const marketing: Partial<Record<Platform, DataSource>> = {};
  for (const platform of PLATFORMS) {
    const file = layout.marketingFiles[platform];
    if (file) {
      marketing[platform] = new FileSource(platform, join(layout.dataFolder, file));
    }
  }
  return {
    business: new FileSource("business", join(layout.dataFolder, layout.businessFile)),
    marketing,
  };
}
