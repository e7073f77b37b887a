import { createHash } from "node:crypto";
import { SourceMissingError } from "../core/errors.js";
import type { DataSource } from "./types.js";

// ---------------------------------------------------------------------------
// In-memory source — uploads and tests
// ---------------------------------------------------------------------------

export class MemorySource implements DataSource {
  private text: string | null;

  constructor(
    readonly name: string,
    text: string | null
  ) {
    this.text = text;
  }

  /** Replace the content, as when a user re-uploads an export */
  update(text: string | null): void {
    this.text = text;
  }

  async read(): Promise<string> {
    if (this.text === null) {
      throw new SourceMissingError(this.name, "no content provided");
    }
    return this.text;
  }

  async fingerprint(): Promise<string> {
    if (this.text === null) {
      throw new SourceMissingError(this.name, "no content provided");
    }
    return createHash("sha256").update(this.text).digest("hex");
  }
}
