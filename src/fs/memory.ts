import { FileSystemError } from "./errors.js";
import type { FileSystem } from "./types.js";

const encoder = new TextEncoder();

/**
 * In-memory filesystem keyed by URI href.
 * Any scheme is addressable.
 */
export class MemoryFileSystem implements FileSystem {
  private files = new Map<string, Uint8Array>();

  /** Number of readBytes calls, for asserting that nothing was touched. */
  reads = 0;

  constructor(files: Record<string, string | Uint8Array> = {}) {
    for (const [uri, content] of Object.entries(files)) {
      this.write(new URL(uri), content);
    }
  }

  write(uri: URL, content: string | Uint8Array): void {
    this.files.set(
      uri.href,
      typeof content === "string" ? encoder.encode(content) : content,
    );
  }

  async exists(uri: URL): Promise<boolean> {
    return this.files.has(uri.href);
  }

  async readBytes(uri: URL): Promise<Uint8Array> {
    this.reads++;
    const bytes = this.files.get(uri.href);
    if (!bytes) {
      throw new FileSystemError(
        "FILE_NOT_FOUND",
        `File not found: ${uri.href}`,
        uri.href,
      );
    }
    return bytes;
  }
}
