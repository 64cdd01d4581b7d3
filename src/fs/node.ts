import { readFile, stat } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { errorMessage } from "../errors.js";
import { FileSystemError } from "./errors.js";
import type { FileSystem } from "./types.js";

/** Physical filesystem. Only `file:` URIs are addressable. */
export class NodeFileSystem implements FileSystem {
  private toPath(uri: URL): string {
    if (uri.protocol !== "file:") {
      throw new FileSystemError(
        "UNSUPPORTED_SCHEME",
        `Unsupported scheme "${uri.protocol}" in ${uri.href}`,
        uri.href,
      );
    }
    return fileURLToPath(uri);
  }

  async exists(uri: URL): Promise<boolean> {
    if (uri.protocol !== "file:") return false;
    try {
      await stat(this.toPath(uri));
      return true;
    } catch {
      return false;
    }
  }

  async readBytes(uri: URL): Promise<Uint8Array> {
    const path = this.toPath(uri);
    try {
      return await readFile(path);
    } catch (error) {
      const missing =
        error instanceof Error && "code" in error && error.code === "ENOENT";
      throw new FileSystemError(
        missing ? "FILE_NOT_FOUND" : "READ_FAILED",
        missing ? `File not found: ${path}` : `Could not read ${path}: ${errorMessage(error)}`,
        uri.href,
      );
    }
  }
}
