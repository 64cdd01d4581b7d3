import { errorMessage } from "../errors.js";
import type { CompilerInputs, CompilerService } from "../compiler/service.js";
import { OutlineCompiler } from "../compiler/service.js";
import type { FileSystem } from "../fs/types.js";
import { sha256Hex, stableStringify } from "./digest.js";
import { CompilationSession } from "./session.js";

export interface SessionRequest {
  inputs: CompilerInputs;
  /** Overlay the session reads through. */
  fs: FileSystem;
  /** How the overlay was configured; part of the cache identity. */
  overlay: { scheme: string; roots: string[]; cwd: string };
}

/**
 * Source of sessions for requests. The runner never builds one itself, so
 * reuse stays a decision of the worker's configuration.
 */
export interface SessionProvider {
  acquire(request: SessionRequest): Promise<CompilationSession>;
}

/** New session per request. */
export class FreshSessionProvider implements SessionProvider {
  constructor(private readonly service: CompilerService = new OutlineCompiler()) {}

  acquire(request: SessionRequest): Promise<CompilationSession> {
    return CompilationSession.create(this.service, request.inputs, request.fs);
  }
}

/**
 * Reuses sessions whose inputs are byte-for-byte identical.
 *
 * The key covers the digest of every input file plus the overlay
 * configuration, so a rebuilt summary produces a new session. Entries are
 * evicted least recently used first.
 */
export class CachedSessionProvider implements SessionProvider {
  private sessions = new Map<string, Promise<CompilationSession>>();

  constructor(
    private readonly service: CompilerService = new OutlineCompiler(),
    private readonly maxEntries = 4,
  ) {
    if (maxEntries < 1) {
      throw new Error("CachedSessionProvider maxEntries must be >= 1");
    }
  }

  get size(): number {
    return this.sessions.size;
  }

  async acquire(request: SessionRequest): Promise<CompilationSession> {
    const key = await computeSessionKey(request);

    const cached = this.sessions.get(key);
    if (cached) {
      // Refresh recency
      this.sessions.delete(key);
      this.sessions.set(key, cached);
      return cached;
    }

    const pending = CompilationSession.create(this.service, request.inputs, request.fs);
    this.sessions.set(key, pending);
    this.evict();
    try {
      return await pending;
    } catch (error) {
      this.sessions.delete(key);
      throw error;
    }
  }

  private evict(): void {
    while (this.sessions.size > this.maxEntries) {
      const oldest = this.sessions.keys().next();
      if (oldest.done) return;
      this.sessions.delete(oldest.value);
    }
  }
}

/**
 * Digest identifying a session's inputs. A file that cannot be read gets a
 * marker instead of a digest; initialising the session reports the failure.
 */
export async function computeSessionKey(request: SessionRequest): Promise<string> {
  const digestOf = async (uri: URL): Promise<{ uri: string; digest: string }> => {
    try {
      return { uri: uri.href, digest: sha256Hex(await request.fs.readBytes(uri)) };
    } catch (error) {
      return { uri: uri.href, digest: `unreadable:${errorMessage(error)}` };
    }
  };

  const { inputs, overlay } = request;
  const material = {
    overlay,
    platformSummary: await digestOf(inputs.platformSummary),
    inputSummaries: await Promise.all(inputs.inputSummaries.map(digestOf)),
    inputLinked: await Promise.all(inputs.inputLinked.map(digestOf)),
    packageMetadata: inputs.packageMetadata ? await digestOf(inputs.packageMetadata) : undefined,
  };
  return sha256Hex(stableStringify(material));
}
