import { pathToFileURL } from "node:url";
import type { FileSystem } from "./types.js";

/**
 * Overlay that maps one logical URI scheme onto an ordered search path of
 * physical roots.
 *
 * A build graph may spread its files over a source tree and one or more output
 * trees; addressing them all as `<scheme>:///<path>` hides that split from the
 * compiler. URIs under any other scheme go straight to the delegate.
 */
export class MultiRootFileSystem implements FileSystem {
  readonly roots: readonly URL[];

  constructor(
    readonly scheme: string,
    roots: readonly URL[],
    private readonly delegate: FileSystem,
    cwd: string = process.cwd(),
  ) {
    const searchPath = roots.length > 0 ? roots : [pathToFileURL(cwd)];
    this.roots = searchPath.map(asDirectory);
  }

  owns(uri: URL): boolean {
    return uri.protocol === `${this.scheme}:`;
  }

  /**
   * Physical location of a multi-root URI: the first root under which the
   * path exists, or the first root when it exists under none. Missing files
   * are left for the reader to report.
   */
  async resolve(uri: URL): Promise<URL> {
    const relative = `./${uri.pathname.replace(/^\/+/, "")}`;
    const candidates = this.roots.map((root) => new URL(relative, root));
    for (const candidate of candidates) {
      if (await this.delegate.exists(candidate)) {
        return candidate;
      }
    }
    const [first] = candidates;
    if (!first) {
      throw new Error("MultiRootFileSystem has no roots");
    }
    return first;
  }

  async exists(uri: URL): Promise<boolean> {
    if (!this.owns(uri)) return this.delegate.exists(uri);
    return this.delegate.exists(await this.resolve(uri));
  }

  async readBytes(uri: URL): Promise<Uint8Array> {
    if (!this.owns(uri)) return this.delegate.readBytes(uri);
    return this.delegate.readBytes(await this.resolve(uri));
  }
}

function asDirectory(root: URL): URL {
  if (root.pathname.endsWith("/")) return root;
  const copy = new URL(root.href);
  copy.pathname = `${copy.pathname}/`;
  return copy;
}
