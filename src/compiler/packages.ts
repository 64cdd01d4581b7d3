import { posix } from "node:path";
import { WorkerError } from "../errors.js";

/** Package name -> root URI (always ending in "/"). */
export type PackageMap = ReadonlyMap<string, URL>;

const PACKAGE_NAME = /^[A-Za-z_][A-Za-z0-9_.-]*$/;
const HAS_SCHEME = /^[a-zA-Z][a-zA-Z0-9+.-]+:/;

/**
 * Parse package metadata: one `name:uri` per line, `#` starts a comment.
 * URIs are resolved against the metadata file's own location.
 *
 * @throws WorkerError RESOLUTION_ERROR on a malformed line
 */
export function parsePackageMetadata(text: string, location: URL): PackageMap {
  const packages = new Map<string, URL>();
  const lines = text.split("\n");

  lines.forEach((rawLine, index) => {
    const line = rawLine.trim();
    if (line === "" || line.startsWith("#")) return;

    const colon = line.indexOf(":");
    const name = colon > 0 ? line.slice(0, colon) : "";
    const target = line.slice(colon + 1);
    if (!PACKAGE_NAME.test(name) || target === "") {
      throw new WorkerError(
        "RESOLUTION_ERROR",
        `Malformed package metadata at ${location.href}:${index + 1}: "${line}"`,
        { path: location.href },
      );
    }
    if (packages.has(name)) {
      throw new WorkerError(
        "RESOLUTION_ERROR",
        `Package "${name}" is listed more than once in ${location.href}`,
        { path: location.href },
      );
    }

    const root = new URL(target.endsWith("/") ? target : `${target}/`, location);
    packages.set(name, root);
  });

  return packages;
}

/**
 * Resolve an import URI against the identity of the importing module.
 * `package:` identities are hierarchical even though WHATWG URLs treat them
 * as opaque, so relative imports from them are joined by hand.
 */
export function resolveImportUri(spec: string, base: string): string {
  if (HAS_SCHEME.test(spec)) {
    return new URL(spec).href;
  }
  if (base.startsWith("package:")) {
    const basePath = base.slice("package:".length);
    const joined = posix.normalize(posix.join(posix.dirname(basePath), spec));
    return `package:${joined}`;
  }
  return new URL(spec, base).href;
}

/**
 * Physical URI a module identity is read from. Only `package:` identities
 * are translated; everything else is handed to the filesystem overlay as is.
 *
 * @returns undefined when the package is unknown
 */
export function locateModule(id: string, packages: PackageMap): URL | undefined {
  if (!id.startsWith("package:")) {
    return new URL(id);
  }
  const path = id.slice("package:".length);
  const slash = path.indexOf("/");
  if (slash <= 0) return undefined;
  const root = packages.get(path.slice(0, slash));
  if (!root) return undefined;
  return new URL(`./${path.slice(slash + 1)}`, root);
}

export function packageNameOf(id: string): string | undefined {
  if (!id.startsWith("package:")) return undefined;
  return id.slice("package:".length).split("/")[0];
}
