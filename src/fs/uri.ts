import { resolve } from "node:path";
import { pathToFileURL } from "node:url";

// Two characters minimum so that Windows drive letters ("C:") read as paths.
const HAS_SCHEME = /^[a-zA-Z][a-zA-Z0-9+.-]+:/;

/**
 * Interpret a command-line value as a URI.
 * Values that already carry a scheme are kept; anything else is a path
 * relative to `cwd`.
 */
export function resolveInputUri(value: string, cwd: string): URL {
  if (HAS_SCHEME.test(value)) {
    return new URL(value);
  }
  return pathToFileURL(resolve(cwd, value));
}
