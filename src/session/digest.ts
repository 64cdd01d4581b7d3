import { createHash } from "node:crypto";

/** SHA-256 as hex (64 characters) */
export function sha256Hex(data: string | Uint8Array): string {
  const hash = createHash("sha256");
  if (typeof data === "string") {
    hash.update(data, "utf8");
  } else {
    hash.update(data);
  }
  return hash.digest("hex");
}

/**
 * Deterministic JSON serialization with sorted keys (recursive).
 *
 * - Arrays keep their order; undefined elements become null
 * - Object keys are sorted; keys with undefined values are omitted
 * - Circular references are unsupported
 */
export function stableStringify(value: unknown): string {
  if (value === undefined) {
    return "null";
  }
  if (value === null || typeof value !== "object") {
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return `[${value.map((v) => (v === undefined ? "null" : stableStringify(v))).join(",")}]`;
  }
  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  const pairs = entries.map(
    ([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`,
  );
  return `{${pairs.join(",")}}`;
}
