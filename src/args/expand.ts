import { readFileSync } from "node:fs";
import { WorkerError, errorMessage } from "../errors.js";

export const ARG_FILE_MARKER = "@";

export type ReadText = (path: string) => string;

const readUtf8: ReadText = (path) => readFileSync(path, "utf8");

/**
 * If the last argument starts with `@`, replace it with the lines of the file
 * it names.
 *
 * This is how a build system separates per-request arguments from start-up
 * arguments: the request's arguments go in the file.
 *
 * - A trailing `\r` on each line is removed
 * - The empty line left by a final newline is dropped
 * - Returns a new array; the input is never mutated
 *
 * @throws WorkerError ARG_FILE_UNREADABLE if the file cannot be read
 */
export function expandArguments(
  args: readonly string[],
  readText: ReadText = readUtf8,
): string[] {
  const expanded = [...args];
  const last = expanded.at(-1);
  if (last === undefined || !last.startsWith(ARG_FILE_MARKER)) {
    return expanded;
  }

  const path = last.slice(ARG_FILE_MARKER.length);
  let content: string;
  try {
    content = readText(path);
  } catch (error) {
    throw new WorkerError(
      "ARG_FILE_UNREADABLE",
      `Failed to read file specified by ${last}: ${errorMessage(error)}`,
      { path, cause: error },
    );
  }

  expanded.pop();
  expanded.push(...splitLines(content));
  return expanded;
}

function splitLines(content: string): string[] {
  const lines = content.split("\n").map((line) => line.replace(/\r$/, ""));
  if (lines.length > 0 && lines.at(-1) === "") {
    lines.pop();
  }
  return lines;
}
