import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { PassThrough, Readable } from "node:stream";
import { pathToFileURL } from "node:url";
import { MemoryFileSystem } from "../fs/memory.js";
import { encodeGraph } from "../ir/codec.js";
import { addModule, createGraph } from "../ir/graph.js";
import type { Declaration, ModuleNode } from "../ir/types.js";

export const PLATFORM_CORE = "platform:core";

export function constant(
  name: string,
  value: number | string | boolean,
  type: Declaration["type"],
): Declaration {
  return {
    name,
    kind: "const",
    type,
    exported: true,
    initializer: { kind: "literal", value },
  };
}

export function createMockModule(
  overrides: Partial<ModuleNode> & { id: string },
): ModuleNode {
  return {
    fileUri: overrides.id,
    imports: [],
    declarations: [],
    isCanonicalOwner: true,
    ...overrides,
  };
}

/** Summary artifact holding `platform:core` with `version` and `maxInt`. */
export function platformSummaryBytes(): Uint8Array {
  const graph = createGraph();
  addModule(
    graph,
    createMockModule({
      id: PLATFORM_CORE,
      declarations: [
        constant("version", "1.0", "string"),
        constant("maxInt", 2147483647, "int"),
      ],
    }),
    { topLevel: true },
  );
  return encodeGraph(graph);
}

/** Fresh directory under the OS temp dir, removed by the returned cleanup. */
export async function createTempDir(): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await mkdtemp(join(tmpdir(), "outline-worker-"));
  return { dir, cleanup: () => rm(dir, { recursive: true, force: true }) };
}

/** MemoryFileSystem whose files sit at paths relative to `dir`. */
export function workspaceFs(
  dir: string,
  files: Record<string, string | Uint8Array>,
): MemoryFileSystem {
  const fs = new MemoryFileSystem();
  for (const [path, content] of Object.entries(files)) {
    fs.write(pathToFileURL(join(dir, path)), content);
  }
  return fs;
}

/** Collects everything written to it; `text()` waits for pending data events. */
export function captureStream(): { stream: PassThrough; text: () => Promise<string> } {
  const stream = new PassThrough();
  const chunks: string[] = [];
  stream.on("data", (chunk: Buffer) => chunks.push(chunk.toString("utf8")));
  const text = async (): Promise<string> => {
    await new Promise<void>((resolve) => setImmediate(resolve));
    return chunks.join("");
  };
  return { stream, text };
}

/** Readable that yields `lines`, newline-terminated, then ends. */
export function linesStream(lines: string[]): Readable {
  return Readable.from([lines.map((line) => `${line}\n`).join("")]);
}
