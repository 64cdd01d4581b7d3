import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { mkdir, readFile, stat } from "node:fs/promises";
import { join } from "node:path";
import { pathToFileURL } from "node:url";
import {
  createTempDir,
  platformSummaryBytes,
  workspaceFs,
} from "../../__tests__/helpers.js";
import { usage } from "../../args/options.js";
import { decodeGraph } from "../../ir/codec.js";
import { FreshSessionProvider, type SessionProvider } from "../../session/providers.js";
import { runRequest } from "../request-runner.js";

const A_SOURCE = [
  'import "platform:core" as core;',
  'import "b.mod" as b;',
  "export const v: string = core.version;",
  "export const n: int = b.count;",
].join("\n");

const unusedSessions: SessionProvider = {
  acquire: () => Promise.reject(new Error("no session expected")),
};

describe("runRequest", () => {
  let dir: string;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    ({ dir, cleanup } = await createTempDir());
  });

  afterEach(async () => {
    await cleanup();
  });

  function files(a: string = A_SOURCE) {
    return workspaceFs(dir, {
      "platform.sum": platformSummaryBytes(),
      "lib/a.mod": a,
      "lib/b.mod": "export const count: int = 2;\n",
    });
  }

  function compileArgs(...extra: string[]): string[] {
    return [
      "--platform-summary=platform.sum",
      `--multi-root=${dir}`,
      "--source=multi-root:///lib/a.mod",
      "--output=out/a.sum",
      ...extra,
    ];
  }

  test("compiles, filters to the sources and writes the artifact", async () => {
    const result = await runRequest(compileArgs("--exclude-non-sources"), {
      sessions: new FreshSessionProvider(),
      fs: files(),
      cwd: dir,
    });

    expect(result.diagnostics).toEqual([]);
    expect(result.ok).toBe(true);
    expect(result.phase).toBe("done");

    const bytes = await readFile(join(dir, "out", "a.sum"));
    expect(result.artifactBytes).toBe(bytes.length);
    const graph = decodeGraph(bytes);
    expect(graph.modules).toEqual(["multi-root:///lib/a.mod"]);
    expect(graph.root.get("multi-root:///lib/b.mod")?.names.get("count")).toBe(
      "multi-root:///lib/b.mod::count",
    );
  });

  test("without --exclude-non-sources the imported module is kept", async () => {
    const result = await runRequest(compileArgs(), {
      sessions: new FreshSessionProvider(),
      fs: files(),
      cwd: dir,
    });

    expect(result.ok).toBe(true);
    const graph = decodeGraph(await readFile(join(dir, "out", "a.sum")));
    expect(graph.modules).toEqual(["multi-root:///lib/a.mod", "multi-root:///lib/b.mod"]);
  });

  test("full compiles ignore --exclude-non-sources", async () => {
    const result = await runRequest(compileArgs("--exclude-non-sources", "--no-summary-only"), {
      sessions: new FreshSessionProvider(),
      fs: files(),
      cwd: dir,
    });

    expect(result.ok).toBe(true);
    const graph = decodeGraph(await readFile(join(dir, "out", "a.sum")));
    expect(graph.modules).toHaveLength(2);
  });

  test("compile errors fail the request and write nothing", async () => {
    const result = await runRequest(compileArgs(), {
      sessions: new FreshSessionProvider(),
      fs: files('export const answer: int = "forty-two";'),
      cwd: dir,
    });

    expect(result.ok).toBe(false);
    expect(result.phase).toBe("compiling");
    expect(result.diagnostics.map((d) => d.message)).toEqual([
      "multi-root:///lib/a.mod:1:28: Error: A value of type 'string' can't be assigned to a constant of type 'int'.",
      "Error: Compilation failed with 1 error(s).",
    ]);
    expect(result.diagnostics[1]?.code).toBe("COMPILE_DIAGNOSTIC");
    await expect(stat(join(dir, "out", "a.sum"))).rejects.toThrow();
  });

  test("help touches neither filesystem nor sessions", async () => {
    const fs = files();
    const result = await runRequest(["--help"], { sessions: unusedSessions, fs, cwd: dir });

    expect(result).toEqual({
      ok: true,
      phase: "done",
      diagnostics: [{ severity: "info", message: usage(), context: [] }],
    });
    expect(fs.reads).toBe(0);
  });

  test("arguments can come from an @file", async () => {
    const result = await runRequest(["@args"], {
      sessions: new FreshSessionProvider(),
      fs: files(),
      cwd: dir,
      readArgFile: (path) => {
        expect(path).toBe("args");
        return `${compileArgs().join("\n")}\n`;
      },
    });

    expect(result.ok).toBe(true);
  });

  test("unreadable @file", async () => {
    const result = await runRequest(["@args"], {
      sessions: unusedSessions,
      readArgFile: () => {
        throw new Error("permission denied");
      },
    });

    expect(result.ok).toBe(false);
    expect(result.phase).toBe("parsing");
    expect(result.diagnostics).toEqual([
      {
        severity: "error",
        message: "Error: Failed to read file specified by @args: permission denied",
        context: [],
        code: "ARG_FILE_UNREADABLE",
      },
    ]);
  });

  test("missing required option", async () => {
    const result = await runRequest(["--source=a.mod", "--output=a.sum"], {
      sessions: unusedSessions,
    });

    expect(result.phase).toBe("parsing");
    expect(result.diagnostics.map((d) => d.message)).toEqual([
      "Error: Missing required option --platform-summary.",
    ]);
  });

  test("platform summary that cannot be loaded fails while resolving", async () => {
    const args = compileArgs().map((arg) =>
      arg.startsWith("--platform-summary") ? "--platform-summary=missing.sum" : arg,
    );
    const result = await runRequest(args, {
      sessions: new FreshSessionProvider(),
      fs: files(),
      cwd: dir,
    });
    const missing = pathToFileURL(join(dir, "missing.sum")).href;

    expect(result.phase).toBe("resolving");
    expect(result.diagnostics).toEqual([
      {
        severity: "error",
        message: `Error: Could not load platform summary ${missing}: File not found: ${missing}`,
        context: [],
        code: "RESOLUTION_ERROR",
      },
    ]);
  });

  test("unwritable output fails while writing", async () => {
    await mkdir(join(dir, "out", "a.sum"), { recursive: true });
    const result = await runRequest(compileArgs(), {
      sessions: new FreshSessionProvider(),
      fs: files(),
      cwd: dir,
    });

    expect(result.ok).toBe(false);
    expect(result.phase).toBe("writing");
    expect(result.diagnostics[0]?.code).toBe("ARTIFACT_WRITE_FAILED");
  });

  test("unexpected failures become internal errors", async () => {
    const result = await runRequest(compileArgs(), {
      sessions: { acquire: () => Promise.reject(new Error("boom")) },
      fs: files(),
      cwd: dir,
    });

    expect(result.phase).toBe("resolving");
    expect(result.diagnostics).toEqual([
      { severity: "error", message: "Error: Internal error: boom", context: [] },
    ]);
  });
});
