import { resolve } from "node:path";
import { expandArguments, type ReadText } from "../args/expand.js";
import { parseOptions, usage, validateOptions } from "../args/options.js";
import type { Diagnostic } from "../compiler/diagnostics.js";
import type { CompilerInputs } from "../compiler/service.js";
import { MultiRootFileSystem } from "../fs/multi-root.js";
import { NodeFileSystem } from "../fs/node.js";
import type { FileSystem } from "../fs/types.js";
import { resolveInputUri } from "../fs/uri.js";
import { writeArtifact } from "../output/artifact-writer.js";
import type { SessionProvider } from "../session/providers.js";
import { filterToSources } from "../transform/summary-filter.js";
import {
  errorDiagnostic,
  type RequestPhase,
  type RequestResult,
} from "./result.js";

export interface RunnerDeps {
  sessions: SessionProvider;
  /** Physical filesystem under the multi-root overlay. Defaults to NodeFileSystem. */
  fs?: FileSystem;
  /** Directory relative paths resolve against. Defaults to process.cwd(). */
  cwd?: string;
  readArgFile?: ReadText;
}

/**
 * Run one compile request to completion.
 *
 * parsing -> resolving -> compiling -> filtering -> writing -> done
 *
 * Help short-circuits from parsing without touching the overlay or a
 * session. Any failure ends the request with the diagnostics gathered so far;
 * nothing is thrown to the caller.
 */
export async function runRequest(
  args: readonly string[],
  deps: RunnerDeps,
): Promise<RequestResult> {
  const diagnostics: Diagnostic[] = [];
  let phase: RequestPhase = "parsing";

  try {
    const parsed = parseOptions(expandArguments(args, deps.readArgFile));
    if (parsed.help) {
      diagnostics.push({ severity: "info", message: usage(), context: [] });
      return { ok: true, diagnostics, phase: "done" };
    }
    const options = validateOptions(parsed);

    phase = "resolving";
    const cwd = deps.cwd ?? process.cwd();
    const toUri = (value: string): URL => resolveInputUri(value, cwd);
    const fs = new MultiRootFileSystem(
      options.multiRootScheme,
      options.multiRoots.map(toUri),
      deps.fs ?? new NodeFileSystem(),
      cwd,
    );
    const inputs: CompilerInputs = {
      platformSummary: toUri(options.platformSummary),
      inputSummaries: options.inputSummaries.map(toUri),
      inputLinked: options.inputLinked.map(toUri),
      packageMetadata:
        options.packageMetadata !== undefined ? toUri(options.packageMetadata) : undefined,
    };
    const sources = options.sources.map(toUri);
    const session = await deps.sessions.acquire({
      inputs,
      fs,
      overlay: {
        scheme: fs.scheme,
        roots: fs.roots.map((root) => root.href),
        cwd,
      },
    });

    phase = "compiling";
    const outcome = await session.compile(sources, { summaryOnly: options.summaryOnly });
    diagnostics.push(...outcome.diagnostics);
    if (!outcome.graph) {
      const errors = outcome.diagnostics.filter((d) => d.severity === "error").length;
      diagnostics.push({
        severity: "error",
        message: `Error: Compilation failed with ${errors} error(s).`,
        context: [],
        code: "COMPILE_DIAGNOSTIC",
      });
      return { ok: false, diagnostics, phase };
    }

    if (options.summaryOnly && options.excludeNonSources) {
      phase = "filtering";
      filterToSources(
        outcome.graph,
        sources.map((uri) => uri.href),
      );
    }

    phase = "writing";
    const artifactBytes = await writeArtifact(outcome.graph, resolve(cwd, options.output));

    return { ok: true, diagnostics, artifactBytes, phase: "done" };
  } catch (error) {
    diagnostics.push(errorDiagnostic(error));
    return { ok: false, diagnostics, phase };
  }
}
