import { WorkerError, errorMessage } from "../errors.js";
import { type FileSystem, readText } from "../fs/types.js";
import { IrCodecError } from "../ir/errors.js";
import { decodeGraph } from "../ir/codec.js";
import { addModule, bindModule, createGraph, topLevelModules } from "../ir/graph.js";
import type { Declaration, ModuleGraph, ModuleId, ModuleNode } from "../ir/types.js";
import { checkModule } from "./checker.js";
import {
  type Diagnostic,
  diagnostic,
  type OnDiagnostic,
  type SourceLocation,
} from "./diagnostics.js";
import {
  locateModule,
  type PackageMap,
  packageNameOf,
  parsePackageMetadata,
  resolveImportUri,
} from "./packages.js";
import { type ParsedModule, parseModule } from "./parser.js";

export interface CompilerInputs {
  platformSummary: URL;
  inputSummaries: URL[];
  inputLinked: URL[];
  packageMetadata?: URL;
}

/**
 * Everything a compile needs besides its sources. Read-only once built:
 * compile() never mutates the external modules or the package map.
 */
export interface SessionHandle {
  readonly externals: ReadonlyMap<ModuleId, ModuleNode>;
  readonly packages: PackageMap;
  readonly fs: FileSystem;
}

export interface CompileOpts {
  summaryOnly: boolean;
}

/**
 * Contract between the worker and the compiler. The worker treats an
 * implementation as a black box.
 */
export interface CompilerService {
  /** @throws WorkerError RESOLUTION_ERROR if a mandatory input cannot be loaded */
  initialize(inputs: CompilerInputs, fs: FileSystem): Promise<SessionHandle>;

  /**
   * Compile `sources` and everything they import that no input provides.
   * Problems go to `onDiagnostic` and never stop the pass.
   *
   * @returns the module graph, or null if any error was reported
   */
  compile(
    handle: SessionHandle,
    sources: URL[],
    onDiagnostic: OnDiagnostic,
    opts: CompileOpts,
  ): Promise<ModuleGraph | null>;
}

interface LoadRequest {
  id: ModuleId;
  from?: SourceLocation;
}

interface LoadedModule {
  node: ModuleNode;
  parsed: ParsedModule;
  /** Parallel to parsed.imports; undefined where the URI did not resolve. */
  importTargets: Array<ModuleId | undefined>;
}

/** Compiler for `.mod` outline modules. */
export class OutlineCompiler implements CompilerService {
  async initialize(inputs: CompilerInputs, fs: FileSystem): Promise<SessionHandle> {
    const externals = new Map<ModuleId, ModuleNode>();
    const blobs: Array<{ role: string; uri: URL }> = [
      { role: "platform summary", uri: inputs.platformSummary },
      ...inputs.inputSummaries.map((uri) => ({ role: "input summary", uri })),
      ...inputs.inputLinked.map((uri) => ({ role: "linked input", uri })),
    ];

    for (const { role, uri } of blobs) {
      const graph = await loadArtifact(fs, role, uri);
      for (const node of topLevelModules(graph)) {
        // First provider of a module wins.
        if (!externals.has(node.id)) {
          externals.set(node.id, { ...node, isCanonicalOwner: false });
        }
      }
    }

    let packages: PackageMap = new Map();
    if (inputs.packageMetadata) {
      const text = await readInput(fs, "package metadata", inputs.packageMetadata, (bytes) =>
        new TextDecoder().decode(bytes),
      );
      packages = parsePackageMetadata(text, inputs.packageMetadata);
    }

    return { externals, packages, fs };
  }

  async compile(
    handle: SessionHandle,
    sources: URL[],
    onDiagnostic: OnDiagnostic,
    opts: CompileOpts,
  ): Promise<ModuleGraph | null> {
    let errors = 0;
    const report = (d: Diagnostic): void => {
      if (d.severity === "error") errors++;
      onDiagnostic(d);
    };

    const graph = createGraph();
    for (const external of handle.externals.values()) {
      addModule(graph, external, { topLevel: false });
      bindModule(graph.root, external);
    }

    const loaded = new Map<ModuleId, LoadedModule>();
    const failed = new Set<ModuleId>();
    const queue: LoadRequest[] = sources.map((uri) => ({ id: uri.href }));

    for (let request = queue.shift(); request; request = queue.shift()) {
      const { id, from } = request;
      if (graph.nodes.has(id) || failed.has(id)) continue;

      const text = await this.readModule(handle, id, from, report);
      if (text === undefined) {
        failed.add(id);
        continue;
      }

      const parsed = parseModule(text);
      for (const problem of parsed.problems) {
        report(diagnostic("error", problem.message, { uri: id, ...problem.span }));
      }

      const node: ModuleNode = {
        id,
        fileUri: (locateModule(id, handle.packages) ?? new URL(id)).href,
        imports: [],
        declarations: outline(parsed),
        isCanonicalOwner: true,
      };
      addModule(graph, node, { topLevel: true });

      const importTargets: Array<ModuleId | undefined> = [];
      for (const imp of parsed.imports) {
        const location = { uri: id, ...imp.span };
        let target: ModuleId;
        try {
          target = resolveImportUri(imp.uri, id);
        } catch (error) {
          report(diagnostic("error", `Invalid import URI '${imp.uri}': ${errorMessage(error)}`, location));
          importTargets.push(undefined);
          continue;
        }
        importTargets.push(target);
        if (!node.imports.includes(target)) node.imports.push(target);
        queue.push({ id: target, from: location });
      }
      loaded.set(id, { node, parsed, importTargets });
    }

    for (const { node, parsed, importTargets } of loaded.values()) {
      node.declarations = checkModule({ id: node.id, parsed, importTargets, graph, report });
      if (opts.summaryOnly) {
        node.declarations = node.declarations.map(toSummary);
      }
    }

    return errors > 0 ? null : graph;
  }

  private async readModule(
    handle: SessionHandle,
    id: ModuleId,
    from: SourceLocation | undefined,
    report: OnDiagnostic,
  ): Promise<string | undefined> {
    let uri: URL | undefined;
    try {
      uri = locateModule(id, handle.packages);
    } catch (error) {
      report(diagnostic("error", `Invalid module URI '${id}': ${errorMessage(error)}`, from));
      return undefined;
    }
    if (!uri) {
      const name = packageNameOf(id) ?? id;
      report(diagnostic("error", `Couldn't resolve the package '${name}' in '${id}'.`, from));
      return undefined;
    }

    try {
      return await readText(handle.fs, uri);
    } catch (error) {
      report(diagnostic("error", `Error when reading '${uri.href}': ${errorMessage(error)}`, from));
      return undefined;
    }
  }
}

/** Declarations without initializers, first declaration of a name wins. */
function outline(parsed: ParsedModule): Declaration[] {
  const seen = new Set<string>();
  const result: Declaration[] = [];
  for (const decl of parsed.declarations) {
    if (seen.has(decl.name)) continue;
    seen.add(decl.name);
    result.push({ name: decl.name, kind: decl.kind, type: decl.type, exported: decl.exported });
  }
  return result;
}

/** Constants are part of the public interface; `let` initializers are not. */
function toSummary(decl: Declaration): Declaration {
  if (decl.kind !== "let" || !decl.initializer) return decl;
  const { initializer: _dropped, ...rest } = decl;
  return rest;
}

async function readInput<T>(
  fs: FileSystem,
  role: string,
  uri: URL,
  decode: (bytes: Uint8Array) => T,
): Promise<T> {
  let bytes: Uint8Array;
  try {
    bytes = await fs.readBytes(uri);
  } catch (error) {
    throw new WorkerError(
      "RESOLUTION_ERROR",
      `Could not load ${role} ${uri.href}: ${errorMessage(error)}`,
      { path: uri.href, cause: error },
    );
  }
  return decode(bytes);
}

async function loadArtifact(fs: FileSystem, role: string, uri: URL): Promise<ModuleGraph> {
  return readInput(fs, role, uri, (bytes) => {
    try {
      return decodeGraph(bytes);
    } catch (error) {
      if (!(error instanceof IrCodecError)) throw error;
      throw new WorkerError(
        "RESOLUTION_ERROR",
        `Could not decode ${role} ${uri.href}: ${error.message}`,
        { path: uri.href, cause: error },
      );
    }
  });
}
