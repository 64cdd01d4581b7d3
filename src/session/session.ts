import {
  type Diagnostic,
  diagnostic,
} from "../compiler/diagnostics.js";
import type {
  CompileOpts,
  CompilerInputs,
  CompilerService,
  SessionHandle,
} from "../compiler/service.js";
import type { FileSystem } from "../fs/types.js";
import type { ModuleGraph } from "../ir/types.js";

/** Either a graph or the reasons there is none; diagnostics accompany both. */
export type CompileOutcome =
  | { graph: ModuleGraph; diagnostics: Diagnostic[] }
  | { graph: null; diagnostics: Diagnostic[] };

/**
 * Loaded platform summary, dependency summaries and package map, ready to
 * compile. Immutable after create(), so one session may serve concurrent
 * requests.
 */
export class CompilationSession {
  private constructor(
    private readonly service: CompilerService,
    private readonly handle: SessionHandle,
  ) {}

  static async create(
    service: CompilerService,
    inputs: CompilerInputs,
    fs: FileSystem,
  ): Promise<CompilationSession> {
    return new CompilationSession(service, await service.initialize(inputs, fs));
  }

  /**
   * Compile sources, collecting every diagnostic the compiler reports.
   * The outcome has no graph if any diagnostic is an error.
   */
  async compile(sources: URL[], opts: CompileOpts): Promise<CompileOutcome> {
    const diagnostics: Diagnostic[] = [];
    const graph = await this.service.compile(
      this.handle,
      sources,
      (d) => diagnostics.push(d),
      opts,
    );

    const failed = diagnostics.some((d) => d.severity === "error");
    if (graph && !failed) {
      return { graph, diagnostics };
    }
    if (!failed) {
      diagnostics.push(diagnostic("error", "Compilation produced no output."));
    }
    return { graph: null, diagnostics };
  }
}
