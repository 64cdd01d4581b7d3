import {
  type Diagnostic,
  formatMessage,
} from "../compiler/diagnostics.js";
import { WorkerError } from "../errors.js";

export const EXIT_SUCCESS = 0;
/** Reported for any failed request; the build tool reads it as "see output". */
export const EXIT_FAILURE = 15;

export type RequestPhase =
  | "parsing"
  | "resolving"
  | "compiling"
  | "filtering"
  | "writing"
  | "done";

export interface RequestResult {
  ok: boolean;
  diagnostics: Diagnostic[];
  /** Size of the artifact written, when one was. */
  artifactBytes?: number;
  /** Last phase entered; "done" only on success. */
  phase: RequestPhase;
}

export function exitCodeFor(result: RequestResult): number {
  return result.ok ? EXIT_SUCCESS : EXIT_FAILURE;
}

/** Diagnostic for a failure caught at a request or loop boundary. */
export function errorDiagnostic(error: unknown, opts: { stack?: boolean } = {}): Diagnostic {
  if (error instanceof WorkerError) {
    return {
      severity: "error",
      message: formatMessage("error", error.message),
      context: [],
      code: error.code,
    };
  }
  const message = error instanceof Error ? error.message : String(error);
  const stack =
    opts.stack && error instanceof Error && error.stack
      ? error.stack.split("\n").slice(1).map((line) => line.trim())
      : [];
  return {
    severity: "error",
    message: formatMessage("error", `Internal error: ${message}`),
    context: stack,
  };
}

/** One message per line, context lines indented beneath their message. */
export function formatDiagnostics(diagnostics: readonly Diagnostic[]): string {
  const lines: string[] = [];
  for (const d of diagnostics) {
    lines.push(d.message);
    for (const context of d.context) {
      lines.push(`  ${context}`);
    }
  }
  return lines.join("\n");
}
