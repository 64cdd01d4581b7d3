import type { WorkerErrorCode } from "../errors.js";

export type Severity = "info" | "error";

export interface SourceLocation {
  uri: string;
  line: number; // 1-based
  column: number; // 1-based
}

/**
 * One reported problem. `message` is already formatted for display,
 * location included; `context` holds related, pre-formatted messages.
 */
export interface Diagnostic {
  severity: Severity;
  message: string;
  context: string[];
  code?: WorkerErrorCode; // set for problems raised by the worker itself
}

export type OnDiagnostic = (diagnostic: Diagnostic) => void;

const LABEL: Record<Severity, string> = { info: "Info", error: "Error" };

export function formatMessage(
  severity: Severity | "context",
  message: string,
  location?: SourceLocation,
): string {
  const label = severity === "context" ? "Context" : LABEL[severity];
  if (!location) return `${label}: ${message}`;
  return `${location.uri}:${location.line}:${location.column}: ${label}: ${message}`;
}

export function diagnostic(
  severity: Severity,
  message: string,
  location?: SourceLocation,
  context: string[] = [],
): Diagnostic {
  return { severity, message: formatMessage(severity, message, location), context };
}
