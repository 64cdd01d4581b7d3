export type WorkerErrorCode =
  | "ARG_FILE_UNREADABLE" // @file indirection could not be read
  | "OPTION_PARSE_ERROR" // malformed, unknown or missing required option
  | "RESOLUTION_ERROR" // a mandatory input could not be loaded through the overlay
  | "COMPILE_DIAGNOSTIC" // compiler reported error-severity diagnostics
  | "FILTER_INVARIANT_VIOLATION" // dropped module could not be bound, or a reference dangles
  | "ARTIFACT_WRITE_FAILED" // encoding or writing the output artifact failed
  | "PROTOCOL_ERROR" // request frame could not be decoded
  | "STARTUP_ERROR"; // process-level failure, the only fatal code

export class WorkerError extends Error {
  constructor(
    public readonly code: WorkerErrorCode,
    message: string,
    public readonly details?: {
      path?: string;
      option?: string;
      module?: string;
      reference?: string;
      cause?: unknown;
    },
  ) {
    super(message);
    this.name = "WorkerError";
  }
}

/** Message text of any thrown value. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
