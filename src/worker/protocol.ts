import { WorkerError } from "../errors.js";
import {
  type WorkRequest,
  WorkRequestSchema,
  type WorkResponse,
  WorkResponseSchema,
} from "../schemas/work-protocol.js";

function parseJson(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch (error) {
    throw new WorkerError(
      "PROTOCOL_ERROR",
      `Request is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }
}

/**
 * Decode one newline-delimited request frame.
 * @throws WorkerError PROTOCOL_ERROR
 */
export function decodeRequest(line: string): WorkRequest {
  const parsed = WorkRequestSchema.safeParse(parseJson(line));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new WorkerError(
      "PROTOCOL_ERROR",
      `Invalid work request${where}: ${issue?.message ?? parsed.error.message}`,
    );
  }
  return parsed.data;
}

/**
 * Request id of a frame that failed to decode, so that its failure response
 * still reaches the right caller. 0 when nothing usable is there.
 */
export function salvageRequestId(line: string): number {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch {
    return 0;
  }
  const id = WorkRequestSchema.shape.requestId.safeParse(
    typeof value === "object" && value !== null && "requestId" in value ? value.requestId : undefined,
  );
  return id.success ? id.data : 0;
}

export function encodeResponse(response: WorkResponse): string {
  return `${JSON.stringify(WorkResponseSchema.parse(response))}\n`;
}
