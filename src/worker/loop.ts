import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import { errorMessage } from "../errors.js";
import {
  errorDiagnostic,
  exitCodeFor,
  formatDiagnostics,
  type RequestResult,
} from "../runner/result.js";
import type { WorkResponse } from "../schemas/work-protocol.js";
import type { WorkJournal } from "./journal.js";
import { decodeRequest, encodeResponse, salvageRequestId } from "./protocol.js";
import { Semaphore } from "./semaphore.js";

export type RequestHandler = (args: string[]) => Promise<RequestResult>;

export interface WorkerLoopOpts {
  handle: RequestHandler;
  concurrency?: number; // default 1
  journal?: WorkJournal;
}

/**
 * Persistent-mode driver: one newline-delimited JSON request in, one response
 * out, until the input ends.
 *
 * Responses are written in the order requests arrived, also when more than
 * one request runs at a time. Whatever a request throws becomes a failure
 * response for that request; the loop carries on with the next one.
 */
export class WorkerLoop {
  private readonly handle: RequestHandler;
  private readonly semaphore: Semaphore;
  private readonly journal?: WorkJournal;

  constructor(opts: WorkerLoopOpts) {
    this.handle = opts.handle;
    this.semaphore = new Semaphore(opts.concurrency ?? 1);
    this.journal = opts.journal;
  }

  /**
   * Serve requests from `input` until it ends.
   * Resolves once every response has been written.
   *
   * @throws Error if the output channel fails; nothing more can be reported
   */
  async run(input: Readable, output: Writable): Promise<void> {
    const lines = createInterface({ input, crlfDelay: Number.POSITIVE_INFINITY, terminal: false });
    let outputError: unknown;
    let written: Promise<void> = Promise.resolve();

    for await (const line of lines) {
      if (line.trim() === "") continue;

      await this.semaphore.acquire();
      const response = this.serve(line).finally(() => this.semaphore.release());
      written = written
        .then(() => response)
        .then((frame) => writeFrame(output, frame))
        .catch((error: unknown) => {
          outputError ??= error;
          console.error(`outline-worker: could not write response: ${errorMessage(error)}`);
        });
    }

    await written;
    if (outputError !== undefined) {
      throw outputError;
    }
  }

  /** Handle one frame. Never rejects. */
  async serve(line: string): Promise<WorkResponse> {
    const startedAt = Date.now();
    let requestId = 0;
    let args: string[] = [];
    let result: RequestResult;

    try {
      const request = decodeRequest(line);
      requestId = request.requestId;
      args = request.arguments;
      result = await this.handle(args);
    } catch (error) {
      requestId ||= salvageRequestId(line);
      result = {
        ok: false,
        diagnostics: [errorDiagnostic(error, { stack: true })],
        phase: "parsing",
      };
    }

    const response: WorkResponse = {
      requestId,
      exitCode: exitCodeFor(result),
      output: formatDiagnostics(result.diagnostics),
    };
    this.recordInJournal(args, response, result, startedAt);
    return response;
  }

  private recordInJournal(
    args: string[],
    response: WorkResponse,
    result: RequestResult,
    startedAt: number,
  ): void {
    if (!this.journal) return;
    try {
      this.journal.record({
        request_id: response.requestId,
        args,
        exit_code: response.exitCode,
        diagnostic_count: result.diagnostics.length,
        artifact_bytes: result.artifactBytes ?? null,
        started_at: startedAt,
        finished_at: Date.now(),
      });
    } catch (error) {
      console.warn(`outline-worker: work journal write failed: ${errorMessage(error)}`);
    }
  }
}

function writeFrame(output: Writable, response: WorkResponse): Promise<void> {
  return new Promise((resolve, reject) => {
    output.write(encodeResponse(response), (error) => {
      if (error) {
        reject(error);
      } else {
        resolve();
      }
    });
  });
}
