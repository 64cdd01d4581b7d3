import type { Readable, Writable } from "node:stream";
import { resolve } from "node:path";
import { expandArguments } from "./args/expand.js";
import { WorkerError, errorMessage } from "./errors.js";
import type { FileSystem } from "./fs/types.js";
import { runRequest } from "./runner/request-runner.js";
import { exitCodeFor, formatDiagnostics } from "./runner/result.js";
import {
  CachedSessionProvider,
  FreshSessionProvider,
  type SessionProvider,
} from "./session/providers.js";
import { PERSISTENT_WORKER_FLAG, parseWorkerConfig } from "./worker/config.js";
import { SqliteWorkJournal, type WorkJournal } from "./worker/journal.js";
import { WorkerLoop } from "./worker/loop.js";

export const EXIT_STARTUP_FAILURE = 1;

export interface CliIo {
  stdin: Readable;
  stdout: Writable;
  stderr: Writable;
  cwd: string;
  /** Physical filesystem; NodeFileSystem when absent. */
  fs?: FileSystem;
}

export function processIo(): CliIo {
  return {
    stdin: process.stdin,
    stdout: process.stdout,
    stderr: process.stderr,
    cwd: process.cwd(),
  };
}

/**
 * Entry point for both modes.
 *
 * With the persistent flag, serves protocol requests until stdin closes;
 * otherwise runs the arguments as a single request. Returns the process exit
 * code: 0, 15 for a failed request, 1 when persistent mode cannot start or
 * its output channel breaks.
 */
export async function main(argv: readonly string[], io: CliIo = processIo()): Promise<number> {
  if (argv.includes(PERSISTENT_WORKER_FLAG)) {
    return runPersistent(argv, io);
  }

  const result = await runRequest(argv, {
    sessions: new FreshSessionProvider(),
    fs: io.fs,
    cwd: io.cwd,
  });
  const text = formatDiagnostics(result.diagnostics);
  if (text !== "") {
    (result.ok ? io.stdout : io.stderr).write(`${text}\n`);
  }
  return exitCodeFor(result);
}

async function runPersistent(argv: readonly string[], io: CliIo): Promise<number> {
  let journal: WorkJournal | undefined;
  try {
    let startupArgs: string[];
    try {
      startupArgs = expandArguments(argv);
    } catch (error) {
      throw new WorkerError("STARTUP_ERROR", errorMessage(error), { cause: error });
    }
    const config = parseWorkerConfig(startupArgs);

    if (config.journal !== undefined) {
      const dbPath = resolve(io.cwd, config.journal);
      try {
        journal = new SqliteWorkJournal({ dbPath });
      } catch (error) {
        throw new WorkerError(
          "STARTUP_ERROR",
          `Cannot open work journal ${dbPath}: ${errorMessage(error)}`,
          { path: dbPath, cause: error },
        );
      }
    }

    const sessions: SessionProvider = config.sessionCache
      ? new CachedSessionProvider()
      : new FreshSessionProvider();
    const loop = new WorkerLoop({
      handle: (args) => runRequest(args, { sessions, fs: io.fs, cwd: io.cwd }),
      concurrency: config.concurrency,
      journal,
    });

    console.warn(
      `outline-worker: persistent mode, concurrency ${config.concurrency}` +
        `${config.sessionCache ? ", session cache on" : ""}` +
        `${journal ? `, journal ${config.journal}` : ""}`,
    );
    await loop.run(io.stdin, io.stdout);
    return 0;
  } catch (error) {
    io.stderr.write(`outline-worker: ${errorMessage(error)}\n`);
    return EXIT_STARTUP_FAILURE;
  } finally {
    journal?.close();
  }
}
