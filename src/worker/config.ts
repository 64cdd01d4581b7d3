import { z } from "zod";
import { WorkerError } from "../errors.js";

export const PERSISTENT_WORKER_FLAG = "--persistent_worker";

export const DEFAULT_WORKER_CONFIG = Object.freeze({
  concurrency: 1,
  sessionCache: false,
});

export const WorkerConfigSchema = z
  .object({
    concurrency: z.coerce.number().int().min(1).max(64).default(DEFAULT_WORKER_CONFIG.concurrency),
    sessionCache: z.boolean().default(DEFAULT_WORKER_CONFIG.sessionCache),
    journal: z.string().min(1).optional(), // SQLite path, off when absent
  })
  .strict();

export type WorkerConfig = z.infer<typeof WorkerConfigSchema>;

const VALUE_OPTIONS: Record<string, "concurrency" | "journal"> = {
  "--worker-concurrency": "concurrency",
  "--journal": "journal",
};

/**
 * Parse the start-up arguments of persistent mode. Anything other than the
 * persistent flag and the worker options is rejected: per-request arguments
 * arrive over the protocol, not on the command line.
 *
 * @throws WorkerError STARTUP_ERROR
 */
export function parseWorkerConfig(args: readonly string[]): WorkerConfig {
  const raw: Record<string, string | boolean> = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";
    if (arg === PERSISTENT_WORKER_FLAG) continue;
    if (arg === "--session-cache") {
      raw.sessionCache = true;
      continue;
    }

    const eq = arg.indexOf("=");
    const name = eq >= 0 ? arg.slice(0, eq) : arg;
    const key = VALUE_OPTIONS[name];
    if (!key) {
      throw new WorkerError(
        "STARTUP_ERROR",
        `Unexpected argument in persistent mode: "${arg}"`,
      );
    }
    const value = eq >= 0 ? arg.slice(eq + 1) : args[++i];
    if (value === undefined) {
      throw new WorkerError("STARTUP_ERROR", `Missing value for ${name}`);
    }
    raw[key] = value;
  }

  const parsed = WorkerConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new WorkerError(
      "STARTUP_ERROR",
      `Invalid worker option ${issue?.path.join(".") ?? ""}: ${issue?.message ?? parsed.error.message}`,
    );
  }
  return parsed.data;
}
