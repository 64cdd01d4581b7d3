export {
  DEFAULT_WORKER_CONFIG,
  PERSISTENT_WORKER_FLAG,
  parseWorkerConfig,
  WorkerConfigSchema,
} from "./config.js";
export type { WorkerConfig } from "./config.js";
export { digestArguments, SqliteWorkJournal } from "./journal.js";
export type { NewJournalEntry, WorkJournal } from "./journal.js";
export { WorkerLoop } from "./loop.js";
export type { RequestHandler, WorkerLoopOpts } from "./loop.js";
export { decodeRequest, encodeResponse, salvageRequestId } from "./protocol.js";
export { Semaphore } from "./semaphore.js";
