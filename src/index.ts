export * from "./args/index.js";
export * from "./compiler/index.js";
export { errorMessage, WorkerError } from "./errors.js";
export type { WorkerErrorCode } from "./errors.js";
export * from "./fs/index.js";
export * from "./ir/index.js";
export * from "./output/index.js";
export * from "./runner/index.js";
export * from "./session/index.js";
export * from "./transform/index.js";
export * from "./worker/index.js";
export { EXIT_STARTUP_FAILURE, main } from "./cli.js";
export type { CliIo } from "./cli.js";
export * from "./schemas/index.js";
