export { runRequest } from "./request-runner.js";
export type { RunnerDeps } from "./request-runner.js";
export {
  errorDiagnostic,
  EXIT_FAILURE,
  EXIT_SUCCESS,
  exitCodeFor,
  formatDiagnostics,
} from "./result.js";
export type { RequestPhase, RequestResult } from "./result.js";
