export { sha256Hex, stableStringify } from "./digest.js";
export {
  CachedSessionProvider,
  computeSessionKey,
  FreshSessionProvider,
} from "./providers.js";
export type { SessionProvider, SessionRequest } from "./providers.js";
export { CompilationSession } from "./session.js";
export type { CompileOutcome } from "./session.js";
