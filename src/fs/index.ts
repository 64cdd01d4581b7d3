export { FileSystemError } from "./errors.js";
export type { FileSystemErrorCode } from "./errors.js";
export { MemoryFileSystem } from "./memory.js";
export { MultiRootFileSystem } from "./multi-root.js";
export { NodeFileSystem } from "./node.js";
export { readText } from "./types.js";
export type { FileSystem } from "./types.js";
export { resolveInputUri } from "./uri.js";
