/**
 * Error codes for filesystem operations.
 */
export type FileSystemErrorCode =
  | "FILE_NOT_FOUND" // nothing exists at the URI
  | "UNSUPPORTED_SCHEME" // the implementation cannot address this scheme
  | "READ_FAILED"; // entry exists but could not be read

export class FileSystemError extends Error {
  constructor(
    public readonly code: FileSystemErrorCode,
    message: string,
    public readonly uri: string,
  ) {
    super(message);
    this.name = "FileSystemError";
  }
}
