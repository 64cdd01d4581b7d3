export type IrCodecErrorCode =
  | "BAD_MAGIC" // not an artifact of this format
  | "UNSUPPORTED_VERSION" // format version this build does not read
  | "TRUNCATED" // fewer bytes than the header announces
  | "MALFORMED_PAYLOAD" // payload is not valid JSON or fails schema validation
  | "MISSING_MODULE" // top-level id with no node in the arena
  | "DANGLING_REFERENCE"; // reference with no canonical name bound in the root

export class IrCodecError extends Error {
  constructor(
    public readonly code: IrCodecErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "IrCodecError";
  }
}
