export {
  decodeGraph,
  encodeGraph,
  IR_FORMAT_VERSION,
  IR_HEADER_BYTES,
  IR_MAGIC,
} from "./codec.js";
export { IrCodecError } from "./errors.js";
export type { IrCodecErrorCode } from "./errors.js";
export {
  addModule,
  bindModule,
  bindReference,
  canonicalName,
  createGraph,
  literalType,
  outgoingReferences,
  resolveReference,
  topLevelModules,
} from "./graph.js";
export type {
  CanonicalNameRecord,
  CanonicalRoot,
  Declaration,
  Expression,
  LiteralValue,
  ModuleGraph,
  ModuleId,
  ModuleNode,
  Reference,
  ValueType,
} from "./types.js";
