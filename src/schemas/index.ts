export {
  type CanonicalNameEntry,
  CanonicalNameEntrySchema,
  type IrPayload,
  IrPayloadSchema,
  type SerializedDeclaration,
  SerializedDeclarationSchema,
  type SerializedModule,
  SerializedModuleSchema,
  ValueTypeSchema,
} from "./ir-payload.js";
export { type JournalEntry, JournalEntrySchema } from "./journal-entry.js";
export {
  MAX_REQUEST_ID,
  type WorkRequest,
  WorkRequestSchema,
  type WorkResponse,
  WorkResponseSchema,
} from "./work-protocol.js";
