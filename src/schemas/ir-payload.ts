import { z } from "zod";

export const ValueTypeSchema = z.enum(["int", "string", "bool"]);

/** Entry of the canonical-name table; references point here by index. */
export const CanonicalNameEntrySchema = z
  .object({
    module: z.string().min(1),
    name: z.string().min(1),
  })
  .strict();

const InitializerSchema = z.union([
  z.object({ literal: z.union([z.number().int().safe(), z.string(), z.boolean()]) }).strict(),
  z.object({ ref: z.number().int().nonnegative() }).strict(),
]);

export const SerializedDeclarationSchema = z
  .object({
    name: z.string().min(1),
    kind: z.enum(["const", "let"]),
    type: ValueTypeSchema,
    exported: z.boolean(),
    initializer: InitializerSchema.optional(),
  })
  .strict();

export const SerializedModuleSchema = z
  .object({
    id: z.string().min(1),
    fileUri: z.string(),
    imports: z.array(z.string().min(1)),
    declarations: z.array(SerializedDeclarationSchema),
  })
  .strict();

/**
 * JSON payload carried after the binary artifact header.
 * Only top-level modules are written; modules they reference but do not
 * own appear solely in the canonical-name table.
 */
export const IrPayloadSchema = z
  .object({
    canonicalNames: z.array(CanonicalNameEntrySchema),
    modules: z.array(SerializedModuleSchema),
  })
  .strict();

export type CanonicalNameEntry = z.infer<typeof CanonicalNameEntrySchema>;
export type SerializedDeclaration = z.infer<typeof SerializedDeclarationSchema>;
export type SerializedModule = z.infer<typeof SerializedModuleSchema>;
export type IrPayload = z.infer<typeof IrPayloadSchema>;
