import { z } from "zod";

// Build systems hand out 32-bit signed request ids.
export const MAX_REQUEST_ID = 2 ** 31 - 1;

const RequestIdSchema = z.number().int().nonnegative().max(MAX_REQUEST_ID);

/**
 * One request frame of the persistent worker protocol (newline-delimited
 * JSON). `inputs` carries the build system's input digests; the worker
 * accepts and ignores it.
 */
export const WorkRequestSchema = z.object({
  requestId: RequestIdSchema.default(0),
  arguments: z.array(z.string()).default([]),
  inputs: z
    .array(z.object({ path: z.string(), digest: z.string().optional() }))
    .optional(),
});

export const WorkResponseSchema = z
  .object({
    requestId: RequestIdSchema,
    exitCode: z.number().int(),
    output: z.string(),
  })
  .strict();

export type WorkRequest = z.infer<typeof WorkRequestSchema>;
export type WorkResponse = z.infer<typeof WorkResponseSchema>;
