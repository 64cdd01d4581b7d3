import { z } from "zod";

/** Row of the work journal, as stored in SQLite. */
export const JournalEntrySchema = z
  .object({
    id: z.string(), // ULID
    request_id: z.number().int(),
    args_digest: z.string(),
    exit_code: z.number().int(),
    diagnostic_count: z.number().int().nonnegative(),
    artifact_bytes: z.number().int().nonnegative().nullable(),
    started_at: z.number().int(),
    finished_at: z.number().int(),
  })
  .strict();

export type JournalEntry = z.infer<typeof JournalEntrySchema>;
