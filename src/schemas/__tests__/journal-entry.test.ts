import { describe, expect, test } from "vitest";
import { JournalEntrySchema } from "../journal-entry.js";

const entry = {
  id: "01J0000000000000000000000A",
  request_id: 1,
  args_digest: "abc",
  exit_code: 0,
  diagnostic_count: 0,
  artifact_bytes: 10,
  started_at: 1,
  finished_at: 2,
};

describe("JournalEntrySchema", () => {
  test("accepts a row", () => {
    expect(JournalEntrySchema.parse(entry)).toEqual(entry);
  });

  test("artifact_bytes may be null", () => {
    expect(JournalEntrySchema.parse({ ...entry, artifact_bytes: null }).artifact_bytes).toBeNull();
  });

  test("rejects a negative diagnostic count", () => {
    expect(() => JournalEntrySchema.parse({ ...entry, diagnostic_count: -1 })).toThrow();
  });
});
