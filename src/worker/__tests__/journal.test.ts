import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { digestArguments, SqliteWorkJournal } from "../journal.js";

describe("SqliteWorkJournal", () => {
  let journal: SqliteWorkJournal;

  beforeEach(() => {
    journal = new SqliteWorkJournal({ dbPath: ":memory:" });
  });

  afterEach(() => {
    journal.close();
  });

  test("record stores a digest instead of the arguments", () => {
    const entry = journal.record({
      request_id: 1,
      args: ["--source=a.mod"],
      exit_code: 0,
      diagnostic_count: 0,
      artifact_bytes: 120,
      started_at: 1000,
      finished_at: 1010,
    });

    expect(entry.args_digest).toBe(digestArguments(["--source=a.mod"]));
    expect(entry.id).toMatch(/^[0-9A-HJKMNP-TV-Z]{26}$/);
    expect(journal.recent()).toEqual([entry]);
  });

  test("recent lists newest first and honours the limit", () => {
    for (const requestId of [1, 2, 3]) {
      journal.record({
        request_id: requestId,
        args: [],
        exit_code: requestId === 2 ? 15 : 0,
        diagnostic_count: requestId === 2 ? 1 : 0,
        artifact_bytes: requestId === 2 ? null : 10,
        started_at: 0,
        finished_at: 0,
      });
    }

    expect(journal.recent().map((e) => e.request_id)).toEqual([3, 2, 1]);
    expect(journal.recent(2).map((e) => e.request_id)).toEqual([3, 2]);
    expect(journal.recent()[1]?.artifact_bytes).toBeNull();
  });

  test("digest depends on argument order", () => {
    expect(digestArguments(["a", "b"])).not.toBe(digestArguments(["b", "a"]));
  });
});
