import Database, {
  type Database as DatabaseType,
  type Statement,
} from "better-sqlite3";
import { monotonicFactory } from "ulid";
import { type JournalEntry, JournalEntrySchema } from "../schemas/journal-entry.js";
import { sha256Hex, stableStringify } from "../session/digest.js";

const DEFAULT_RECENT_LIMIT = 50;

// Monotonic so that ids sort in insertion order within one millisecond
const nextId = monotonicFactory();

export type NewJournalEntry = Omit<JournalEntry, "id" | "args_digest"> & {
  args: readonly string[];
};

/**
 * Record of the requests a worker has served.
 * Implementations: SqliteWorkJournal (":memory:" in tests).
 */
export interface WorkJournal {
  record(entry: NewJournalEntry): JournalEntry;
  /** Most recent entries first. */
  recent(limit?: number): JournalEntry[];
  close(): void;
}

interface SqliteWorkJournalOptions {
  dbPath: string; // ":memory:" for tests, file path for production
}

export function digestArguments(args: readonly string[]): string {
  return sha256Hex(stableStringify(args));
}

/**
 * SQLite-backed journal. WAL mode so a reader can inspect a live worker's
 * journal without blocking it.
 */
export class SqliteWorkJournal implements WorkJournal {
  private db: DatabaseType;
  private stmts: {
    insert: Statement;
    recent: Statement;
  };

  constructor(opts: SqliteWorkJournalOptions) {
    this.db = new Database(opts.dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("busy_timeout = 3000");
    this.initSchema();
    this.stmts = {
      insert: this.db.prepare(`
        INSERT INTO work_requests (
          id, request_id, args_digest, exit_code, diagnostic_count,
          artifact_bytes, started_at, finished_at
        ) VALUES (
          @id, @request_id, @args_digest, @exit_code, @diagnostic_count,
          @artifact_bytes, @started_at, @finished_at
        )
      `),
      recent: this.db.prepare(`
        SELECT * FROM work_requests ORDER BY id DESC LIMIT ?
      `),
    };
  }

  close(): void {
    this.db.close();
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS work_requests (
        id                TEXT PRIMARY KEY,
        request_id        INTEGER NOT NULL,
        args_digest       TEXT NOT NULL,
        exit_code         INTEGER NOT NULL,
        diagnostic_count  INTEGER NOT NULL,
        artifact_bytes    INTEGER,
        started_at        INTEGER NOT NULL,
        finished_at       INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_work_requests_digest ON work_requests(args_digest);
    `);
  }

  record(entry: NewJournalEntry): JournalEntry {
    const { args, ...rest } = entry;
    const row = JournalEntrySchema.parse({
      ...rest,
      id: nextId(),
      args_digest: digestArguments(args),
    });
    this.stmts.insert.run(row);
    return row;
  }

  recent(limit = DEFAULT_RECENT_LIMIT): JournalEntry[] {
    const rows = this.stmts.recent.all(limit);
    return rows.map((row) => JournalEntrySchema.parse(row));
  }
}
