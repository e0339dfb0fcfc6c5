import Database from "better-sqlite3";
import { join } from "node:path";

export const DB_FILENAME = "credence.db";

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS memories (
  id                TEXT PRIMARY KEY,
  text              TEXT NOT NULL,
  vector            BLOB NOT NULL,
  dim               INTEGER NOT NULL,
  created_at        INTEGER NOT NULL,
  confidence        REAL NOT NULL CHECK(confidence BETWEEN 0 AND 1),
  trust             REAL NOT NULL CHECK(trust BETWEEN 0 AND 1),
  source            TEXT NOT NULL CHECK(source IN ('user','system','fallback','external','reflection','model_output')),
  compression_mode  TEXT NOT NULL CHECK(compression_mode IN ('lossless','sketch','hybrid')),
  significance      REAL NOT NULL DEFAULT 0,
  context           TEXT,
  tags              TEXT NOT NULL DEFAULT '[]'
);
CREATE INDEX IF NOT EXISTS idx_memories_source ON memories(source);

CREATE TABLE IF NOT EXISTS trust_log (
  id          INTEGER PRIMARY KEY AUTOINCREMENT,
  memory_id   TEXT NOT NULL REFERENCES memories(id),
  timestamp   INTEGER NOT NULL,
  old_trust   REAL NOT NULL,
  new_trust   REAL NOT NULL,
  reason      TEXT NOT NULL,
  drift       REAL
);
CREATE INDEX IF NOT EXISTS idx_trust_log_memory ON trust_log(memory_id, id);

CREATE TABLE IF NOT EXISTS belief_speech (
  id          INTEGER PRIMARY KEY AUTOINCREMENT,
  timestamp   INTEGER NOT NULL,
  query       TEXT NOT NULL,
  response    TEXT NOT NULL,
  is_belief   INTEGER NOT NULL CHECK(is_belief IN (0,1)),
  memory_ids  TEXT,
  avg_trust   REAL,
  source      TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_belief_speech_time ON belief_speech(timestamp);

CREATE TABLE IF NOT EXISTS contradictions (
  id                  TEXT PRIMARY KEY,
  created_at          INTEGER NOT NULL,
  old_memory_id       TEXT NOT NULL REFERENCES memories(id),
  new_memory_id       TEXT NOT NULL REFERENCES memories(id),
  drift_mean          REAL NOT NULL,
  confidence_delta    REAL NOT NULL,
  status              TEXT NOT NULL DEFAULT 'open' CHECK(status IN ('open','settling','settled','resolved')),
  contradiction_type  TEXT NOT NULL CHECK(contradiction_type IN ('conflict','revision','temporal','refinement')),
  affects_slots       TEXT NOT NULL DEFAULT '[]',
  summary             TEXT NOT NULL,
  confirmation_count  INTEGER NOT NULL DEFAULT 0,
  confirmed_memory_id TEXT,
  volatility          REAL NOT NULL DEFAULT 0,
  deferred_at         INTEGER,
  resolution          TEXT CHECK(resolution IN ('override','preserve')),
  winner_memory_id    TEXT,
  resolved_at         INTEGER,
  status_changed_at   INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_contradictions_status ON contradictions(status);
CREATE INDEX IF NOT EXISTS idx_contradictions_old ON contradictions(old_memory_id);
CREATE INDEX IF NOT EXISTS idx_contradictions_new ON contradictions(new_memory_id);

CREATE TRIGGER IF NOT EXISTS trust_log_no_update BEFORE UPDATE ON trust_log BEGIN
  SELECT RAISE(ABORT, 'trust_log is append-only');
END;
CREATE TRIGGER IF NOT EXISTS trust_log_no_delete BEFORE DELETE ON trust_log BEGIN
  SELECT RAISE(ABORT, 'trust_log is append-only');
END;
CREATE TRIGGER IF NOT EXISTS belief_speech_no_update BEFORE UPDATE ON belief_speech BEGIN
  SELECT RAISE(ABORT, 'belief_speech is append-only');
END;
CREATE TRIGGER IF NOT EXISTS belief_speech_no_delete BEFORE DELETE ON belief_speech BEGIN
  SELECT RAISE(ABORT, 'belief_speech is append-only');
END;
CREATE TRIGGER IF NOT EXISTS memories_no_delete BEFORE DELETE ON memories BEGIN
  SELECT RAISE(ABORT, 'memories are never deleted');
END;
CREATE TRIGGER IF NOT EXISTS memories_content_immutable
BEFORE UPDATE OF text, vector, dim, confidence, source, compression_mode, created_at ON memories BEGIN
  SELECT RAISE(ABORT, 'memory content is immutable');
END;
CREATE TRIGGER IF NOT EXISTS contradictions_no_delete BEFORE DELETE ON contradictions BEGIN
  SELECT RAISE(ABORT, 'contradictions are never deleted');
END;
CREATE TRIGGER IF NOT EXISTS contradictions_resolved_final
BEFORE UPDATE ON contradictions WHEN OLD.status = 'resolved' BEGIN
  SELECT RAISE(ABORT, 'resolved contradictions are final');
END;
`;

/**
 * Owns the single SQLite connection for a state directory.
 * Stores share it; every multi-statement write goes through transaction().
 */
export class VaultDB {
  private db: Database.Database;
  private committed: Array<() => void> = [];

  constructor(stateDir: string) {
    this.db = new Database(join(stateDir, DB_FILENAME));
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
    this.db.pragma("busy_timeout = 5000");
    this.db.exec(SCHEMA_SQL);
    this.migrate();
  }

  /**
   * Forward-only migrations for databases created by earlier versions.
   * Each migration is idempotent (checks before altering).
   */
  private migrate(): void {
    const memoryColumns = this.columnsOf("memories");
    if (!memoryColumns.has("significance")) {
      this.db.exec("ALTER TABLE memories ADD COLUMN significance REAL NOT NULL DEFAULT 0");
    }

    const ledgerColumns = this.columnsOf("contradictions");
    if (!ledgerColumns.has("volatility")) {
      this.db.exec("ALTER TABLE contradictions ADD COLUMN volatility REAL NOT NULL DEFAULT 0");
    }
    if (!ledgerColumns.has("confirmed_memory_id")) {
      this.db.exec("ALTER TABLE contradictions ADD COLUMN confirmed_memory_id TEXT");
    }
  }

  private columnsOf(table: string): Set<string> {
    const rows = this.db.prepare(`PRAGMA table_info(${table})`).all() as Array<{ name: string }>;
    return new Set(rows.map((r) => r.name));
  }

  /**
   * Runs fn inside BEGIN IMMEDIATE; nested calls become savepoints.
   * Callbacks queued with afterCommit run once the outermost call commits
   * and are dropped with whatever level rolls back.
   */
  transaction<T>(fn: () => T): T {
    const outermost = !this.db.inTransaction;
    const mark = this.committed.length;
    let result: T;
    try {
      result = this.db.transaction(fn).immediate();
    } catch (err) {
      this.committed.length = mark;
      throw err;
    }
    if (outermost) {
      const callbacks = this.committed;
      this.committed = [];
      for (const callback of callbacks) callback();
    }
    return result;
  }

  /** Runs callback now, or after the enclosing transaction commits. */
  afterCommit(callback: () => void): void {
    if (this.db.inTransaction) {
      this.committed.push(callback);
    } else {
      callback();
    }
  }

  raw(): Database.Database {
    return this.db;
  }

  isOpen(): boolean {
    return this.db.open;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
