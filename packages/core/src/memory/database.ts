// packages/core/src/memory/database.ts

import Database from 'better-sqlite3';
import { DatabaseError } from '../utils/errors.js';

const SCHEMA_VERSION = '1';

const MIGRATIONS = [
  // Sessions (one row per run, upserted on every checkpoint)
  `CREATE TABLE IF NOT EXISTS sessions (
    id              TEXT PRIMARY KEY,
    workflow_name   TEXT NOT NULL,
    initial_message TEXT NOT NULL DEFAULT '',
    current_state   TEXT NOT NULL,
    turn_count      INTEGER NOT NULL DEFAULT 0,
    decisions_json  TEXT NOT NULL DEFAULT '{}',
    status          TEXT NOT NULL DEFAULT 'idle'
                    CHECK(status IN ('idle','running','paused','terminated','aborted','halted')),
    workspace       TEXT NOT NULL,
    error           TEXT,
    created_at      TEXT NOT NULL,
    updated_at      TEXT NOT NULL
  )`,
  'CREATE INDEX IF NOT EXISTS idx_sessions_status ON sessions(status)',
  'CREATE INDEX IF NOT EXISTS idx_sessions_workflow ON sessions(workflow_name)',
  'CREATE INDEX IF NOT EXISTS idx_sessions_updated ON sessions(updated_at DESC)',

  // Turns (append-only history)
  `CREATE TABLE IF NOT EXISTS turns (
    id              INTEGER PRIMARY KEY AUTOINCREMENT,
    session_id      TEXT NOT NULL REFERENCES sessions(id) ON DELETE CASCADE,
    turn            INTEGER NOT NULL CHECK(turn >= 1),
    state           TEXT NOT NULL,
    agent           TEXT NOT NULL,
    prompt          TEXT NOT NULL,
    raw_response    TEXT NOT NULL,
    content         TEXT NOT NULL,
    decisions_json  TEXT NOT NULL DEFAULT '{}',
    recorded_at     TEXT NOT NULL
  )`,
  'CREATE UNIQUE INDEX IF NOT EXISTS idx_turns_unique ON turns(session_id, turn)',

  // Schema meta
  `CREATE TABLE IF NOT EXISTS schema_meta (
    key   TEXT PRIMARY KEY,
    value TEXT NOT NULL
  )`,
];

/**
 * Open a SQLite database and run migrations.
 * Pass ':memory:' for in-memory databases (testing).
 */
export function openDatabase(dbPath: string): Database.Database {
  try {
    const db = new Database(dbPath);
    configurePragmas(db);
    runMigrations(db);
    return db;
  } catch (err) {
    throw new DatabaseError(
      `Failed to open database at "${dbPath}": ${err instanceof Error ? err.message : String(err)}`,
      'open',
    );
  }
}

function configurePragmas(db: Database.Database): void {
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  db.pragma('busy_timeout = 5000');
}

/**
 * Run all schema migrations. Idempotent (uses IF NOT EXISTS).
 */
export function runMigrations(db: Database.Database): void {
  db.transaction(() => {
    for (const sql of MIGRATIONS) {
      db.exec(sql);
    }
    db.prepare("INSERT OR REPLACE INTO schema_meta(key, value) VALUES ('version', ?)").run(
      SCHEMA_VERSION,
    );
    db.prepare(
      "INSERT OR IGNORE INTO schema_meta(key, value) VALUES ('created_at', datetime('now'))",
    ).run();
  })();
}

/** Get the current schema version. */
export function getSchemaVersion(db: Database.Database): string | null {
  const row: unknown = db.prepare("SELECT value FROM schema_meta WHERE key = 'version'").get();
  if (typeof row === 'object' && row !== null && 'value' in row && typeof row.value === 'string') {
    return row.value;
  }
  return null;
}
