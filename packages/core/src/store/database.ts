// packages/core/src/store/database.ts

import Database from 'better-sqlite3';
import { DatabaseError } from '../utils/errors.js';

const SCHEMA_VERSION = '1';

const MIGRATIONS = [
  `CREATE TABLE IF NOT EXISTS schema_meta (
    key   TEXT PRIMARY KEY,
    value TEXT NOT NULL
  )`,

  // Runs
  `CREATE TABLE IF NOT EXISTS runs (
    run_id       TEXT PRIMARY KEY,
    name         TEXT NOT NULL,
    version      TEXT NOT NULL,
    status       TEXT NOT NULL,
    started_at   TEXT NOT NULL,
    finished_at  TEXT NOT NULL,
    duration_ms  INTEGER NOT NULL,
    report_json  TEXT NOT NULL
  )`,
  'CREATE INDEX IF NOT EXISTS idx_runs_started ON runs(started_at DESC)',
  'CREATE INDEX IF NOT EXISTS idx_runs_version ON runs(version)',

  // Step outcomes
  `CREATE TABLE IF NOT EXISTS step_outcomes (
    run_id       TEXT NOT NULL REFERENCES runs(run_id) ON DELETE CASCADE,
    step_id      TEXT NOT NULL,
    status       TEXT NOT NULL,
    fingerprint  TEXT,
    attempts     INTEGER NOT NULL DEFAULT 0,
    error_kind   TEXT,
    duration_ms  INTEGER NOT NULL DEFAULT 0,
    PRIMARY KEY (run_id, step_id)
  )`,
  'CREATE INDEX IF NOT EXISTS idx_step_outcomes_step ON step_outcomes(step_id)',
];

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

/** Idempotent (IF NOT EXISTS throughout). */
export function runMigrations(db: Database.Database): void {
  db.transaction(() => {
    for (const sql of MIGRATIONS) {
      db.exec(sql);
    }
    db.prepare("INSERT OR REPLACE INTO schema_meta(key, value) VALUES ('version', ?)").run(SCHEMA_VERSION);
    db.prepare("INSERT OR IGNORE INTO schema_meta(key, value) VALUES ('created_at', datetime('now'))").run();
  })();
}

export function getSchemaVersion(db: Database.Database): string | null {
  const row = db
    .prepare<[], { value: string }>("SELECT value FROM schema_meta WHERE key = 'version'")
    .get();
  return row?.value ?? null;
}
