import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import * as schema from "./schema";
import path from "path";
import fs from "fs";
import { createLogger } from "@/lib/logger";

const log = createLogger("db");

export type AppDatabase = BetterSQLite3Database<typeof schema>;

export interface DatabaseHandle {
  db: AppDatabase;
  sqlite: Database.Database;
  close(): void;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS ledger_entries (
    key TEXT PRIMARY KEY,
    destination_id TEXT NOT NULL,
    name TEXT,
    completed_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS transfer_runs (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    started_at TEXT NOT NULL,
    completed_at TEXT,
    status TEXT NOT NULL CHECK(status IN ('running', 'success', 'failure', 'cancelled', 'aborted', 'interrupted')),
    total_items INTEGER NOT NULL DEFAULT 0,
    already_transferred INTEGER NOT NULL DEFAULT 0,
    committed INTEGER NOT NULL DEFAULT 0,
    failed INTEGER NOT NULL DEFAULT 0,
    error_message TEXT
  );

  CREATE TABLE IF NOT EXISTS transfer_logs (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    run_id INTEGER NOT NULL REFERENCES transfer_runs(id),
    item_key TEXT NOT NULL,
    file_name TEXT NOT NULL,
    outcome TEXT NOT NULL CHECK(outcome IN ('committed', 'fetch-failed', 'left-on-disk')),
    phase TEXT NOT NULL CHECK(phase IN ('fetch', 'publish')),
    attempts INTEGER NOT NULL DEFAULT 0,
    destination_id TEXT,
    error_message TEXT,
    logged_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ','now'))
  );

  CREATE INDEX IF NOT EXISTS idx_transfer_runs_status ON transfer_runs(status);
  CREATE INDEX IF NOT EXISTS idx_transfer_logs_run_id ON transfer_logs(run_id);
  CREATE INDEX IF NOT EXISTS idx_transfer_logs_item_key ON transfer_logs(item_key);
`;

function initialize(dbPath: string): Database.Database {
  const sqlite = new Database(dbPath);
  try {
    // FULL: a ledger commit is on disk before the staging file is deleted.
    sqlite.pragma("journal_mode = WAL");
    sqlite.pragma("foreign_keys = ON");
    sqlite.pragma("synchronous = FULL");
    sqlite.exec(SCHEMA);
    return sqlite;
  } catch (err) {
    sqlite.close();
    throw err;
  }
}

/**
 * Move an unreadable database (and its WAL side files) out of the way so a
 * fresh one can be created in its place.
 */
function quarantine(dbPath: string): string {
  const target = `${dbPath}.corrupt-${Date.now()}`;
  fs.renameSync(dbPath, target);
  for (const suffix of ["-wal", "-shm"]) {
    fs.rmSync(dbPath + suffix, { force: true });
  }
  return target;
}

/**
 * Open (or create) the state database. A missing file is a first run; a
 * corrupt file is set aside and replaced by an empty database.
 */
export function openDatabase(dbPath: string): DatabaseHandle {
  fs.mkdirSync(path.dirname(dbPath), { recursive: true });

  let sqlite: Database.Database;
  try {
    sqlite = initialize(dbPath);
  } catch (err) {
    if (!fs.existsSync(dbPath)) throw err;
    const movedTo = quarantine(dbPath);
    log.warn("State database unreadable — starting with an empty ledger", {
      dbPath,
      movedTo,
      error: err instanceof Error ? err.message : String(err),
    });
    sqlite = initialize(dbPath);
  }

  const db = drizzle(sqlite, { schema });
  return {
    db,
    sqlite,
    close: () => sqlite.close(),
  };
}
