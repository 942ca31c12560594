import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";

export type LogDatabase = Database.Database;

const PRAGMAS = ["journal_mode = WAL", "synchronous = NORMAL"];

/** Opens (creating if needed) the watchdog's log database. */
export function openLogDb(dbPath: string): LogDatabase {
  mkdirSync(dirname(dbPath), { recursive: true });
  // the watchdog writes while `watchdog logs` reads
  const db = new Database(dbPath, { timeout: 5000 });
  for (const pragma of PRAGMAS) {
    db.pragma(pragma);
  }
  db.exec(`
  CREATE TABLE IF NOT EXISTS daemon_logs (
    id      INTEGER PRIMARY KEY AUTOINCREMENT,
    ts      INTEGER NOT NULL,
    level   TEXT NOT NULL,
    scope   TEXT,
    message TEXT NOT NULL,
    meta    TEXT
  );
  CREATE INDEX IF NOT EXISTS idx_daemon_logs_ts ON daemon_logs(ts);
`);
  return db;
}
