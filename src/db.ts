import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';

export type StateDatabase = Database.Database;

const IN_MEMORY = ':memory:';

const STATE_SCHEMA = `
  CREATE TABLE IF NOT EXISTS alert_fingerprints (
    fingerprint TEXT PRIMARY KEY,
    sent_at INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS alert_sends (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    ts INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS alert_counters (
    name TEXT PRIMARY KEY,
    value INTEGER NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_alert_sends_ts ON alert_sends (ts);
`;

export function openStateDatabase(filePath: string): StateDatabase {
  if (filePath !== IN_MEMORY) {
    fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
  }
  const db = new Database(filePath);
  if (filePath !== IN_MEMORY) {
    db.pragma('journal_mode = WAL');
  }
  ensureStateSchema(db);
  return db;
}

export function ensureStateSchema(db: StateDatabase) {
  db.exec(STATE_SCHEMA);
}
