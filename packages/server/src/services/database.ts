import Database from 'better-sqlite3';
import * as path from 'path';
import * as fs from 'fs';
import type BetterSqlite3 from 'better-sqlite3';

export const DATA_DIR = path.join(process.cwd(), 'data');
export const DB_PATH = path.join(DATA_DIR, 'skyfuse.db');

/** Opens (or creates) the feed database. Pass ':memory:' for a throwaway one. */
export function openDatabase(file: string = DB_PATH): BetterSqlite3.Database {
  if (file !== ':memory:') {
    const dir = path.dirname(file);
    if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
  }
  const db: BetterSqlite3.Database = new Database(file);

  // Performance settings
  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');

  db.exec(`
    CREATE TABLE IF NOT EXISTS telemetry_samples (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      entity_id TEXT NOT NULL,
      timestamp INTEGER NOT NULL,
      latitude REAL NOT NULL,
      longitude REAL NOT NULL,
      reported_speed_kmh REAL,
      accuracy_m REAL,
      signal_dbm REAL
    );
    CREATE INDEX IF NOT EXISTS idx_samples_time ON telemetry_samples(timestamp);

    CREATE TABLE IF NOT EXISTS weather_events (
      event_id TEXT PRIMARY KEY,
      category TEXT NOT NULL,
      timestamp INTEGER NOT NULL,
      magnitude REAL
    );
    CREATE INDEX IF NOT EXISTS idx_events_time ON weather_events(timestamp);

    CREATE TABLE IF NOT EXISTS cyber_records (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      kind TEXT NOT NULL,
      timestamp INTEGER NOT NULL,
      record TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_cyber_time ON cyber_records(timestamp);

    CREATE TABLE IF NOT EXISTS alerts (
      id TEXT PRIMARY KEY,
      fingerprint TEXT NOT NULL,
      category TEXT NOT NULL,
      severity TEXT NOT NULL,
      source TEXT NOT NULL,
      subject TEXT NOT NULL,
      timestamp INTEGER NOT NULL,
      summary TEXT NOT NULL,
      details TEXT NOT NULL DEFAULT '{}'
    );
    CREATE INDEX IF NOT EXISTS idx_alerts_time ON alerts(timestamp DESC);
    CREATE INDEX IF NOT EXISTS idx_alerts_source ON alerts(source, timestamp);

    CREATE TABLE IF NOT EXISTS diagnostics (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      kind TEXT NOT NULL,
      source TEXT NOT NULL,
      timestamp INTEGER NOT NULL,
      message TEXT NOT NULL,
      data TEXT NOT NULL DEFAULT '{}'
    );
  `);

  return db;
}
