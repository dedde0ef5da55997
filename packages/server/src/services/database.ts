import Database from 'better-sqlite3';
import type BetterSqlite3 from 'better-sqlite3';
import * as path from 'path';
import * as fs from 'fs';

export const DEFAULT_DATA_DIR = path.join(process.cwd(), 'data');

export type Db = BetterSqlite3.Database;

/**
 * Opens the uplink database and creates its tables.
 * Pass ':memory:' for a throwaway database.
 */
export function openDatabase(dbPath: string): Db {
  if (dbPath !== ':memory:') {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
  }

  const db: Db = new Database(dbPath);

  // Performance settings
  if (dbPath !== ':memory:') db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');

  db.exec(`
    CREATE TABLE IF NOT EXISTS connections (
      bssid TEXT PRIMARY KEY,
      ssid TEXT NOT NULL,
      password TEXT NOT NULL,
      last_connected INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_connections_last ON connections(last_connected);

    CREATE TABLE IF NOT EXISTS settings (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL DEFAULT '{}'
    );
  `);

  return db;
}

export function databasePath(dataDir: string): string {
  return path.join(dataDir, 'uplink.db');
}
