/**
 * SQLite database initialization.
 * Opens the database, enables WAL mode, and creates the key-value table.
 */

import Database from 'better-sqlite3';
import * as path from 'path';
import * as fs from 'fs';

// BLOB keys compare with memcmp, so ORDER BY key is byte order.
const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS kv_store (
  key   BLOB PRIMARY KEY,
  value BLOB NOT NULL
) WITHOUT ROWID;
`;

export const DEFAULT_DB_PATH = path.join(process.cwd(), 'data', 'referrals.db');

export function openDatabase(dbPath?: string): Database.Database {
  const resolvedPath = dbPath ?? DEFAULT_DB_PATH;

  if (resolvedPath !== ':memory:') {
    const dir = path.dirname(resolvedPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(resolvedPath);

  // WAL mode for better concurrent read performance
  db.pragma('journal_mode = WAL');

  db.exec(SCHEMA_SQL);

  return db;
}
