export { openDatabase, DEFAULT_DB_PATH } from './database';
export { SqliteKvStore } from './kvStore';

import { openDatabase } from './database';
import { SqliteKvStore } from './kvStore';

export function createSqliteKvStore(dbPath?: string): SqliteKvStore {
  return new SqliteKvStore(openDatabase(dbPath));
}
