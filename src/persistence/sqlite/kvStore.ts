/**
 * Ordered key-value store backed by SQLite.
 * Keys and values are BLOBs; iteration follows byte order of the key.
 */

import type Database from 'better-sqlite3';
import { IKeyValueIterator, IKeyValueStore } from '../interfaces';

const PAGE_SIZE = 256;

interface KvRow {
  key: Buffer;
  value: Buffer;
}

/**
 * Pages through the table in key order so a full-namespace scan never
 * holds more than PAGE_SIZE rows or keeps a statement open between calls.
 */
class SqliteKvIterator implements IKeyValueIterator {
  private rows: KvRow[] = [];
  private pos = 0;
  private exhausted = true;

  constructor(
    private readonly stmtFrom: Database.Statement,
    private readonly stmtAfter: Database.Statement
  ) {}

  seekToFirst(): void {
    this.seek(Buffer.alloc(0));
  }

  seek(target: Buffer): void {
    this.load(this.stmtFrom.all(target, PAGE_SIZE) as KvRow[]);
  }

  valid(): boolean {
    return this.pos < this.rows.length;
  }

  next(): void {
    this.pos++;
    if (this.pos >= this.rows.length && !this.exhausted) {
      const last = this.rows[this.rows.length - 1];
      this.load(this.stmtAfter.all(last.key, PAGE_SIZE) as KvRow[]);
    }
  }

  key(): Buffer {
    return this.current().key;
  }

  value(): Buffer {
    return this.current().value;
  }

  private load(rows: KvRow[]): void {
    this.rows = rows;
    this.pos = 0;
    this.exhausted = rows.length < PAGE_SIZE;
  }

  private current(): KvRow {
    const row = this.rows[this.pos];
    if (!row) {
      throw new Error('Iterator is not positioned on an entry');
    }
    return row;
  }
}

export class SqliteKvStore implements IKeyValueStore {
  private stmtGet: Database.Statement;
  private stmtSet: Database.Statement;
  private stmtDelete: Database.Statement;
  private stmtExists: Database.Statement;
  private stmtFrom: Database.Statement;
  private stmtAfter: Database.Statement;

  constructor(private readonly db: Database.Database) {
    this.stmtGet = db.prepare('SELECT value FROM kv_store WHERE key = ?');
    this.stmtSet = db.prepare('INSERT OR REPLACE INTO kv_store (key, value) VALUES (?, ?)');
    this.stmtDelete = db.prepare('DELETE FROM kv_store WHERE key = ?');
    this.stmtExists = db.prepare('SELECT 1 AS found FROM kv_store WHERE key = ?');
    this.stmtFrom = db.prepare(
      'SELECT key, value FROM kv_store WHERE key >= ? ORDER BY key LIMIT ?'
    );
    this.stmtAfter = db.prepare(
      'SELECT key, value FROM kv_store WHERE key > ? ORDER BY key LIMIT ?'
    );
  }

  read(key: Buffer): Buffer | undefined {
    const row = this.stmtGet.get(key) as { value: Buffer } | undefined;
    return row?.value;
  }

  write(key: Buffer, value: Buffer): boolean {
    try {
      this.stmtSet.run(key, value);
      return true;
    } catch (err) {
      console.error('SqliteKvStore: write failed:', err);
      return false;
    }
  }

  erase(key: Buffer): boolean {
    try {
      this.stmtDelete.run(key);
      return true;
    } catch (err) {
      console.error('SqliteKvStore: erase failed:', err);
      return false;
    }
  }

  exists(key: Buffer): boolean {
    return this.stmtExists.get(key) !== undefined;
  }

  newIterator(): IKeyValueIterator {
    return new SqliteKvIterator(this.stmtFrom, this.stmtAfter);
  }

  close(): void {
    this.db.close();
  }
}
