import { IKeyValueIterator, IKeyValueStore } from './interfaces';

interface Entry {
  key: Buffer;
  value: Buffer;
}

/**
 * Iterator over a sorted snapshot of the entries.
 */
class SnapshotIterator implements IKeyValueIterator {
  private entries: Entry[] = [];
  private pos = 0;

  constructor(private readonly snapshot: () => Entry[]) {}

  seekToFirst(): void {
    this.entries = this.snapshot();
    this.pos = 0;
  }

  seek(target: Buffer): void {
    this.entries = this.snapshot();
    this.pos = this.entries.findIndex(e => Buffer.compare(e.key, target) >= 0);
    if (this.pos < 0) this.pos = this.entries.length;
  }

  valid(): boolean {
    return this.pos < this.entries.length;
  }

  next(): void {
    this.pos++;
  }

  key(): Buffer {
    return this.current().key;
  }

  value(): Buffer {
    return this.current().value;
  }

  private current(): Entry {
    const entry = this.entries[this.pos];
    if (!entry) {
      throw new Error('Iterator is not positioned on an entry');
    }
    return entry;
  }
}

/**
 * In-memory ordered store. Data does not survive the process.
 *
 * Supports write-fault injection so callers can exercise the
 * partial-failure paths of multi-key operations.
 */
export class InMemoryKvStore implements IKeyValueStore {
  // hex(key) → entry; hex preserves byte order under string comparison
  private entries = new Map<string, Entry>();
  private writesUntilFailure: number | undefined;

  read(key: Buffer): Buffer | undefined {
    const entry = this.entries.get(key.toString('hex'));
    return entry ? Buffer.from(entry.value) : undefined;
  }

  write(key: Buffer, value: Buffer): boolean {
    if (!this.consumeWrite()) return false;
    this.entries.set(key.toString('hex'), {
      key: Buffer.from(key),
      value: Buffer.from(value),
    });
    return true;
  }

  erase(key: Buffer): boolean {
    if (!this.consumeWrite()) return false;
    this.entries.delete(key.toString('hex'));
    return true;
  }

  exists(key: Buffer): boolean {
    return this.entries.has(key.toString('hex'));
  }

  newIterator(): IKeyValueIterator {
    return new SnapshotIterator(() =>
      [...this.entries.entries()]
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([, entry]) => entry)
    );
  }

  close(): void {
    this.entries.clear();
  }

  /** Number of stored entries */
  size(): number {
    return this.entries.size;
  }

  /**
   * Let the next `count` writes/erases succeed, then fail every one after.
   */
  failWritesAfter(count: number): void {
    this.writesUntilFailure = count;
  }

  clearFaults(): void {
    this.writesUntilFailure = undefined;
  }

  private consumeWrite(): boolean {
    if (this.writesUntilFailure === undefined) return true;
    if (this.writesUntilFailure <= 0) return false;
    this.writesUntilFailure--;
    return true;
  }
}
