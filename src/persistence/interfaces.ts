/**
 * Ordered byte-key → byte-value store consumed by the referral ledger.
 *
 * All calls are synchronous point operations. Multi-key updates are not
 * atomic: callers see `false` from write/erase and must assume everything
 * written before the failure is still there.
 */
export interface IKeyValueStore {
  read(key: Buffer): Buffer | undefined;
  write(key: Buffer, value: Buffer): boolean;
  /** Erasing an absent key succeeds */
  erase(key: Buffer): boolean;
  exists(key: Buffer): boolean;
  newIterator(): IKeyValueIterator;
  close(): void;
}

/**
 * Forward cursor over keys in ascending byte order.
 * Whether it sees writes made after it is positioned depends on the
 * backend: InMemoryKvStore iterates a snapshot, SqliteKvStore reads in
 * pages and sees writes that land ahead of the current page.
 */
export interface IKeyValueIterator {
  seekToFirst(): void;
  /** Position at the first key >= target */
  seek(target: Buffer): void;
  valid(): boolean;
  next(): void;
  key(): Buffer;
  value(): Buffer;
}
