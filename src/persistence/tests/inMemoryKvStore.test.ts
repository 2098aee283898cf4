import { InMemoryKvStore } from '../inMemoryKvStore';

const k = (hex: string) => Buffer.from(hex, 'hex');

function collect(store: InMemoryKvStore, from?: Buffer): string[] {
  const iter = store.newIterator();
  const keys: string[] = [];
  if (from) iter.seek(from);
  else iter.seekToFirst();
  for (; iter.valid(); iter.next()) {
    keys.push(iter.key().toString('hex'));
  }
  return keys;
}

describe('InMemoryKvStore', () => {
  let store: InMemoryKvStore;

  beforeEach(() => {
    store = new InMemoryKvStore();
  });

  it('should read back written values', () => {
    expect(store.write(k('6101'), k('ff'))).toBe(true);
    expect(store.read(k('6101'))?.toString('hex')).toBe('ff');
    expect(store.exists(k('6101'))).toBe(true);
  });

  it('should return undefined for absent keys', () => {
    expect(store.read(k('6101'))).toBeUndefined();
    expect(store.exists(k('6101'))).toBe(false);
  });

  it('should copy values so callers cannot mutate stored data', () => {
    const value = k('0102');
    store.write(k('01'), value);
    value[0] = 0xff;
    const read = store.read(k('01'));
    expect(read?.toString('hex')).toBe('0102');
  });

  it('should erase keys and succeed on absent keys', () => {
    store.write(k('01'), k('aa'));
    expect(store.erase(k('01'))).toBe(true);
    expect(store.exists(k('01'))).toBe(false);
    expect(store.erase(k('01'))).toBe(true);
  });

  it('should iterate in ascending byte order', () => {
    store.write(k('70'), k('00'));
    store.write(k('6102'), k('00'));
    store.write(k('61'), k('00'));
    store.write(k('6101'), k('00'));

    expect(collect(store)).toEqual(['61', '6101', '6102', '70']);
  });

  it('should seek to the first key at or after the target', () => {
    store.write(k('61'), k('00'));
    store.write(k('6301'), k('00'));
    store.write(k('70'), k('00'));

    expect(collect(store, k('62'))).toEqual(['6301', '70']);
    expect(collect(store, k('71'))).toEqual([]);
  });

  it('should iterate a snapshot unaffected by later writes', () => {
    store.write(k('01'), k('00'));
    const iter = store.newIterator();
    iter.seekToFirst();
    store.write(k('02'), k('00'));

    const keys: string[] = [];
    for (; iter.valid(); iter.next()) keys.push(iter.key().toString('hex'));
    expect(keys).toEqual(['01']);
  });

  it('should throw when reading an exhausted iterator', () => {
    const iter = store.newIterator();
    iter.seekToFirst();
    expect(iter.valid()).toBe(false);
    expect(() => iter.key()).toThrow('Iterator is not positioned on an entry');
  });

  it('should fail writes and erases after the injected budget', () => {
    store.failWritesAfter(1);
    expect(store.write(k('01'), k('00'))).toBe(true);
    expect(store.write(k('02'), k('00'))).toBe(false);
    expect(store.erase(k('01'))).toBe(false);
    expect(store.exists(k('02'))).toBe(false);
    expect(store.exists(k('01'))).toBe(true);

    store.clearFaults();
    expect(store.write(k('02'), k('00'))).toBe(true);
    expect(store.size()).toBe(2);
  });
});
