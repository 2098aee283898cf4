// Store interface
export type { IKeyValueStore, IKeyValueIterator } from './interfaces';

// Key layout
export {
  Namespace,
  namespacePrefix,
  addressKey,
  hashKey,
  lotterySizeKey,
  lotterySlotKey,
  hasNamespace,
  addressFromKey,
  hexToBytes,
} from './keys';

// Record codecs
export {
  encodeReferral,
  decodeReferral,
  encodeAddress,
  decodeAddress,
  encodeHash,
  decodeHash,
  encodeAddressList,
  decodeAddressList,
  encodeAnv,
  decodeAnv,
  encodeSize,
  decodeSize,
  encodeLotteryEntry,
  decodeLotteryEntry,
} from './codec';

export { scanNamespace } from './scan';

// Backends
export { InMemoryKvStore } from './inMemoryKvStore';
export { SqliteKvStore, openDatabase, createSqliteKvStore, DEFAULT_DB_PATH } from './sqlite';
