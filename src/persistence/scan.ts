import { IKeyValueStore } from './interfaces';
import { hasNamespace, Namespace, namespacePrefix } from './keys';

/**
 * Visit every well-formed entry of one namespace in key order.
 * Entries the decoders reject are skipped.
 */
export function scanNamespace<K, V>(
  store: IKeyValueStore,
  ns: Namespace,
  decodeKey: (key: Buffer) => K | undefined,
  decodeValue: (value: Buffer) => V | undefined
): Array<[K, V]> {
  const results: Array<[K, V]> = [];
  const iter = store.newIterator();

  for (iter.seek(namespacePrefix(ns)); iter.valid(); iter.next()) {
    const rawKey = iter.key();
    if (!hasNamespace(rawKey, ns)) break;

    const key = decodeKey(rawKey);
    if (key === undefined) continue;

    const value = decodeValue(iter.value());
    if (value === undefined) continue;

    results.push([key, value]);
  }

  return results;
}
