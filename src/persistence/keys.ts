/**
 * Composite store keys: one namespace byte followed by the natural key.
 * Keeping the tag first makes every namespace a contiguous key range.
 */

import { Address, ADDRESS_BYTES, Hash256, HASH_BYTES } from '../types';

export const Namespace = {
  CHILDREN: 'c',
  REFERRAL: 'r',
  REFERRAL_BY_ADDRESS: 'k',
  PARENT: 'p',
  ANV: 'a',
  LOTTERY_SIZE: 's',
  LOTTERY_SLOT: 'v',
} as const;

export type Namespace = (typeof Namespace)[keyof typeof Namespace];

function tagByte(ns: Namespace): number {
  return ns.charCodeAt(0);
}

export function hexToBytes(hex: string, length: number): Buffer {
  const bytes = Buffer.from(hex, 'hex');
  if (bytes.length !== length) {
    throw new Error(`Expected ${length} bytes of hex, got ${bytes.length}: ${hex}`);
  }
  return bytes;
}

function withTag(ns: Namespace, body: Buffer): Buffer {
  return Buffer.concat([Buffer.from([tagByte(ns)]), body]);
}

export function namespacePrefix(ns: Namespace): Buffer {
  return Buffer.from([tagByte(ns)]);
}

export function addressKey(ns: Namespace, address: Address): Buffer {
  return withTag(ns, hexToBytes(address, ADDRESS_BYTES));
}

export function hashKey(ns: Namespace, hash: Hash256): Buffer {
  return withTag(ns, hexToBytes(hash, HASH_BYTES));
}

export function lotterySizeKey(): Buffer {
  return namespacePrefix(Namespace.LOTTERY_SIZE);
}

export function lotterySlotKey(slot: number): Buffer {
  const body = Buffer.alloc(4);
  body.writeUInt32BE(slot, 0);
  return withTag(Namespace.LOTTERY_SLOT, body);
}

export function hasNamespace(key: Buffer, ns: Namespace): boolean {
  return key.length > 0 && key[0] === tagByte(ns);
}

/**
 * Decode the address portion of an address-keyed entry.
 * Returns undefined when the key is not a well-formed key of that namespace.
 */
export function addressFromKey(key: Buffer, ns: Namespace): Address | undefined {
  if (!hasNamespace(key, ns) || key.length !== 1 + ADDRESS_BYTES) {
    return undefined;
  }
  return key.subarray(1).toString('hex');
}
