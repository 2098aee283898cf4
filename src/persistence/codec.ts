/**
 * Binary record layouts for the referral ledger namespaces.
 *
 * Decoders return undefined for malformed values so that readers treat a
 * damaged record as absent rather than throwing mid-scan.
 */

import { Decimal } from '../decimal';
import {
  Address,
  ADDRESS_BYTES,
  AddressANV,
  HASH_BYTES,
  LotteryEntry,
  Referral,
} from '../types';
import { hexToBytes } from './keys';

const REFERRAL_BYTES = HASH_BYTES * 2 + ADDRESS_BYTES;
const ANV_BYTES = 1 + ADDRESS_BYTES + 8;

// ── Referral ────────────────────────────────────────────────────────

export function encodeReferral(referral: Referral): Buffer {
  return Buffer.concat([
    hexToBytes(referral.codeHash, HASH_BYTES),
    hexToBytes(referral.previousReferral, HASH_BYTES),
    hexToBytes(referral.pubKeyId, ADDRESS_BYTES),
  ]);
}

export function decodeReferral(buf: Buffer): Referral | undefined {
  if (buf.length !== REFERRAL_BYTES) return undefined;
  return {
    codeHash: buf.subarray(0, HASH_BYTES).toString('hex'),
    previousReferral: buf.subarray(HASH_BYTES, HASH_BYTES * 2).toString('hex'),
    pubKeyId: buf.subarray(HASH_BYTES * 2).toString('hex'),
  };
}

// ── Single address / digest ─────────────────────────────────────────

export function encodeAddress(address: Address): Buffer {
  return hexToBytes(address, ADDRESS_BYTES);
}

export function decodeAddress(buf: Buffer): Address | undefined {
  return buf.length === ADDRESS_BYTES ? buf.toString('hex') : undefined;
}

export function encodeHash(hash: string): Buffer {
  return hexToBytes(hash, HASH_BYTES);
}

export function decodeHash(buf: Buffer): string | undefined {
  return buf.length === HASH_BYTES ? buf.toString('hex') : undefined;
}

// ── Children list: u32 count + count × address ──────────────────────

export function encodeAddressList(addresses: Address[]): Buffer {
  const header = Buffer.alloc(4);
  header.writeUInt32BE(addresses.length, 0);
  return Buffer.concat([header, ...addresses.map(encodeAddress)]);
}

export function decodeAddressList(buf: Buffer): Address[] | undefined {
  if (buf.length < 4) return undefined;
  const count = buf.readUInt32BE(0);
  if (buf.length !== 4 + count * ADDRESS_BYTES) return undefined;

  const addresses: Address[] = [];
  for (let i = 0; i < count; i++) {
    const start = 4 + i * ADDRESS_BYTES;
    addresses.push(buf.subarray(start, start + ADDRESS_BYTES).toString('hex'));
  }
  return addresses;
}

// ── ANV: u8 type + representative address + i64 BE value ───────────

export function encodeAnv(record: AddressANV): Buffer {
  const buf = Buffer.alloc(ANV_BYTES);
  buf.writeUInt8(record.addressType, 0);
  encodeAddress(record.address).copy(buf, 1);
  buf.writeBigInt64BE(record.anv, 1 + ADDRESS_BYTES);
  return buf;
}

export function decodeAnv(buf: Buffer): AddressANV | undefined {
  if (buf.length !== ANV_BYTES) return undefined;
  return {
    addressType: buf.readUInt8(0),
    address: buf.subarray(1, 1 + ADDRESS_BYTES).toString('hex'),
    anv: buf.readBigInt64BE(1 + ADDRESS_BYTES),
  };
}

// ── Lottery heap ────────────────────────────────────────────────────

export function encodeSize(size: number): Buffer {
  const buf = Buffer.alloc(4);
  buf.writeUInt32BE(size, 0);
  return buf;
}

export function decodeSize(buf: Buffer): number | undefined {
  return buf.length === 4 ? buf.readUInt32BE(0) : undefined;
}

/**
 * u16 length + decimal string of the key + address.
 * The key keeps its full precision as text.
 */
export function encodeLotteryEntry(entry: LotteryEntry): Buffer {
  const keyText = Buffer.from(entry.key.toString(), 'utf8');
  const header = Buffer.alloc(2);
  header.writeUInt16BE(keyText.length, 0);
  return Buffer.concat([header, keyText, encodeAddress(entry.address)]);
}

export function decodeLotteryEntry(buf: Buffer): LotteryEntry | undefined {
  if (buf.length < 2) return undefined;
  const keyLength = buf.readUInt16BE(0);
  if (buf.length !== 2 + keyLength + ADDRESS_BYTES) return undefined;

  const keyText = buf.subarray(2, 2 + keyLength).toString('utf8');
  let key: Decimal;
  try {
    key = new Decimal(keyText);
  } catch {
    return undefined;
  }

  return {
    key,
    address: buf.subarray(2 + keyLength).toString('hex'),
  };
}
