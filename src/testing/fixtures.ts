/**
 * Test fixtures: deterministic addresses, digests and random values.
 */

import * as crypto from 'crypto';
import { Address, Hash256, NULL_HASH, Referral } from '../types';

/** Address whose value is n, e.g. addr(10) = 000…00a */
export function addr(n: number): Address {
  return n.toString(16).padStart(40, '0');
}

/** Digest whose value is n */
export function hash(n: number): Hash256 {
  return n.toString(16).padStart(64, '0');
}

/**
 * Random value whose first 64 bits (little-endian) are `draw`.
 */
export function randomWithDraw(draw: bigint): Hash256 {
  const buf = Buffer.alloc(32);
  buf.writeBigUInt64LE(draw, 0);
  return buf.toString('hex');
}

/** Pseudo-random value derived from a seed */
export function seededRandom(seed: string): Hash256 {
  return crypto.createHash('sha256').update(seed).digest('hex');
}

export function referral(code: number, previous: number | null, pubKeyId: Address): Referral {
  return {
    codeHash: hash(code),
    previousReferral: previous === null ? NULL_HASH : hash(previous),
    pubKeyId,
  };
}
