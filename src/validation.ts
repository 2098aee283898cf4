import { Address, ADDRESS_BYTES, Hash256, HASH_BYTES, Referral } from './types';

const ADDRESS_RE = new RegExp(`^[0-9a-f]{${ADDRESS_BYTES * 2}}$`);
const HASH_RE = new RegExp(`^[0-9a-f]{${HASH_BYTES * 2}}$`);

export function isAddress(value: unknown): value is Address {
  return typeof value === 'string' && ADDRESS_RE.test(value);
}

export function isHash256(value: unknown): value is Hash256 {
  return typeof value === 'string' && HASH_RE.test(value);
}

/**
 * Lowercase and check a hex address.
 * @throws Error if the value is not 20 bytes of hex
 */
export function normalizeAddress(value: string): Address {
  const lower = value.toLowerCase();
  if (!isAddress(lower)) {
    throw new Error(`Invalid address: ${value}`);
  }
  return lower;
}

/**
 * Lowercase and check a hex digest.
 * @throws Error if the value is not 32 bytes of hex
 */
export function normalizeHash(value: string): Hash256 {
  const lower = value.toLowerCase();
  if (!isHash256(lower)) {
    throw new Error(`Invalid hash: ${value}`);
  }
  return lower;
}

export function normalizeReferral(referral: Referral): Referral {
  return {
    codeHash: normalizeHash(referral.codeHash),
    previousReferral: normalizeHash(referral.previousReferral),
    pubKeyId: normalizeAddress(referral.pubKeyId),
  };
}
