/**
 * Referral Ledger - Core Types
 */

import type Decimal from 'decimal.js-light';

/**
 * 20-byte account identifier, carried as 40 lowercase hex chars
 */
export type Address = string;

/**
 * 32-byte digest, carried as 64 lowercase hex chars
 */
export type Hash256 = string;

/**
 * Signed 64-bit fixed-point amount
 */
export type Amount = bigint;

/**
 * Account kind tag (0-255)
 */
export type AddressType = number;

/**
 * Log-space sampling priority. Larger (closer to zero) wins.
 */
export type WeightedKey = Decimal;

export const ADDRESS_BYTES = 20;
export const HASH_BYTES = 32;

/** Distinguished "no parent" address marking a tree root */
export const NULL_ADDRESS: Address = '0'.repeat(ADDRESS_BYTES * 2);

/** Conventional previousReferral of a root referral */
export const NULL_HASH: Hash256 = '0'.repeat(HASH_BYTES * 2);

/** Address types eligible for the reward lottery */
export const REWARDABLE_ADDRESS_TYPES: ReadonlySet<AddressType> = new Set([1, 2]);

export const MAX_RESERVOIR_SIZE = 1000;

/**
 * Walk bound for parent chains. Real referral trees are far shallower;
 * hitting this means the stored chain loops.
 */
export const DEFAULT_MAX_LEVELS = 100_000;

export const INT64_MIN = -(2n ** 63n);
export const INT64_MAX = 2n ** 63n - 1n;

/**
 * "pubKeyId was introduced by the referral codeHash, which was created
 * from previousReferral". Immutable once written.
 */
export interface Referral {
  codeHash: Hash256;
  previousReferral: Hash256;
  pubKeyId: Address;
}

export interface AddressANV {
  addressType: AddressType;
  address: Address; // representative address stamped by the last direct update
  anv: Amount;
}

export interface LotteryEntry {
  key: WeightedKey;
  address: Address;
}

export interface ReferralsDbOptions {
  maxLevels?: number;
  reservoirSize?: number;
  debug?: boolean;
}
