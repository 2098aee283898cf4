/**
 * Weighted sampling keys for the lottery reservoir.
 *
 * Efraimidis–Spirakis weighted reservoir sampling keeps the items with the
 * largest rand^(1/W). We keep log(rand^(1/W)) = log(rand) / W instead,
 * which has the same order and does not underflow for large weights.
 *
 * rand is the first 64 bits of the random value scaled into (0, 1]:
 *   rand = u / (2^64 - 1)
 *   log(rand) = ln(u) - ln(2^64 - 1)
 */

import { Decimal } from '../decimal';
import { assertInvariant } from '../errors';
import { hexToBytes } from '../persistence/keys';
import { Amount, Hash256, HASH_BYTES, WeightedKey } from '../types';

export const MAX_UINT64 = 2n ** 64n - 1n;

const LN_MAX_UINT64 = new Decimal(MAX_UINT64.toString()).ln();

/**
 * First 64 bits of the random value, little-endian from byte 0.
 * A zero draw is clamped to 1 so the scaled value stays inside (0, 1].
 */
export function drawFromRandom(randomValue: Hash256): bigint {
  const draw = hexToBytes(randomValue, HASH_BYTES).readBigUInt64LE(0);
  return draw === 0n ? 1n : draw;
}

/**
 * log(rand), always <= 0
 */
export function logDraw(randomValue: Hash256): Decimal {
  const draw = drawFromRandom(randomValue);
  const result = new Decimal(draw.toString()).ln().minus(LN_MAX_UINT64);
  assertInvariant(result.lte(0), `log draw must be non-positive, got ${result.toString()}`);
  return result;
}

/**
 * log(rand) / weight. More negative for smaller weights.
 * @throws Error if weight is not positive
 */
export function computeWeightedKey(randomValue: Hash256, weight: Amount): WeightedKey {
  if (weight <= 0n) {
    throw new Error(`Weight must be positive: ${weight}`);
  }
  return logDraw(randomValue).div(new Decimal(weight.toString()));
}
