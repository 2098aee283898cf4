/**
 * Aggregate Network Value propagation.
 *
 * A change to one address's value is applied to that address and then to
 * every ancestor on its referral chain, so each record holds the sum of
 * everything credited within its subtree. Cost per update is O(depth).
 */

import { IKeyValueStore } from '../persistence/interfaces';
import { addressFromKey, addressKey, Namespace } from '../persistence/keys';
import { decodeAnv, encodeAnv } from '../persistence/codec';
import { scanNamespace } from '../persistence/scan';
import { assertInvariant } from '../errors';
import {
  Address,
  AddressANV,
  AddressType,
  Amount,
  DEFAULT_MAX_LEVELS,
  INT64_MAX,
  NULL_ADDRESS,
  REWARDABLE_ADDRESS_TYPES,
} from '../types';
import { ReferralTree } from './referralTree';

export interface AnvEngineOptions {
  maxLevels?: number;
  debug?: boolean;
}

export class AnvEngine {
  private readonly maxLevels: number;
  private readonly debug: boolean;

  constructor(
    private readonly store: IKeyValueStore,
    private readonly tree: ReferralTree,
    options: AnvEngineOptions = {}
  ) {
    this.maxLevels = options.maxLevels ?? DEFAULT_MAX_LEVELS;
    this.debug = options.debug ?? false;
  }

  /**
   * Apply `change` (may be negative) to the start address and all of its
   * ancestors. Only the start record is restamped with the address type
   * and itself as representative; ancestors keep theirs.
   *
   * @returns false if a write failed; earlier levels stay written
   * @throws InvariantViolationError if a value would go negative or the
   *   chain is longer than maxLevels (a cycle in the stored pointers)
   */
  updateANV(addressType: AddressType, startAddress: Address, change: Amount): boolean {
    if (startAddress === NULL_ADDRESS) {
      throw new Error('Cannot update ANV of the null address');
    }

    if (this.debug) {
      console.log(`AnvEngine: update ${startAddress} type ${addressType} by ${change}`);
    }

    let address: Address | undefined = startAddress;
    let levels = 0;

    while (address !== undefined && address !== NULL_ADDRESS) {
      assertInvariant(
        levels < this.maxLevels,
        `Referral chain from ${startAddress} exceeded ${this.maxLevels} levels; cycle suspected`
      );

      // An address without a record starts from zero.
      const current = this.getANV(address) ?? {
        addressType: 0,
        address: NULL_ADDRESS,
        anv: 0n,
      };

      const updated: AddressANV =
        levels === 0
          ? { addressType, address: startAddress, anv: current.anv + change }
          : { ...current, anv: current.anv + change };

      if (this.debug) {
        console.log(`AnvEngine:   level ${levels} ${address}: ${current.anv} + ${change}`);
      }

      assertInvariant(
        updated.anv >= 0n,
        `ANV of ${address} would become negative (${updated.anv}) at level ${levels}`
      );
      assertInvariant(updated.anv <= INT64_MAX, `ANV of ${address} overflows (${updated.anv})`);

      if (!this.store.write(addressKey(Namespace.ANV, address), encodeAnv(updated))) {
        console.error(
          `AnvEngine: write failed at level ${levels} (${address}); lower levels stay updated`
        );
        return false;
      }

      address = this.tree.getReferrer(address);
      levels++;
    }

    return true;
  }

  getANV(address: Address): AddressANV | undefined {
    const raw = this.store.read(addressKey(Namespace.ANV, address));
    return raw ? decodeAnv(raw) : undefined;
  }

  /** All ANV records in store key order */
  getAllANVs(): AddressANV[] {
    return this.getAnvEntries().map(([, record]) => record);
  }

  /** ANV records whose address type is eligible for the lottery */
  getAllRewardableANVs(): AddressANV[] {
    return this.getAllANVs().filter(record => REWARDABLE_ADDRESS_TYPES.has(record.addressType));
  }

  /** ANV records paired with the address they are stored under */
  getAnvEntries(): Array<[Address, AddressANV]> {
    return scanNamespace(
      this.store,
      Namespace.ANV,
      key => addressFromKey(key, Namespace.ANV),
      decodeAnv
    );
  }
}
