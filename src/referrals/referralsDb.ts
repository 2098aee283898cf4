/**
 * Referral ledger over one ordered key-value store.
 *
 * Composes the referral tree, ANV propagation and the lottery reservoir.
 * Every mutating call runs in an exclusive scope: the store gives no
 * multi-key transactions, so two logical operations must never interleave.
 * The ledger assumes a single writer per store. The components are private
 * so that every write goes through normalization and the exclusive scope;
 * audits get read-only views.
 */

import { IKeyValueStore } from '../persistence/interfaces';
import { ConcurrentMutationError } from '../errors';
import {
  Address,
  AddressANV,
  AddressType,
  Amount,
  DEFAULT_MAX_LEVELS,
  Hash256,
  LotteryEntry,
  MAX_RESERVOIR_SIZE,
  Referral,
  ReferralsDbOptions,
  WeightedKey,
} from '../types';
import { normalizeAddress, normalizeHash, normalizeReferral } from '../validation';
import { ReferralTree } from './referralTree';
import { AnvEngine } from './anvEngine';
import { LotteryReservoir } from './lotteryReservoir';

export class ReferralsDb {
  private readonly tree: ReferralTree;
  private readonly anv: AnvEngine;
  private readonly lottery: LotteryReservoir;

  private activeOperation: string | undefined;

  constructor(private readonly store: IKeyValueStore, options: ReferralsDbOptions = {}) {
    const maxLevels = options.maxLevels ?? DEFAULT_MAX_LEVELS;
    if (!Number.isInteger(maxLevels) || maxLevels < 1) {
      throw new Error(`Invalid maxLevels: ${maxLevels}`);
    }

    this.tree = new ReferralTree(store, maxLevels);
    this.anv = new AnvEngine(store, this.tree, { maxLevels, debug: options.debug });
    this.lottery = new LotteryReservoir(store, this.anv, {
      capacity: options.reservoirSize ?? MAX_RESERVOIR_SIZE,
      debug: options.debug,
    });
  }

  // ── Referral tree ──────────────────────────────────────────────────

  getReferral(codeHash: Hash256): Referral | undefined {
    return this.tree.getReferral(normalizeHash(codeHash));
  }

  getReferralByAddress(address: Address): Referral | undefined {
    return this.tree.getReferralByAddress(normalizeAddress(address));
  }

  getReferrer(address: Address): Address | undefined {
    return this.tree.getReferrer(normalizeAddress(address));
  }

  getChildren(address: Address): Address[] {
    return this.tree.getChildren(normalizeAddress(address));
  }

  insertReferral(referral: Referral): boolean {
    const normalized = normalizeReferral(referral);
    return this.exclusive('insertReferral', () => this.tree.insertReferral(normalized));
  }

  removeReferral(referral: Referral): boolean {
    const normalized = normalizeReferral(referral);
    return this.exclusive('removeReferral', () => this.tree.removeReferral(normalized));
  }

  referralCodeExists(codeHash: Hash256): boolean {
    return this.tree.referralCodeExists(normalizeHash(codeHash));
  }

  walletIdExists(address: Address): boolean {
    return this.tree.walletIdExists(normalizeAddress(address));
  }

  getParentLinks(): Array<[Address, Address]> {
    return this.tree.getParentLinks();
  }

  getChildLists(): Array<[Address, Address[]]> {
    return this.tree.getChildLists();
  }

  // ── ANV ────────────────────────────────────────────────────────────

  updateANV(addressType: AddressType, startAddress: Address, change: Amount): boolean {
    if (!Number.isInteger(addressType) || addressType < 0 || addressType > 255) {
      throw new Error(`Invalid address type: ${addressType}`);
    }
    const address = normalizeAddress(startAddress);
    return this.exclusive('updateANV', () => this.anv.updateANV(addressType, address, change));
  }

  getANV(address: Address): AddressANV | undefined {
    return this.anv.getANV(normalizeAddress(address));
  }

  getAllANVs(): AddressANV[] {
    return this.anv.getAllANVs();
  }

  getAllRewardableANVs(): AddressANV[] {
    return this.anv.getAllRewardableANVs();
  }

  /** ANV records paired with the address they are stored under */
  getAnvEntries(): Array<[Address, AddressANV]> {
    return this.anv.getAnvEntries();
  }

  // ── Lottery ────────────────────────────────────────────────────────

  addAddressToLottery(randomValue: Hash256, address: Address): boolean {
    const rand = normalizeHash(randomValue);
    const candidate = normalizeAddress(address);
    return this.exclusive('addAddressToLottery', () =>
      this.lottery.addAddressToLottery(rand, candidate)
    );
  }

  get lotteryCapacity(): number {
    return this.lottery.capacity;
  }

  getLotteryHeapSize(): number {
    return this.lottery.getLotteryHeapSize();
  }

  getLotterySlot(slot: number): LotteryEntry | undefined {
    return this.lottery.getLotterySlot(slot);
  }

  getLotteryMinKey(): WeightedKey | undefined {
    return this.lottery.getLotteryMinKey();
  }

  insertLotteryAddress(key: WeightedKey, address: Address): boolean {
    const candidate = normalizeAddress(address);
    return this.exclusive('insertLotteryAddress', () =>
      this.lottery.insertLotteryAddress(key, candidate)
    );
  }

  replaceLotteryMin(key: WeightedKey, address: Address): boolean {
    const candidate = normalizeAddress(address);
    return this.exclusive('replaceLotteryMin', () =>
      this.lottery.replaceLotteryMin(key, candidate)
    );
  }

  getLotteryEntries(): LotteryEntry[] {
    return this.lottery.getLotteryEntries();
  }

  clearLottery(): boolean {
    return this.exclusive('clearLottery', () => this.lottery.clearLottery());
  }

  close(): void {
    this.store.close();
  }

  private exclusive<T>(operation: string, fn: () => T): T {
    if (this.activeOperation !== undefined) {
      throw new ConcurrentMutationError(operation, this.activeOperation);
    }
    this.activeOperation = operation;
    try {
      return fn();
    } finally {
      this.activeOperation = undefined;
    }
  }
}
