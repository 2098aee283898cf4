/**
 * Bounded weighted reservoir of lottery candidates.
 *
 * The reservoir is a binary min-heap whose slots are individual store
 * records ('v' + slot index) with a separate size record. Slot 0 holds the
 * smallest weighted key, which is the one evicted when a better candidate
 * arrives at capacity. Nothing is loaded into memory beyond the O(log n)
 * slots touched by a sift.
 */

import { IKeyValueStore } from '../persistence/interfaces';
import { lotterySizeKey, lotterySlotKey } from '../persistence/keys';
import {
  decodeLotteryEntry,
  decodeSize,
  encodeLotteryEntry,
  encodeSize,
} from '../persistence/codec';
import { Address, Hash256, LotteryEntry, MAX_RESERVOIR_SIZE, WeightedKey } from '../types';
import { AnvEngine } from './anvEngine';
import { computeWeightedKey } from './weightedKey';

export interface LotteryReservoirOptions {
  capacity?: number;
  debug?: boolean;
}

function parentSlot(pos: number): number {
  return (pos - 1) >> 1;
}

export class LotteryReservoir {
  readonly capacity: number;
  private readonly debug: boolean;

  constructor(
    private readonly store: IKeyValueStore,
    private readonly anv: AnvEngine,
    options: LotteryReservoirOptions = {}
  ) {
    this.capacity = options.capacity ?? MAX_RESERVOIR_SIZE;
    this.debug = options.debug ?? false;

    if (!Number.isInteger(this.capacity) || this.capacity < 1) {
      throw new Error(`Invalid reservoir capacity: ${this.capacity}`);
    }
  }

  /**
   * Offer an address to the reservoir, weighted by its ANV.
   *
   * Below capacity the candidate is always inserted. At capacity it
   * replaces the current minimum only if its key is larger; otherwise it is
   * discarded and the call still succeeds.
   *
   * @returns false if the address has no ANV (or zero ANV) or a store
   *   operation failed
   */
  addAddressToLottery(randomValue: Hash256, address: Address): boolean {
    const record = this.anv.getANV(address);
    if (!record || record.anv <= 0n) return false;

    const key = computeWeightedKey(randomValue, record.anv);

    if (this.getLotteryHeapSize() < this.capacity) {
      return this.insertLotteryAddress(key, address);
    }

    const minKey = this.getLotteryMinKey();
    if (minKey === undefined) return false;

    if (key.gt(minKey)) {
      if (this.debug) {
        console.log(`LotteryReservoir: ${address} (${key.toString()}) evicts min ${minKey.toString()}`);
      }
      return this.replaceLotteryMin(key, address);
    }

    return true;
  }

  getLotteryHeapSize(): number {
    const raw = this.store.read(lotterySizeKey());
    return (raw && decodeSize(raw)) || 0;
  }

  getLotteryMinKey(): WeightedKey | undefined {
    return this.getLotterySlot(0)?.key;
  }

  getLotterySlot(slot: number): LotteryEntry | undefined {
    const raw = this.store.read(lotterySlotKey(slot));
    return raw ? decodeLotteryEntry(raw) : undefined;
  }

  /**
   * Append at the tail slot and sift up. The size record is written first,
   * so a failed sift leaves the size counting a slot that may be stale.
   */
  insertLotteryAddress(key: WeightedKey, address: Address): boolean {
    let pos = this.getLotteryHeapSize();
    if (pos >= this.capacity) return false;

    if (!this.store.write(lotterySizeKey(), encodeSize(pos + 1))) return false;

    while (pos !== 0) {
      const parentPos = parentSlot(pos);
      const parent = this.getLotterySlot(parentPos);
      if (!parent) return false;

      if (key.gt(parent.key)) break;

      // Pull the parent down into the hole and keep climbing.
      if (!this.writeSlot(pos, parent)) return false;
      pos = parentPos;
    }

    return this.writeSlot(pos, { key, address });
  }

  /**
   * Replace the minimum (slot 0) with a new entry and sift it down to
   * restore heap order. Fails on an empty heap.
   */
  replaceLotteryMin(key: WeightedKey, address: Address): boolean {
    const size = this.getLotteryHeapSize();
    if (size === 0) return false;

    let pos = 0;
    for (;;) {
      const left = 2 * pos + 1;
      if (left >= size) break;

      let childPos = left;
      let child = this.getLotterySlot(left);
      if (!child) return false;

      const right = left + 1;
      if (right < size) {
        const rightChild = this.getLotterySlot(right);
        if (!rightChild) return false;
        if (rightChild.key.lt(child.key)) {
          childPos = right;
          child = rightChild;
        }
      }

      if (!child.key.lt(key)) break;

      if (!this.writeSlot(pos, child)) return false;
      pos = childPos;
    }

    return this.writeSlot(pos, { key, address });
  }

  /** Stored entries in slot order; slot 0 first */
  getLotteryEntries(): LotteryEntry[] {
    const entries: LotteryEntry[] = [];
    const size = this.getLotteryHeapSize();
    for (let slot = 0; slot < size; slot++) {
      const entry = this.getLotterySlot(slot);
      if (entry) entries.push(entry);
    }
    return entries;
  }

  /**
   * Erase every slot and the size record to start a new sampling round.
   */
  clearLottery(): boolean {
    const size = this.getLotteryHeapSize();
    for (let slot = 0; slot < size; slot++) {
      if (!this.store.erase(lotterySlotKey(slot))) return false;
    }
    return this.store.erase(lotterySizeKey());
  }

  private writeSlot(slot: number, entry: LotteryEntry): boolean {
    return this.store.write(lotterySlotKey(slot), encodeLotteryEntry(entry));
  }
}
