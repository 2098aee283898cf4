/**
 * Referral tree over flat keyed records.
 *
 * The referral record (by code hash) is authoritative. The parent pointer,
 * the children list and the address index are derived from it and kept in
 * step on every insert and remove. None of the multi-key updates are
 * atomic: a `false` return means some of the writes may already be applied.
 */

import { IKeyValueStore } from '../persistence/interfaces';
import {
  addressFromKey,
  addressKey,
  hashKey,
  Namespace,
} from '../persistence/keys';
import {
  decodeAddress,
  decodeAddressList,
  decodeHash,
  decodeReferral,
  encodeAddress,
  encodeAddressList,
  encodeHash,
  encodeReferral,
} from '../persistence/codec';
import { scanNamespace } from '../persistence/scan';
import { Address, DEFAULT_MAX_LEVELS, Hash256, NULL_ADDRESS, Referral } from '../types';

export class ReferralTree {
  constructor(
    private readonly store: IKeyValueStore,
    private readonly maxLevels: number = DEFAULT_MAX_LEVELS
  ) {}

  getReferral(codeHash: Hash256): Referral | undefined {
    const raw = this.store.read(hashKey(Namespace.REFERRAL, codeHash));
    return raw ? decodeReferral(raw) : undefined;
  }

  /** Referral that introduced the address, via the address index */
  getReferralByAddress(address: Address): Referral | undefined {
    const raw = this.store.read(addressKey(Namespace.REFERRAL_BY_ADDRESS, address));
    const codeHash = raw ? decodeHash(raw) : undefined;
    return codeHash ? this.getReferral(codeHash) : undefined;
  }

  /**
   * Stored parent of the address. A root yields NULL_ADDRESS;
   * an address that was never inserted yields undefined.
   */
  getReferrer(address: Address): Address | undefined {
    const raw = this.store.read(addressKey(Namespace.PARENT, address));
    return raw ? decodeAddress(raw) : undefined;
  }

  getChildren(address: Address): Address[] {
    const raw = this.store.read(addressKey(Namespace.CHILDREN, address));
    return (raw && decodeAddressList(raw)) || [];
  }

  referralCodeExists(codeHash: Hash256): boolean {
    return this.store.exists(hashKey(Namespace.REFERRAL, codeHash));
  }

  walletIdExists(address: Address): boolean {
    return this.store.exists(addressKey(Namespace.PARENT, address));
  }

  /**
   * Parent address for a referral. Referrals can arrive before the one
   * they were created from; the parent is then the null address.
   */
  resolveParent(referral: Referral): Address {
    return this.getReferral(referral.previousReferral)?.pubKeyId ?? NULL_ADDRESS;
  }

  /**
   * Whether `address` appears on the parent chain starting at `from`
   * (inclusive). Stops at the root or after maxLevels steps.
   */
  isOnParentChain(address: Address, from: Address): boolean {
    let current: Address | undefined = from;
    for (let levels = 0; current !== undefined && current !== NULL_ADDRESS; levels++) {
      if (current === address || levels >= this.maxLevels) return true;
      current = this.getReferrer(current);
    }
    return false;
  }

  /**
   * Write the referral and its derived indexes.
   *
   * Rejected before anything is written: a referral that would put its own
   * address on its parent chain, and one for an address already introduced
   * by another code or linked under another parent.
   */
  insertReferral(referral: Referral): boolean {
    if (referral.previousReferral === referral.codeHash) return false;

    const indexed = this.store.read(addressKey(Namespace.REFERRAL_BY_ADDRESS, referral.pubKeyId));
    if (indexed && decodeHash(indexed) !== referral.codeHash) return false;

    const parent = this.resolveParent(referral);
    const existing = this.getReferrer(referral.pubKeyId);
    if (existing !== undefined && existing !== parent) return false;
    if (this.isOnParentChain(referral.pubKeyId, parent)) return false;

    if (!this.store.write(hashKey(Namespace.REFERRAL, referral.codeHash), encodeReferral(referral))) {
      return false;
    }

    if (!this.store.write(addressKey(Namespace.PARENT, referral.pubKeyId), encodeAddress(parent))) {
      return false;
    }

    if (
      !this.store.write(
        addressKey(Namespace.REFERRAL_BY_ADDRESS, referral.pubKeyId),
        encodeHash(referral.codeHash)
      )
    ) {
      return false;
    }

    const children = this.getChildren(parent);
    if (children.includes(referral.pubKeyId)) return true;

    children.push(referral.pubKeyId);
    return this.store.write(addressKey(Namespace.CHILDREN, parent), encodeAddressList(children));
  }

  /**
   * Erase the referral and undo its derived indexes.
   *
   * The parent is taken from the stored pointer rather than re-resolved, so
   * a referral inserted before its predecessor is unlinked from the list it
   * was actually added to. A referral that is not stored for its address
   * has nothing to undo.
   */
  removeReferral(referral: Referral): boolean {
    const indexKey = addressKey(Namespace.REFERRAL_BY_ADDRESS, referral.pubKeyId);
    const raw = this.store.read(indexKey);
    const indexed = raw ? decodeHash(raw) : undefined;
    if (this.getReferral(referral.codeHash)?.pubKeyId !== referral.pubKeyId) return true;
    if (indexed !== undefined && indexed !== referral.codeHash) return true;

    const parent = this.getReferrer(referral.pubKeyId) ?? this.resolveParent(referral);

    if (!this.store.erase(hashKey(Namespace.REFERRAL, referral.codeHash))) {
      return false;
    }

    if (!this.store.erase(addressKey(Namespace.PARENT, referral.pubKeyId))) {
      return false;
    }

    if (indexed !== undefined && !this.store.erase(indexKey)) {
      return false;
    }

    const childrenKey = addressKey(Namespace.CHILDREN, parent);
    const children = this.getChildren(parent).filter(child => child !== referral.pubKeyId);
    return children.length > 0
      ? this.store.write(childrenKey, encodeAddressList(children))
      : this.store.erase(childrenKey);
  }

  // ── Bulk reads for audits ──────────────────────────────────────────

  /** Every stored child → parent pointer */
  getParentLinks(): Array<[Address, Address]> {
    return scanNamespace(
      this.store,
      Namespace.PARENT,
      key => addressFromKey(key, Namespace.PARENT),
      decodeAddress
    );
  }

  /** Every stored parent → children list */
  getChildLists(): Array<[Address, Address[]]> {
    return scanNamespace(
      this.store,
      Namespace.CHILDREN,
      key => addressFromKey(key, Namespace.CHILDREN),
      decodeAddressList
    );
  }
}
