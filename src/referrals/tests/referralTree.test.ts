import { InMemoryKvStore } from '../../persistence/inMemoryKvStore';
import { addressKey, Namespace } from '../../persistence/keys';
import { encodeAddress } from '../../persistence/codec';
import { ReferralTree } from '../referralTree';
import { NULL_ADDRESS } from '../../types';
import { addr, hash, referral } from '../../testing/fixtures';

const A = addr(0xa);
const B = addr(0xb);
const C = addr(0xc);

describe('ReferralTree', () => {
  let store: InMemoryKvStore;
  let tree: ReferralTree;

  const r1 = referral(1, null, A);
  const r2 = referral(2, 1, B);

  beforeEach(() => {
    store = new InMemoryKvStore();
    tree = new ReferralTree(store);
  });

  describe('insertReferral', () => {
    it('links a child to the address of its previous referral', () => {
      expect(tree.insertReferral(r1)).toBe(true);
      expect(tree.insertReferral(r2)).toBe(true);

      expect(tree.getReferrer(B)).toBe(A);
      expect(tree.getChildren(A)).toEqual([B]);
      expect(tree.getReferral(hash(2))).toEqual(r2);
    });

    it('links roots to the null address', () => {
      tree.insertReferral(r1);

      expect(tree.getReferrer(A)).toBe(NULL_ADDRESS);
      expect(tree.getChildren(NULL_ADDRESS)).toEqual([A]);
    });

    it('indexes the referral by the address it introduced', () => {
      tree.insertReferral(r1);
      tree.insertReferral(r2);

      expect(tree.getReferralByAddress(B)).toEqual(r2);
      expect(tree.getReferralByAddress(C)).toBeUndefined();
    });

    it('keeps a child listed exactly once when re-inserted', () => {
      tree.insertReferral(r1);
      tree.insertReferral(r2);
      expect(tree.insertReferral(r2)).toBe(true);

      expect(tree.getChildren(A)).toEqual([B]);
    });

    it('appends siblings in insertion order', () => {
      tree.insertReferral(r1);
      tree.insertReferral(r2);
      tree.insertReferral(referral(3, 1, C));

      expect(tree.getChildren(A)).toEqual([B, C]);
    });

    it('falls back to the null parent when the previous referral is unknown', () => {
      expect(tree.insertReferral(r2)).toBe(true);

      expect(tree.getReferrer(B)).toBe(NULL_ADDRESS);
      expect(tree.getChildren(NULL_ADDRESS)).toEqual([B]);
    });

    it('rejects a referral created from itself', () => {
      expect(tree.insertReferral(referral(3, 3, C))).toBe(false);
      expect(tree.referralCodeExists(hash(3))).toBe(false);
      expect(tree.walletIdExists(C)).toBe(false);
    });

    it('rejects a referral that would close a loop', () => {
      tree.insertReferral(r1);
      tree.insertReferral(r2);

      // A re-introduced under B: B's chain already contains A.
      expect(tree.insertReferral(referral(3, 2, A))).toBe(false);
      expect(tree.referralCodeExists(hash(3))).toBe(false);
      expect(tree.getReferrer(A)).toBe(NULL_ADDRESS);
      expect(tree.getChildren(B)).toEqual([]);
    });

    it('rejects a second code for an address already introduced', () => {
      tree.insertReferral(r1);
      tree.insertReferral(r2);
      tree.insertReferral(referral(3, null, C));

      expect(tree.insertReferral(referral(4, 3, B))).toBe(false);

      expect(tree.referralCodeExists(hash(4))).toBe(false);
      expect(tree.getReferrer(B)).toBe(A);
      expect(tree.getChildren(A)).toEqual([B]);
      expect(tree.getChildren(C)).toEqual([]);
    });

    it('rejects re-linking an address under a different parent', () => {
      // r2 is parked under the null address before r1 arrives.
      tree.insertReferral(r2);
      tree.insertReferral(r1);

      expect(tree.insertReferral(r2)).toBe(false);

      expect(tree.getReferrer(B)).toBe(NULL_ADDRESS);
      expect(tree.getChildren(NULL_ADDRESS)).toEqual([B, A]);
      expect(tree.getChildren(A)).toEqual([]);
    });

    it('leaves earlier writes in place when a later write fails', () => {
      store.failWritesAfter(1);

      expect(tree.insertReferral(r1)).toBe(false);
      expect(tree.referralCodeExists(hash(1))).toBe(true);
      expect(tree.walletIdExists(A)).toBe(false);
      expect(tree.getChildren(NULL_ADDRESS)).toEqual([]);
    });
  });

  describe('removeReferral', () => {
    it('undoes every index written by insert', () => {
      tree.insertReferral(r1);
      tree.insertReferral(r2);

      expect(tree.removeReferral(r2)).toBe(true);

      expect(tree.getReferral(hash(2))).toBeUndefined();
      expect(tree.getReferrer(B)).toBeUndefined();
      expect(tree.getReferralByAddress(B)).toBeUndefined();
      expect(tree.getChildren(A)).toEqual([]);
      expect(store.exists(addressKey(Namespace.CHILDREN, A))).toBe(false);
    });

    it('keeps the remaining siblings', () => {
      tree.insertReferral(r1);
      tree.insertReferral(r2);
      tree.insertReferral(referral(3, 1, C));

      tree.removeReferral(r2);

      expect(tree.getChildren(A)).toEqual([C]);
      expect(tree.getReferrer(C)).toBe(A);
    });

    it('unlinks from the parent recorded at insert time', () => {
      // r2 arrives first and is parked under the null address.
      tree.insertReferral(r2);
      tree.insertReferral(r1);

      expect(tree.removeReferral(r2)).toBe(true);

      expect(tree.getChildren(NULL_ADDRESS)).toEqual([A]);
      expect(tree.getChildren(A)).toEqual([]);
    });

    it('leaves the stored referral of an address untouched', () => {
      tree.insertReferral(r1);
      tree.insertReferral(r2);

      expect(tree.removeReferral(referral(99, 1, B))).toBe(true);

      expect(tree.walletIdExists(B)).toBe(true);
      expect(tree.getReferrer(B)).toBe(A);
      expect(tree.getChildren(A)).toEqual([B]);
      expect(tree.getReferralByAddress(B)).toEqual(r2);
    });

    it('ignores a code stored for another address', () => {
      tree.insertReferral(r1);
      tree.insertReferral(r2);

      expect(tree.removeReferral(referral(2, 1, C))).toBe(true);

      expect(tree.getReferral(hash(2))).toEqual(r2);
      expect(tree.getChildren(A)).toEqual([B]);
    });

    it('returns false when an erase fails', () => {
      tree.insertReferral(r1);
      store.failWritesAfter(0);

      expect(tree.removeReferral(r1)).toBe(false);
      expect(tree.referralCodeExists(hash(1))).toBe(true);
    });
  });

  describe('existence checks', () => {
    it('reports referral codes and wallet ids', () => {
      tree.insertReferral(r1);

      expect(tree.referralCodeExists(hash(1))).toBe(true);
      expect(tree.referralCodeExists(hash(2))).toBe(false);
      expect(tree.walletIdExists(A)).toBe(true);
      expect(tree.walletIdExists(B)).toBe(false);
    });

    it('returns empty children for unknown addresses', () => {
      expect(tree.getChildren(C)).toEqual([]);
      expect(tree.getReferrer(C)).toBeUndefined();
    });
  });

  describe('acyclicity', () => {
    it('walks every inserted chain to the root within the number of addresses', () => {
      const count = 25;
      tree.insertReferral(referral(1, null, addr(1)));
      for (let i = 2; i <= count; i++) {
        // Each new address hangs off a pseudo-random earlier one.
        const previous = ((i * 7) % (i - 1)) + 1;
        expect(tree.insertReferral(referral(i, previous, addr(i)))).toBe(true);
      }

      for (let i = 1; i <= count; i++) {
        let current: string | undefined = addr(i);
        let steps = 0;
        while (current !== undefined && current !== NULL_ADDRESS) {
          current = tree.getReferrer(current);
          steps++;
        }
        expect(current).toBe(NULL_ADDRESS);
        expect(steps).toBeLessThanOrEqual(count);
      }
    });

    it('treats a chain longer than maxLevels as unsafe', () => {
      const shallow = new ReferralTree(store, 2);
      store.write(addressKey(Namespace.PARENT, A), encodeAddress(B));
      store.write(addressKey(Namespace.PARENT, B), encodeAddress(A));

      expect(shallow.isOnParentChain(C, A)).toBe(true);
    });
  });

  describe('bulk reads', () => {
    it('lists parent links and children lists', () => {
      tree.insertReferral(r1);
      tree.insertReferral(r2);

      expect(tree.getParentLinks()).toEqual([
        [A, NULL_ADDRESS],
        [B, A],
      ]);
      expect(tree.getChildLists()).toEqual([
        [NULL_ADDRESS, [A]],
        [A, [B]],
      ]);
    });
  });
});
