/**
 * Full-ledger audits.
 *
 * The persisted tree is only parent pointers and children lists. Audits
 * load both into an in-memory arena keyed by address and cross-check them;
 * this is for occasional bulk checks, never for the write path.
 */

import { ReferralsDb } from '../referrals/referralsDb';
import { Address, NULL_ADDRESS } from '../types';

export type AuditIssueType =
  | 'CYCLE'
  | 'MISSING_CHILD_ENTRY'
  | 'ORPHAN_CHILD_ENTRY'
  | 'DUPLICATE_CHILD_ENTRY'
  | 'NEGATIVE_ANV'
  | 'SIZE_EXCEEDED'
  | 'MISSING_SLOT'
  | 'HEAP_ORDER';

export interface AuditIssue {
  type: AuditIssueType;
  address?: Address;
  slot?: number;
  detail: string;
}

export interface AuditReport {
  valid: boolean;
  checked: number;
  issues: AuditIssue[];
}

interface ArenaNode {
  parent?: Address;
  children: Address[];
}

function buildArena(db: ReferralsDb): Map<Address, ArenaNode> {
  const arena = new Map<Address, ArenaNode>();
  const node = (address: Address): ArenaNode => {
    let existing = arena.get(address);
    if (!existing) {
      existing = { children: [] };
      arena.set(address, existing);
    }
    return existing;
  };

  for (const [child, parent] of db.getParentLinks()) {
    node(child).parent = parent;
  }
  for (const [parent, children] of db.getChildLists()) {
    node(parent).children = children;
  }

  return arena;
}

function report(checked: number, issues: AuditIssue[]): AuditReport {
  return { valid: issues.length === 0, checked, issues };
}

/**
 * Check acyclicity, parent/children symmetry and ANV non-negativity.
 */
export function auditReferralGraph(db: ReferralsDb): AuditReport {
  const arena = buildArena(db);
  const issues: AuditIssue[] = [];

  for (const [address, entry] of arena) {
    if (entry.parent === undefined) continue;

    // A chain longer than the number of nodes must revisit one.
    let current: Address | undefined = entry.parent;
    let steps = 0;
    while (current !== undefined && current !== NULL_ADDRESS && steps <= arena.size) {
      current = arena.get(current)?.parent;
      steps++;
    }
    if (steps > arena.size) {
      issues.push({
        type: 'CYCLE',
        address,
        detail: `parent chain of ${address} does not reach the root`,
      });
    }

    const siblings = arena.get(entry.parent)?.children ?? [];
    const listed = siblings.filter(child => child === address).length;
    if (listed === 0) {
      issues.push({
        type: 'MISSING_CHILD_ENTRY',
        address,
        detail: `${address} is not in the children list of its parent ${entry.parent}`,
      });
    } else if (listed > 1) {
      issues.push({
        type: 'DUPLICATE_CHILD_ENTRY',
        address,
        detail: `${address} appears ${listed} times in the children list of ${entry.parent}`,
      });
    }
  }

  for (const [parent, entry] of arena) {
    for (const child of new Set(entry.children)) {
      const actual = arena.get(child)?.parent;
      if (actual !== parent) {
        issues.push({
          type: 'ORPHAN_CHILD_ENTRY',
          address: child,
          detail: `${parent} lists ${child} as a child but its parent is ${actual ?? 'unset'}`,
        });
      }
    }
  }

  const anvEntries = db.getAnvEntries();
  for (const [address, record] of anvEntries) {
    if (record.anv < 0n) {
      issues.push({
        type: 'NEGATIVE_ANV',
        address,
        detail: `ANV of ${address} is ${record.anv}`,
      });
    }
  }

  return report(arena.size + anvEntries.length, issues);
}

/**
 * Check the size bound and min-heap order across every lottery slot.
 */
export function auditLotteryHeap(db: ReferralsDb): AuditReport {
  const issues: AuditIssue[] = [];
  const size = db.getLotteryHeapSize();

  if (size > db.lotteryCapacity) {
    issues.push({
      type: 'SIZE_EXCEEDED',
      detail: `heap size ${size} exceeds capacity ${db.lotteryCapacity}`,
    });
  }

  for (let slot = 0; slot < size; slot++) {
    const entry = db.getLotterySlot(slot);
    if (!entry) {
      issues.push({ type: 'MISSING_SLOT', slot, detail: `slot ${slot} is empty` });
      continue;
    }
    if (slot === 0) continue;

    const parentPos = (slot - 1) >> 1;
    const parent = db.getLotterySlot(parentPos);
    if (parent && entry.key.lt(parent.key)) {
      issues.push({
        type: 'HEAP_ORDER',
        slot,
        address: entry.address,
        detail: `slot ${slot} key ${entry.key.toString()} is below parent slot ${parentPos} key ${parent.key.toString()}`,
      });
    }
  }

  return report(size, issues);
}
