export { ReferralTree } from './referralTree';
export { AnvEngine } from './anvEngine';
export type { AnvEngineOptions } from './anvEngine';
export { LotteryReservoir } from './lotteryReservoir';
export type { LotteryReservoirOptions } from './lotteryReservoir';
export { ReferralsDb } from './referralsDb';
export { computeWeightedKey, drawFromRandom, logDraw, MAX_UINT64 } from './weightedKey';

import { LedgerConfig } from '../config';
import { InMemoryKvStore } from '../persistence/inMemoryKvStore';
import { createSqliteKvStore } from '../persistence/sqlite';
import { ReferralsDb } from './referralsDb';

/**
 * Open a ledger on the configured backend.
 */
export function createReferralsDb(config: LedgerConfig): ReferralsDb {
  const store =
    config.backend === 'memory' ? new InMemoryKvStore() : createSqliteKvStore(config.dbPath);

  return new ReferralsDb(store, {
    maxLevels: config.maxLevels,
    reservoirSize: config.reservoirSize,
    debug: config.debug,
  });
}
