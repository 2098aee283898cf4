export * from './types';
export { InvariantViolationError, ConcurrentMutationError, assertInvariant } from './errors';
export {
  isAddress,
  isHash256,
  normalizeAddress,
  normalizeHash,
  normalizeReferral,
} from './validation';
export { loadConfig } from './config';
export type { LedgerConfig, StoreBackend } from './config';
export { Decimal } from './decimal';
export * from './persistence';
export * from './referrals';
export * from './services';
export * from './api';
