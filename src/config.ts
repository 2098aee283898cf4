/**
 * Process configuration from environment variables.
 *
 *   REFDB_BACKEND         sqlite (default) | memory
 *   REFDB_PATH            SQLite file, default ./data/referrals.db
 *   REFDB_MAX_LEVELS      referral chain walk bound
 *   REFDB_RESERVOIR_SIZE  lottery capacity, default 1000
 *   REFDB_DEBUG           'true' traces ANV propagation
 *   PORT                  inspection API port, default 3000
 */

import { DEFAULT_MAX_LEVELS, MAX_RESERVOIR_SIZE } from './types';

export type StoreBackend = 'sqlite' | 'memory';

export interface LedgerConfig {
  backend: StoreBackend;
  dbPath?: string;
  maxLevels: number;
  reservoirSize: number;
  debug: boolean;
  port: number;
}

function parsePositiveInt(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw === '') return fallback;
  const value = parseInt(raw, 10);
  if (!Number.isInteger(value) || value < 1 || String(value) !== raw.trim()) {
    throw new Error(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function parseBackend(raw: string | undefined): StoreBackend {
  if (raw === undefined || raw === '' || raw === 'sqlite') return 'sqlite';
  if (raw === 'memory') return 'memory';
  throw new Error(`REFDB_BACKEND must be "sqlite" or "memory", got "${raw}"`);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): LedgerConfig {
  return {
    backend: parseBackend(env.REFDB_BACKEND),
    dbPath: env.REFDB_PATH || undefined,
    maxLevels: parsePositiveInt('REFDB_MAX_LEVELS', env.REFDB_MAX_LEVELS, DEFAULT_MAX_LEVELS),
    reservoirSize: parsePositiveInt(
      'REFDB_RESERVOIR_SIZE',
      env.REFDB_RESERVOIR_SIZE,
      MAX_RESERVOIR_SIZE
    ),
    debug: env.REFDB_DEBUG === 'true',
    port: parsePositiveInt('PORT', env.PORT, 3000),
  };
}
