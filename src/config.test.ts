import { loadConfig } from './config';
import { DEFAULT_MAX_LEVELS, MAX_RESERVOIR_SIZE } from './types';

describe('loadConfig', () => {
  it('should apply defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      backend: 'sqlite',
      dbPath: undefined,
      maxLevels: DEFAULT_MAX_LEVELS,
      reservoirSize: MAX_RESERVOIR_SIZE,
      debug: false,
      port: 3000,
    });
  });

  it('should read every variable', () => {
    const config = loadConfig({
      REFDB_BACKEND: 'memory',
      REFDB_PATH: '/tmp/ledger.db',
      REFDB_MAX_LEVELS: '64',
      REFDB_RESERVOIR_SIZE: '10',
      REFDB_DEBUG: 'true',
      PORT: '8080',
    });

    expect(config).toEqual({
      backend: 'memory',
      dbPath: '/tmp/ledger.db',
      maxLevels: 64,
      reservoirSize: 10,
      debug: true,
      port: 8080,
    });
  });

  it('should only enable debug for the literal "true"', () => {
    expect(loadConfig({ REFDB_DEBUG: '1' }).debug).toBe(false);
  });

  it('should reject an unknown backend', () => {
    expect(() => loadConfig({ REFDB_BACKEND: 'postgres' })).toThrow(
      'REFDB_BACKEND must be "sqlite" or "memory", got "postgres"'
    );
  });

  it('should reject non-integer and non-positive sizes', () => {
    expect(() => loadConfig({ REFDB_RESERVOIR_SIZE: '0' })).toThrow(
      'REFDB_RESERVOIR_SIZE must be a positive integer, got "0"'
    );
    expect(() => loadConfig({ REFDB_MAX_LEVELS: '1.5' })).toThrow(
      'REFDB_MAX_LEVELS must be a positive integer, got "1.5"'
    );
    expect(() => loadConfig({ PORT: 'abc' })).toThrow('PORT must be a positive integer, got "abc"');
  });
});
