/**
 * Tests for config/index.ts
 *
 * Tests cover:
 * - Defaults when nothing is set
 * - Source priority parsing
 * - ConfigurationError on invalid values
 */

import { describe, it, expect } from 'vitest';
import * as path from 'path';
import { ConfigurationError } from '@fxledger/core';
import { getFxLedgerConfig, resolveSourcePriority } from '../../src/config/index.js';

describe('getFxLedgerConfig', () => {
  it('should fall back to defaults', () => {
    const config = getFxLedgerConfig({});

    expect(config).toEqual({
      databaseUrl: undefined,
      sqlitePath: path.join(process.cwd(), 'data', 'fxledger.db'),
      sourcePriority: ['SBI', 'RBI'],
      batchSize: 500,
    });
  });

  it('should read every supported key', () => {
    const config = getFxLedgerConfig({
      FXLEDGER_DB_URL: 'postgresql://localhost/forex',
      FXLEDGER_SQLITE_PATH: '/tmp/fx.db',
      FXLEDGER_SOURCE_PRIORITY: 'rbi, sbi',
      FXLEDGER_BATCH_SIZE: '250',
    });

    expect(config).toEqual({
      databaseUrl: 'postgresql://localhost/forex',
      sqlitePath: '/tmp/fx.db',
      sourcePriority: ['RBI', 'SBI'],
      batchSize: 250,
    });
  });

  it('should reject unknown sources in the priority list', () => {
    expect(() => getFxLedgerConfig({ FXLEDGER_SOURCE_PRIORITY: 'RBI,ECB' })).toThrow(ConfigurationError);
  });

  it('should name the offending key', () => {
    try {
      getFxLedgerConfig({ FXLEDGER_BATCH_SIZE: '-5' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({ configKey: 'FXLEDGER_BATCH_SIZE' });
    }
  });
});

describe('resolveSourcePriority', () => {
  it('should append sources left out of the list', () => {
    expect(resolveSourcePriority(['RBI'])).toEqual(['RBI', 'SBI']);
  });

  it('should drop duplicates', () => {
    expect(resolveSourcePriority(['SBI', 'SBI'])).toEqual(['SBI', 'RBI']);
  });
});
