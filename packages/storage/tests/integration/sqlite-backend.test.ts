/**
 * SQLite backend integration tests
 *
 * Run against a real in-memory sqlite3 database:
 * - Idempotent upserts on both the modern and legacy write paths
 * - All-or-nothing batches
 * - Inclusive date ranges
 * - Monotonic checkpoints
 * - Schema patching by DROP COLUMN and by table rebuild
 */

import { describe, it, expect, afterEach } from 'vitest';
import { DatabaseError } from '@fxledger/core';
import type { RateObservation } from '@fxledger/core';
import { SqliteBackend } from '../../src/backends/sqlite-backend.js';
import { SQLITE_MEMORY, SqliteDriver } from '../../src/sqlite/sqlite-driver.js';
import { silentLogger } from '../helpers/silent-logger.js';

const { logger } = silentLogger();

function rbi(date: string, currencyCode: string, rate: number): RateObservation {
  return { date, currencyCode, source: 'RBI', rate };
}

async function columnNames(driver: SqliteDriver, table: string): Promise<string[]> {
  const { rows } = await driver.query(`PRAGMA table_info(${table})`);
  return rows.map((row) => String(row.name));
}

async function legacyCopperTable(driver: SqliteDriver): Promise<void> {
  await driver.query(
    'CREATE TABLE lme_copper_rates (rate_date DATE NOT NULL PRIMARY KEY, price NUMERIC(18, 6), ' +
      'usd_price NUMERIC(18, 6), eur_change NUMERIC(18, 6))'
  );
  await driver.query(
    'INSERT INTO lme_copper_rates (rate_date, price, usd_price, eur_change) VALUES (?, ?, ?, ?)',
    ['2024-01-02', 8000, 1.5, 2.5]
  );
}

describe('SqliteBackend', () => {
  const opened: SqliteBackend[] = [];

  function open(engineVersion?: string): SqliteBackend {
    const backend = SqliteBackend.open(SQLITE_MEMORY, { logger, engineVersion });
    opened.push(backend);
    return backend;
  }

  afterEach(async () => {
    await Promise.all(opened.splice(0).map((backend) => backend.close()));
  });

  describe.each([
    ['linked engine', undefined],
    ['engine without ON CONFLICT', '3.20.0'],
  ])('rates on the %s', (_label, engineVersion) => {
    it('should insert once then update in place', async () => {
      const backend = open(engineVersion);

      await expect(backend.insertRates([rbi('2024-01-02', 'USD', 83.1)])).resolves.toEqual({
        inserted: 1,
        updated: 0,
      });
      await expect(backend.insertRates([rbi('2024-01-02', 'USD', 83.2)])).resolves.toEqual({
        inserted: 0,
        updated: 1,
      });

      await expect(backend.fetchRange()).resolves.toEqual([rbi('2024-01-02', 'USD', 83.2)]);
    });

    it('should leave the table untouched when the last row of a batch violates NOT NULL', async () => {
      const backend = open(engineVersion);

      // sqlite binds NaN as NULL
      const attempt = backend.insertRates([
        rbi('2024-01-02', 'USD', 83),
        rbi('2024-01-02', 'EUR', 90),
        rbi('2024-01-03', 'GBP', Number.NaN),
      ]);

      await expect(attempt).rejects.toThrow(DatabaseError);
      await expect(attempt).rejects.toThrow('NOT NULL constraint failed');
      await expect(backend.fetchRange()).resolves.toEqual([]);
    });

    it('should only move checkpoints forward', async () => {
      const backend = open(engineVersion);

      await backend.writeCheckpoint('RBI', '2024-01-31');
      await backend.writeCheckpoint('RBI', '2024-01-15');
      await expect(backend.readCheckpoint('rbi')).resolves.toBe('2024-01-31');

      await backend.writeCheckpoint('RBI', '2024-02-01');
      await expect(backend.readCheckpoint('RBI')).resolves.toBe('2024-02-01');
    });
  });

  it('should pick the write path from the engine version', async () => {
    const legacy = open('3.20.0');
    await legacy.ensureSchema();

    expect(legacy.getEngineVersion()).toBe('3.20.0');
    expect(legacy.upsertStrategies()).toEqual(['delete-insert']);

    const current = open();
    await current.ensureSchema();

    expect(current.getEngineVersion()).toMatch(/^3\.\d+\.\d+$/);
    expect(current.upsertStrategies()).toEqual(['bulk-upsert', 'row-upsert', 'delete-insert']);
  });

  it('should treat both range bounds as inclusive', async () => {
    const backend = open();
    await backend.insertRates([
      rbi('2024-01-01', 'USD', 82),
      rbi('2024-01-02', 'USD', 83),
      rbi('2024-01-03', 'USD', 84),
    ]);

    const rows = await backend.fetchRange({ start: '2024-01-02', end: '2024-01-02' });

    expect(rows).toEqual([rbi('2024-01-02', 'USD', 83)]);
  });

  it('should round-trip SBI card rates', async () => {
    const backend = open();
    await backend.insertRates([
      { date: '2024-01-02', currencyCode: 'USD', source: 'SBI', rate: 83.25, ttBuy: 82.5, ttSell: 84 },
    ]);

    await expect(backend.fetchRange({ source: 'SBI' })).resolves.toEqual([
      {
        date: '2024-01-02',
        currencyCode: 'USD',
        source: 'SBI',
        rate: 83.25,
        ttBuy: 82.5,
        ttSell: 84,
        billBuy: null,
        billSell: null,
        travelCardBuy: null,
        travelCardSell: null,
        cnBuy: null,
        cnSell: null,
      },
    ]);
    await expect(backend.fetchRange({ source: 'RBI' })).resolves.toEqual([]);
  });

  it('should keep metals in separate tables', async () => {
    const backend = open();
    await backend.insertCommodity('COPPER', [
      { date: '2024-01-02', metal: 'COPPER', spotPrice: 8500.5, forward3mPrice: 8550, stockQuantity: 120000 },
    ]);

    await expect(backend.fetchCommodityRange('COPPER')).resolves.toEqual([
      { date: '2024-01-02', metal: 'COPPER', spotPrice: 8500.5, forward3mPrice: 8550, stockQuantity: 120000 },
    ]);
    await expect(backend.fetchCommodityRange('ALUMINUM')).resolves.toEqual([]);
  });

  describe('schema patching', () => {
    it.each([
      ['DROP COLUMN', undefined],
      ['table rebuild', '3.30.0'],
    ])('should retire legacy commodity columns by %s', async (_label, engineVersion) => {
      const driver = new SqliteDriver({ filename: SQLITE_MEMORY, logger });
      const backend = new SqliteBackend(driver, { logger, engineVersion });
      opened.push(backend);
      await legacyCopperTable(driver);

      await backend.ensureSchema();

      expect(await columnNames(driver, 'lme_copper_rates')).toEqual([
        'rate_date',
        'price',
        'price_3_month',
        'stock',
        'created_at',
      ]);
      await expect(backend.fetchCommodityRange('COPPER')).resolves.toEqual([
        { date: '2024-01-02', metal: 'COPPER', spotPrice: 8000, forward3mPrice: null, stockQuantity: null },
      ]);
    });
  });
});
