/**
 * FxLedger over an in-memory SQLite database
 *
 * Seeds through fixed source ports, then reads back through the public
 * operations and migrates into a second database.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { SqliteBackend } from '@fxledger/storage';
import { FxLedger } from '../../src/FxLedger.js';
import {
  COPPER_ROWS,
  FIXED_CLOCK,
  FixedCommoditySource,
  FixedRateSource,
  RBI_ROWS,
  TEST_CONFIG,
} from '../helpers/fixtures.js';
import { silentLogger } from '../helpers/silent-logger.js';

describe('FxLedger (SQLite)', () => {
  let ledger: FxLedger;
  let rbi: FixedRateSource;

  beforeEach(async () => {
    rbi = new FixedRateSource('RBI', RBI_ROWS);
    ledger = new FxLedger({
      config: TEST_CONFIG,
      rateSources: [rbi],
      commoditySources: [new FixedCommoditySource('COPPER', COPPER_ROWS)],
      logger: silentLogger().logger,
      clock: FIXED_CLOCK,
    });
    await ledger.seed({ start: '2023-01-01', end: '2023-02-28' }, 'RBI');
  });

  afterEach(async () => {
    await ledger.close();
  });

  it('should resume from the checkpoint when seeding the same window again', async () => {
    const again = await ledger.seed({ start: '2023-01-01', end: '2023-02-28' }, 'RBI');

    expect(again).toEqual({
      inserted: 0,
      updated: 0,
      sources: [
        {
          source: 'RBI',
          inserted: 0,
          updated: 0,
          chunks: 1,
          skipped: 1,
          rejected: 0,
          checkpoint: '2023-02-05',
        },
      ],
    });
    expect(rbi.windows.slice(2)).toEqual([{ start: '2023-02-06', end: '2023-02-28' }]);
  });

  it('should return the latest snapshot of each stored source', async () => {
    await expect(ledger.rate()).resolves.toEqual([
      { date: '2023-02-05', baseCurrency: 'INR', source: 'RBI', rates: { EUR: 92, USD: 85 } },
    ]);
    await expect(ledger.rate(undefined, 'RBI')).resolves.toEqual({
      date: '2023-02-05',
      baseCurrency: 'INR',
      source: 'RBI',
      rates: { EUR: 92, USD: 85 },
    });
  });

  it('should return one date for one source', async () => {
    await expect(ledger.rate('2023-01-02', 'rbi')).resolves.toEqual({
      date: '2023-01-02',
      baseCurrency: 'INR',
      source: 'RBI',
      rates: { USD: 83 },
    });
    await expect(ledger.rate(new Date(Date.UTC(2023, 0, 3)), 'RBI')).resolves.toBeNull();
    await expect(ledger.rate('2023-01-02', 'SBI')).resolves.toBeNull();
  });

  it('should keep the last observed day of each bucket', async () => {
    const range = { start: '2023-01-01', end: '2023-02-28' };

    const daily = await ledger.history(range, 'daily', 'RBI');
    const weekly = await ledger.history(range, 'weekly', 'RBI');
    const monthly = await ledger.history(range, 'MONTHLY', 'RBI');
    const yearly = await ledger.history(range, 'yearly');

    expect(daily.map((snapshot) => snapshot.date)).toEqual([
      '2023-01-01',
      '2023-01-02',
      '2023-01-08',
      '2023-02-05',
    ]);
    expect(weekly.map((snapshot) => snapshot.date)).toEqual(['2023-01-01', '2023-01-08', '2023-02-05']);
    expect(monthly).toEqual([
      { date: '2023-01-08', baseCurrency: 'INR', source: 'RBI', rates: { EUR: 90, USD: 84 } },
      { date: '2023-02-05', baseCurrency: 'INR', source: 'RBI', rates: { EUR: 92, USD: 85 } },
    ]);
    expect(yearly.map((snapshot) => snapshot.date)).toEqual(['2023-02-05']);
  });

  it('should return an empty history for a window with no rows', async () => {
    await expect(ledger.history({ start: '2023-03-01', end: '2023-03-31' }, 'daily', 'RBI')).resolves.toEqual(
      []
    );
  });

  it('should seed and read LME prices', async () => {
    const seeded = await ledger.seedCommodity('cu');

    expect(seeded).toEqual({
      metal: 'COPPER',
      inserted: 2,
      updated: 0,
      fetched: 2,
      rejected: 0,
      checkpoint: '2023-01-04',
    });
    await expect(ledger.commodity('copper')).resolves.toEqual({
      date: '2023-01-04',
      metal: 'COPPER',
      spotPrice: 8100,
      forward3mPrice: null,
      stockQuantity: null,
    });
    await expect(ledger.commodity('COPPER', '2023-01-03')).resolves.toEqual({
      date: '2023-01-03',
      metal: 'COPPER',
      spotPrice: 8000,
      forward3mPrice: 8050,
      stockQuantity: 90000,
    });
    await expect(ledger.commodity('aluminium')).resolves.toBeNull();

    const monthly = await ledger.commodityHistory('copper', { start: '2023-01-01', end: '2023-01-31' }, 'monthly');
    expect(monthly.map((snapshot) => snapshot.date)).toEqual(['2023-01-04']);
  });

  it('should report the in-memory database as reachable', async () => {
    await expect(ledger.connection()).resolves.toEqual({
      success: true,
      message: 'Connection successful',
    });
  });

  describe('migrate', () => {
    let target: SqliteBackend;

    beforeEach(async () => {
      await ledger.seedCommodity('COPPER');
      target = SqliteBackend.open(':memory:', { logger: silentLogger().logger });
    });

    afterEach(async () => {
      await target.close();
    });

    it('should copy rows and checkpoints into another backend', async () => {
      const result = await ledger.migrate(target, { batchSize: 2 });

      expect(result).toEqual({
        rates: { inserted: 7, updated: 0 },
        commodities: {
          COPPER: { inserted: 2, updated: 0 },
          ALUMINUM: { inserted: 0, updated: 0 },
        },
        checkpoints: 2,
        batches: 5,
      });
      await expect(target.fetchRange({ source: 'RBI' })).resolves.toHaveLength(7);
      await expect(target.readCheckpoint('RBI')).resolves.toBe('2023-02-05');
      await expect(target.readCheckpoint('LME_COPPER')).resolves.toBe('2023-01-04');
    });

    it('should update rather than duplicate on a second run', async () => {
      await ledger.migrate(target);
      const second = await ledger.migrate(target);

      expect(second.rates).toEqual({ inserted: 0, updated: 7 });
      expect(second.commodities.COPPER).toEqual({ inserted: 0, updated: 2 });
      await expect(target.fetchRange()).resolves.toHaveLength(7);
    });
  });
});

describe('FxLedger month-start and month-end rows', () => {
  it('should report the latest day and one snapshot per month', async () => {
    const rows = RBI_ROWS.filter((row) => row.date === '2023-01-01' || row.date === '2023-02-05');
    const ledger = new FxLedger({
      config: TEST_CONFIG,
      rateSources: [new FixedRateSource('RBI', rows)],
      logger: silentLogger().logger,
      clock: FIXED_CLOCK,
    });

    try {
      const seeded = await ledger.seed({ start: '2023-01-01', end: '2023-02-28' });

      expect(seeded.inserted).toBe(4);
      await expect(ledger.rate()).resolves.toEqual([
        { date: '2023-02-05', baseCurrency: 'INR', source: 'RBI', rates: { EUR: 92, USD: 85 } },
      ]);
      const monthly = await ledger.history({ start: '2023-01-01', end: '2023-02-28' }, 'monthly');
      expect(monthly.map((snapshot) => snapshot.date)).toEqual(['2023-01-01', '2023-02-05']);
    } finally {
      await ledger.close();
    }
  });
});
