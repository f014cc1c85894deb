/**
 * migrateBackend Tests
 *
 * Tests cover:
 * - Spec validation
 * - Batching of rate and LME copies
 * - Checkpoint transfer and the include switches
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ConfigurationError } from '@fxledger/core';
import { migrateBackend } from '../../src/migrate/migrateBackend.js';
import { COPPER_ROWS, RBI_ROWS } from '../helpers/fixtures.js';
import { silentLogger } from '../helpers/silent-logger.js';
import { createStubBackend } from '../helpers/stub-backend.js';
import type { StubBackend } from '../helpers/stub-backend.js';

describe('migrateBackend', () => {
  let source: StubBackend;
  let target: StubBackend;
  const { logger } = silentLogger();

  beforeEach(() => {
    source = createStubBackend();
    target = createStubBackend();
    source.fetchRange.mockResolvedValue(RBI_ROWS);
    source.fetchCommodityRange.mockImplementation(async (metal) => (metal === 'COPPER' ? COPPER_ROWS : []));
    source.listCheckpoints.mockResolvedValue([
      { source: 'RBI', lastIngestedDate: '2023-02-05' },
      { source: 'LME_COPPER', lastIngestedDate: '2023-01-04' },
    ]);
  });

  it('should copy rates, LME rows and checkpoints in batches', async () => {
    const result = await migrateBackend(source, target, { batchSize: 3 }, logger);

    expect(source.ensureSchema).toHaveBeenCalledTimes(1);
    expect(target.ensureSchema).toHaveBeenCalledTimes(1);
    expect(target.insertRates.mock.calls.map(([rows]) => rows.length)).toEqual([3, 3, 1]);
    expect(target.insertCommodity).toHaveBeenCalledTimes(1);
    expect(target.insertCommodity).toHaveBeenCalledWith('COPPER', COPPER_ROWS);
    expect(target.writeCheckpoint.mock.calls).toEqual([
      ['RBI', '2023-02-05'],
      ['LME_COPPER', '2023-01-04'],
    ]);
    expect(result).toEqual({
      rates: { inserted: 7, updated: 0 },
      commodities: {
        COPPER: { inserted: 2, updated: 0 },
        ALUMINUM: { inserted: 0, updated: 0 },
      },
      checkpoints: 2,
      batches: 4,
    });
  });

  it('should copy only rates when commodities and checkpoints are excluded', async () => {
    const result = await migrateBackend(
      source,
      target,
      { includeCommodities: false, includeCheckpoints: false },
      logger
    );

    expect(target.insertRates).toHaveBeenCalledTimes(1);
    expect(source.fetchCommodityRange).not.toHaveBeenCalled();
    expect(target.writeCheckpoint).not.toHaveBeenCalled();
    expect(result.checkpoints).toBe(0);
    expect(result.batches).toBe(1);
  });

  it('should reject a non-positive batch size before touching either backend', async () => {
    await expect(migrateBackend(source, target, { batchSize: 0 }, logger)).rejects.toThrow(
      ConfigurationError
    );
    await expect(migrateBackend(source, target, { batchSize: 0 }, logger)).rejects.toThrow(
      'Invalid migration spec: Number must be greater than 0'
    );

    expect(source.ensureSchema).not.toHaveBeenCalled();
    expect(target.ensureSchema).not.toHaveBeenCalled();
  });

  it('should stop at the first failed batch', async () => {
    target.insertRates.mockRejectedValueOnce(new Error('disk full'));

    await expect(migrateBackend(source, target, { batchSize: 3 }, logger)).rejects.toThrow('disk full');
    expect(target.insertRates).toHaveBeenCalledTimes(1);
    expect(target.writeCheckpoint).not.toHaveBeenCalled();
  });
});
