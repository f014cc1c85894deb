/**
 * CommodityIngestionService Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Mock } from 'vitest';
import { ValidationError } from '@fxledger/core';
import type { CommodityObservation, CommoditySourcePort } from '@fxledger/core';
import { CommodityIngestionService } from '../../src/CommodityIngestionService.js';
import { InMemoryBackend } from '../helpers/in-memory-backend.js';
import { silentLogger } from '../helpers/silent-logger.js';

const COPPER_TABLE: CommodityObservation[] = [
  { date: '2024-01-02', metal: 'COPPER', spotPrice: 8400, forward3mPrice: 8450, stockQuantity: 150000 },
  { date: '2024-01-03', metal: 'COPPER', spotPrice: 8420, forward3mPrice: 8470, stockQuantity: 149500 },
  { date: '2024-01-04', metal: 'COPPER', spotPrice: 8390, forward3mPrice: null, stockQuantity: null },
];

describe('CommodityIngestionService', () => {
  let backend: InMemoryBackend;
  let fetchPrices: Mock<() => Promise<CommodityObservation[]>>;
  let service: CommodityIngestionService;

  beforeEach(() => {
    backend = new InMemoryBackend();
    fetchPrices = vi.fn<() => Promise<CommodityObservation[]>>().mockResolvedValue(COPPER_TABLE);
    const port: CommoditySourcePort = { metal: 'COPPER', fetchPrices };
    service = new CommodityIngestionService(backend, [port], silentLogger().logger);
  });

  it('should upsert the published table and set the LME checkpoint', async () => {
    const result = await service.ingest({ metal: 'cu' });

    expect(result).toEqual({
      metal: 'COPPER',
      inserted: 3,
      updated: 0,
      fetched: 3,
      rejected: 0,
      checkpoint: '2024-01-04',
    });
    expect(backend.checkpointWrites).toEqual([{ source: 'LME_COPPER', date: '2024-01-04' }]);
  });

  it('should keep only rows inside the requested range', async () => {
    const result = await service.ingest({
      metal: 'COPPER',
      range: { start: '2024-01-03', end: '2024-01-03' },
    });

    expect(result).toMatchObject({ inserted: 1, checkpoint: '2024-01-03' });
    expect([...backend.commodities.values()].map((row) => row.date)).toEqual(['2024-01-03']);
  });

  it('should update rows on a second run', async () => {
    await service.ingest({ metal: 'COPPER' });

    await expect(service.ingest({ metal: 'COPPER' })).resolves.toMatchObject({ inserted: 0, updated: 3 });
  });

  it('should leave the checkpoint alone when nothing is in range', async () => {
    const result = await service.ingest({ metal: 'COPPER', range: { start: '2025-01-01' } });

    expect(result).toMatchObject({ inserted: 0, checkpoint: null });
    expect(backend.checkpointWrites).toEqual([]);
  });

  it('should skip fetching on a dry run', async () => {
    await service.ingest({ metal: 'COPPER', dryRun: true });

    expect(fetchPrices).not.toHaveBeenCalled();
    expect(backend.commodities.size).toBe(0);
  });

  it('should reject unsupported metals', async () => {
    await expect(service.ingest({ metal: 'zinc' })).rejects.toThrow('Unsupported LME metal: zinc');
    await expect(service.ingest({ metal: 'zinc' })).rejects.toBeInstanceOf(ValidationError);
  });

  it('should require a port for the metal', async () => {
    await expect(service.ingest({ metal: 'aluminium' })).rejects.toThrow(
      'No LME source registered for ALUMINUM'
    );
  });
});
