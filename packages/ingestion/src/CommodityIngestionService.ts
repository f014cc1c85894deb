/**
 * CommodityIngestionService - LME price ingestion
 *
 * LME pages publish their whole table at once, so each run fetches everything,
 * keeps the requested window and upserts it in one batch. The `LME_<METAL>`
 * checkpoint records the newest date written.
 */

import {
  assertDateRange,
  commodityCheckpointTag,
  ConfigurationError,
  isWithinRange,
  normalizeMetal,
  parseIsoDate,
} from '@fxledger/core';
import type {
  BackendStrategy,
  CommoditySourcePort,
  DateRange,
  IsoDate,
  MetalTag,
  PersistenceResult,
} from '@fxledger/core';
import type { Logger } from '@fxledger/utils';
import { logger as ingestionLogger } from './logger.js';
import { latestDate, validateCommodityObservations } from './observationValidation.js';

export interface CommodityIngestionParams {
  metal: string;
  range?: {
    start?: IsoDate | Date;
    end?: IsoDate | Date;
  };
  dryRun?: boolean;
}

export interface CommodityIngestionResult extends PersistenceResult {
  metal: MetalTag;
  fetched: number;
  rejected: number;
  checkpoint: IsoDate | null;
}

export class CommodityIngestionService {
  private readonly ports = new Map<MetalTag, CommoditySourcePort>();

  constructor(
    private readonly backend: BackendStrategy,
    sources: readonly CommoditySourcePort[],
    private readonly logger: Logger = ingestionLogger
  ) {
    for (const port of sources) {
      this.ports.set(port.metal, port);
    }
  }

  async ingest(params: CommodityIngestionParams): Promise<CommodityIngestionResult> {
    const metal = normalizeMetal(params.metal);
    const range: DateRange = {
      start: params.range?.start === undefined ? undefined : parseIsoDate(params.range.start),
      end: params.range?.end === undefined ? undefined : parseIsoDate(params.range.end),
    };
    assertDateRange(range);

    const tag = commodityCheckpointTag(metal);
    if (params.dryRun) {
      this.logger.info('Dry run: skipping LME ingestion', { metal, ...range });
      const checkpoint = await this.backend.readCheckpoint(tag);
      return { metal, inserted: 0, updated: 0, fetched: 0, rejected: 0, checkpoint };
    }

    const port = this.ports.get(metal);
    if (!port) {
      throw new ConfigurationError(`No LME source registered for ${metal}`, 'sources', { metal });
    }

    const fetched = await port.fetchPrices();
    const validated = validateCommodityObservations(fetched, this.logger);
    const rows = validated.rows.filter((row) => row.metal === metal && isWithinRange(row.date, range));

    const result = await this.backend.insertCommodity(metal, rows);
    if (rows.length > 0) {
      await this.backend.writeCheckpoint(tag, latestDate(rows));
    }
    this.logger.info('Seeded LME rows', { metal, rows: rows.length, ...result });

    return {
      metal,
      ...result,
      fetched: fetched.length,
      rejected: validated.rejected,
      checkpoint: await this.backend.readCheckpoint(tag),
    };
  }
}
