/**
 * RateIngestionService - incremental, checkpoint-driven rate ingestion
 *
 * Walks the requested window one calendar month at a time. Each month is
 * fetched, validated and upserted as one batch, and the source checkpoint moves
 * to the newest date written, so a failure part-way through a long run only
 * loses the month in flight. Re-running the same window resumes after the
 * checkpoint instead of fetching covered days again.
 */

import {
  addDays,
  addPersistenceResults,
  assertDateRange,
  assertSourceCoversDate,
  ConfigurationError,
  createSystemClock,
  emptyPersistenceResult,
  isWithinRange,
  maxIsoDate,
  monthRanges,
  normalizeSourceTag,
  parseIsoDate,
  todayIsoDate,
} from '@fxledger/core';
import type {
  BackendStrategy,
  ClockPort,
  DateWindow,
  IsoDate,
  PersistenceResult,
  RateSourcePort,
  SourceTag,
} from '@fxledger/core';
import { LogHelpers } from '@fxledger/utils';
import type { Logger } from '@fxledger/utils';
import { logger as ingestionLogger } from './logger.js';
import { latestDate, validateRateObservations } from './observationValidation.js';

export interface RateIngestionParams {
  source: string;
  range: {
    start: IsoDate | Date;
    /** Defaults to today */
    end?: IsoDate | Date;
  };
  /** Report the chunks that would be fetched without fetching or writing */
  dryRun?: boolean;
}

export interface RateIngestionResult extends PersistenceResult {
  source: SourceTag;
  /** Month chunks fetched (or, on a dry run, that would be fetched) */
  chunks: number;
  /** Month chunks already covered by the checkpoint */
  skipped: number;
  /** Rows dropped by validation */
  rejected: number;
  checkpoint: IsoDate | null;
}

export interface RateIngestionServiceOptions {
  logger?: Logger;
  clock?: ClockPort;
}

export class RateIngestionService {
  private readonly ports = new Map<SourceTag, RateSourcePort>();
  private readonly logger: Logger;
  private readonly clock: ClockPort;

  constructor(
    private readonly backend: BackendStrategy,
    sources: readonly RateSourcePort[],
    options: RateIngestionServiceOptions = {}
  ) {
    for (const port of sources) {
      this.ports.set(port.source, port);
    }
    this.logger = options.logger ?? ingestionLogger;
    this.clock = options.clock ?? createSystemClock();
  }

  async ingest(params: RateIngestionParams): Promise<RateIngestionResult> {
    const source = normalizeSourceTag(params.source);
    const start = parseIsoDate(params.range.start);
    const end =
      params.range.end === undefined ? todayIsoDate(this.clock.nowMs()) : parseIsoDate(params.range.end);
    assertDateRange({ start, end });
    assertSourceCoversDate(source, start);

    const port = this.ports.get(source);
    if (!port) {
      throw new ConfigurationError(`No rate source registered for ${source}`, 'sources', { source });
    }

    const startedAt = this.clock.nowMs();
    let checkpoint = await this.backend.readCheckpoint(source);
    let totals = emptyPersistenceResult();
    let chunks = 0;
    let skipped = 0;
    let rejected = 0;

    this.logger.info('Starting rate ingestion', {
      source,
      start,
      end,
      checkpoint,
      dryRun: params.dryRun ?? false,
    });

    for (const month of monthRanges(start, end)) {
      const windowStart = checkpoint === null ? month.start : maxIsoDate(month.start, addDays(checkpoint, 1));
      if (windowStart > month.end) {
        skipped += 1;
        this.logger.debug('Chunk already ingested', { source, ...month, checkpoint });
        continue;
      }

      const window: DateWindow = { start: windowStart, end: month.end };
      chunks += 1;
      if (params.dryRun) {
        this.logger.info('Dry run: would ingest chunk', { source, ...window });
        continue;
      }

      const fetched = await port.fetchRates(window);
      const validated = validateRateObservations(fetched, this.logger);
      rejected += validated.rejected;
      const rows = validated.rows.filter((row) => row.source === source && isWithinRange(row.date, window));
      if (rows.length === 0) {
        this.logger.debug('No rows for chunk', { source, ...window, fetched: fetched.length });
        continue;
      }

      const result = await this.backend.insertRates(rows);
      totals = addPersistenceResults(totals, result);
      const latest = latestDate(rows);
      await this.backend.writeCheckpoint(source, latest);
      checkpoint = checkpoint === null ? latest : maxIsoDate(checkpoint, latest);
      this.logger.info('Ingested chunk', { source, ...window, rows: rows.length, ...result });
    }

    LogHelpers.performance(this.logger, 'rate-ingestion', this.clock.nowMs() - startedAt, true, {
      source,
      chunks,
      skipped,
      ...totals,
    });

    return { source, ...totals, chunks, skipped, rejected, checkpoint };
  }
}
