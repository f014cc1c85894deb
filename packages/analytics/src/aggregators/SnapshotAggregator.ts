/**
 * Snapshot Aggregator
 * ===================
 * Turns range-filtered observations into date snapshots. Each source is bucketed
 * on its own; results are concatenated in source-priority order, dates ascending
 * within a source.
 */

import { METAL_TAGS, SOURCE_DESCRIPTORS, TIERED_PRICE_FIELDS } from '@fxledger/core';
import type {
  CommodityObservation,
  CommoditySnapshot,
  IsoDate,
  RateObservation,
  RatePayload,
  Snapshot,
  SourceTag,
  TieredQuote,
} from '@fxledger/core';
import { DEFAULT_SOURCE_PRIORITY, resolveSourcePriority } from '@fxledger/utils';
import type { Logger } from '@fxledger/utils';
import { logger as analyticsLogger } from '../logger.js';
import type { Frequency, SnapshotAggregatorOptions } from '../types.js';
import { groupByDate, selectBucketDates } from '../utils/bucketing.js';

function tieredQuote(row: RateObservation): TieredQuote {
  const quote: TieredQuote = { rate: row.rate };
  for (const field of TIERED_PRICE_FIELDS) {
    quote[field] = row[field] ?? null;
  }
  return quote;
}

function toSnapshot(date: IsoDate, source: SourceTag, rows: readonly RateObservation[]): Snapshot {
  const tiered = SOURCE_DESCRIPTORS[source].payload === 'tiered';
  const byCurrency = new Map<string, RatePayload>();
  for (const row of rows) {
    byCurrency.set(row.currencyCode, tiered ? tieredQuote(row) : row.rate);
  }

  const rates: Record<string, RatePayload> = {};
  for (const currency of [...byCurrency.keys()].sort()) {
    const payload = byCurrency.get(currency);
    if (payload !== undefined) {
      rates[currency] = payload;
    }
  }
  return { date, baseCurrency: 'INR', source, rates };
}

function toCommoditySnapshot(row: CommodityObservation): CommoditySnapshot {
  return {
    date: row.date,
    metal: row.metal,
    spotPrice: row.spotPrice ?? null,
    forward3mPrice: row.forward3mPrice ?? null,
    stockQuantity: row.stockQuantity ?? null,
  };
}

export class SnapshotAggregator {
  readonly sourcePriority: readonly SourceTag[];

  constructor(
    options: SnapshotAggregatorOptions = {},
    private readonly logger: Logger = analyticsLogger
  ) {
    this.sourcePriority = resolveSourcePriority(options.sourcePriority ?? DEFAULT_SOURCE_PRIORITY);
  }

  /**
   * One snapshot per retained date per source. Empty input gives an empty list.
   */
  buildRateSnapshots(observations: readonly RateObservation[], frequency: Frequency): Snapshot[] {
    const snapshots: Snapshot[] = [];
    for (const source of this.sourcePriority) {
      const byDate = groupByDate(observations.filter((row) => row.source === source));
      for (const date of selectBucketDates(byDate.keys(), frequency)) {
        snapshots.push(toSnapshot(date, source, byDate.get(date) ?? []));
      }
    }
    this.logger.debug('Built rate snapshots', {
      frequency,
      observations: observations.length,
      snapshots: snapshots.length,
    });
    return snapshots;
  }

  /**
   * The most recent snapshot of each source present in `observations`
   */
  latestRateSnapshots(observations: readonly RateObservation[]): Snapshot[] {
    const latest: Snapshot[] = [];
    for (const source of this.sourcePriority) {
      const byDate = groupByDate(observations.filter((row) => row.source === source));
      const dates = selectBucketDates(byDate.keys(), 'daily');
      const date = dates[dates.length - 1];
      if (date !== undefined) {
        latest.push(toSnapshot(date, source, byDate.get(date) ?? []));
      }
    }
    return latest;
  }

  /**
   * Commodity counterpart of buildRateSnapshots; metals are emitted in a fixed
   * order, dates ascending within a metal.
   */
  buildCommoditySnapshots(
    observations: readonly CommodityObservation[],
    frequency: Frequency
  ): CommoditySnapshot[] {
    const snapshots: CommoditySnapshot[] = [];
    for (const metal of METAL_TAGS) {
      const byDate = groupByDate(observations.filter((row) => row.metal === metal));
      for (const date of selectBucketDates(byDate.keys(), frequency)) {
        const rows = byDate.get(date) ?? [];
        const last = rows[rows.length - 1];
        if (last) {
          snapshots.push(toCommoditySnapshot(last));
        }
      }
    }
    return snapshots;
  }
}
