/**
 * FxLedger - public entry point
 * =============================
 * Binds one storage backend to the ingestion services and the snapshot
 * aggregator. Every query validates its arguments before touching storage;
 * the schema is prepared once, on the first call that needs the backend.
 */

import {
  assertDateRange,
  assertSourceCoversDate,
  ConfigurationError,
  createSystemClock,
  maxIsoDate,
  normalizeMetal,
  normalizeSourceTag,
  parseIsoDate,
  SOURCE_DESCRIPTORS,
  todayIsoDate,
} from '@fxledger/core';
import type {
  BackendStrategy,
  ClockPort,
  CommoditySnapshot,
  CommoditySourcePort,
  IsoDate,
  RateSourcePort,
  Snapshot,
  SourceTag,
} from '@fxledger/core';
import { SnapshotAggregator, parseFrequency } from '@fxledger/analytics';
import { CommodityIngestionService, RateIngestionService } from '@fxledger/ingestion';
import type { CommodityIngestionResult, RateIngestionResult } from '@fxledger/ingestion';
import { createBackend, parseConnectionUrl, probeConnection } from '@fxledger/storage';
import type { ConnectionProbeResult, DatabaseConnectionInfo, DriverRegistry } from '@fxledger/storage';
import { getFxLedgerConfig, handleError } from '@fxledger/utils';
import type { FxLedgerConfig, Logger } from '@fxledger/utils';
import { logger as workflowsLogger } from './logger.js';
import { migrateBackend } from './migrate/migrateBackend.js';
import type { MigrateBackendResult, MigrateBackendSpec } from './migrate/migrateBackend.js';

export interface FxLedgerOptions {
  /** Connection string; wins over FXLEDGER_DB_URL */
  url?: string;
  connection?: DatabaseConnectionInfo;
  /** Use this backend as is; url, connection and drivers are then ignored */
  backend?: BackendStrategy;
  /** Defaults to getFxLedgerConfig() */
  config?: FxLedgerConfig;
  drivers?: DriverRegistry;
  rateSources?: readonly RateSourcePort[];
  commoditySources?: readonly CommoditySourcePort[];
  /** Order of multi-source results; defaults to the configured priority */
  sourcePriority?: readonly SourceTag[];
  logger?: Logger;
  clock?: ClockPort;
}

export interface QueryRange {
  start: IsoDate | Date;
  /** Defaults to today */
  end?: IsoDate | Date;
}

export interface SeedOptions {
  dryRun?: boolean;
}

export interface SeedResult {
  inserted: number;
  updated: number;
  sources: RateIngestionResult[];
}

function resolveConnection(options: FxLedgerOptions, config: FxLedgerConfig): DatabaseConnectionInfo {
  if (options.connection) {
    return options.connection;
  }
  return parseConnectionUrl(options.url ?? config.databaseUrl ?? `sqlite:///${config.sqlitePath}`);
}

export class FxLedger {
  readonly backend: BackendStrategy;
  /** Absent when the caller supplied a ready-made backend */
  readonly connectionInfo?: DatabaseConnectionInfo;
  private readonly config: FxLedgerConfig;
  private readonly drivers?: DriverRegistry;
  private readonly logger: Logger;
  private readonly clock: ClockPort;
  private readonly aggregator: SnapshotAggregator;
  private readonly rateIngestion: RateIngestionService;
  private readonly commodityIngestion: CommodityIngestionService;
  private readonly rateSources: ReadonlySet<SourceTag>;
  private ready: Promise<void> | null = null;

  constructor(options: FxLedgerOptions = {}) {
    this.config = options.config ?? getFxLedgerConfig();
    this.logger = options.logger ?? workflowsLogger;
    this.clock = options.clock ?? createSystemClock();
    this.drivers = options.drivers;

    if (options.backend) {
      this.backend = options.backend;
    } else {
      const info = resolveConnection(options, this.config);
      this.connectionInfo = info;
      this.backend = createBackend(info, { drivers: options.drivers, logger: this.logger });
    }

    this.aggregator = new SnapshotAggregator(
      { sourcePriority: options.sourcePriority ?? this.config.sourcePriority },
      this.logger
    );
    const rateSources = options.rateSources ?? [];
    this.rateSources = new Set(rateSources.map((port) => port.source));
    this.rateIngestion = new RateIngestionService(this.backend, rateSources, {
      logger: this.logger,
      clock: this.clock,
    });
    this.commodityIngestion = new CommodityIngestionService(
      this.backend,
      options.commoditySources ?? [],
      this.logger
    );
  }

  get sourcePriority(): readonly SourceTag[] {
    return this.aggregator.sourcePriority;
  }

  /**
   * Prepare the schema. Called implicitly by every operation; a failure is
   * not cached, so the next call tries again.
   */
  async ensureReady(): Promise<void> {
    if (!this.ready) {
      this.ready = this.backend.ensureSchema().catch((error: unknown) => {
        this.ready = null;
        throw error;
      });
    }
    await this.ready;
  }

  /**
   * Ingest rates for `range`. Without a source every source with a registered
   * port is seeded, in priority order, each starting no earlier than the first
   * day its publisher covers.
   */
  async seed(range: QueryRange, source?: string, options: SeedOptions = {}): Promise<SeedResult> {
    const start = parseIsoDate(range.start);
    const end = range.end === undefined ? todayIsoDate(this.clock.nowMs()) : parseIsoDate(range.end);
    assertDateRange({ start, end });

    const runs: Array<{ source: SourceTag; start: IsoDate }> = [];
    if (source === undefined && this.rateSources.size === 0) {
      throw new ConfigurationError('No rate sources registered', 'rateSources');
    }
    if (source !== undefined) {
      const tag = normalizeSourceTag(source);
      assertSourceCoversDate(tag, start);
      runs.push({ source: tag, start });
    } else {
      for (const tag of this.sourcePriority) {
        if (!this.rateSources.has(tag)) {
          continue;
        }
        const minimum = SOURCE_DESCRIPTORS[tag].minimumDate;
        const from = minimum === undefined ? start : maxIsoDate(start, minimum);
        if (from <= end) {
          runs.push({ source: tag, start: from });
        }
      }
    }

    await this.ensureReady();
    const results: RateIngestionResult[] = [];
    for (const run of runs) {
      results.push(
        await this.rateIngestion.ingest({
          source: run.source,
          range: { start: run.start, end },
          dryRun: options.dryRun,
        })
      );
    }

    return {
      inserted: results.reduce((sum, result) => sum + result.inserted, 0),
      updated: results.reduce((sum, result) => sum + result.updated, 0),
      sources: results,
    };
  }

  async seedCommodity(
    metal: string,
    range: { start?: IsoDate | Date; end?: IsoDate | Date } = {},
    options: SeedOptions = {}
  ): Promise<CommodityIngestionResult> {
    const tag = normalizeMetal(metal);
    const window = {
      start: range.start === undefined ? undefined : parseIsoDate(range.start),
      end: range.end === undefined ? undefined : parseIsoDate(range.end),
    };
    assertDateRange(window);

    await this.ensureReady();
    return this.commodityIngestion.ingest({ metal: tag, range: window, dryRun: options.dryRun });
  }

  /**
   * Snapshot for one source: that date's quotes, or the latest date stored
   * when `date` is omitted. Null when there is nothing to report.
   */
  async rate(date: IsoDate | Date | undefined, source: string): Promise<Snapshot | null>;
  /**
   * One snapshot per source, in priority order
   */
  async rate(date?: IsoDate | Date): Promise<Snapshot[]>;
  async rate(date?: IsoDate | Date, source?: string): Promise<Snapshot | Snapshot[] | null> {
    const tag = source === undefined ? undefined : normalizeSourceTag(source);
    const day = date === undefined ? undefined : parseIsoDate(date);
    if (tag !== undefined && day !== undefined) {
      assertSourceCoversDate(tag, day);
    }

    await this.ensureReady();
    const snapshots =
      day === undefined
        ? this.aggregator.latestRateSnapshots(await this.backend.fetchRange({ source: tag }))
        : this.aggregator.buildRateSnapshots(
            await this.backend.fetchRange({ start: day, end: day, source: tag }),
            'daily'
          );

    if (tag === undefined) {
      return snapshots;
    }
    return snapshots.find((snapshot) => snapshot.source === tag) ?? null;
  }

  /**
   * Snapshots across an inclusive window, bucketed by `frequency`
   * (daily, weekly, monthly or yearly). Weekly and longer buckets keep the
   * last observed day of each bucket.
   */
  async history(range: QueryRange, frequency: string = 'daily', source?: string): Promise<Snapshot[]> {
    const start = parseIsoDate(range.start);
    const end = range.end === undefined ? todayIsoDate(this.clock.nowMs()) : parseIsoDate(range.end);
    assertDateRange({ start, end });
    const bucket = parseFrequency(frequency);
    const tag = source === undefined ? undefined : normalizeSourceTag(source);
    if (tag !== undefined) {
      assertSourceCoversDate(tag, start);
    }

    await this.ensureReady();
    const rows = await this.backend.fetchRange({ start, end, source: tag });
    return this.aggregator.buildRateSnapshots(rows, bucket);
  }

  /**
   * LME row for a date, or the latest stored row when `date` is omitted
   */
  async commodity(metal: string, date?: IsoDate | Date): Promise<CommoditySnapshot | null> {
    const tag = normalizeMetal(metal);
    const day = date === undefined ? undefined : parseIsoDate(date);

    await this.ensureReady();
    const range = day === undefined ? {} : { start: day, end: day };
    const rows = await this.backend.fetchCommodityRange(tag, range);
    const snapshots = this.aggregator.buildCommoditySnapshots(rows, 'daily');
    return snapshots[snapshots.length - 1] ?? null;
  }

  async commodityHistory(
    metal: string,
    range: QueryRange,
    frequency: string = 'daily'
  ): Promise<CommoditySnapshot[]> {
    const tag = normalizeMetal(metal);
    const start = parseIsoDate(range.start);
    const end = range.end === undefined ? todayIsoDate(this.clock.nowMs()) : parseIsoDate(range.end);
    assertDateRange({ start, end });
    const bucket = parseFrequency(frequency);

    await this.ensureReady();
    const rows = await this.backend.fetchCommodityRange(tag, { start, end });
    return this.aggregator.buildCommoditySnapshots(rows, bucket);
  }

  /**
   * Copy everything stored here into another backend (or the backend a URL
   * names). A target opened from a URL is closed afterwards.
   */
  async migrate(
    target: BackendStrategy | string,
    spec: MigrateBackendSpec = {}
  ): Promise<MigrateBackendResult> {
    const ownsTarget = typeof target === 'string';
    const backend =
      typeof target === 'string'
        ? createBackend(parseConnectionUrl(target), { drivers: this.drivers, logger: this.logger })
        : target;

    await this.ensureReady();
    try {
      return await migrateBackend(
        this.backend,
        backend,
        { batchSize: this.config.batchSize, ...spec },
        this.logger
      );
    } finally {
      if (ownsTarget) {
        await backend.close();
      }
    }
  }

  /**
   * Reachability check. Never throws.
   */
  async connection(): Promise<ConnectionProbeResult> {
    if (this.connectionInfo) {
      return probeConnection(this.connectionInfo, { drivers: this.drivers, logger: this.logger });
    }
    try {
      await this.ensureReady();
      await this.backend.listCheckpoints();
      return { success: true, message: 'Connection successful' };
    } catch (error) {
      const handled = handleError(error, { backend: this.backend.kind }, this.logger);
      return { success: false, message: `Connection failed: ${handled.message ?? 'unknown error'}` };
    }
  }

  async close(): Promise<void> {
    await this.backend.close();
  }
}
