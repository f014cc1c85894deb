/**
 * Backend Strategy Port
 *
 * Capability set every storage engine implements. Callers drive schema readiness,
 * idempotent batched upserts, inclusive range scans and the checkpoint store
 * through this interface only.
 */

import type {
  CommodityObservation,
  IngestionCheckpoint,
  PersistenceResult,
  RateObservation,
} from '../domain/observations.js';
import type { MetalTag } from '../domain/metals.js';
import type { SourceTag } from '../domain/sources.js';
import type { DateRange, IsoDate } from '../time/dates.js';

export interface RateRangeQuery extends DateRange {
  /** Omitted means the union of all sources */
  source?: SourceTag;
}

export interface BackendStrategy {
  /** Backend kind, for logging and diagnostics */
  readonly kind: string;

  /**
   * Create missing tables/collections/indexes and patch older layouts.
   * Idempotent. Throws SchemaError on failure; the backend then refuses writes.
   */
  ensureSchema(): Promise<void>;

  /**
   * Upsert keyed by (date, currencyCode, source). All-or-nothing per call.
   * Does not touch checkpoints.
   */
  insertRates(rows: readonly RateObservation[]): Promise<PersistenceResult>;

  /** Inclusive on both bounds, ordered by date ascending */
  fetchRange(query?: RateRangeQuery): Promise<RateObservation[]>;

  insertCommodity(metal: MetalTag, rows: readonly CommodityObservation[]): Promise<PersistenceResult>;

  fetchCommodityRange(metal: MetalTag, range?: DateRange): Promise<CommodityObservation[]>;

  readCheckpoint(source: string): Promise<IsoDate | null>;

  /** Advances only; an older or equal date leaves the stored value untouched */
  writeCheckpoint(source: string, date: IsoDate): Promise<void>;

  listCheckpoints(): Promise<IngestionCheckpoint[]>;

  close(): Promise<void>;
}
