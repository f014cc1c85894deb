import type { IsoDate } from '../time/dates.js';
import type { MetalTag } from './metals.js';
import type { SourceTag } from './sources.js';

/**
 * Card-rate buy/sell prices published by tiered sources
 */
export interface TieredPrices {
  ttBuy?: number | null;
  ttSell?: number | null;
  billBuy?: number | null;
  billSell?: number | null;
  travelCardBuy?: number | null;
  travelCardSell?: number | null;
  cnBuy?: number | null;
  cnSell?: number | null;
}

export const TIERED_PRICE_FIELDS = [
  'ttBuy',
  'ttSell',
  'billBuy',
  'billSell',
  'travelCardBuy',
  'travelCardSell',
  'cnBuy',
  'cnSell',
] as const satisfies ReadonlyArray<keyof TieredPrices>;

export type TieredPriceField = (typeof TIERED_PRICE_FIELDS)[number];

/**
 * One currency quote for one day from one source.
 *
 * Identity: (date, currencyCode, source). A later write with the same identity
 * replaces the stored values.
 */
export interface RateObservation extends TieredPrices {
  date: IsoDate;
  /** ISO-4217 code, upper case */
  currencyCode: string;
  source: SourceTag;
  rate: number;
}

/**
 * One LME settlement row. Identity: (date, metal).
 */
export interface CommodityObservation {
  date: IsoDate;
  metal: MetalTag;
  spotPrice?: number | null;
  forward3mPrice?: number | null;
  stockQuantity?: number | null;
}

export interface PersistenceResult {
  inserted: number;
  updated: number;
}

export function emptyPersistenceResult(): PersistenceResult {
  return { inserted: 0, updated: 0 };
}

export function addPersistenceResults(a: PersistenceResult, b: PersistenceResult): PersistenceResult {
  return { inserted: a.inserted + b.inserted, updated: a.updated + b.updated };
}

export interface IngestionCheckpoint {
  source: string;
  lastIngestedDate: IsoDate;
}

/** Tiered payload: the reference rate plus whichever card prices were published */
export interface TieredQuote extends TieredPrices {
  rate: number;
}

export type RatePayload = number | TieredQuote;

/**
 * One date's worth of quotes from one source, keyed by currency code
 */
export interface Snapshot {
  date: IsoDate;
  baseCurrency: 'INR';
  source: SourceTag;
  rates: Record<string, RatePayload>;
}

export interface CommodityQuote {
  spotPrice: number | null;
  forward3mPrice: number | null;
  stockQuantity: number | null;
}

export interface CommoditySnapshot extends CommodityQuote {
  date: IsoDate;
  metal: MetalTag;
}
