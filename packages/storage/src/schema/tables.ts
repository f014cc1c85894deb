/**
 * Persisted schema
 * ================
 * Logical table layout shared by every relational dialect. Dialects turn these
 * definitions into DDL; backends map observations onto the data columns.
 */

import type { MetalTag, SourceTag, TieredPriceField } from '@fxledger/core';

export type ColumnKind = 'date' | 'currency' | 'decimal' | 'source' | 'timestamp';

export interface ColumnDefinition {
  name: string;
  kind: ColumnKind;
  nullable: boolean;
  /** SQL literal used as DEFAULT */
  defaultValue?: string;
}

export interface TableDefinition {
  name: string;
  columns: readonly ColumnDefinition[];
  primaryKey: readonly string[];
  /** Columns written by insert/upsert, in statement order */
  dataColumns: readonly string[];
  /** Columns left behind by retired storage formats; dropped on schema patch */
  retiredColumns: readonly string[];
}

const createdAt: ColumnDefinition = {
  name: 'created_at',
  kind: 'timestamp',
  nullable: true,
  defaultValue: 'CURRENT_TIMESTAMP',
};

const rateColumns: readonly ColumnDefinition[] = [
  { name: 'rate_date', kind: 'date', nullable: false },
  { name: 'currency_code', kind: 'currency', nullable: false },
  { name: 'rate', kind: 'decimal', nullable: false },
  { name: 'base_currency', kind: 'currency', nullable: false, defaultValue: "'INR'" },
  createdAt,
];

/** SBI card-rate columns, keyed by observation field */
export const TIERED_COLUMNS: Readonly<Record<TieredPriceField, string>> = {
  ttBuy: 'tt_buy',
  ttSell: 'tt_sell',
  billBuy: 'bill_buy',
  billSell: 'bill_sell',
  travelCardBuy: 'travel_card_buy',
  travelCardSell: 'travel_card_sell',
  cnBuy: 'cn_buy',
  cnSell: 'cn_sell',
};

const tieredColumnNames = Object.values(TIERED_COLUMNS);

function rateTable(name: string, tiered: boolean): TableDefinition {
  const extra: ColumnDefinition[] = tiered
    ? tieredColumnNames.map((column): ColumnDefinition => ({ name: column, kind: 'decimal', nullable: true }))
    : [];
  return {
    name,
    columns: [...rateColumns, ...extra],
    primaryKey: ['rate_date', 'currency_code'],
    dataColumns: ['rate_date', 'currency_code', 'rate', ...(tiered ? tieredColumnNames : [])],
    retiredColumns: [],
  };
}

function commodityTable(name: string): TableDefinition {
  return {
    name,
    columns: [
      { name: 'rate_date', kind: 'date', nullable: false },
      { name: 'price', kind: 'decimal', nullable: true },
      { name: 'price_3_month', kind: 'decimal', nullable: true },
      { name: 'stock', kind: 'decimal', nullable: true },
      createdAt,
    ],
    primaryKey: ['rate_date'],
    dataColumns: ['rate_date', 'price', 'price_3_month', 'stock'],
    retiredColumns: ['usd_price', 'eur_price', 'usd_change', 'eur_change'],
  };
}

export const RATE_TABLES: Readonly<Record<SourceTag, TableDefinition>> = {
  RBI: rateTable('forex_rates_rbi', false),
  SBI: rateTable('forex_rates_sbi', true),
};

export const COMMODITY_TABLES: Readonly<Record<MetalTag, TableDefinition>> = {
  COPPER: commodityTable('lme_copper_rates'),
  ALUMINUM: commodityTable('lme_aluminum_rates'),
};

export const CHECKPOINT_TABLE: TableDefinition = {
  name: 'ingestion_metadata',
  columns: [
    { name: 'source', kind: 'source', nullable: false },
    { name: 'last_ingested_date', kind: 'date', nullable: false },
    { name: 'updated_at', kind: 'timestamp', nullable: true, defaultValue: 'CURRENT_TIMESTAMP' },
  ],
  primaryKey: ['source'],
  dataColumns: ['source', 'last_ingested_date'],
  retiredColumns: [],
};

export const ALL_TABLES: readonly TableDefinition[] = [
  RATE_TABLES.RBI,
  RATE_TABLES.SBI,
  COMMODITY_TABLES.COPPER,
  COMMODITY_TABLES.ALUMINUM,
  CHECKPOINT_TABLE,
];
