import { DatabaseError, TIERED_PRICE_FIELDS } from '@fxledger/core';
import type { CommodityObservation, MetalTag, RateObservation, SourceTag } from '@fxledger/core';
import { TIERED_COLUMNS } from '../schema/tables.js';
import type { SqlRow, SqlValue } from '../sql/sql-driver.js';

/** NUMERIC/DECIMAL columns come back as strings from pg and mysql2 */
export function toNullableNumber(value: unknown): number | null {
  if (value === null || value === undefined) {
    return null;
  }
  const parsed = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

export function requireNumber(row: SqlRow, column: string): number {
  const parsed = toNullableNumber(row[column]);
  if (parsed === null) {
    throw new DatabaseError(`Column ${column} is not numeric`, 'read', { value: row[column] });
  }
  return parsed;
}

export function requireText(row: SqlRow, column: string): string {
  const value = row[column];
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number') {
    return String(value);
  }
  throw new DatabaseError(`Column ${column} is not text`, 'read', { value });
}

export function rateRowValues(row: RateObservation, tiered: boolean): SqlValue[] {
  const values: SqlValue[] = [row.date, row.currencyCode, row.rate];
  if (tiered) {
    for (const field of TIERED_PRICE_FIELDS) {
      values.push(row[field] ?? null);
    }
  }
  return values;
}

export function rateFromRow(row: SqlRow, source: SourceTag, tiered: boolean): RateObservation {
  const observation: RateObservation = {
    date: requireText(row, 'rate_date'),
    currencyCode: requireText(row, 'currency_code'),
    source,
    rate: requireNumber(row, 'rate'),
  };
  if (tiered) {
    for (const field of TIERED_PRICE_FIELDS) {
      observation[field] = toNullableNumber(row[TIERED_COLUMNS[field]]);
    }
  }
  return observation;
}

export function commodityRowValues(row: CommodityObservation): SqlValue[] {
  return [row.date, row.spotPrice ?? null, row.forward3mPrice ?? null, row.stockQuantity ?? null];
}

export function commodityFromRow(row: SqlRow, metal: MetalTag): CommodityObservation {
  return {
    date: requireText(row, 'rate_date'),
    metal,
    spotPrice: toNullableNumber(row.price),
    forward3mPrice: toNullableNumber(row.price_3_month),
    stockQuantity: toNullableNumber(row.stock),
  };
}

/** Keep the last item per key, in order of each key's last appearance */
export function lastWriteWins<T>(items: readonly T[], keyOf: (item: T) => string): T[] {
  const byKey = new Map<string, T>();
  for (const item of items) {
    const key = keyOf(item);
    byKey.delete(key);
    byKey.set(key, item);
  }
  return [...byKey.values()];
}
