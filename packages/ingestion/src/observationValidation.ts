/**
 * Observation validation
 *
 * Source collaborators hand over loosely-typed rows; anything that does not
 * match the observation schema is dropped and logged rather than written.
 */

import { CommodityObservationSchema, RateObservationSchema } from '@fxledger/core';
import type { CommodityObservation, RateObservation } from '@fxledger/core';
import type { Logger } from '@fxledger/utils';
import type { z } from 'zod';

export interface ValidatedRows<T> {
  rows: T[];
  rejected: number;
}

function validate<S extends z.ZodTypeAny>(
  schema: S,
  items: readonly unknown[],
  log: Logger,
  kind: string
): ValidatedRows<z.output<S>> {
  const rows: Array<z.output<S>> = [];
  let rejected = 0;
  for (const item of items) {
    const parsed = schema.safeParse(item);
    if (parsed.success) {
      rows.push(parsed.data);
    } else {
      rejected += 1;
      log.warn(`Dropping invalid ${kind} observation`, {
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }
  }
  return { rows, rejected };
}

export function validateRateObservations(items: readonly unknown[], log: Logger): ValidatedRows<RateObservation> {
  return validate(RateObservationSchema, items, log, 'rate');
}

export function validateCommodityObservations(
  items: readonly unknown[],
  log: Logger
): ValidatedRows<CommodityObservation> {
  return validate(CommodityObservationSchema, items, log, 'commodity');
}

/** Latest date among rows; rows must be non-empty */
export function latestDate(rows: ReadonlyArray<{ date: string }>): string {
  return rows.reduce((latest, row) => (row.date > latest ? row.date : latest), rows[0]?.date ?? '');
}
