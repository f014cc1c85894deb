/**
 * Zod schemas for observations handed to the core by source collaborators
 */

import { z } from 'zod';
import { isIsoDate } from '../time/dates.js';
import { METAL_TAGS } from '../domain/metals.js';
import { SOURCE_TAGS } from '../domain/sources.js';

const isoDateSchema = z.string().refine(isIsoDate, { message: 'Expected YYYY-MM-DD calendar date' });

const optionalPrice = z.number().finite().nullable().optional();

export const RateObservationSchema = z.object({
  date: isoDateSchema,
  currencyCode: z
    .string()
    .regex(/^[A-Za-z]{3}$/, 'Expected 3-letter currency code')
    .transform((code) => code.toUpperCase()),
  source: z.enum(SOURCE_TAGS),
  rate: z.number().finite(),
  ttBuy: optionalPrice,
  ttSell: optionalPrice,
  billBuy: optionalPrice,
  billSell: optionalPrice,
  travelCardBuy: optionalPrice,
  travelCardSell: optionalPrice,
  cnBuy: optionalPrice,
  cnSell: optionalPrice,
});

export const CommodityObservationSchema = z.object({
  date: isoDateSchema,
  metal: z.enum(METAL_TAGS),
  spotPrice: optionalPrice,
  forward3mPrice: optionalPrice,
  stockQuantity: optionalPrice,
});

