/**
 * LME base metals tracked alongside currency rates
 */

import { ValidationError } from '../errors.js';

export const METAL_TAGS = ['COPPER', 'ALUMINUM'] as const;

export type MetalTag = (typeof METAL_TAGS)[number];

const METAL_ALIASES: Readonly<Record<string, MetalTag>> = {
  CU: 'COPPER',
  COPPER: 'COPPER',
  AL: 'ALUMINUM',
  ALUMINUM: 'ALUMINUM',
  ALUMINIUM: 'ALUMINUM',
};

export function normalizeMetal(value: string): MetalTag {
  const metal = METAL_ALIASES[value.trim().toUpperCase()];
  if (metal === undefined) {
    throw new ValidationError('UNSUPPORTED_METAL', `Unsupported LME metal: ${value}`, {
      metal: value,
    });
  }
  return metal;
}

/** Checkpoint key for a metal, e.g. `LME_COPPER` */
export function commodityCheckpointTag(metal: MetalTag): string {
  return `LME_${metal}`;
}
