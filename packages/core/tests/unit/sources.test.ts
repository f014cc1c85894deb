/**
 * Tests for source and metal tags
 */

import { describe, it, expect } from 'vitest';
import {
  assertSourceCoversDate,
  normalizeSourceTag,
  SOURCE_DESCRIPTORS,
} from '../../src/domain/sources.js';
import { commodityCheckpointTag, normalizeMetal } from '../../src/domain/metals.js';
import { ValidationError } from '../../src/errors.js';

describe('normalizeSourceTag', () => {
  it('should upper-case known tags', () => {
    expect(normalizeSourceTag('rbi')).toBe('RBI');
    expect(normalizeSourceTag(' Sbi ')).toBe('SBI');
  });

  it('should reject unknown tags with kind UNSUPPORTED_SOURCE', () => {
    expect(() => normalizeSourceTag('ECB')).toThrow('Unsupported source: ECB');
    expect(() => normalizeSourceTag('ECB')).toThrow(ValidationError);
  });
});

describe('source descriptors', () => {
  it('should mark SBI as tiered and RBI as plain', () => {
    expect(SOURCE_DESCRIPTORS.SBI.payload).toBe('tiered');
    expect(SOURCE_DESCRIPTORS.RBI.payload).toBe('plain');
  });

  it('should reject RBI dates before the publisher minimum', () => {
    expect(() => assertSourceCoversDate('RBI', '2022-04-11')).toThrow(
      'RBI does not provide data before 12/04/2022'
    );
    expect(() => assertSourceCoversDate('RBI', '2022-04-12')).not.toThrow();
    expect(() => assertSourceCoversDate('SBI', '2001-01-01')).not.toThrow();
  });
});

describe('normalizeMetal', () => {
  it('should map aliases onto canonical metals', () => {
    expect(normalizeMetal('cu')).toBe('COPPER');
    expect(normalizeMetal('Copper')).toBe('COPPER');
    expect(normalizeMetal('AL')).toBe('ALUMINUM');
    expect(normalizeMetal('aluminium')).toBe('ALUMINUM');
  });

  it('should reject unknown metals', () => {
    expect(() => normalizeMetal('zinc')).toThrow('Unsupported LME metal: zinc');
  });

  it('should derive checkpoint tags', () => {
    expect(commodityCheckpointTag('ALUMINUM')).toBe('LME_ALUMINUM');
  });
});
