/**
 * Tests for collections.ts
 */

import { describe, it, expect } from 'vitest';
import { chunk } from '../../src/collections.js';

describe('chunk', () => {
  it('should split items into fixed-size batches with a short tail', () => {
    expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
    expect(chunk(['a', 'b'], 5)).toEqual([['a', 'b']]);
  });

  it('should return no batches for no items', () => {
    expect(chunk([], 3)).toEqual([]);
  });

  it('should reject a non-positive size', () => {
    expect(() => chunk([1], 0)).toThrow('chunk size must be a positive integer, got 0');
  });
});
