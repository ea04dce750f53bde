/**
 * Unit tests for math helper utilities
 */

import { describe, it, expect } from 'vitest';
import { l2NormalizeInPlace, safeAverage, safeDivide } from '../../../src/utils/math-helpers.js';

describe('Math Helpers', () => {
  describe('safeAverage', () => {
    it('should return 0 for empty array', () => {
      expect(safeAverage([])).toBe(0);
    });

    it('should return custom default for empty array', () => {
      expect(safeAverage([], 100)).toBe(100);
    });

    it('should calculate correct average for array with values', () => {
      expect(safeAverage([1, 2, 3])).toBe(2);
      expect(safeAverage([-10, 10])).toBe(0);
    });
  });

  describe('safeDivide', () => {
    it('should divide normally', () => {
      expect(safeDivide(10, 4)).toBe(2.5);
    });

    it('should return the default on a zero denominator', () => {
      expect(safeDivide(5, 0)).toBe(0);
      expect(safeDivide(5, 0, -1)).toBe(-1);
    });
  });

  describe('l2NormalizeInPlace', () => {
    it('should scale to unit length in place', () => {
      const vector = [3, 4];
      const result = l2NormalizeInPlace(vector);

      expect(result).toBe(vector);
      expect(vector).toEqual([0.6, 0.8]);
    });

    it('should leave a zero vector untouched', () => {
      expect(l2NormalizeInPlace([0, 0, 0])).toEqual([0, 0, 0]);
    });
  });
});
