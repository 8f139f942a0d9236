/**
 * Unit tests for math helper utilities
 */

import { describe, it, expect } from 'vitest';
import { roundTo, safeDivide } from '../../../src/utils/math-helpers.js';

describe('Math Helpers', () => {
  describe('safeDivide', () => {
    it('should return 0 for division by zero', () => {
      expect(safeDivide(10, 0)).toBe(0);
      expect(safeDivide(0, 0)).toBe(0);
    });

    it('should return custom default for division by zero', () => {
      expect(safeDivide(10, 0, 100)).toBe(100);
    });

    it('should calculate correct division for valid inputs', () => {
      expect(safeDivide(10, 2)).toBe(5);
      expect(safeDivide(7, 2)).toBe(3.5);
      expect(safeDivide(10, 2.5)).toBe(4);
    });

    it('should return the default for non-finite quotients', () => {
      expect(safeDivide(Number.NaN, 2)).toBe(0);
      expect(safeDivide(1, Number.NaN, -1)).toBe(-1);
      expect(safeDivide(Number.POSITIVE_INFINITY, 2)).toBe(0);
    });

    it('should compute throughput for a benchmark run', () => {
      // 41 tokens over 7.59 seconds
      expect(roundTo(safeDivide(41, 7.59))).toBe(5.4);
    });
  });

  describe('roundTo', () => {
    it('should round to two decimals by default', () => {
      expect(roundTo(5.40184)).toBe(5.4);
      expect(roundTo(1138.4999999999998)).toBe(1138.5);
      expect(roundTo(2.345)).toBe(2.35);
    });

    it('should honour the decimals argument', () => {
      expect(roundTo(31.0634, 1)).toBe(31.1);
      expect(roundTo(1138.5, 0)).toBe(1139);
    });

    it('should map non-finite values to 0', () => {
      expect(roundTo(Number.NaN)).toBe(0);
      expect(roundTo(Number.NEGATIVE_INFINITY)).toBe(0);
    });
  });
});
