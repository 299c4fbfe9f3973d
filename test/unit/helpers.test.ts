import { describe, expect, it } from 'vitest';
import {
  formatCurrency,
  formatLargeNumber,
  formatPercent,
  round,
} from '../../src/utils/helpers.js';

describe('helpers', () => {
  describe('round', () => {
    it('rounds to two decimals by default', () => {
      expect(round(3.14159)).toBe(3.14);
    });

    it('respects the decimals argument', () => {
      expect(round(3.14159, 3)).toBe(3.142);
      expect(round(2.5, 0)).toBe(3);
    });
  });

  describe('formatCurrency', () => {
    it('formats yuan with grouping', () => {
      expect(formatCurrency(1234.5)).toBe('¥1,234.50');
    });

    it('formats negative amounts', () => {
      expect(formatCurrency(-20)).toBe('-¥20.00');
    });
  });

  describe('formatPercent', () => {
    it('appends a percent sign to percentage points', () => {
      expect(formatPercent(12.3)).toBe('12.30%');
      expect(formatPercent(-5)).toBe('-5.00%');
    });

    it('returns N/A for missing or non-finite values', () => {
      expect(formatPercent(null)).toBe('N/A');
      expect(formatPercent(Number.NaN)).toBe('N/A');
      expect(formatPercent(Number.POSITIVE_INFINITY)).toBe('N/A');
    });
  });

  describe('formatLargeNumber', () => {
    it('uses B, M and K suffixes', () => {
      expect(formatLargeNumber(3_250_000_000)).toBe('3.25B');
      expect(formatLargeNumber(1_500_000)).toBe('1.50M');
      expect(formatLargeNumber(2_000)).toBe('2.00K');
    });

    it('keeps the sign', () => {
      expect(formatLargeNumber(-1_200_000)).toBe('-1.20M');
    });

    it('leaves small numbers unsuffixed', () => {
      expect(formatLargeNumber(999)).toBe('999.00');
    });
  });
});
