import { describe, expect, it } from 'vitest';
import {
  buildEquityCurve,
  calculateMaxDrawdown,
  calculateSharpe,
  dailyReturns,
  summarizeReturns,
} from '../../src/backtest/metrics.js';
import type { BacktestPosition } from '../../src/backtest/types.js';
import { isoDay } from '../helpers/fixtures.js';

function positions(values: number[]): BacktestPosition[] {
  return values.map((totalValue, i) => ({
    date: isoDay(i),
    shares: 0,
    capital: totalValue,
    closePrice: 10,
    positionValue: 0,
    totalValue,
  }));
}

describe('performance metrics', () => {
  describe('buildEquityCurve', () => {
    const curve = buildEquityCurve(positions([100, 110, 99, 121]));

    it('returns an empty curve for no positions', () => {
      expect(buildEquityCurve([])).toEqual([]);
    });

    it('computes daily returns in percent', () => {
      expect(curve[0].dailyReturn).toBeNull();
      expect(curve[1].dailyReturn).toBeCloseTo(10, 10);
      expect(curve[2].dailyReturn).toBeCloseTo(-10, 10);
    });

    it('computes cumulative returns from the first day', () => {
      expect(curve[0].cumulativeReturn).toBe(0);
      expect(curve[2].cumulativeReturn).toBeCloseTo(-1, 10);
      expect(curve[3].cumulativeReturn).toBeCloseTo(21, 10);
    });

    it('computes drawdown from the running peak', () => {
      expect(curve[1].drawdown).toBe(0);
      expect(curve[2].drawdown).toBeCloseTo(-10, 10);
      expect(curve[3].drawdown).toBe(0);
    });
  });

  describe('calculateMaxDrawdown', () => {
    it('returns the deepest drawdown', () => {
      const curve = buildEquityCurve(positions([100, 120, 90, 110, 60, 130]));
      expect(calculateMaxDrawdown(curve)).toBeCloseTo(-50, 10);
    });

    it('returns zero for a rising curve', () => {
      expect(calculateMaxDrawdown(buildEquityCurve(positions([1, 2, 3])))).toBe(0);
    });
  });

  describe('dailyReturns', () => {
    it('skips the first day', () => {
      expect(dailyReturns(buildEquityCurve(positions([100, 100, 100])))).toEqual([0, 0]);
    });
  });

  describe('calculateSharpe', () => {
    it('annualises the mean excess return over its sample std', () => {
      const rfDaily = 0.03 / 252;
      const excess = [0.01 - rfDaily, -0.01 - rfDaily, 0.02 - rfDaily];
      const avg = (excess[0] + excess[1] + excess[2]) / 3;
      const std = Math.sqrt(excess.reduce((acc, e) => acc + (e - avg) ** 2, 0) / 2);

      expect(calculateSharpe([1, -1, 2])).toBeCloseTo((Math.sqrt(252) * avg) / std, 8);
    });

    it('returns zero for constant returns', () => {
      expect(calculateSharpe([0.5, 0.5, 0.5])).toBe(0);
    });

    it('returns zero for fewer than two returns', () => {
      expect(calculateSharpe([])).toBe(0);
      expect(calculateSharpe([1])).toBe(0);
    });

    it('honours the risk-free rate', () => {
      expect(calculateSharpe([1, -1, 2], 0)).toBeGreaterThan(calculateSharpe([1, -1, 2], 0.5));
    });
  });

  describe('summarizeReturns', () => {
    it('reports mean and sample std in percent', () => {
      const summary = summarizeReturns([1, 3]);
      expect(summary.avgDailyReturn).toBe(2);
      expect(summary.volatility).toBeCloseTo(Math.SQRT2, 12);
    });

    it('reports null without returns', () => {
      expect(summarizeReturns([])).toEqual({ avgDailyReturn: null, volatility: null });
    });
  });
});
