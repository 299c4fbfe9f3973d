import { mean, sampleStd } from '../analysis/rolling.js';
import type { BacktestPosition, EquityPoint } from './types.js';

const TRADING_DAYS_PER_YEAR = 252;

/**
 * Daily return, cumulative return and drawdown for each position snapshot,
 * all in percent.
 */
export function buildEquityCurve(positions: readonly BacktestPosition[]): EquityPoint[] {
  if (positions.length === 0) return [];

  const first = positions[0].totalValue;
  let peak = first;

  return positions.map((p, i) => {
    const prev = i > 0 ? positions[i - 1].totalValue : null;
    if (p.totalValue > peak) peak = p.totalValue;

    return {
      date: p.date,
      totalValue: p.totalValue,
      dailyReturn: prev === null || prev === 0 ? null : (p.totalValue / prev - 1) * 100,
      cumulativeReturn: first === 0 ? 0 : (p.totalValue / first - 1) * 100,
      drawdown: peak === 0 ? 0 : (p.totalValue / peak - 1) * 100,
    };
  });
}

export function dailyReturns(curve: readonly EquityPoint[]): number[] {
  const returns: number[] = [];
  for (const point of curve) {
    if (point.dailyReturn !== null) returns.push(point.dailyReturn);
  }
  return returns;
}

/** Most negative drawdown in percent; 0 for an empty or ever-rising curve. */
export function calculateMaxDrawdown(curve: readonly EquityPoint[]): number {
  let worst = 0;
  for (const point of curve) {
    if (point.drawdown < worst) worst = point.drawdown;
  }
  return worst;
}

/**
 * Annualised Sharpe ratio from daily returns in percent. Zero when fewer than
 * two returns exist or their excess returns do not vary.
 */
export function calculateSharpe(returnsPct: readonly number[], riskFreeAnnual = 0.03): number {
  const riskFreeDaily = riskFreeAnnual / TRADING_DAYS_PER_YEAR;
  const excess = returnsPct.map((r) => r / 100 - riskFreeDaily);
  const std = sampleStd(excess);
  if (!Number.isFinite(std) || std <= 0) return 0;
  return (Math.sqrt(TRADING_DAYS_PER_YEAR) * mean(excess)) / std;
}

export function summarizeReturns(returnsPct: readonly number[]): {
  avgDailyReturn: number | null;
  volatility: number | null;
} {
  const avg = mean(returnsPct);
  const std = sampleStd(returnsPct);
  return {
    avgDailyReturn: Number.isFinite(avg) ? avg : null,
    volatility: Number.isFinite(std) ? std : null,
  };
}
