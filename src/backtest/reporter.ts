import { formatCurrency, formatPercent, round } from '../utils/helpers.js';
import type { BacktestResult, OptimizationResult } from './types.js';

/**
 * Generate a text summary suitable for console output.
 */
export function generateSummary(result: BacktestResult): string {
  const { stats, params, positions } = result;
  const lines: string[] = [];

  lines.push('=== Backtest Results ===');
  if (positions.length > 0) {
    lines.push(`Period: ${positions[0].date} to ${positions[positions.length - 1].date}`);
  }
  lines.push(
    `Channel: +${formatPercent(params.upperPct * 100)} / -${formatPercent(params.lowerPct * 100)}`,
  );
  lines.push(`Initial Capital: ${formatCurrency(result.initialCapital)}`);
  lines.push('');

  lines.push('--- Performance ---');
  lines.push(`Final Value: ${formatCurrency(result.finalValue)}`);
  lines.push(`Return: ${formatPercent(stats.totalReturn)}`);
  lines.push(`Final State: ${result.finalState}`);
  lines.push('');

  lines.push('--- Trade Statistics ---');
  lines.push(`Total Trades: ${stats.totalTrades}`);
  lines.push(`Win Rate: ${formatPercent(stats.winRate * 100)}`);
  lines.push(`Wins: ${stats.winTrades} | Losses: ${stats.lossTrades}`);
  lines.push('');

  lines.push('--- Risk Metrics ---');
  lines.push(`Max Drawdown: ${formatPercent(stats.maxDrawdown)}`);
  lines.push(`Sharpe Ratio: ${round(stats.sharpeRatio, 2)}`);
  lines.push(`Avg Daily Return: ${formatPercent(stats.avgDailyReturn)}`);
  lines.push(`Volatility: ${formatPercent(stats.volatility)}`);

  return lines.join('\n');
}

/**
 * Rank grid points by return, best first.
 */
export function generateOptimizationSummary(result: OptimizationResult, top = 5): string {
  if (result.allResults.length === 0) return 'No grid points evaluated.';

  const lines: string[] = ['=== Channel Optimization ===', ''];
  lines.push(
    `Best: upper ${formatPercent(result.bestParams.upperPct * 100)}, ` +
      `lower ${formatPercent(result.bestParams.lowerPct * 100)} → ${formatPercent(result.bestReturn)}`,
  );
  lines.push('');

  // Stable sort keeps grid order among equal returns
  const ranked = [...result.allResults].sort((a, b) => b.totalReturn - a.totalReturn).slice(0, top);
  ranked.forEach((r, i) => {
    lines.push(
      `${i + 1}. upper ${formatPercent(r.upperPct * 100)}, lower ${formatPercent(r.lowerPct * 100)}: ` +
        `${formatPercent(r.totalReturn)} over ${r.totalTrades} trades, WR ${formatPercent(r.winRate * 100)}`,
    );
  });

  return lines.join('\n');
}

/**
 * Format the equity curve for charting.
 */
export function formatEquityCurve(result: BacktestResult): {
  dates: string[];
  values: number[];
  initialCapital: number;
} {
  return {
    dates: result.equityCurve.map((p) => p.date),
    values: result.equityCurve.map((p) => round(p.totalValue, 2)),
    initialCapital: result.initialCapital,
  };
}
