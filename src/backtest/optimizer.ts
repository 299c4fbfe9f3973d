import {
  type AnalysisConfig,
  gridRangeSchema,
  listIssues,
} from '../config/schema-validator.js';
import { ConfigurationError } from '../utils/errors.js';
import { round } from '../utils/helpers.js';
import { createLogger } from '../utils/logger.js';
import {
  BacktestEngine,
  type BacktestOptions,
  type ChannelBar,
  resolveBacktestConfig,
} from './engine.js';
import type { GridPointResult, GridRange, OptimizationResult } from './types.js';

const log = createLogger('optimizer');

const DEFAULT_PARAMS = { upperPct: 0.01, lowerPct: 0.01 };

/**
 * Values `start, start + step, …` up to and including `stop` (within a small
 * tolerance), rounded to strip accumulated floating-point noise.
 */
export function buildGrid(range: GridRange, label = 'range'): number[] {
  const parsed = gridRangeSchema.safeParse(range);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid ${label}`, listIssues(parsed.error));
  }
  const { start, stop, step } = parsed.data;
  const count = Math.floor((stop - start) / step + 1e-9) + 1;

  const values: number[] = [];
  for (let k = 0; k < count; k++) {
    values.push(round(start + k * step, 10));
  }
  return values;
}

/**
 * Brute-force search over (upperPct, lowerPct). Every grid point runs an
 * independent backtest; ties keep the first point visited (ascending upper,
 * then ascending lower).
 */
export function optimizeChannel(
  bars: readonly ChannelBar[],
  upperRange: GridRange,
  lowerRange: GridRange,
  base: Omit<BacktestOptions, 'upperPct' | 'lowerPct'> = {},
): OptimizationResult {
  const upperValues = buildGrid(upperRange, 'upper range');
  const lowerValues = buildGrid(lowerRange, 'lower range');
  // The largest grid values are last; validating them covers the whole grid.
  resolveBacktestConfig({
    ...base,
    upperPct: upperValues[upperValues.length - 1],
    lowerPct: lowerValues[lowerValues.length - 1],
  });

  if (bars.length === 0) {
    return { bestParams: { ...DEFAULT_PARAMS }, bestReturn: 0, allResults: [] };
  }

  const allResults: GridPointResult[] = [];
  let bestReturn = Number.NEGATIVE_INFINITY;
  let bestParams = { ...DEFAULT_PARAMS };

  for (const upperPct of upperValues) {
    for (const lowerPct of lowerValues) {
      const { stats } = new BacktestEngine({ ...base, upperPct, lowerPct }).run(bars);

      allResults.push({
        upperPct,
        lowerPct,
        totalReturn: stats.totalReturn,
        totalTrades: stats.totalTrades,
        winRate: stats.winRate,
      });

      if (stats.totalReturn > bestReturn) {
        bestReturn = stats.totalReturn;
        bestParams = { upperPct, lowerPct };
      }
    }
  }

  log.info(
    { gridPoints: allResults.length, bestParams, bestReturn },
    'Channel optimization complete',
  );

  return { bestParams, bestReturn, allResults };
}

/**
 * Grid search over the configured `optimizer` ranges, with capital, fees and
 * the risk-free rate taken from the `backtest` section.
 */
export function optimizeChannelFromConfig(
  bars: readonly ChannelBar[],
  config: Pick<AnalysisConfig, 'backtest' | 'optimizer'>,
): OptimizationResult {
  const { initialCapital, feeRate, riskFreeRate } = config.backtest;
  return optimizeChannel(bars, config.optimizer.upperRange, config.optimizer.lowerRange, {
    initialCapital,
    feeRate,
    riskFreeRate,
  });
}
