import { z } from 'zod';
import type { EnrichedBar } from '../analysis/indicators/types.js';
import { type AnalysisConfig, listIssues } from '../config/schema-validator.js';
import { assertSeries } from '../data/normalizer.js';
import { ConfigurationError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import {
  buildEquityCurve,
  calculateMaxDrawdown,
  calculateSharpe,
  dailyReturns,
  summarizeReturns,
} from './metrics.js';
import type {
  BacktestConfig,
  BacktestPosition,
  BacktestResult,
  BacktestStats,
  BacktestTrade,
  PositionState,
} from './types.js';

const log = createLogger('backtest-engine');

export const backtestOptionsSchema = z.object({
  upperPct: z.number().min(0).lt(1).default(0.01),
  lowerPct: z.number().min(0).lt(1).default(0.01),
  initialCapital: z.number().gt(0).default(100_000),
  feeRate: z.number().min(0).lt(1).default(0.0003),
  riskFreeRate: z.number().min(0).max(1).default(0.03),
});

export type BacktestOptions = z.input<typeof backtestOptionsSchema>;

/** The bar fields the channel strategy reads. */
export type ChannelBar = Pick<EnrichedBar, 'date' | 'high' | 'low' | 'close' | 'midPrice'>;

export function resolveBacktestConfig(options: BacktestOptions = {}): BacktestConfig {
  const parsed = backtestOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new ConfigurationError('Invalid backtest options', listIssues(parsed.error));
  }
  return parsed.data;
}

/**
 * Mid-price channel strategy: buy the whole account at the lower channel when
 * flat, sell everything at the upper channel when long. Fills happen exactly at
 * the channel price.
 */
export class BacktestEngine {
  readonly config: Readonly<BacktestConfig>;

  constructor(options: BacktestOptions = {}) {
    this.config = Object.freeze(resolveBacktestConfig(options));
  }

  static fromConfig(config: AnalysisConfig['backtest']): BacktestEngine {
    return new BacktestEngine(config);
  }

  run(bars: readonly ChannelBar[]): BacktestResult {
    assertSeries(bars);
    const { upperPct, lowerPct, initialCapital, feeRate, riskFreeRate } = this.config;

    let state: PositionState = 'FLAT';
    let capital = initialCapital;
    let shares = 0;
    let costBasis = 0;
    const trades: BacktestTrade[] = [];
    const positions: BacktestPosition[] = [];

    for (const bar of bars) {
      const upper = bar.midPrice * (1 + upperPct);
      const lower = bar.midPrice * (1 - lowerPct);

      if (state === 'LONG' && bar.high >= upper) {
        const amount = shares * upper;
        const fee = amount * feeRate;
        const net = amount - fee;
        const profit = net - costBasis;
        capital += net;

        trades.push({ date: bar.date, side: 'sell', price: upper, shares, amount, fee, profit });
        log.debug({ date: bar.date, price: upper, shares, profit }, 'Sell executed');

        shares = 0;
        costBasis = 0;
        state = 'FLAT';
      } else if (state === 'FLAT' && bar.low <= lower && capital > 0) {
        const affordable = Math.floor(capital / (lower * (1 + feeRate)));
        if (affordable > 0) {
          const amount = affordable * lower;
          const fee = amount * feeRate;
          const cost = amount + fee;
          capital -= cost;
          shares = affordable;
          costBasis = cost;

          trades.push({ date: bar.date, side: 'buy', price: lower, shares, amount, fee, cost });
          log.debug({ date: bar.date, price: lower, shares }, 'Buy executed');
          state = 'LONG';
        }
      }

      const positionValue = shares * bar.close;
      positions.push({
        date: bar.date,
        shares,
        capital,
        closePrice: bar.close,
        positionValue,
        totalValue: capital + positionValue,
      });
    }

    const finalValue = bars.length > 0 ? capital + shares * bars[bars.length - 1].close : capital;
    const equityCurve = buildEquityCurve(positions);
    const stats = this.computeStats(trades, equityCurve, finalValue, riskFreeRate);

    log.debug(
      { bars: bars.length, trades: trades.length, finalValue, totalReturn: stats.totalReturn },
      'Backtest complete',
    );

    return Object.freeze({
      params: this.config,
      initialCapital,
      finalValue,
      finalState: state,
      trades: Object.freeze(trades),
      positions: Object.freeze(positions),
      equityCurve: Object.freeze(equityCurve),
      stats,
    });
  }

  private computeStats(
    trades: readonly BacktestTrade[],
    equityCurve: BacktestResult['equityCurve'],
    finalValue: number,
    riskFreeRate: number,
  ): BacktestStats {
    const sells = trades.filter((t) => t.side === 'sell');
    const winTrades = sells.filter((t) => (t.profit ?? 0) > 0).length;
    const lossTrades = sells.length - winTrades;
    const returns = dailyReturns(equityCurve);

    return {
      totalReturn: (finalValue / this.config.initialCapital - 1) * 100,
      totalTrades: trades.filter((t) => t.side === 'buy').length,
      winTrades,
      lossTrades,
      winRate: winTrades / Math.max(sells.length, 1),
      maxDrawdown: calculateMaxDrawdown(equityCurve),
      sharpeRatio: calculateSharpe(returns, riskFreeRate),
      ...summarizeReturns(returns),
    };
  }
}
