import { type Alert, generateAlerts } from './alerts/generator.js';
import { IndicatorEngine } from './analysis/indicators/engine.js';
import type { EnrichedBar } from './analysis/indicators/types.js';
import { BacktestEngine } from './backtest/engine.js';
import { optimizeChannelFromConfig } from './backtest/optimizer.js';
import type { BacktestResult, OptimizationResult } from './backtest/types.js';
import { configManager } from './config/manager.js';
import type { AnalysisConfig } from './config/schema-validator.js';
import { mergeFundFlow } from './data/fund-flow.js';
import { normalizeBars } from './data/normalizer.js';
import type { FundFlowRow, RawBarRow, Series } from './data/types.js';
import type { ComputationError } from './utils/errors.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('pipeline');

export interface AnalyzeOptions {
  fundFlow?: readonly FundFlowRow[];
  /** Also grid-search the channel over the configured optimizer ranges. */
  optimize?: boolean;
}

export interface AnalysisReport {
  series: Series;
  bars: EnrichedBar[];
  faults: ComputationError[];
  alerts: Alert[];
  backtest: BacktestResult;
  optimization?: OptimizationResult;
}

/**
 * Normalize raw rows, enrich them, evaluate alerts on the latest bar and run
 * the channel backtest, all with one configuration snapshot. Empty input
 * raises EmptySeriesError from normalization.
 */
export function analyzeSeries(
  rows: readonly RawBarRow[],
  config: AnalysisConfig = configManager.load(),
  options: AnalyzeOptions = {},
): AnalysisReport {
  let series = normalizeBars(rows, { onInvalidRow: config.normalizer.onInvalidRow });
  if (options.fundFlow) {
    series = mergeFundFlow(series, options.fundFlow);
  }

  const { bars, faults } = IndicatorEngine.fromConfig(config.indicators).enrich(series);
  const alerts = generateAlerts(bars, config.alerts);
  const backtest = BacktestEngine.fromConfig(config.backtest).run(bars);
  const optimization = options.optimize ? optimizeChannelFromConfig(bars, config) : undefined;

  log.info(
    {
      bars: bars.length,
      faults: faults.length,
      alerts: alerts.length,
      totalReturn: backtest.stats.totalReturn,
    },
    'Series analyzed',
  );

  return { series, bars, faults, alerts, backtest, ...(optimization ? { optimization } : {}) };
}
