export {
  type Alert,
  type AlertDirection,
  type AlertLevel,
  type AlertOptions,
  type AlertType,
  alertOptionsSchema,
  generateAlerts,
} from './alerts/generator.js';

export { breaksOut, markBreakouts, trailingEnvelope } from './analysis/indicators/breakout.js';
export {
  type EnrichmentResult,
  IndicatorEngine,
  type IndicatorEngineOptions,
  indicatorEngineOptionsSchema,
  runStages,
} from './analysis/indicators/engine.js';
export { computeMpmi } from './analysis/indicators/mpmi.js';
export { createEnrichedBars } from './analysis/indicators/price-channel.js';
export { classifyStar, markStars } from './analysis/indicators/star.js';
export {
  computeTrailingStats,
  enhanceAmplitude,
  enhanceOpenMidDiff,
} from './analysis/indicators/trailing-stats.js';
export type {
  EnrichedBar,
  IndicatorStage,
  PercentileBands,
  StarIndicator,
} from './analysis/indicators/types.js';
export { Ema, RollingWindow } from './analysis/rolling.js';

export {
  BacktestEngine,
  type BacktestOptions,
  type ChannelBar,
  resolveBacktestConfig,
} from './backtest/engine.js';
export { buildGrid, optimizeChannel, optimizeChannelFromConfig } from './backtest/optimizer.js';
export {
  formatEquityCurve,
  generateOptimizationSummary,
  generateSummary,
} from './backtest/reporter.js';
export type * from './backtest/types.js';

export { ConfigManager, configManager } from './config/manager.js';
export { type AnalysisConfig, analysisConfigSchema } from './config/schema-validator.js';

export { mergeFundFlow } from './data/fund-flow.js';
export { assertSeries, normalizeBars, toCalendarDate } from './data/normalizer.js';
export { type BarSource, SeriesLoader } from './data/series-loader.js';
export { isValidSymbol, normalizeSymbol } from './data/symbols.js';
export type * from './data/types.js';

export { type AnalysisReport, type AnalyzeOptions, analyzeSeries } from './pipeline.js';

export {
  AnalysisError,
  ComputationError,
  ConfigurationError,
  EmptySeriesError,
  InputError,
  serializeError,
} from './utils/errors.js';
export { createLogger, logger } from './utils/logger.js';
