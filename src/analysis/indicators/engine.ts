import { z } from 'zod';
import {
  type AnalysisConfig,
  fraction,
  listIssues,
  percentile,
  percentileList,
  positiveInt,
} from '../../config/schema-validator.js';
import { assertSeries } from '../../data/normalizer.js';
import type { Series } from '../../data/types.js';
import { ComputationError, ConfigurationError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import { markBreakouts } from './breakout.js';
import { computeMpmi } from './mpmi.js';
import { createEnrichedBars } from './price-channel.js';
import { markStars } from './star.js';
import { enhanceAmplitude, enhanceOpenMidDiff } from './trailing-stats.js';
import type { EnrichedBar, IndicatorStage } from './types.js';

const log = createLogger('indicator-engine');

export const indicatorEngineOptionsSchema = z.object({
  channelPct: fraction.default(0.01),
  breakout: z
    .object({
      window: positiveInt(500).default(5),
      threshold: z.number().min(0).max(1).default(0.02),
    })
    .default({}),
  amplitude: z
    .object({
      maPeriod: positiveInt(500).default(10),
      window: positiveInt(1000).default(20),
      percentiles: percentileList.default([20, 50, 80]),
      abnormalPercentile: percentile.default(90),
    })
    .default({}),
  openMidDiff: z
    .object({
      maPeriod: positiveInt(500).default(5),
      window: positiveInt(1000).default(20),
      percentiles: percentileList.default([20, 50, 80]),
    })
    .default({}),
  mpmi: z
    .object({
      fast: positiveInt(500).default(12),
      slow: positiveInt(500).default(26),
      signal: positiveInt(500).default(9),
    })
    .refine((m) => m.fast < m.slow, 'fast span must be shorter than slow span')
    .default({}),
});

export type IndicatorEngineOptions = z.input<typeof indicatorEngineOptionsSchema>;
export type ResolvedIndicatorOptions = z.infer<typeof indicatorEngineOptionsSchema>;

export interface EnrichmentResult {
  bars: EnrichedBar[];
  /** Indicator families that failed; their fields keep their defaults. */
  faults: ComputationError[];
}

/**
 * Run each stage over the output of the previous one. A stage that throws, or
 * returns a frame of the wrong length, is recorded as a fault and skipped; the
 * remaining stages still run.
 */
export function runStages(
  initial: EnrichedBar[],
  stages: readonly IndicatorStage[],
): EnrichmentResult {
  let bars = initial;
  const faults: ComputationError[] = [];

  for (const stage of stages) {
    try {
      const next = stage.run(bars);
      if (next.length !== bars.length) {
        throw new Error(`returned ${next.length} bars for ${bars.length} inputs`);
      }
      bars = next;
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      log.error({ err, stage: stage.name }, 'Indicator stage failed');
      faults.push(new ComputationError(stage.name, `Stage "${stage.name}" failed: ${reason}`, err));
    }
  }

  return { bars, faults };
}

/**
 * Derives the mid-price indicator set from a daily series. Stateless: one
 * instance can enrich any number of series, concurrently or not.
 */
export class IndicatorEngine {
  readonly options: ResolvedIndicatorOptions;
  private readonly stages: readonly IndicatorStage[];

  constructor(options: IndicatorEngineOptions = {}) {
    const parsed = indicatorEngineOptionsSchema.safeParse(options);
    if (!parsed.success) {
      throw new ConfigurationError('Invalid indicator engine options', listIssues(parsed.error));
    }
    this.options = parsed.data;

    const o = this.options;
    this.stages = [
      { name: 'breakout', run: (bars) => markBreakouts(bars, o.breakout) },
      { name: 'amplitude', run: (bars) => enhanceAmplitude(bars, o.amplitude) },
      { name: 'openMidDiff', run: (bars) => enhanceOpenMidDiff(bars, o.openMidDiff) },
      { name: 'mpmi', run: (bars) => computeMpmi(bars, o.mpmi) },
      { name: 'star', run: (bars) => markStars(bars) },
    ];
  }

  static fromConfig(config: AnalysisConfig['indicators']): IndicatorEngine {
    return new IndicatorEngine(config);
  }

  /**
   * Enrich a date-ordered series. An empty series yields an empty result;
   * unordered or duplicate dates raise InputError before any computation.
   */
  enrich(series: Series): EnrichmentResult {
    if (series.length === 0) {
      return { bars: [], faults: [] };
    }
    assertSeries(series);

    const result = runStages(createEnrichedBars(series, this.options.channelPct), this.stages);

    log.debug(
      {
        bars: result.bars.length,
        from: series[0].date,
        to: series[series.length - 1].date,
        faults: result.faults.length,
      },
      'Series enriched',
    );
    return result;
  }
}
