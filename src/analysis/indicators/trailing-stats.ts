import { mean, percentileRank, quantile, RollingWindow, sampleStd } from '../rolling.js';
import type { EnrichedBar, PercentileBands } from './types.js';

export interface TrailingStatsOptions {
  maPeriod: number;
  window: number;
  percentiles: readonly number[];
}

export interface TrailingStats {
  ma: number | null;
  cum: number | null;
  percentile: number | null;
  bands: PercentileBands;
  zscore: number | null;
}

function emptyBands(percentiles: readonly number[]): PercentileBands {
  const bands: Record<`p${number}`, number | null> = {};
  for (const p of percentiles) bands[`p${p}`] = null;
  return bands;
}

/**
 * Moving average, trailing sum, percentile rank, percentile bands and z-score
 * of a value series. The percentile window ends at, and includes, the current
 * value, so fields are defined from index `window - 1` onward. Missing values
 * inside that window are skipped, leaving only the missing bar itself
 * undefined; the moving average and sum stay undefined while one is in range.
 */
export function computeTrailingStats(
  values: ReadonlyArray<number | null>,
  { maPeriod, window, percentiles }: TrailingStatsOptions,
): TrailingStats[] {
  const maWindow = new RollingWindow(maPeriod);
  const statWindow = new RollingWindow(window);

  return values.map((value) => {
    maWindow.push(value);
    statWindow.push(value);

    const stats: TrailingStats = {
      ma: maWindow.mean(),
      cum: maWindow.total(),
      percentile: null,
      bands: emptyBands(percentiles),
      zscore: null,
    };

    const trailing = statWindow.values();
    if (trailing === null || value === null || !Number.isFinite(value)) return stats;

    const bands: Record<`p${number}`, number | null> = {};
    for (const p of percentiles) bands[`p${p}`] = quantile(trailing, p);

    const std = sampleStd(trailing);

    return {
      ...stats,
      percentile: percentileRank(trailing, value),
      bands,
      zscore: std > 0 ? (value - mean(trailing)) / std : null,
    };
  });
}

export interface AmplitudeOptions extends TrailingStatsOptions {
  abnormalPercentile: number;
}

/**
 * Amplitude family: moving average, true range and ATR over `maPeriod`,
 * ATR percent change, and the trailing-window statistics.
 */
export function enhanceAmplitude(
  bars: readonly EnrichedBar[],
  options: AmplitudeOptions,
): EnrichedBar[] {
  const stats = computeTrailingStats(
    bars.map((b) => b.amplitude),
    options,
  );
  const trWindow = new RollingWindow(options.maPeriod);
  let prevAtr: number | null = null;

  return bars.map((bar, i) => {
    let trueRange: number | null = null;
    if (i > 0) {
      const prevClose = bars[i - 1].close;
      trueRange = Math.max(
        bar.high - bar.low,
        Math.abs(bar.high - prevClose),
        Math.abs(bar.low - prevClose),
      );
    }
    trWindow.push(trueRange);
    const atr = trWindow.mean();
    const atrChange =
      atr !== null && prevAtr !== null && prevAtr !== 0 ? (atr / prevAtr - 1) * 100 : null;
    prevAtr = atr;

    const s = stats[i];
    return {
      ...bar,
      amplitudeMa: s.ma,
      trueRange,
      atr,
      atrChange,
      amplitudePercentile: s.percentile,
      amplitudeBands: s.bands,
      amplitudeZscore: s.zscore,
      abnormalAmplitude: s.percentile !== null && s.percentile > options.abnormalPercentile,
    };
  });
}

/** Open/mid divergence family, including the trailing sum over `maPeriod`. */
export function enhanceOpenMidDiff(
  bars: readonly EnrichedBar[],
  options: TrailingStatsOptions,
): EnrichedBar[] {
  const stats = computeTrailingStats(
    bars.map((b) => b.openMidDiff),
    options,
  );

  return bars.map((bar, i) => {
    const s = stats[i];
    return {
      ...bar,
      openMidDiffMa: s.ma,
      openMidDiffCum: s.cum,
      openMidDiffPercentile: s.percentile,
      openMidDiffBands: s.bands,
      openMidDiffZscore: s.zscore,
    };
  });
}
