import type { Series } from '../../data/types.js';
import type { EnrichedBar } from './types.js';

function ratioPct(numerator: number, denominator: number): number | null {
  return denominator === 0 ? null : (numerator / denominator) * 100;
}

/**
 * Build the enriched frame: copy the base bar fields, compute the O(1)
 * per-bar price-channel fields and default every other indicator.
 */
export function createEnrichedBars(series: Series, channelPct: number): EnrichedBar[] {
  return series.map((bar, i): EnrichedBar => {
    const midPrice = (bar.high + bar.low) / 2;
    const prevClose = i > 0 ? series[i - 1].close : null;

    return {
      date: bar.date,
      open: bar.open,
      high: bar.high,
      low: bar.low,
      close: bar.close,
      volume: bar.volume,
      ...(bar.amount !== undefined ? { amount: bar.amount } : {}),
      ...(bar.mainNetInflow !== undefined ? { mainNetInflow: bar.mainNetInflow } : {}),

      midPrice,
      amplitude: ratioPct(bar.high - bar.low, bar.low),
      relAmplitude: prevClose === null ? null : ratioPct(bar.high - bar.low, prevClose),
      openMidDiff: ratioPct(midPrice - bar.open, midPrice),
      midUpper: midPrice * (1 + channelPct),
      midLower: midPrice * (1 - channelPct),

      priceBreakout: false,

      amplitudeMa: null,
      trueRange: null,
      atr: null,
      atrChange: null,
      amplitudePercentile: null,
      amplitudeBands: {},
      amplitudeZscore: null,
      abnormalAmplitude: false,

      openMidDiffMa: null,
      openMidDiffCum: null,
      openMidDiffPercentile: null,
      openMidDiffBands: {},
      openMidDiffZscore: null,

      emaShort: null,
      emaLong: null,
      mpmiLine: null,
      mpmiSignal: null,
      mpmiHist: null,
      goldenCross: false,
      deathCross: false,

      starIndicator: 'none',
    };
  });
}
