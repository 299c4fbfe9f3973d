import type { Bar } from '../../data/types.js';

export type StarIndicator = 'none' | 'red' | 'green' | 'yellow';

/** Percentile bands keyed by percentile, e.g. `{ p20, p50, p80 }`. */
export type PercentileBands = Readonly<Record<`p${number}`, number | null>>;

/**
 * A bar with every derived indicator at a fixed schema. Values that cannot be
 * computed (short history, zero divisors) are `null`, never 0.
 */
export interface EnrichedBar extends Bar {
  // price channel
  readonly midPrice: number;
  readonly amplitude: number | null;
  readonly relAmplitude: number | null;
  readonly openMidDiff: number | null;
  readonly midUpper: number;
  readonly midLower: number;

  // breakout
  readonly priceBreakout: boolean;

  // enhanced amplitude
  readonly amplitudeMa: number | null;
  readonly trueRange: number | null;
  readonly atr: number | null;
  readonly atrChange: number | null;
  readonly amplitudePercentile: number | null;
  readonly amplitudeBands: PercentileBands;
  readonly amplitudeZscore: number | null;
  readonly abnormalAmplitude: boolean;

  // open/mid divergence
  readonly openMidDiffMa: number | null;
  readonly openMidDiffCum: number | null;
  readonly openMidDiffPercentile: number | null;
  readonly openMidDiffBands: PercentileBands;
  readonly openMidDiffZscore: number | null;

  // MPMI
  readonly emaShort: number | null;
  readonly emaLong: number | null;
  readonly mpmiLine: number | null;
  readonly mpmiSignal: number | null;
  readonly mpmiHist: number | null;
  readonly goldenCross: boolean;
  readonly deathCross: boolean;

  // three-day pattern
  readonly starIndicator: StarIndicator;
}

/** One indicator family: a pure transformation of the whole bar list. */
export interface IndicatorStage {
  readonly name: string;
  run(bars: readonly EnrichedBar[]): EnrichedBar[];
}
