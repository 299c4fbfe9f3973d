import { Ema } from '../rolling.js';
import type { EnrichedBar } from './types.js';

export interface MpmiOptions {
  fast: number;
  slow: number;
  signal: number;
}

/**
 * Mid-Price Momentum Indicator: a MACD computed on mid-price. Line and signal
 * crossings are reported on the bar where the sign of (line − signal) flips.
 */
export function computeMpmi(
  bars: readonly EnrichedBar[],
  { fast, slow, signal }: MpmiOptions,
): EnrichedBar[] {
  const emaFast = new Ema(fast);
  const emaSlow = new Ema(slow);
  const emaSignal = new Ema(signal);

  let prevLine: number | null = null;
  let prevSignal: number | null = null;

  return bars.map((bar) => {
    const emaShort = emaFast.next(bar.midPrice);
    const emaLong = emaSlow.next(bar.midPrice);
    const mpmiLine = emaShort - emaLong;
    const mpmiSignal = emaSignal.next(mpmiLine);

    let goldenCross = false;
    let deathCross = false;
    if (prevLine !== null && prevSignal !== null) {
      goldenCross = mpmiLine > mpmiSignal && prevLine <= prevSignal;
      deathCross = mpmiLine < mpmiSignal && prevLine >= prevSignal;
    }

    prevLine = mpmiLine;
    prevSignal = mpmiSignal;

    return {
      ...bar,
      emaShort,
      emaLong,
      mpmiLine,
      mpmiSignal,
      mpmiHist: mpmiLine - mpmiSignal,
      goldenCross,
      deathCross,
    };
  });
}
