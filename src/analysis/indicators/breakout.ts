import type { Bar } from '../../data/types.js';
import type { EnrichedBar } from './types.js';

export interface BreakoutOptions {
  window: number;
  threshold: number;
}

export interface Envelope {
  high: number;
  low: number;
}

/**
 * Highest high and lowest low over bars `[end - window, end)`, clipped at the
 * start of the series. Null when that range is empty.
 */
export function trailingEnvelope(
  bars: readonly Bar[],
  end: number,
  window: number,
): Envelope | null {
  const start = Math.max(0, end - window);
  if (start >= end) return null;

  let high = Number.NEGATIVE_INFINITY;
  let low = Number.POSITIVE_INFINITY;
  for (let j = start; j < end; j++) {
    if (bars[j].high > high) high = bars[j].high;
    if (bars[j].low < low) low = bars[j].low;
  }
  return { high, low };
}

export function breaksOut(
  close: number,
  envelope: Envelope,
  threshold: number,
): 'up' | 'down' | null {
  if (close > envelope.high * (1 + threshold)) return 'up';
  if (close < envelope.low * (1 - threshold)) return 'down';
  return null;
}

/**
 * Flag closes that clear the previous `window` bars' range by more than
 * `threshold`. The first `window` bars are never flagged.
 */
export function markBreakouts(
  bars: readonly EnrichedBar[],
  { window, threshold }: BreakoutOptions,
): EnrichedBar[] {
  return bars.map((bar, i) => {
    if (i < window) return { ...bar, priceBreakout: false };
    const envelope = trailingEnvelope(bars, i, window);
    const priceBreakout = envelope !== null && breaksOut(bar.close, envelope, threshold) !== null;
    return { ...bar, priceBreakout };
  });
}
