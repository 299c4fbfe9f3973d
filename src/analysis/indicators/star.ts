import type { EnrichedBar, StarIndicator } from './types.js';

function within(value: number, low: number, high: number): boolean {
  return value >= low && value <= high;
}

/**
 * Classify the triple ending at `i`: three days of strictly shrinking
 * amplitude whose second and third ranges sit inside the first day's range.
 * The colour follows the mid-price trend across the three days.
 */
export function classifyStar(bars: readonly EnrichedBar[], i: number): StarIndicator {
  if (i < 2) return 'none';
  const [d1, d2, d3] = [bars[i - 2], bars[i - 1], bars[i]];

  if (d1.amplitude === null || d2.amplitude === null || d3.amplitude === null) return 'none';
  const shrinking = d1.amplitude > d2.amplitude && d2.amplitude > d3.amplitude;

  const contained =
    within(d2.low, d1.low, d1.high) &&
    within(d2.high, d1.low, d1.high) &&
    within(d3.low, d1.low, d1.high) &&
    within(d3.high, d1.low, d1.high);

  if (!shrinking || !contained) return 'none';

  if (d1.midPrice < d2.midPrice && d2.midPrice < d3.midPrice) return 'red';
  if (d1.midPrice > d2.midPrice && d2.midPrice > d3.midPrice) return 'green';
  return 'yellow';
}

export function markStars(bars: readonly EnrichedBar[]): EnrichedBar[] {
  return bars.map((bar, i) => ({ ...bar, starIndicator: classifyStar(bars, i) }));
}
