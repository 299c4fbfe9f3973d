import { describe, expect, it } from 'vitest';
import { createEnrichedBars } from '../../src/analysis/indicators/price-channel.js';
import { makeSeries } from '../helpers/fixtures.js';

describe('createEnrichedBars', () => {
  const series = makeSeries([
    { high: 110, low: 90, open: 95, close: 105 },
    { high: 112, low: 98, open: 100, close: 110 },
  ]);

  it('computes mid-price and the channel around it', () => {
    const [bar] = createEnrichedBars(series, 0.01);
    expect(bar.midPrice).toBe(100);
    expect(bar.midUpper).toBe(101);
    expect(bar.midLower).toBe(99);
  });

  it('expresses amplitude relative to the low', () => {
    const [bar] = createEnrichedBars(series, 0.01);
    expect(bar.amplitude).toBeCloseTo((20 / 90) * 100, 10);
  });

  it('expresses relative amplitude against the previous close', () => {
    const bars = createEnrichedBars(series, 0.01);
    expect(bars[0].relAmplitude).toBeNull();
    expect(bars[1].relAmplitude).toBeCloseTo((14 / 105) * 100, 10);
  });

  it('measures open against mid-price', () => {
    const bars = createEnrichedBars(series, 0.01);
    expect(bars[0].openMidDiff).toBe(5);
    expect(bars[1].openMidDiff).toBeCloseTo((5 / 105) * 100, 10);
  });

  it('returns null instead of dividing by zero', () => {
    const series = makeSeries([{ high: 1, low: 0, open: 0.5, close: 0.5 }]);
    const [bar] = createEnrichedBars(series, 0.01);
    expect(bar.amplitude).toBeNull();
  });

  it('defaults every downstream indicator', () => {
    const [bar] = createEnrichedBars(series, 0.01);
    expect(bar).toMatchObject({
      priceBreakout: false,
      amplitudeMa: null,
      trueRange: null,
      atr: null,
      amplitudePercentile: null,
      amplitudeBands: {},
      abnormalAmplitude: false,
      openMidDiffCum: null,
      mpmiLine: null,
      goldenCross: false,
      deathCross: false,
      starIndicator: 'none',
    });
  });

  it('copies base fields without carrying extra keys', () => {
    const [bar] = createEnrichedBars([{ ...series[0], amount: 42 }], 0.01);
    expect(bar.amount).toBe(42);
    expect('mainNetInflow' in bar).toBe(false);
  });
});
