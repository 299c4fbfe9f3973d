import { describe, expect, it, vi } from 'vitest';

vi.mock('../../src/utils/logger.js', () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

import { IndicatorEngine, runStages } from '../../src/analysis/indicators/engine.js';
import { computeMpmi } from '../../src/analysis/indicators/mpmi.js';
import { createEnrichedBars } from '../../src/analysis/indicators/price-channel.js';
import { markStars } from '../../src/analysis/indicators/star.js';
import type { IndicatorStage } from '../../src/analysis/indicators/types.js';
import { ComputationError, ConfigurationError, InputError } from '../../src/utils/errors.js';
import { makeSeries, wavySeries } from '../helpers/fixtures.js';

describe('IndicatorEngine', () => {
  describe('options', () => {
    it('fills in defaults', () => {
      const engine = new IndicatorEngine();
      expect(engine.options.channelPct).toBe(0.01);
      expect(engine.options.breakout).toEqual({ window: 5, threshold: 0.02 });
      expect(engine.options.amplitude.window).toBe(20);
      expect(engine.options.mpmi).toEqual({ fast: 12, slow: 26, signal: 9 });
    });

    it('merges partial sections', () => {
      const engine = new IndicatorEngine({ amplitude: { window: 30 } });
      expect(engine.options.amplitude).toEqual({
        maPeriod: 10,
        window: 30,
        percentiles: [20, 50, 80],
        abnormalPercentile: 90,
      });
    });

    it('rejects a fast span that is not shorter than the slow span', () => {
      try {
        new IndicatorEngine({ mpmi: { fast: 26, slow: 12 } });
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(ConfigurationError);
        if (err instanceof ConfigurationError) {
          expect(err.issues).toEqual(['mpmi: fast span must be shorter than slow span']);
        }
      }
    });

    it('rejects a zero window', () => {
      expect(() => new IndicatorEngine({ breakout: { window: 0 } })).toThrow(ConfigurationError);
    });

    it('builds from the loaded configuration section', () => {
      const engine = IndicatorEngine.fromConfig({
        channelPct: 0.02,
        breakout: { window: 3, threshold: 0.01 },
        amplitude: { maPeriod: 5, window: 10, percentiles: [50], abnormalPercentile: 95 },
        openMidDiff: { maPeriod: 3, window: 10, percentiles: [50] },
        mpmi: { fast: 5, slow: 10, signal: 4 },
      });
      expect(engine.options.channelPct).toBe(0.02);
      expect(engine.options.amplitude.abnormalPercentile).toBe(95);
    });
  });

  describe('enrich', () => {
    const engine = new IndicatorEngine();
    const series = wavySeries(40);

    it('returns an empty result for an empty series', () => {
      expect(engine.enrich([])).toEqual({ bars: [], faults: [] });
    });

    it('produces one enriched bar per input bar without faults', () => {
      const { bars, faults } = engine.enrich(series);
      expect(bars).toHaveLength(40);
      expect(faults).toEqual([]);
      expect(bars.map((b) => b.date)).toEqual(series.map((b) => b.date));
    });

    it('leaves a degenerate bar undefined without blanking the bars after it', () => {
      const withZeroLow = wavySeries(60).map((bar, i) => (i === 25 ? { ...bar, low: 0 } : bar));
      const { bars, faults } = engine.enrich(withZeroLow);

      expect(faults).toEqual([]);
      expect(bars[25].amplitude).toBeNull();
      const undefinedAfterWarmup = bars
        .map((b, i) => (i >= 19 && b.amplitudePercentile === null ? i : -1))
        .filter((i) => i >= 0);
      expect(undefinedAfterWarmup).toEqual([25]);
      expect(bars[26].amplitudeZscore).not.toBeNull();
    });

    it('rejects unordered input', () => {
      expect(() => engine.enrich([series[1], series[0]])).toThrow(InputError);
    });

    it('rejects duplicate dates', () => {
      expect(() => engine.enrich([series[0], series[0]])).toThrow('Duplicate bar date');
    });

    it('defines percentile and z-score from index window - 1', () => {
      const { bars } = engine.enrich(series);
      for (let i = 0; i < 19; i++) {
        expect(bars[i].amplitudePercentile).toBeNull();
        expect(bars[i].amplitudeZscore).toBeNull();
        expect(bars[i].openMidDiffPercentile).toBeNull();
        expect(bars[i].openMidDiffZscore).toBeNull();
      }
      expect(bars[19].amplitudePercentile).not.toBeNull();
      expect(bars[19].amplitudeZscore).not.toBeNull();
      expect(bars[19].openMidDiffPercentile).not.toBeNull();
      expect(bars[19].openMidDiffZscore).not.toBeNull();
    });

    it('defines ATR from index maPeriod', () => {
      const { bars } = engine.enrich(series);
      expect(bars[9].atr).toBeNull();
      expect(bars[10].atr).not.toBeNull();
    });

    it('is deterministic', () => {
      expect(engine.enrich(series)).toEqual(engine.enrich(series));
    });

    it('is causal: appending bars never changes earlier values', () => {
      const full = engine.enrich(series).bars;
      for (const k of [1, 3, 5, 19, 20, 33]) {
        expect(engine.enrich(series.slice(0, k)).bars).toEqual(full.slice(0, k));
      }
    });

    it('is idempotent over its own output', () => {
      const first = engine.enrich(series).bars;
      expect(engine.enrich(first).bars).toEqual(first);
    });

    it('does not mutate a frozen input', () => {
      const frozen = Object.freeze(series.map((b) => Object.freeze({ ...b })));
      expect(() => engine.enrich(frozen)).not.toThrow();
      expect(frozen).toEqual(series);
    });

    it('attaches the star pattern', () => {
      const { bars } = engine.enrich(
        makeSeries([
          { high: 110, low: 100 },
          { high: 108, low: 102 },
          { high: 106, low: 104 },
        ]),
      );
      expect(bars[2].starIndicator).toBe('yellow');
    });
  });
});

describe('runStages', () => {
  const initial = createEnrichedBars(
    makeSeries([
      { high: 110, low: 100 },
      { high: 108, low: 102 },
      { high: 106, low: 104 },
    ]),
    0.01,
  );

  const mpmi: IndicatorStage = {
    name: 'mpmi',
    run: (bars) => computeMpmi(bars, { fast: 2, slow: 3, signal: 2 }),
  };
  const broken: IndicatorStage = {
    name: 'broken',
    run: () => {
      throw new Error('kaput');
    },
  };
  const truncating: IndicatorStage = { name: 'truncating', run: (bars) => bars.slice(1) };
  const star: IndicatorStage = { name: 'star', run: (bars) => markStars(bars) };

  it('runs every stage in order', () => {
    const { bars, faults } = runStages(initial, [mpmi, star]);
    expect(faults).toEqual([]);
    expect(bars[2].starIndicator).toBe('yellow');
    expect(bars[2].mpmiLine).toBe(0);
  });

  it('isolates a failing stage and keeps the others', () => {
    const { bars, faults } = runStages(initial, [mpmi, broken, truncating, star]);

    expect(faults).toHaveLength(2);
    expect(faults[0]).toBeInstanceOf(ComputationError);
    expect(faults[0].stage).toBe('broken');
    expect(faults[0].message).toBe('Stage "broken" failed: kaput');
    expect(faults[1].stage).toBe('truncating');
    expect(faults[1].message).toBe('Stage "truncating" failed: returned 2 bars for 3 inputs');

    expect(bars).toHaveLength(3);
    expect(bars[0].mpmiLine).toBe(0);
    expect(bars[2].starIndicator).toBe('yellow');
  });

  it('leaves defaults in place for the failed family', () => {
    const { bars } = runStages(initial, [broken, star]);
    expect(bars.every((b) => b.mpmiLine === null)).toBe(true);
  });
});
