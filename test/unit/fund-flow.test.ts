import { describe, expect, it } from 'vitest';
import { mergeFundFlow } from '../../src/data/fund-flow.js';
import { makeSeries } from '../helpers/fixtures.js';

describe('mergeFundFlow', () => {
  const series = makeSeries([
    { high: 11, low: 9 },
    { high: 12, low: 10 },
    { high: 13, low: 11 },
  ]);

  it('attaches fund flow by date', () => {
    const merged = mergeFundFlow(series, [
      { date: '2024-01-02', mainNetInflow: 2_000_000 },
      { date: '2024-01-03', mainNetInflow: -500 },
    ]);

    expect(merged.map((b) => b.mainNetInflow)).toEqual([undefined, 2_000_000, -500]);
  });

  it('leaves unmatched bars untouched', () => {
    const merged = mergeFundFlow(series, [{ date: '2024-01-02', mainNetInflow: 1 }]);
    expect(merged[0]).toBe(series[0]);
    expect(merged[2]).toBe(series[2]);
  });

  it('ignores flows for dates outside the series', () => {
    const merged = mergeFundFlow(series, [{ date: '2023-12-31', mainNetInflow: 1 }]);
    expect(merged).toEqual(series);
  });

  it('skips non-finite figures', () => {
    const merged = mergeFundFlow(series, [{ date: '2024-01-01', mainNetInflow: Number.NaN }]);
    expect(merged[0].mainNetInflow).toBeUndefined();
  });

  it('returns the series itself when there is nothing to merge', () => {
    expect(mergeFundFlow(series, [])).toBe(series);
    expect(mergeFundFlow([], [{ date: '2024-01-01', mainNetInflow: 1 }])).toEqual([]);
  });
});
