import type { Bar, FundFlowRow, Series } from './types.js';

/**
 * Left-join fund-flow figures onto a series by calendar date. Bars without a
 * matching row are returned untouched.
 */
export function mergeFundFlow(series: Series, flows: readonly FundFlowRow[]): Series {
  if (series.length === 0 || flows.length === 0) return series;

  const byDate = new Map<string, number>();
  for (const flow of flows) {
    if (Number.isFinite(flow.mainNetInflow)) {
      byDate.set(flow.date, flow.mainNetInflow);
    }
  }

  return Object.freeze(
    series.map((bar): Bar => {
      const inflow = byDate.get(bar.date);
      return inflow === undefined ? bar : Object.freeze({ ...bar, mainNetInflow: inflow });
    }),
  );
}
