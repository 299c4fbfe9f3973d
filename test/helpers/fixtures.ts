import type { Bar } from '../../src/data/types.js';

export interface BarShape {
  high: number;
  low: number;
  open?: number;
  close?: number;
  volume?: number;
  mainNetInflow?: number;
}

/** Calendar date `offset` days after `start`. */
export function isoDay(offset: number, start = '2024-01-01'): string {
  const d = new Date(`${start}T00:00:00Z`);
  d.setUTCDate(d.getUTCDate() + offset);
  return d.toISOString().slice(0, 10);
}

/** Open and close default to the mid-price. */
export function makeBar(index: number, shape: BarShape): Bar {
  const mid = (shape.high + shape.low) / 2;
  return {
    date: isoDay(index),
    open: shape.open ?? mid,
    high: shape.high,
    low: shape.low,
    close: shape.close ?? mid,
    volume: shape.volume ?? 1_000_000,
    ...(shape.mainNetInflow !== undefined ? { mainNetInflow: shape.mainNetInflow } : {}),
  };
}

export function makeSeries(shapes: readonly BarShape[]): Bar[] {
  return shapes.map((shape, i) => makeBar(i, shape));
}

/** A deterministic wavy series whose ranges and opens vary bar to bar. */
export function wavySeries(count: number, base = 100): Bar[] {
  const shapes: BarShape[] = [];
  for (let i = 0; i < count; i++) {
    const centre = base + 5 * Math.sin(i / 3) + i * 0.1;
    const high = centre + 1 + (i % 4) * 0.4;
    const low = centre - 1 - (i % 3) * 0.3;
    shapes.push({
      high,
      low,
      open: low + (high - low) * ((i % 5) / 5),
      close: low + (high - low) * (((i + 2) % 5) / 5),
    });
  }
  return makeSeries(shapes);
}
