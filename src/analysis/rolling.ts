/**
 * Fixed-capacity ring buffer over the most recent values of a series.
 *
 * Keeps a running sum so the mean is O(1) per bar. The sums are rebuilt from the buffer each time
 * the write head wraps, which bounds floating-point drift to one window.
 * A `null` anywhere in the window makes the running aggregates `null`;
 * `values()` skips it instead.
 */
export class RollingWindow {
  private readonly buffer: Array<number | null>;
  private head = 0;
  private count = 0;
  private nulls = 0;
  private sum = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`RollingWindow capacity must be a positive integer, got ${capacity}`);
    }
    this.buffer = new Array<number | null>(capacity).fill(null);
  }

  get size(): number {
    return this.count;
  }

  get isFull(): boolean {
    return this.count === this.capacity;
  }

  /** True when the window is full and holds no nulls. */
  get isComplete(): boolean {
    return this.isFull && this.nulls === 0;
  }

  push(value: number | null): void {
    const v = value !== null && Number.isFinite(value) ? value : null;

    if (this.isFull) {
      this.remove(this.buffer[this.head]);
    } else {
      this.count++;
    }

    this.buffer[this.head] = v;
    this.add(v);
    this.head = (this.head + 1) % this.capacity;

    if (this.head === 0) {
      this.rebuild();
    }
  }

  total(): number | null {
    return this.isComplete ? this.sum : null;
  }

  mean(): number | null {
    return this.isComplete ? this.sum / this.capacity : null;
  }

  /** Non-null contents of a full window, oldest first; null until the window fills. */
  values(): number[] | null {
    if (!this.isFull) return null;
    const out: number[] = [];
    for (let i = 0; i < this.capacity; i++) {
      const v = this.buffer[(this.head + i) % this.capacity];
      if (v !== null) out.push(v);
    }
    return out;
  }

  private add(v: number | null): void {
    if (v === null) {
      this.nulls++;
    } else {
      this.sum += v;
    }
  }

  private remove(v: number | null): void {
    if (v === null) {
      this.nulls--;
    } else {
      this.sum -= v;
    }
  }

  private rebuild(): void {
    let sum = 0;
    for (let i = 0; i < this.count; i++) {
      const v = this.buffer[i];
      if (v !== null) sum += v;
    }
    this.sum = sum;
  }
}

/**
 * Exponential moving average seeded with the first observation,
 * alpha = 2 / (span + 1).
 */
export class Ema {
  private readonly alpha: number;
  private current: number | null = null;

  constructor(readonly span: number) {
    this.alpha = 2 / (span + 1);
  }

  next(value: number): number {
    this.current =
      this.current === null ? value : this.alpha * value + (1 - this.alpha) * this.current;
    return this.current;
  }
}

/** Share of `values` strictly below `current`, in percent. */
export function percentileRank(values: readonly number[], current: number): number {
  if (values.length === 0) return Number.NaN;
  let below = 0;
  for (const v of values) {
    if (v < current) below++;
  }
  return (below / values.length) * 100;
}

/** Percentile `p` (0–100) with linear interpolation between closest ranks. */
export function quantile(values: readonly number[], p: number): number {
  if (values.length === 0) return Number.NaN;
  const sorted = [...values].sort((a, b) => a - b);
  const pos = ((sorted.length - 1) * p) / 100;
  const lo = Math.floor(pos);
  const hi = Math.ceil(pos);
  return sorted[lo] + (sorted[hi] - sorted[lo]) * (pos - lo);
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return Number.NaN;
  return values.reduce((acc, v) => acc + v, 0) / values.length;
}

/**
 * Two-pass sample standard deviation; NaN below two observations, 0 when the
 * spread is rounding noise relative to the values.
 */
export function sampleStd(values: readonly number[]): number {
  if (values.length < 2) return Number.NaN;
  const avg = mean(values);
  let ss = 0;
  let scale = 0;
  for (const v of values) {
    ss += (v - avg) ** 2;
    scale += v * v;
  }
  const variance = ss / (values.length - 1);
  if (variance <= (scale / values.length) * 1e-24) return 0;
  return Math.sqrt(variance);
}
