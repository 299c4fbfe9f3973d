import { z } from 'zod';
import { formatIssues } from '../config/schema-validator.js';
import { EmptySeriesError, InputError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { Bar, InvalidRowPolicy, RawBarRow, Series } from './types.js';

const log = createLogger('normalizer');

const LEADING_DATE = /^(\d{4})-(\d{2})-(\d{2})(?:[T ]|$)/;
const COMPACT_DATE = /^(\d{4})(\d{2})(\d{2})$/;

function utcDay(ms: number): string {
  return new Date(ms).toISOString().slice(0, 10);
}

/** The `YYYY-MM-DD` string when it names a real day; rejects rollovers such as 2024-02-30. */
function realDay(year: string, month: string, day: string): string | null {
  const candidate = `${year}-${month}-${day}`;
  const ms = Date.UTC(Number(year), Number(month) - 1, Number(day));
  return utcDay(ms) === candidate ? candidate : null;
}

/**
 * Reduce a date-like value to a `YYYY-MM-DD` calendar date, or null when it
 * does not name a real day.
 *
 * Strings keep the date they are written with, so `2024-01-02T00:00:00+08:00`
 * is 2024-01-02 whatever its offset. Date objects and epoch milliseconds carry
 * no offset of their own and are read as UTC days.
 */
export function toCalendarDate(value: unknown): string | null {
  if (value instanceof Date) {
    const ms = value.getTime();
    return Number.isNaN(ms) ? null : utcDay(ms);
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? utcDay(value) : null;
  }
  if (typeof value !== 'string') return null;

  const trimmed = value.trim();
  const parts = COMPACT_DATE.exec(trimmed) ?? LEADING_DATE.exec(trimmed);
  if (parts) return realDay(parts[1], parts[2], parts[3]);

  const ms = Date.parse(trimmed);
  return Number.isNaN(ms) ? null : utcDay(ms);
}

const emptyToUndefined = (value: unknown) =>
  value === null || value === undefined || value === '' ? undefined : value;

const price = z.coerce.number().finite().positive();
const volume = z.preprocess(emptyToUndefined, z.coerce.number().finite().nonnegative());
const optionalNumber = z.preprocess(emptyToUndefined, z.coerce.number().finite().optional());

const barRowSchema = z
  .object({
    date: z.unknown().transform((value, ctx) => {
      const date = toCalendarDate(value);
      if (date === null) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Invalid date' });
        return z.NEVER;
      }
      return date;
    }),
    open: price,
    high: price,
    low: price,
    close: price,
    volume,
    amount: optionalNumber,
    mainNetInflow: optionalNumber,
  })
  .refine((b) => b.low <= b.high, 'low exceeds high')
  .refine(
    (b) => b.open >= b.low && b.open <= b.high && b.close >= b.low && b.close <= b.high,
    'open/close outside the high/low range',
  );

function toBar(row: z.infer<typeof barRowSchema>): Bar {
  const bar: Bar = {
    date: row.date,
    open: row.open,
    high: row.high,
    low: row.low,
    close: row.close,
    volume: row.volume,
    ...(row.amount !== undefined ? { amount: row.amount } : {}),
    ...(row.mainNetInflow !== undefined ? { mainNetInflow: row.mainNetInflow } : {}),
  };
  return Object.freeze(bar);
}

export interface NormalizeOptions {
  onInvalidRow?: InvalidRowPolicy;
}

/**
 * Coerce raw rows into a date-ordered Series.
 *
 * Under the default `drop` policy rows that cannot be coerced are skipped;
 * under `reject` the first bad row fails the whole batch. Duplicate dates
 * always fail.
 */
export function normalizeBars(rows: readonly RawBarRow[], options: NormalizeOptions = {}): Series {
  const policy = options.onInvalidRow ?? 'drop';
  const bars: Bar[] = [];
  let dropped = 0;

  rows.forEach((row, index) => {
    const parsed = barRowSchema.safeParse(row);
    if (parsed.success) {
      bars.push(toBar(parsed.data));
      return;
    }
    if (policy === 'reject') {
      throw new InputError(`Invalid bar at row ${index}: ${formatIssues(parsed.error)}`, {
        row: index,
      });
    }
    dropped++;
  });

  if (dropped > 0) {
    log.warn({ dropped, received: rows.length }, 'Dropped rows that could not be coerced');
  }

  if (bars.length === 0) {
    throw new EmptySeriesError();
  }

  bars.sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
  assertSeries(bars);

  log.debug(
    { bars: bars.length, from: bars[0].date, to: bars[bars.length - 1].date },
    'Series normalized',
  );
  return Object.freeze(bars);
}

/**
 * Verify that bars are strictly ascending by date.
 */
export function assertSeries(series: ReadonlyArray<{ readonly date: string }>): void {
  for (let i = 1; i < series.length; i++) {
    const prev = series[i - 1].date;
    const curr = series[i].date;
    if (curr === prev) {
      throw new InputError(`Duplicate bar date ${curr}`, { date: curr, index: i });
    }
    if (curr < prev) {
      throw new InputError(`Bars out of order at index ${i}: ${curr} after ${prev}`, {
        date: curr,
        index: i,
      });
    }
  }
}
