import { EmptySeriesError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { mergeFundFlow } from './fund-flow.js';
import { type NormalizeOptions, normalizeBars } from './normalizer.js';
import { normalizeSymbol } from './symbols.js';
import type { FundFlowRow, RawBarRow, Series } from './types.js';

const log = createLogger('series-loader');

/**
 * A market-data feed. Implementations own transport, retries and rate limits;
 * the loader only needs daily rows for a date range.
 */
export interface BarSource {
  getBars(symbol: string, startDate: string, endDate: string): Promise<RawBarRow[]>;
  getFundFlow?(symbol: string, startDate: string, endDate: string): Promise<FundFlowRow[]>;
}

export interface LoadSeriesOptions extends NormalizeOptions {
  withFundFlow?: boolean;
}

export class SeriesLoader {
  constructor(private readonly source: BarSource) {}

  /**
   * Fetch and normalize one instrument's bars. Throws EmptySeriesError when
   * the source has nothing usable for the range.
   */
  async load(
    symbol: string,
    startDate: string,
    endDate: string,
    options: LoadSeriesOptions = {},
  ): Promise<Series> {
    const code = normalizeSymbol(symbol);
    log.info({ symbol: code, startDate, endDate }, 'Loading bars');

    const rows = await this.source.getBars(code, startDate, endDate);
    const series = normalizeBars(rows, options);

    if (!options.withFundFlow || !this.source.getFundFlow) {
      return series;
    }

    const flows = await this.source.getFundFlow(code, startDate, endDate);
    log.debug({ symbol: code, flows: flows.length }, 'Merging fund flow');
    return mergeFundFlow(series, flows);
  }

  /**
   * Load several instruments in parallel. Instruments with no usable data are
   * skipped with a warning; any other failure rejects.
   */
  async loadMultiple(
    symbols: string[],
    startDate: string,
    endDate: string,
    options: LoadSeriesOptions = {},
  ): Promise<Map<string, Series>> {
    const entries = await Promise.all(
      symbols.map(async (symbol) => {
        try {
          return { symbol, series: await this.load(symbol, startDate, endDate, options) };
        } catch (err) {
          if (err instanceof EmptySeriesError) {
            log.warn({ symbol }, 'Skipping symbol, no data available');
            return { symbol, series: null };
          }
          throw err;
        }
      }),
    );

    const result = new Map<string, Series>();
    for (const { symbol, series } of entries) {
      if (series) result.set(normalizeSymbol(symbol), series);
    }
    return result;
  }
}
