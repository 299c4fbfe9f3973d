export interface Bar {
  readonly date: string;
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;
  readonly amount?: number;
  /** Main-force net fund inflow, merged in from a fund-flow feed. */
  readonly mainNetInflow?: number;
}

/** Bars for one instrument, ascending by date with no duplicate dates. */
export type Series = readonly Bar[];

/** A loosely typed row as delivered by a market-data source. */
export type RawBarRow = Readonly<Record<string, unknown>>;

export interface FundFlowRow {
  readonly date: string;
  readonly mainNetInflow: number;
}

export type InvalidRowPolicy = 'drop' | 'reject';
