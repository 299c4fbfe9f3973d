export type PositionState = 'FLAT' | 'LONG';

export interface ChannelParams {
  upperPct: number;
  lowerPct: number;
}

export interface BacktestConfig extends ChannelParams {
  initialCapital: number;
  feeRate: number;
  /** Annual rate; the Sharpe ratio uses riskFreeRate / 252 per day. */
  riskFreeRate: number;
}

export interface BacktestTrade {
  readonly date: string;
  readonly side: 'buy' | 'sell';
  readonly price: number;
  readonly shares: number;
  /** Notional, shares × price. */
  readonly amount: number;
  readonly fee: number;
  /** Buys: notional plus fee, the position's cost basis. */
  readonly cost?: number;
  /** Sells: net proceeds minus cost basis. */
  readonly profit?: number;
}

export interface BacktestPosition {
  readonly date: string;
  readonly shares: number;
  readonly capital: number;
  readonly closePrice: number;
  readonly positionValue: number;
  readonly totalValue: number;
}

export interface EquityPoint {
  readonly date: string;
  readonly totalValue: number;
  /** Percent change from the previous day; null on the first day. */
  readonly dailyReturn: number | null;
  /** Percent change from the first day. */
  readonly cumulativeReturn: number;
  /** Percent below the running peak (≤ 0). */
  readonly drawdown: number;
}

export interface BacktestStats {
  /** Percent. */
  readonly totalReturn: number;
  /** Number of buys. */
  readonly totalTrades: number;
  readonly winTrades: number;
  readonly lossTrades: number;
  /** Fraction of sells with positive profit. */
  readonly winRate: number;
  /** Percent, ≤ 0. */
  readonly maxDrawdown: number;
  readonly sharpeRatio: number;
  readonly avgDailyReturn: number | null;
  readonly volatility: number | null;
}

export interface BacktestResult {
  readonly params: Readonly<BacktestConfig>;
  readonly initialCapital: number;
  readonly finalValue: number;
  readonly finalState: PositionState;
  readonly trades: readonly BacktestTrade[];
  readonly positions: readonly BacktestPosition[];
  readonly equityCurve: readonly EquityPoint[];
  readonly stats: BacktestStats;
}

export interface GridRange {
  start: number;
  stop: number;
  step: number;
}

export interface GridPointResult extends ChannelParams {
  readonly totalReturn: number;
  readonly totalTrades: number;
  readonly winRate: number;
}

export interface OptimizationResult {
  readonly bestParams: ChannelParams;
  readonly bestReturn: number;
  readonly allResults: readonly GridPointResult[];
}
