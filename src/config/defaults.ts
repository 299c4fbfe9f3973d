export interface ConfigDefault {
  key: string;
  value: string;
  category: string;
  description: string;
}

export const CONFIG_DEFAULTS: ConfigDefault[] = [
  // Normalizer
  {
    key: 'normalizer.onInvalidRow',
    value: '"drop"',
    category: 'normalizer',
    description: 'Rows that cannot be coerced: drop or reject',
  },

  // Price channel
  {
    key: 'indicators.channelPct',
    value: '0.01',
    category: 'indicators',
    description: 'Mid-price channel half-width (fraction)',
  },

  // Breakout
  {
    key: 'indicators.breakout.window',
    value: '5',
    category: 'indicators',
    description: 'Trailing bars for the breakout envelope',
  },
  {
    key: 'indicators.breakout.threshold',
    value: '0.02',
    category: 'indicators',
    description: 'Fraction beyond the envelope that counts as a breakout',
  },

  // Amplitude
  {
    key: 'indicators.amplitude.maPeriod',
    value: '10',
    category: 'indicators',
    description: 'Moving-average and ATR period for amplitude',
  },
  {
    key: 'indicators.amplitude.window',
    value: '20',
    category: 'indicators',
    description: 'Trailing window for amplitude percentile and z-score',
  },
  {
    key: 'indicators.amplitude.percentiles',
    value: '[20,50,80]',
    category: 'indicators',
    description: 'Percentile bands computed over the amplitude window',
  },
  {
    key: 'indicators.amplitude.abnormalPercentile',
    value: '90',
    category: 'indicators',
    description: 'Percentile above which amplitude is flagged abnormal',
  },

  // Open/mid divergence
  {
    key: 'indicators.openMidDiff.maPeriod',
    value: '5',
    category: 'indicators',
    description: 'Moving-average and trailing-sum period for open/mid divergence',
  },
  {
    key: 'indicators.openMidDiff.window',
    value: '20',
    category: 'indicators',
    description: 'Trailing window for open/mid divergence percentile and z-score',
  },
  {
    key: 'indicators.openMidDiff.percentiles',
    value: '[20,50,80]',
    category: 'indicators',
    description: 'Percentile bands computed over the divergence window',
  },

  // MPMI
  {
    key: 'indicators.mpmi.fast',
    value: '12',
    category: 'indicators',
    description: 'Short EMA span',
  },
  {
    key: 'indicators.mpmi.slow',
    value: '26',
    category: 'indicators',
    description: 'Long EMA span',
  },
  {
    key: 'indicators.mpmi.signal',
    value: '9',
    category: 'indicators',
    description: 'Signal EMA span',
  },

  // Alerts
  {
    key: 'alerts.window',
    value: '5',
    category: 'alerts',
    description: 'Trailing bars for the breakout alert',
  },
  {
    key: 'alerts.amplitudeThresholdPercentile',
    value: '90',
    category: 'alerts',
    description: 'Amplitude percentile that raises an alert',
  },
  {
    key: 'alerts.priceChangeThreshold',
    value: '0.02',
    category: 'alerts',
    description: 'Breakout threshold (fraction) for alerts',
  },
  {
    key: 'alerts.fundFlowThreshold',
    value: '1000000',
    category: 'alerts',
    description: 'Absolute net fund flow that raises an alert',
  },

  // Backtest
  {
    key: 'backtest.initialCapital',
    value: '100000',
    category: 'backtest',
    description: 'Starting cash',
  },
  {
    key: 'backtest.feeRate',
    value: '0.0003',
    category: 'backtest',
    description: 'Fee charged on notional per fill',
  },
  {
    key: 'backtest.upperPct',
    value: '0.01',
    category: 'backtest',
    description: 'Sell channel above mid-price (fraction)',
  },
  {
    key: 'backtest.lowerPct',
    value: '0.01',
    category: 'backtest',
    description: 'Buy channel below mid-price (fraction)',
  },
  {
    key: 'backtest.riskFreeRate',
    value: '0.03',
    category: 'backtest',
    description: 'Annual risk-free rate for the Sharpe ratio',
  },

  // Optimizer
  {
    key: 'optimizer.upperRange',
    value: '{"start":0.005,"stop":0.02,"step":0.005}',
    category: 'optimizer',
    description: 'Grid for upperPct',
  },
  {
    key: 'optimizer.lowerRange',
    value: '{"start":0.005,"stop":0.02,"step":0.005}',
    category: 'optimizer',
    description: 'Grid for lowerPct',
  },
];
