export interface ConfigDefault {
  key: string;
  value: string;
  category: string;
  description: string;
}

export const CONFIG_DEFAULTS: ConfigDefault[] = [
  // Backtest
  {
    key: 'backtest.initialCapital',
    value: '100000',
    category: 'backtest',
    description: 'Starting cash per run (USD)',
  },
  {
    key: 'backtest.commissionRate',
    value: '0.001',
    category: 'backtest',
    description: 'Commission as a fraction of traded value, charged on buys and sells',
  },
  {
    key: 'backtest.slippageRate',
    value: '0.0005',
    category: 'backtest',
    description: 'Fraction added to buy fills and taken off sell fills',
  },

  // Metrics
  {
    key: 'metrics.riskFreeRate',
    value: '0.02',
    category: 'metrics',
    description: 'Annual risk-free rate for Sharpe and Sortino',
  },

  // Data
  {
    key: 'data.lookbackDays',
    value: '365',
    category: 'data',
    description: 'Calendar days loaded before the start date for indicator warm-up',
  },
  {
    key: 'data.timeoutSeconds',
    value: '30',
    category: 'data',
    description: 'HTTP timeout for historical data requests',
  },
];
