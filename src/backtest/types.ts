import type { Bar } from '../strategy/types.js';

export type ExitReason = 'stop_loss' | 'take_profit' | 'signal' | 'end_of_data';

export interface Position {
  ticker: string;
  entryDate: string;
  entryPrice: number;
  /** Whole shares, always > 0. */
  quantity: number;
  stopLoss: number | null;
  takeProfit: number | null;
  /** Percent below the latest price the stop trails at; null when not trailing. */
  trailingStopPct: number | null;
  entryCommission: number;
}

export interface Trade {
  readonly ticker: string;
  readonly entryDate: string;
  readonly exitDate: string;
  readonly entryPrice: number;
  readonly exitPrice: number;
  readonly quantity: number;
  /** Entry plus exit commission of this round trip. */
  readonly commission: number;
  readonly exitReason: ExitReason;
}

export interface EquityPoint {
  date: string;
  equity: number;
  cash: number;
  positionsValue: number;
}

export interface PortfolioStatistics {
  totalTrades: number;
  winningTrades: number;
  losingTrades: number;
  winRatePct: number;
  totalPnl: number;
  avgWin: number;
  avgLoss: number;
  totalCommission: number;
  avgHoldingDays: number;
}

export interface DrawdownResult {
  maxDrawdownPct: number;
  peakDate: string | null;
  troughDate: string | null;
  peakValue: number;
  troughValue: number;
}

export interface TradeStatistics {
  totalTrades: number;
  winningTrades: number;
  losingTrades: number;
  winRatePct: number;
  /** `Infinity` when there are profits and no losses. */
  profitFactor: number;
  expectancy: number;
  avgWin: number;
  avgLoss: number;
  largestWin: number;
  largestLoss: number;
  avgHoldingDays: number;
}

export interface PerformanceMetrics extends TradeStatistics {
  initialCapital: number;
  finalEquity: number;
  totalReturnPct: number;
  cagrPct: number;
  sharpeRatio: number;
  sortinoRatio: number;
  drawdown: DrawdownResult;
}

export interface MonthlyReturn {
  /** YYYY-MM */
  month: string;
  /** Null for the first month, which has no prior month-end. */
  returnPct: number | null;
}

export interface TradeDistribution {
  meanPnl: number;
  medianPnl: number;
  stdPnl: number;
  meanPnlPct: number;
  medianPnlPct: number;
  stdPnlPct: number;
}

export interface BacktestResult {
  tickers: string[];
  strategyName: string;
  startDate: string;
  endDate: string;
  metrics: PerformanceMetrics;
  trades: readonly Trade[];
  equityCurve: readonly EquityPoint[];
  portfolioStats: PortfolioStatistics;
}

/** Returned instead of a result when a run has no bars to work with. */
export interface BacktestFailure {
  error: string;
  tickers: string[];
}

export type BacktestOutcome = BacktestResult | BacktestFailure;

export function isBacktestFailure(outcome: BacktestOutcome): outcome is BacktestFailure {
  return 'error' in outcome;
}

/** Supplies daily bars for a ticker over an inclusive ISO date range. */
export interface BarSource {
  loadBars(ticker: string, startDate: string, endDate: string): Promise<Bar[]>;
}
