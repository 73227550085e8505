import { daysBetween, mean, median, stdDev } from '../utils/helpers.js';
import { tradeHoldingDays, tradePnl, tradePnlPct } from './portfolio.js';
import type {
  DrawdownResult,
  EquityPoint,
  MonthlyReturn,
  PerformanceMetrics,
  Trade,
  TradeDistribution,
  TradeStatistics,
} from './types.js';

export const TRADING_DAYS_PER_YEAR = 252;
export const DEFAULT_RISK_FREE_RATE = 0.02;
const DAYS_PER_YEAR = 365.25;

// ── Returns ──────────────────────────────────────────────────────────────

/** Simple period returns between consecutive equity values; the first is 0. */
export function calculateReturns(equity: readonly number[]): number[] {
  return equity.map((value, i) => {
    if (i === 0) return 0;
    const prev = equity[i - 1];
    return prev === 0 ? 0 : (value - prev) / prev;
  });
}

export function totalReturnPct(initialCapital: number, finalEquity: number): number {
  if (initialCapital === 0) return 0;
  return ((finalEquity - initialCapital) / initialCapital) * 100;
}

/** Compound annual growth in percent. A total loss of capital reports -100. */
export function cagrPct(initialCapital: number, finalEquity: number, years: number): number {
  if (years <= 0 || initialCapital <= 0) return 0;
  const ratio = finalEquity / initialCapital;
  if (ratio <= 0) return -100;
  return (ratio ** (1 / years) - 1) * 100;
}

// ── Risk-adjusted ────────────────────────────────────────────────────────

/** Annualised Sharpe ratio over daily returns with sample standard deviation. */
export function sharpeRatio(returns: readonly number[], riskFreeRate = DEFAULT_RISK_FREE_RATE): number {
  if (returns.length < 2) return 0;
  const sd = stdDev(returns);
  if (!Number.isFinite(sd) || sd === 0) return 0;
  const dailyRf = riskFreeRate / TRADING_DAYS_PER_YEAR;
  const excess = mean(returns.map((r) => r - dailyRf));
  return Math.sqrt(TRADING_DAYS_PER_YEAR) * (excess / sd);
}

/**
 * Sortino ratio: the Sharpe numerator over the standard deviation of the
 * negative returns only. Zero when fewer than two returns are negative or
 * they do not vary.
 */
export function sortinoRatio(returns: readonly number[], riskFreeRate = DEFAULT_RISK_FREE_RATE): number {
  const downside = returns.filter((r) => r < 0);
  if (downside.length < 2) return 0;
  const sd = stdDev(downside);
  if (!Number.isFinite(sd) || sd === 0) return 0;
  const dailyRf = riskFreeRate / TRADING_DAYS_PER_YEAR;
  const excess = mean(returns.map((r) => r - dailyRf));
  return Math.sqrt(TRADING_DAYS_PER_YEAR) * (excess / sd);
}

/**
 * Deepest decline from a running peak, in percent (negative or zero). The
 * peak is the highest point at or before the trough; ties resolve to the
 * earliest point.
 */
export function calculateMaxDrawdown(curve: readonly EquityPoint[]): DrawdownResult {
  if (curve.length === 0) {
    return { maxDrawdownPct: 0, peakDate: null, troughDate: null, peakValue: 0, troughValue: 0 };
  }

  let runningMax = curve[0].equity;
  let worst = 0;
  let troughIdx = 0;
  for (let i = 0; i < curve.length; i++) {
    const equity = curve[i].equity;
    if (equity > runningMax) runningMax = equity;
    const dd = runningMax > 0 ? ((equity - runningMax) / runningMax) * 100 : 0;
    if (dd < worst) {
      worst = dd;
      troughIdx = i;
    }
  }

  let peakIdx = 0;
  for (let i = 1; i <= troughIdx; i++) {
    if (curve[i].equity > curve[peakIdx].equity) peakIdx = i;
  }

  return {
    maxDrawdownPct: worst,
    peakDate: curve[peakIdx].date,
    troughDate: curve[troughIdx].date,
    peakValue: curve[peakIdx].equity,
    troughValue: curve[troughIdx].equity,
  };
}

// ── Trades ───────────────────────────────────────────────────────────────

/** Gross profit over gross loss; Infinity with profit and no loss, 0 with neither. */
export function profitFactor(trades: readonly Trade[]): number {
  if (trades.length === 0) return 0;
  const pnls = trades.map(tradePnl);
  const grossProfit = pnls.filter((p) => p > 0).reduce((a, b) => a + b, 0);
  const grossLoss = Math.abs(pnls.filter((p) => p < 0).reduce((a, b) => a + b, 0));
  if (grossLoss === 0) return grossProfit > 0 ? Number.POSITIVE_INFINITY : 0;
  return grossProfit / grossLoss;
}

export function expectancy(trades: readonly Trade[]): number {
  return trades.length === 0 ? 0 : mean(trades.map(tradePnl));
}

export function calculateTradeStatistics(trades: readonly Trade[]): TradeStatistics {
  if (trades.length === 0) {
    return {
      totalTrades: 0,
      winningTrades: 0,
      losingTrades: 0,
      winRatePct: 0,
      profitFactor: 0,
      expectancy: 0,
      avgWin: 0,
      avgLoss: 0,
      largestWin: 0,
      largestLoss: 0,
      avgHoldingDays: 0,
    };
  }

  const pnls = trades.map(tradePnl);
  const wins = pnls.filter((p) => p > 0);
  const losses = pnls.filter((p) => p < 0);

  return {
    totalTrades: trades.length,
    winningTrades: wins.length,
    losingTrades: losses.length,
    winRatePct: (wins.length / trades.length) * 100,
    profitFactor: profitFactor(trades),
    expectancy: expectancy(trades),
    avgWin: wins.length > 0 ? mean(wins) : 0,
    avgLoss: losses.length > 0 ? mean(losses) : 0,
    largestWin: Math.max(...pnls),
    largestLoss: Math.min(...pnls),
    avgHoldingDays: mean(trades.map(tradeHoldingDays)),
  };
}

// ── Aggregate ────────────────────────────────────────────────────────────

export function calculateAllMetrics(
  curve: readonly EquityPoint[],
  trades: readonly Trade[],
  initialCapital: number,
  riskFreeRate = DEFAULT_RISK_FREE_RATE,
): PerformanceMetrics {
  const first = curve[0];
  const last = curve[curve.length - 1];
  const finalEquity = last ? last.equity : initialCapital;
  const years = first && last ? daysBetween(first.date, last.date) / DAYS_PER_YEAR : 0;
  const returns = calculateReturns(curve.map((p) => p.equity));

  return {
    initialCapital,
    finalEquity,
    totalReturnPct: totalReturnPct(initialCapital, finalEquity),
    cagrPct: cagrPct(initialCapital, finalEquity, years),
    sharpeRatio: sharpeRatio(returns, riskFreeRate),
    sortinoRatio: sortinoRatio(returns, riskFreeRate),
    drawdown: calculateMaxDrawdown(curve),
    ...calculateTradeStatistics(trades),
  };
}

/** Month-over-month percent change of month-end equity. */
export function calculateMonthlyReturns(curve: readonly EquityPoint[]): MonthlyReturn[] {
  const monthEnd = new Map<string, number>();
  for (const point of curve) {
    monthEnd.set(point.date.slice(0, 7), point.equity);
  }

  const result: MonthlyReturn[] = [];
  let prev: number | null = null;
  for (const [month, equity] of monthEnd) {
    result.push({
      month,
      returnPct: prev === null || prev === 0 ? null : ((equity - prev) / prev) * 100,
    });
    prev = equity;
  }
  return result;
}

/** Mean, median and population standard deviation of trade pnl and pnl %. */
export function calculateTradeDistribution(trades: readonly Trade[]): TradeDistribution | null {
  if (trades.length === 0) return null;
  const pnls = trades.map(tradePnl);
  const pcts = trades.map(tradePnlPct);
  return {
    meanPnl: mean(pnls),
    medianPnl: median(pnls),
    stdPnl: stdDev(pnls, 0),
    meanPnlPct: mean(pcts),
    medianPnlPct: median(pcts),
    stdPnlPct: stdDev(pcts, 0),
  };
}
