import { formatCurrency, formatPercent, formatRatio, round } from '../utils/helpers.js';
import { calculateMonthlyReturns, calculateTradeDistribution } from './metrics.js';
import { tradePnl, tradePnlPct } from './portfolio.js';
import type { BacktestResult } from './types.js';

/**
 * Generate a text summary suitable for console output.
 */
export function generateSummary(result: BacktestResult): string {
  const { metrics } = result;
  const lines: string[] = [];

  lines.push('=== Backtest Results ===');
  lines.push(`Strategy: ${result.strategyName}`);
  lines.push(`Period: ${result.startDate} to ${result.endDate}`);
  lines.push(`Tickers: ${result.tickers.join(', ')}`);
  lines.push(`Initial Capital: ${formatCurrency(metrics.initialCapital)}`);
  lines.push('');

  lines.push('--- Performance ---');
  lines.push(`Final Equity: ${formatCurrency(metrics.finalEquity)}`);
  lines.push(`Total Return: ${formatPercent(metrics.totalReturnPct)}`);
  lines.push(`CAGR: ${formatPercent(metrics.cagrPct)}`);
  lines.push(`Total P&L: ${formatCurrency(result.portfolioStats.totalPnl)}`);
  lines.push(`Commission Paid: ${formatCurrency(result.portfolioStats.totalCommission)}`);
  lines.push('');

  lines.push('--- Trade Statistics ---');
  lines.push(`Total Trades: ${metrics.totalTrades}`);
  lines.push(`Win Rate: ${formatPercent(metrics.winRatePct)}`);
  lines.push(`Wins: ${metrics.winningTrades} | Losses: ${metrics.losingTrades}`);
  lines.push(`Avg Win: ${formatCurrency(metrics.avgWin)}`);
  lines.push(`Avg Loss: ${formatCurrency(metrics.avgLoss)}`);
  lines.push(`Largest Win: ${formatCurrency(metrics.largestWin)}`);
  lines.push(`Largest Loss: ${formatCurrency(metrics.largestLoss)}`);
  lines.push(`Avg Hold: ${metrics.totalTrades > 0 ? `${round(metrics.avgHoldingDays, 1)}d` : 'N/A'}`);
  lines.push('');

  lines.push('--- Risk Metrics ---');
  lines.push(`Max Drawdown: ${formatPercent(metrics.drawdown.maxDrawdownPct)}`);
  if (metrics.drawdown.peakDate && metrics.drawdown.troughDate) {
    lines.push(`Drawdown Window: ${metrics.drawdown.peakDate} to ${metrics.drawdown.troughDate}`);
  }
  lines.push(`Sharpe Ratio: ${formatRatio(metrics.sharpeRatio)}`);
  lines.push(`Sortino Ratio: ${formatRatio(metrics.sortinoRatio)}`);
  lines.push(`Profit Factor: ${formatRatio(metrics.profitFactor)}`);
  lines.push(`Expectancy: ${formatCurrency(metrics.expectancy)}`);

  const distribution = calculateTradeDistribution(result.trades);
  if (distribution) {
    lines.push('');
    lines.push('--- Trade Distribution ---');
    lines.push(
      `P&L mean ${formatCurrency(distribution.meanPnl)}, median ${formatCurrency(distribution.medianPnl)}, ` +
        `std ${formatCurrency(distribution.stdPnl)}`,
    );
    lines.push(
      `P&L % mean ${formatPercent(distribution.meanPnlPct)}, median ${formatPercent(distribution.medianPnlPct)}, ` +
        `std ${formatPercent(distribution.stdPnlPct)}`,
    );
  }

  return lines.join('\n');
}

/**
 * Generate a per-ticker breakdown of trades, best total P&L first.
 */
export function generateTickerBreakdown(result: BacktestResult): string {
  const { trades } = result;
  if (trades.length === 0) return 'No trades to analyze.';

  const byTicker = new Map<string, { trades: number; wins: number; totalPnl: number; sumPnlPct: number }>();

  for (const trade of trades) {
    const existing = byTicker.get(trade.ticker) ?? { trades: 0, wins: 0, totalPnl: 0, sumPnlPct: 0 };
    const pnl = tradePnl(trade);
    existing.trades++;
    if (pnl > 0) existing.wins++;
    existing.totalPnl += pnl;
    existing.sumPnlPct += tradePnlPct(trade);
    byTicker.set(trade.ticker, existing);
  }

  const lines: string[] = ['=== Per-Ticker Breakdown ===', ''];

  const entries = [...byTicker.entries()]
    .map(([ticker, data]) => ({
      ticker,
      ...data,
      avgPnlPct: data.sumPnlPct / data.trades,
      winRatePct: (data.wins / data.trades) * 100,
    }))
    .sort((a, b) => b.totalPnl - a.totalPnl);

  for (const entry of entries) {
    lines.push(
      `${entry.ticker}: ${entry.trades} trades, WR ${formatPercent(entry.winRatePct)}, ` +
        `P&L ${formatCurrency(entry.totalPnl)}, Avg ${formatPercent(entry.avgPnlPct)}`,
    );
  }

  return lines.join('\n');
}

/**
 * Month-end equity changes, one line per month; the first month has no prior month-end.
 */
export function generateMonthlyReturns(result: BacktestResult): string {
  const months = calculateMonthlyReturns(result.equityCurve);
  if (months.length === 0) return 'No equity data.';

  const lines: string[] = ['=== Monthly Returns ===', ''];
  for (const { month, returnPct } of months) {
    lines.push(`${month}: ${returnPct === null ? 'N/A' : formatPercent(returnPct)}`);
  }
  return lines.join('\n');
}

/**
 * Format the equity curve for export or charting.
 */
export function formatEquityCurve(result: BacktestResult): {
  dates: string[];
  values: number[];
  initialCapital: number;
} {
  return {
    dates: result.equityCurve.map((p) => p.date),
    values: result.equityCurve.map((p) => round(p.equity, 2)),
    initialCapital: result.metrics.initialCapital,
  };
}
