import { desc, eq } from 'drizzle-orm';
import { z } from 'zod';
import type { BacktestResult } from '../../backtest/types.js';
import { getDb } from '../index.js';
import { backtestRuns } from '../schema.js';

const tickersSchema = z.array(z.string());

export interface BacktestRunRecord {
  id: number;
  strategyName: string;
  tickers: string[];
  startDate: string;
  endDate: string;
  initialCapital: number;
  finalEquity: number;
  totalReturnPct: number;
  tradeCount: number;
  /** JSON of the run's PerformanceMetrics; an infinite profit factor is stored as null. */
  metrics: string;
  stats: string;
  createdAt: string;
}

type BacktestRunRow = typeof backtestRuns.$inferSelect;

function toRecord(row: BacktestRunRow): BacktestRunRecord {
  return { ...row, tickers: tickersSchema.parse(JSON.parse(row.tickers)) };
}

export function recordBacktestRun(result: BacktestResult): number {
  const db = getDb();
  const inserted = db
    .insert(backtestRuns)
    .values({
      strategyName: result.strategyName,
      tickers: JSON.stringify(result.tickers),
      startDate: result.startDate,
      endDate: result.endDate,
      initialCapital: result.metrics.initialCapital,
      finalEquity: result.metrics.finalEquity,
      totalReturnPct: result.metrics.totalReturnPct,
      tradeCount: result.trades.length,
      metrics: JSON.stringify(result.metrics),
      stats: JSON.stringify(result.portfolioStats),
      createdAt: new Date().toISOString(),
    })
    .returning({ id: backtestRuns.id })
    .get();

  return inserted.id;
}

/** Most recent runs first. */
export function getRecentRuns(limit = 20): BacktestRunRecord[] {
  const db = getDb();
  return db
    .select()
    .from(backtestRuns)
    .orderBy(desc(backtestRuns.id))
    .limit(limit)
    .all()
    .map(toRecord);
}

export function getRunsForStrategy(strategyName: string, limit = 20): BacktestRunRecord[] {
  const db = getDb();
  return db
    .select()
    .from(backtestRuns)
    .where(eq(backtestRuns.strategyName, strategyName))
    .orderBy(desc(backtestRuns.id))
    .limit(limit)
    .all()
    .map(toRecord);
}
