import { index, integer, real, sqliteTable, text } from 'drizzle-orm/sqlite-core';

// ── Config (key/value settings) ──────────────────────────────────────────
export const config = sqliteTable('config', {
  key: text('key').primaryKey(),
  value: text('value').notNull(),
  category: text('category').notNull(),
  description: text('description'),
  updatedAt: text('updatedAt').default('CURRENT_TIMESTAMP'),
});

// ── Strategy library ─────────────────────────────────────────────────────
export const strategies = sqliteTable('strategies', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  name: text('name').notNull().unique(),
  description: text('description'),
  document: text('document').notNull(), // JSON StrategyDocument
  createdAt: text('createdAt').notNull(),
  updatedAt: text('updatedAt'),
});

// ── Backtest run history ─────────────────────────────────────────────────
export const backtestRuns = sqliteTable(
  'backtest_runs',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    strategyName: text('strategyName').notNull(),
    tickers: text('tickers').notNull(), // JSON array
    startDate: text('startDate').notNull(),
    endDate: text('endDate').notNull(),
    initialCapital: real('initialCapital').notNull(),
    finalEquity: real('finalEquity').notNull(),
    totalReturnPct: real('totalReturnPct').notNull(),
    tradeCount: integer('tradeCount').notNull(),
    metrics: text('metrics').notNull(), // JSON PerformanceMetrics
    stats: text('stats').notNull(), // JSON PortfolioStatistics
    createdAt: text('createdAt').notNull(),
  },
  (table) => [
    index('idx_backtest_runs_strategy').on(table.strategyName),
    index('idx_backtest_runs_created').on(table.createdAt),
  ],
);
