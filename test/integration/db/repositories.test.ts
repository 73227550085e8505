import { describe, expect, it } from 'vitest';
import { BacktestEngine } from '../../../src/backtest/engine.js';
import { type BacktestResult, isBacktestFailure } from '../../../src/backtest/types.js';
import {
  getRecentRuns,
  getRunsForStrategy,
  recordBacktestRun,
} from '../../../src/db/repositories/backtest-runs.js';
import {
  deleteStrategy,
  getStrategy,
  listStrategies,
  saveStrategy,
} from '../../../src/db/repositories/strategies.js';
import { createDefaultStrategy } from '../../../src/strategy/strategy.js';
import type { Bar, Strategy } from '../../../src/strategy/types.js';

function strategyNamed(name: string, description = ''): Strategy {
  return { ...createDefaultStrategy(), name, description };
}

function runResult(strategyName: string): BacktestResult {
  const bars: Bar[] = [100, 101, 102].map((close, i) => ({
    date: `2024-01-0${i + 1}`,
    open: close,
    high: close,
    low: close,
    close,
    volume: 1000,
  }));
  const engine = new BacktestEngine({ commissionRate: 0 });
  const outcome = engine.runSingle('ACME', bars, {
    ...strategyNamed(strategyName),
    entryRules: 'price > 0',
    exitRules: '',
  });
  if (isBacktestFailure(outcome)) throw new Error(outcome.error);
  return outcome;
}

describe('Strategy repository', () => {
  it('saves and reads back a strategy', () => {
    const strategy = strategyNamed('Dip buyer', 'Oversold entries');
    saveStrategy(strategy);

    expect(getStrategy('Dip buyer')).toEqual(strategy);
  });

  it('returns undefined for an unknown name', () => {
    expect(getStrategy('ghost')).toBeUndefined();
  });

  it('replaces a strategy saved under the same name', () => {
    const first = saveStrategy(strategyNamed('Dip buyer'));
    const second = saveStrategy({ ...strategyNamed('Dip buyer'), exitRules: 'rsi(14) > 80' });

    expect(second).toBe(first);
    expect(listStrategies()).toHaveLength(1);
    expect(getStrategy('Dip buyer')?.exitRules).toBe('rsi(14) > 80');
  });

  it('lists strategies by name', () => {
    saveStrategy(strategyNamed('Zeta', 'last'));
    saveStrategy(strategyNamed('Alpha', 'first'));

    expect(listStrategies().map((s) => [s.name, s.description])).toEqual([
      ['Alpha', 'first'],
      ['Zeta', 'last'],
    ]);
  });

  it('deletes by name', () => {
    saveStrategy(strategyNamed('Dip buyer'));

    expect(deleteStrategy('Dip buyer')).toBe(true);
    expect(deleteStrategy('Dip buyer')).toBe(false);
    expect(listStrategies()).toEqual([]);
  });
});

describe('Backtest run repository', () => {
  it('records a run with its headline numbers', () => {
    const result = runResult('Dip buyer');
    const id = recordBacktestRun(result);

    const [run] = getRecentRuns();
    expect(run).toMatchObject({
      id,
      strategyName: 'Dip buyer',
      tickers: ['ACME'],
      startDate: '2024-01-01',
      endDate: '2024-01-03',
      initialCapital: 100_000,
      finalEquity: 100_200,
      tradeCount: 1,
    });
    expect(run.totalReturnPct).toBeCloseTo(0.2, 10);
  });

  it('stores an infinite profit factor as null', () => {
    recordBacktestRun(runResult('Dip buyer'));

    const [run] = getRecentRuns();
    const metrics: unknown = JSON.parse(run.metrics);
    expect(metrics).toMatchObject({ profitFactor: null, totalTrades: 1 });
  });

  it('returns the most recent runs first, up to the limit', () => {
    const first = recordBacktestRun(runResult('A'));
    const second = recordBacktestRun(runResult('B'));
    const third = recordBacktestRun(runResult('A'));

    expect(getRecentRuns().map((r) => r.id)).toEqual([third, second, first]);
    expect(getRecentRuns(2).map((r) => r.id)).toEqual([third, second]);
    expect(getRunsForStrategy('A').map((r) => r.id)).toEqual([third, first]);
  });
});
