import { type BarFrame, createBarFrame, evaluateRuleText } from '../strategy/evaluator.js';
import { parseRules, referencesEntryPrice } from '../strategy/parser.js';
import { calculatePositionSize } from '../strategy/position-sizing.js';
import type { Bar, Strategy } from '../strategy/types.js';
import { createLogger } from '../utils/logger.js';
import { DEFAULT_RISK_FREE_RATE, calculateAllMetrics } from './metrics.js';
import { DEFAULT_COMMISSION_RATE, Portfolio } from './portfolio.js';
import type { BacktestOutcome, BacktestResult, BarSource } from './types.js';

const log = createLogger('backtest-engine');

export const DEFAULT_INITIAL_CAPITAL = 100_000;

export interface BacktestEngineOptions {
  initialCapital?: number;
  commissionRate?: number;
  /** Fraction added to buy fills and taken off sell fills. */
  slippageRate?: number;
  riskFreeRate?: number;
  dataLoader?: BarSource;
}

/**
 * Trading window inside the supplied bars. Bars before `startDate` only warm
 * up indicators; bars after `endDate` are ignored.
 */
export interface RunWindow {
  startDate?: string;
  endDate?: string;
}

/** Signals and bookkeeping for one ticker during a run. */
interface TickerState {
  ticker: string;
  frame: BarFrame;
  /** Indices into `frame.bars` inside the run window. */
  first: number;
  last: number;
  entry: boolean[];
  exit: boolean[];
  baseExit: boolean[];
  exitNeedsEntryPrice: boolean;
}

export class BacktestEngine {
  private readonly initialCapital: number;
  private readonly commissionRate: number;
  private readonly slippageRate: number;
  private readonly riskFreeRate: number;
  private readonly dataLoader: BarSource | undefined;

  constructor(options: BacktestEngineOptions = {}) {
    this.initialCapital = options.initialCapital ?? DEFAULT_INITIAL_CAPITAL;
    this.commissionRate = options.commissionRate ?? DEFAULT_COMMISSION_RATE;
    this.slippageRate = options.slippageRate ?? 0;
    this.riskFreeRate = options.riskFreeRate ?? DEFAULT_RISK_FREE_RATE;
    this.dataLoader = options.dataLoader;
  }

  /** Loads bars for one ticker, then runs `runSingle` over [startDate, endDate]. */
  async run(
    ticker: string,
    strategy: Strategy,
    startDate: string,
    endDate: string,
  ): Promise<BacktestOutcome> {
    const bars = await this.requireLoader().loadBars(ticker, startDate, endDate);
    return this.runSingle(ticker, bars, strategy, { startDate, endDate });
  }

  /** Loads bars for every ticker, then runs `runMulti` over [startDate, endDate]. */
  async runPortfolio(
    tickers: string[],
    strategy: Strategy,
    startDate: string,
    endDate: string,
  ): Promise<BacktestOutcome> {
    const loader = this.requireLoader();
    const loaded = await Promise.all(
      tickers.map(async (ticker) => [ticker, await loader.loadBars(ticker, startDate, endDate)] as const),
    );
    const barsByTicker = new Map<string, Bar[]>(loaded);
    return this.runMulti(barsByTicker, strategy, { startDate, endDate });
  }

  runSingle(
    ticker: string,
    bars: readonly Bar[],
    strategy: Strategy,
    window: RunWindow = {},
  ): BacktestOutcome {
    const state = this.prepareTicker(ticker, bars, strategy, window);
    if (!state) {
      log.warn({ ticker }, 'No data available');
      return { error: `No data available for ${ticker}`, tickers: [ticker] };
    }

    log.info(
      { ticker, strategy: strategy.name, bars: state.last - state.first + 1 },
      'Starting backtest',
    );

    const portfolio = this.createPortfolio();
    for (let i = state.first; i <= state.last; i++) {
      const bar = state.frame.bars[i];
      this.processBar(portfolio, state, i, strategy);
      portfolio.recordEquity(bar.date, new Map([[ticker, bar.close]]));
    }
    this.forceClose(portfolio, [state]);

    return this.buildResult(portfolio, [ticker], strategy, window, [state]);
  }

  /**
   * Runs one strategy over several tickers sharing one cash balance. Dates are
   * the union of all tickers' dates; on each date tickers are processed in
   * map order, then one combined equity point is recorded.
   */
  runMulti(
    barsByTicker: ReadonlyMap<string, readonly Bar[]>,
    strategy: Strategy,
    window: RunWindow = {},
  ): BacktestOutcome {
    const tickers = [...barsByTicker.keys()];
    const states: TickerState[] = [];
    for (const [ticker, bars] of barsByTicker) {
      const state = this.prepareTicker(ticker, bars, strategy, window);
      if (state) {
        states.push(state);
      } else {
        log.warn({ ticker }, 'Skipping ticker, no data available');
      }
    }

    if (states.length === 0) {
      return { error: 'No data available for any tickers', tickers };
    }

    const dateIndex = this.buildDateIndex(states);
    const dates = [...dateIndex.keys()].sort();

    log.info(
      { tickers: states.length, tradingDays: dates.length, strategy: strategy.name },
      'Starting multi-asset backtest',
    );

    const portfolio = this.createPortfolio();
    for (const date of dates) {
      const prices = new Map<string, number>();
      const entries = dateIndex.get(date) ?? [];
      for (const { state, index } of entries) {
        prices.set(state.ticker, state.frame.bars[index].close);
        this.processBar(portfolio, state, index, strategy);
      }
      portfolio.recordEquity(date, prices);
    }
    this.forceClose(portfolio, states);

    return this.buildResult(portfolio, tickers, strategy, window, states);
  }

  // ── Internals ──────────────────────────────────────────────────────────

  private requireLoader(): BarSource {
    if (!this.dataLoader) {
      throw new Error('No dataLoader configured; pass bars to runSingle/runMulti instead');
    }
    return this.dataLoader;
  }

  private createPortfolio(): Portfolio {
    return new Portfolio({
      initialCapital: this.initialCapital,
      commissionRate: this.commissionRate,
    });
  }

  private prepareTicker(
    ticker: string,
    bars: readonly Bar[],
    strategy: Strategy,
    window: RunWindow,
  ): TickerState | null {
    const inRange = bars.filter((b) => window.endDate === undefined || b.date <= window.endDate);
    const first = inRange.findIndex(
      (b) => window.startDate === undefined || b.date >= window.startDate,
    );
    if (first === -1) return null;

    const frame = createBarFrame(inRange);
    const exit = evaluateRuleText(strategy.exitRules, frame);
    return {
      ticker,
      frame,
      first,
      last: inRange.length - 1,
      entry: evaluateRuleText(strategy.entryRules, frame),
      exit,
      baseExit: exit,
      exitNeedsEntryPrice: this.exitNeedsEntryPrice(strategy.exitRules),
    };
  }

  private exitNeedsEntryPrice(rules: string): boolean {
    try {
      return referencesEntryPrice(parseRules(rules));
    } catch {
      // evaluateRuleText has already disabled and logged this rule
      return false;
    }
  }

  private buildDateIndex(states: TickerState[]): Map<string, { state: TickerState; index: number }[]> {
    const index = new Map<string, { state: TickerState; index: number }[]>();
    for (const state of states) {
      for (let i = state.first; i <= state.last; i++) {
        const date = state.frame.bars[i].date;
        let entries = index.get(date);
        if (!entries) {
          entries = [];
          index.set(date, entries);
        }
        entries.push({ state, index: i });
      }
    }
    return index;
  }

  /**
   * One ticker, one bar: with a position open, ratchet the trailing stop and
   * exit on stop/target or the exit signal; when flat, enter on the entry
   * signal. A ticker never exits and re-enters on the same bar.
   */
  private processBar(portfolio: Portfolio, state: TickerState, i: number, strategy: Strategy): void {
    const { ticker } = state;
    const bar = state.frame.bars[i];
    const risk = strategy.riskManagement;

    if (portfolio.hasPosition(ticker)) {
      if (risk.trailingStop) portfolio.updateTrailingStop(ticker, bar.close);

      const reason = portfolio.checkExitConditions(ticker, bar.close, bar.low);
      if (reason || state.exit[i]) {
        const trade = portfolio.closePosition(ticker, bar.date, this.sellPrice(bar.close), reason ?? 'signal');
        state.exit = state.baseExit;
        log.debug(
          { ticker, date: bar.date, price: trade?.exitPrice, reason: trade?.exitReason },
          'Exit executed',
        );
      }
      return;
    }

    if (!state.entry[i]) return;

    const buyPrice = this.buyPrice(bar.close);
    const atr = state.frame.indicators.get('atr(14)')?.[i] ?? null;
    const quantity = calculatePositionSize(strategy.positionSizing, portfolio.cash, buyPrice, atr);
    if (quantity <= 0) return;

    const opened = portfolio.openPosition({
      ticker,
      date: bar.date,
      price: buyPrice,
      quantity,
      stopLoss: risk.stopLossPct != null ? buyPrice * (1 - risk.stopLossPct / 100) : null,
      takeProfit: risk.takeProfitPct != null ? buyPrice * (1 + risk.takeProfitPct / 100) : null,
      trailingStopPct: risk.trailingStop ? risk.trailingStopPct : null,
    });
    if (!opened) return;

    if (state.exitNeedsEntryPrice) {
      state.exit = evaluateRuleText(strategy.exitRules, state.frame, { entryPrice: buyPrice });
    }
    log.debug({ ticker, date: bar.date, price: buyPrice, quantity }, 'Entry executed');
  }

  /** Closes whatever is still open at each ticker's last bar. */
  private forceClose(portfolio: Portfolio, states: TickerState[]): void {
    for (const state of states) {
      if (!portfolio.hasPosition(state.ticker)) continue;
      const bar = state.frame.bars[state.last];
      portfolio.closePosition(state.ticker, bar.date, this.sellPrice(bar.close), 'end_of_data');
    }
  }

  private buyPrice(close: number): number {
    return close * (1 + this.slippageRate);
  }

  private sellPrice(close: number): number {
    return close * (1 - this.slippageRate);
  }

  private buildResult(
    portfolio: Portfolio,
    tickers: string[],
    strategy: Strategy,
    window: RunWindow,
    states: TickerState[],
  ): BacktestResult {
    const curve = portfolio.getEquityCurve();
    const trades = portfolio.getTrades();
    const metrics = calculateAllMetrics(curve, trades, this.initialCapital, this.riskFreeRate);

    const firstDates = states.map((s) => s.frame.bars[s.first].date).sort();
    const lastDates = states.map((s) => s.frame.bars[s.last].date).sort();

    log.info(
      {
        strategy: strategy.name,
        trades: trades.length,
        finalEquity: metrics.finalEquity,
        totalReturnPct: metrics.totalReturnPct,
      },
      'Backtest complete',
    );

    return {
      tickers,
      strategyName: strategy.name,
      startDate: window.startDate ?? firstDates[0],
      endDate: window.endDate ?? lastDates[lastDates.length - 1],
      metrics,
      trades,
      equityCurve: curve,
      portfolioStats: portfolio.getStatistics(),
    };
  }
}
