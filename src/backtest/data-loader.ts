import { YahooFinanceClient } from '../data/yahoo-finance.js';
import type { Bar } from '../strategy/types.js';
import { addDays } from '../utils/helpers.js';
import { createLogger } from '../utils/logger.js';
import type { BarSource } from './types.js';

const log = createLogger('backtest-data-loader');

/** Calendar days loaded before the start date, about 250 trading days. */
export const DEFAULT_LOOKBACK_DAYS = 365;

export interface HistoricalBarClient {
  getHistoricalBars(symbol: string, startDate: string, endDate: string): Promise<Bar[]>;
}

export interface BacktestDataLoaderOptions {
  lookbackDays?: number;
}

export class BacktestDataLoader implements BarSource {
  private readonly client: HistoricalBarClient;
  private readonly lookbackDays: number;

  constructor(client?: HistoricalBarClient, options: BacktestDataLoaderOptions = {}) {
    this.client = client ?? new YahooFinanceClient();
    this.lookbackDays = options.lookbackDays ?? DEFAULT_LOOKBACK_DAYS;
  }

  /**
   * Loads bars for a single ticker. Adds `lookbackDays` of padding before
   * startDate so that indicators are warm on the first traded bar; the
   * engine only trades from startDate on.
   */
  async loadBars(ticker: string, startDate: string, endDate: string): Promise<Bar[]> {
    const lookbackStart = addDays(startDate, -this.lookbackDays);

    log.info({ ticker, startDate, endDate, lookbackStart }, 'Loading OHLCV data');

    const bars = await this.client.getHistoricalBars(ticker, lookbackStart, endDate);
    if (bars.length === 0) {
      log.warn({ ticker }, 'No data returned');
      return [];
    }

    const sorted = bars
      .filter((b) => b.date <= endDate)
      .sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));

    // One bar per date; the later row for a repeated date wins.
    const byDate = new Map<string, Bar>();
    for (const bar of sorted) byDate.set(bar.date, bar);
    if (byDate.size < sorted.length) {
      log.warn({ ticker, duplicates: sorted.length - byDate.size }, 'Dropped bars with repeated dates');
    }
    return [...byDate.values()];
  }
}
