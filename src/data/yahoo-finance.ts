import axios from 'axios';
import { z } from 'zod';
import type { Bar } from '../strategy/types.js';
import { DataLoadError, errorMessage } from '../utils/errors.js';
import { retryAsync } from '../utils/helpers.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('yahoo-finance');

const YAHOO_CHART_URL = 'https://query1.finance.yahoo.com/v8/finance/chart';

// Common headers for Yahoo Finance REST calls
const YF_HEADERS = {
  'User-Agent': 'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7)',
};

const SECONDS_PER_DAY = 86_400;

const nullableNumbers = z.array(z.number().nullable()).optional();

const chartResponseSchema = z.object({
  chart: z.object({
    result: z
      .array(
        z.object({
          timestamp: z.array(z.number()).optional(),
          indicators: z.object({
            quote: z.array(
              z.object({
                open: nullableNumbers,
                high: nullableNumbers,
                low: nullableNumbers,
                close: nullableNumbers,
                volume: nullableNumbers,
              }),
            ),
          }),
        }),
      )
      .nullable(),
  }),
});

type ChartResponse = z.infer<typeof chartResponseSchema>;

export interface YahooFinanceClientOptions {
  timeoutMs?: number;
  retries?: number;
  retryDelayMs?: number;
}

/** Converts a chart payload into bars, dropping rows without an open or close. */
export function barsFromChart(payload: ChartResponse): Bar[] {
  const result = payload.chart.result?.[0];
  const timestamps = result?.timestamp;
  const quote = result?.indicators.quote[0];
  if (!timestamps || !quote) return [];

  const bars: Bar[] = [];
  for (let i = 0; i < timestamps.length; i++) {
    const o = quote.open?.[i];
    const h = quote.high?.[i];
    const l = quote.low?.[i];
    const c = quote.close?.[i];
    const v = quote.volume?.[i];

    if (o == null || c == null) continue;

    bars.push({
      date: new Date(timestamps[i] * 1000).toISOString().split('T')[0],
      open: o,
      high: h ?? o,
      low: l ?? o,
      close: c,
      volume: v ?? 0,
    });
  }
  return bars;
}

export class YahooFinanceClient {
  private readonly timeoutMs: number;
  private readonly retries: number;
  private readonly retryDelayMs: number;

  constructor(options: YahooFinanceClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 15_000;
    this.retries = options.retries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 1000;
  }

  /**
   * Daily bars for `symbol` from `startDate` through `endDate` inclusive.
   * Network and payload failures are logged and yield an empty list.
   */
  async getHistoricalBars(symbol: string, startDate: string, endDate: string): Promise<Bar[]> {
    try {
      const bars = await retryAsync(
        () => this.fetchChart(symbol, startDate, endDate),
        this.retries,
        this.retryDelayMs,
      );
      if (bars.length === 0) {
        log.warn({ symbol }, 'No historical data returned');
      }
      return bars;
    } catch (err) {
      log.error({ symbol, err: errorMessage(err) }, 'Failed to fetch historical data');
      return [];
    }
  }

  private async fetchChart(symbol: string, startDate: string, endDate: string): Promise<Bar[]> {
    const period1 = Math.floor(Date.parse(startDate) / 1000);
    const period2 = Math.floor(Date.parse(endDate) / 1000) + SECONDS_PER_DAY;
    if (!Number.isFinite(period1) || !Number.isFinite(period2)) {
      throw new DataLoadError(`Invalid date range ${startDate}..${endDate}`, symbol);
    }

    const { data } = await axios.get<unknown>(`${YAHOO_CHART_URL}/${encodeURIComponent(symbol)}`, {
      params: {
        period1,
        period2,
        interval: '1d',
        includePrePost: false,
      },
      headers: YF_HEADERS,
      timeout: this.timeoutMs,
    });

    const parsed = chartResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new DataLoadError(`Unexpected chart payload: ${parsed.error.issues[0].message}`, symbol);
    }
    return barsFromChart(parsed.data);
  }
}
