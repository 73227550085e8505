import { beforeEach, describe, expect, it, vi } from 'vitest';

const { mockAxiosGet } = vi.hoisted(() => ({ mockAxiosGet: vi.fn() }));

vi.mock('axios', () => ({ default: { get: mockAxiosGet } }));

vi.mock('../../src/utils/logger.js', () => ({
  createLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

import { YahooFinanceClient, barsFromChart } from '../../src/data/yahoo-finance.js';

// 2024-01-02 and 2024-01-03, 14:30 UTC
const DAY_1 = 1704205800;
const DAY_2 = DAY_1 + 86_400;

type Quote = Partial<Record<'open' | 'high' | 'low' | 'close' | 'volume', (number | null)[]>>;

function chart(quote: Quote, timestamp = [DAY_1, DAY_2]) {
  return { chart: { result: [{ timestamp, indicators: { quote: [quote] } }] } };
}

describe('barsFromChart', () => {
  it('converts rows to dated bars', () => {
    const bars = barsFromChart(
      chart({
        open: [10, 11],
        high: [12, 13],
        low: [9, 10],
        close: [11, 12],
        volume: [1000, 2000],
      }),
    );
    expect(bars).toEqual([
      { date: '2024-01-02', open: 10, high: 12, low: 9, close: 11, volume: 1000 },
      { date: '2024-01-03', open: 11, high: 13, low: 10, close: 12, volume: 2000 },
    ]);
  });

  it('drops rows without an open or close and fills other gaps', () => {
    const bars = barsFromChart(
      chart({
        open: [null, 11],
        high: [12, null],
        low: [9, null],
        close: [11, 12],
        volume: [1000, null],
      }),
    );
    expect(bars).toEqual([{ date: '2024-01-03', open: 11, high: 11, low: 11, close: 12, volume: 0 }]);
  });

  it('is empty for a missing result', () => {
    expect(barsFromChart({ chart: { result: null } })).toEqual([]);
  });
});

describe('YahooFinanceClient', () => {
  beforeEach(() => {
    mockAxiosGet.mockReset();
  });

  it('requests the chart for the inclusive date range', async () => {
    mockAxiosGet.mockResolvedValue({ data: chart({ open: [10, 11], close: [11, 12] }) });
    const client = new YahooFinanceClient({ timeoutMs: 5000 });

    const bars = await client.getHistoricalBars('^GSPC', '2024-01-01', '2024-01-03');

    expect(bars).toHaveLength(2);
    expect(mockAxiosGet).toHaveBeenCalledWith(
      'https://query1.finance.yahoo.com/v8/finance/chart/%5EGSPC',
      expect.objectContaining({
        params: { period1: 1704067200, period2: 1704326400, interval: '1d', includePrePost: false },
        timeout: 5000,
      }),
    );
  });

  it('retries and then gives up with an empty list', async () => {
    mockAxiosGet.mockRejectedValue(new Error('socket hang up'));
    const client = new YahooFinanceClient({ retries: 2, retryDelayMs: 0 });

    expect(await client.getHistoricalBars('ACME', '2024-01-01', '2024-01-03')).toEqual([]);
    expect(mockAxiosGet).toHaveBeenCalledTimes(2);
  });

  it('treats an unexpected payload as a failure', async () => {
    mockAxiosGet.mockResolvedValue({ data: { error: 'not found' } });
    const client = new YahooFinanceClient({ retries: 1, retryDelayMs: 0 });

    expect(await client.getHistoricalBars('ACME', '2024-01-01', '2024-01-03')).toEqual([]);
    expect(mockAxiosGet).toHaveBeenCalledTimes(1);
  });

  it('does not call out for an invalid date', async () => {
    const client = new YahooFinanceClient({ retries: 1, retryDelayMs: 0 });

    expect(await client.getHistoricalBars('ACME', 'not-a-date', '2024-01-03')).toEqual([]);
    expect(mockAxiosGet).not.toHaveBeenCalled();
  });
});
