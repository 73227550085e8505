import { describe, expect, it } from 'vitest';
import {
  adx,
  atr,
  bollingerBands,
  cci,
  ema,
  macd,
  momentum,
  obv,
  roc,
  rollingStd,
  rsi,
  sma,
  stochastic,
  trueRange,
  vwap,
  williamsR,
  wma,
} from '../../src/strategy/indicators.js';
import type { Series } from '../../src/strategy/types.js';

function expectSeriesClose(actual: Series, expected: (number | null)[], digits = 6): void {
  expect(actual).toHaveLength(expected.length);
  expected.forEach((value, i) => {
    if (value === null) {
      expect(actual[i]).toBeNull();
    } else {
      expect(actual[i]).toBeCloseTo(value, digits);
    }
  });
}

describe('moving averages', () => {
  it('sma pads the warm-up with nulls', () => {
    expectSeriesClose(sma([1, 2, 3, 4, 5], 3), [null, null, 2, 3, 4]);
  });

  it('sma is all null when the period exceeds the data', () => {
    expect(sma([1, 2], 3)).toEqual([null, null]);
  });

  it('wma weights recent values more heavily', () => {
    expectSeriesClose(wma([1, 2, 3, 4, 5], 3), [null, null, 14 / 6, 20 / 6, 26 / 6]);
  });

  it('ema is seeded with the first value', () => {
    expectSeriesClose(ema([1, 2, 3], 3), [1, 1.5, 2.25]);
  });

  it('ema skips null inputs without resetting', () => {
    expectSeriesClose(ema([null, 4, null, 8], 3), [null, 4, null, 6]);
  });
});

describe('rsi', () => {
  it('is 100 when the window has gains and no losses', () => {
    expectSeriesClose(rsi([1, 2, 3, 2], 3), [null, null, 100, 100 - 100 / 3]);
  });

  it('is undefined for a flat window', () => {
    expect(rsi([5, 5, 5], 2)).toEqual([null, null, null]);
  });

  it('is 0 after a run of losses', () => {
    expect(rsi([5, 4, 3], 2)[2]).toBe(0);
  });
});

describe('macd', () => {
  it('is zero for a constant series', () => {
    const { macd: line, signal, histogram } = macd([10, 10, 10, 10], 2, 3, 2);
    expect(line).toEqual([0, 0, 0, 0]);
    expect(signal).toEqual([0, 0, 0, 0]);
    expect(histogram).toEqual([0, 0, 0, 0]);
  });
});

describe('range oscillators', () => {
  const high = [10, 12, 11];
  const low = [8, 9, 9];
  const close = [9, 11, 10];

  it('stochastic %K and %D', () => {
    const { k, d } = stochastic(high, low, close, 2, 2);
    expectSeriesClose(k, [null, 75, 100 / 3]);
    expectSeriesClose(d, [null, null, (75 + 100 / 3) / 2]);
  });

  it('stochastic is undefined when high equals low', () => {
    const { k } = stochastic([5, 5], [5, 5], [5, 5], 2, 1);
    expect(k).toEqual([null, null]);
  });

  it('williams %R', () => {
    const r = williamsR(high, low, close, 2);
    expect(r).toHaveLength(3);
    expect(r[0]).toBeNull();
    expect(r[2]).toBeCloseTo(-(2 / 3) * 100, 6);
  });

  it('williams %R is undefined for a flat window', () => {
    expect(williamsR([5, 5, 5], [5, 5, 5], [5, 5, 5], 2)).toEqual([null, null, null]);
  });

  it('cci scales the typical price deviation by 0.015', () => {
    const prices = [1, 3, 5];
    expectSeriesClose(cci(prices, prices, prices, 2), [null, 1 / 0.015, 1 / 0.015]);
  });

  it('cci is undefined without deviation', () => {
    expect(cci([5, 5, 5], [5, 5, 5], [5, 5, 5], 2)).toEqual([null, null, null]);
  });

  it('cci is all null when the period exceeds the data', () => {
    expect(cci([1, 2], [1, 2], [1, 2], 3)).toEqual([null, null]);
  });
});

describe('momentum and roc', () => {
  it('momentum is the difference over the period', () => {
    expect(momentum([1, 4, 9, 16], 2)).toEqual([null, null, 8, 12]);
  });

  it('roc is the percent change over the period', () => {
    expectSeriesClose(roc([10, 11, 12.1], 1), [null, 10, 10]);
  });

  it('roc is all null when the period reaches the data length', () => {
    expect(roc([1, 2, 3], 3)).toEqual([null, null, null]);
  });
});

describe('volatility', () => {
  it('bollinger bands use the sample standard deviation', () => {
    const { upper, middle, lower } = bollingerBands([1, 2, 3], 3, 2);
    expectSeriesClose(middle, [null, null, 2]);
    expectSeriesClose(upper, [null, null, 4]);
    expectSeriesClose(lower, [null, null, 0]);
  });

  it('rollingStd of a single-value window is undefined', () => {
    expect(rollingStd([1, 2], 1)).toEqual([null, null]);
  });

  it('true range uses high - low on the first bar', () => {
    expect(trueRange([10, 12], [8, 9], [9, 11])).toEqual([2, 3]);
  });

  it('atr is the rolling mean of true range', () => {
    expectSeriesClose(atr([10, 12], [8, 9], [9, 11], 2), [null, 2.5]);
  });

  it('adx first appears at bar 2 * period - 2', () => {
    const high = [10, 11, 12, 13, 14];
    const low = [9, 10, 11, 12, 13];
    const close = [9.5, 10.5, 11.5, 12.5, 13.5];
    expectSeriesClose(adx(high, low, close, 2), [null, null, 100, 100, 100]);
  });
});

describe('volume', () => {
  it('obv accumulates signed volume from zero', () => {
    expect(obv([10, 11, 10, 10], [100, 200, 300, 400])).toEqual([0, 200, -100, -100]);
  });

  it('obv of a single bar is zero', () => {
    expect(obv([10], [100])).toEqual([0]);
  });

  it('vwap is the cumulative volume-weighted typical price', () => {
    expectSeriesClose(vwap([10, 20], [10, 20], [10, 20], [1, 3]), [10, 17.5]);
  });

  it('vwap is undefined before any volume trades', () => {
    expectSeriesClose(vwap([10, 20], [10, 20], [10, 20], [0, 2]), [null, 20]);
  });
});
