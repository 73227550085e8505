import { CCI, OBV, ROC, SMA, VWAP, WMA, WilliamsR } from 'technicalindicators';
import type { Series } from './types.js';

// ── Series helpers ───────────────────────────────────────────────────────

function nulls(length: number): Series {
  return new Array<number | null>(length).fill(null);
}

/** Right-aligns a shorter library result against the input, padding the warm-up with nulls. */
function alignToEnd(values: number[], length: number): Series {
  const out = nulls(length);
  const offset = length - values.length;
  for (let i = 0; i < values.length; i++) {
    const v = values[i];
    if (offset + i >= 0) out[offset + i] = Number.isFinite(v) ? v : null;
  }
  return out;
}

function isValidPeriod(period: number, length: number): boolean {
  return Number.isInteger(period) && period > 0 && period <= length;
}

function divide(a: number | null, b: number | null): number | null {
  if (a === null || b === null || b === 0) return null;
  const q = a / b;
  return Number.isFinite(q) ? q : null;
}

/** Applies `fn` to every full trailing window; a window holding any null yields null. */
function rolling(values: Series, period: number, fn: (window: number[]) => number): Series {
  const out = nulls(values.length);
  if (!Number.isInteger(period) || period <= 0) return out;
  for (let i = period - 1; i < values.length; i++) {
    const window: number[] = [];
    for (let j = i - period + 1; j <= i; j++) {
      const v = values[j];
      if (v === null) break;
      window.push(v);
    }
    if (window.length === period) out[i] = fn(window);
  }
  return out;
}

function sum(window: number[]): number {
  let s = 0;
  for (const v of window) s += v;
  return s;
}

export function rollingMean(values: Series, period: number): Series {
  return rolling(values, period, (w) => sum(w) / w.length);
}

export function rollingMin(values: Series, period: number): Series {
  return rolling(values, period, (w) => Math.min(...w));
}

export function rollingMax(values: Series, period: number): Series {
  return rolling(values, period, (w) => Math.max(...w));
}

/** Sample (n-1) standard deviation over the trailing window. */
export function rollingStd(values: Series, period: number): Series {
  return rolling(values, period, (w) => {
    if (w.length < 2) return Number.NaN;
    const m = sum(w) / w.length;
    let acc = 0;
    for (const v of w) acc += (v - m) ** 2;
    return Math.sqrt(acc / (w.length - 1));
  }).map((v) => (v !== null && Number.isFinite(v) ? v : null));
}

// ── Moving averages ──────────────────────────────────────────────────────

export function sma(values: number[], period: number): Series {
  if (!isValidPeriod(period, values.length)) return nulls(values.length);
  return alignToEnd(SMA.calculate({ period, values }), values.length);
}

/**
 * Exponential moving average, alpha = 2/(period+1), seeded with the first
 * defined observation. Null inputs produce null and leave the state unchanged.
 */
export function ema(values: Series, period: number): Series {
  const out = nulls(values.length);
  if (!Number.isInteger(period) || period <= 0) return out;
  const alpha = 2 / (period + 1);
  let prev: number | null = null;
  for (let i = 0; i < values.length; i++) {
    const v = values[i];
    if (v === null) continue;
    prev = prev === null ? v : alpha * v + (1 - alpha) * prev;
    out[i] = prev;
  }
  return out;
}

export function wma(values: number[], period: number): Series {
  if (!isValidPeriod(period, values.length)) return nulls(values.length);
  return alignToEnd(WMA.calculate({ period, values }), values.length);
}

// ── Oscillators ──────────────────────────────────────────────────────────

/**
 * RSI over simple rolling means of gains and losses. The first bar has no
 * prior close and counts as a zero change.
 */
export function rsi(values: number[], period = 14): Series {
  const gains: number[] = [];
  const losses: number[] = [];
  for (let i = 0; i < values.length; i++) {
    const delta = i === 0 ? 0 : values[i] - values[i - 1];
    gains.push(delta > 0 ? delta : 0);
    losses.push(delta < 0 ? -delta : 0);
  }
  const avgGain = rollingMean(gains, period);
  const avgLoss = rollingMean(losses, period);

  return avgGain.map((g, i) => {
    const l = avgLoss[i];
    if (g === null || l === null) return null;
    if (l === 0) return g === 0 ? null : 100;
    return 100 - 100 / (1 + g / l);
  });
}

export interface MacdSeries {
  macd: Series;
  signal: Series;
  histogram: Series;
}

export function macd(values: number[], fast = 12, slow = 26, signal = 9): MacdSeries {
  const fastEma = ema(values, fast);
  const slowEma = ema(values, slow);
  const line: Series = fastEma.map((f, i) => {
    const s = slowEma[i];
    return f === null || s === null ? null : f - s;
  });
  const signalLine = ema(line, signal);
  const histogram: Series = line.map((m, i) => {
    const s = signalLine[i];
    return m === null || s === null ? null : m - s;
  });
  return { macd: line, signal: signalLine, histogram };
}

export interface StochasticSeries {
  k: Series;
  d: Series;
}

/**
 * %K stays hand-written: the library's Stochastic turns a flat window into
 * %K = 0 instead of no value, and derives %D from that.
 */
export function stochastic(
  high: number[],
  low: number[],
  close: number[],
  kPeriod = 14,
  dPeriod = 3,
): StochasticSeries {
  const lowest = rollingMin(low, kPeriod);
  const highest = rollingMax(high, kPeriod);
  const k: Series = close.map((c, i) => {
    const ll = lowest[i];
    const hh = highest[i];
    if (ll === null || hh === null) return null;
    const ratio = divide(c - ll, hh - ll);
    return ratio === null ? null : 100 * ratio;
  });
  return { k, d: rollingMean(k, dPeriod) };
}

export function williamsR(high: number[], low: number[], close: number[], period = 14): Series {
  if (!isValidPeriod(period, close.length)) return nulls(close.length);
  return alignToEnd(WilliamsR.calculate({ high, low, close, period }), close.length);
}

export function cci(high: number[], low: number[], close: number[], period = 20): Series {
  if (!isValidPeriod(period, close.length)) return nulls(close.length);
  return alignToEnd(CCI.calculate({ high, low, close, period }), close.length);
}

export function roc(values: number[], period = 12): Series {
  if (!Number.isInteger(period) || period <= 0 || period >= values.length) {
    return nulls(values.length);
  }
  return alignToEnd(ROC.calculate({ period, values }), values.length);
}

export function momentum(values: number[], period = 10): Series {
  return values.map((v, i) =>
    Number.isInteger(period) && period > 0 && i >= period ? v - values[i - period] : null,
  );
}

// ── Volatility ───────────────────────────────────────────────────────────

export interface BollingerSeries {
  upper: Series;
  middle: Series;
  lower: Series;
}

export function bollingerBands(values: number[], period = 20, k = 2): BollingerSeries {
  const middle = sma(values, period);
  const std = rollingStd(values, period);
  const upper: Series = [];
  const lower: Series = [];
  for (let i = 0; i < values.length; i++) {
    const m = middle[i];
    const s = std[i];
    upper.push(m === null || s === null ? null : m + k * s);
    lower.push(m === null || s === null ? null : m - k * s);
  }
  return { upper, middle, lower };
}

/** True range; the first bar has no previous close and uses high - low. */
export function trueRange(high: number[], low: number[], close: number[]): number[] {
  return high.map((h, i) => {
    const hl = h - low[i];
    if (i === 0) return hl;
    const prevClose = close[i - 1];
    return Math.max(hl, Math.abs(h - prevClose), Math.abs(low[i] - prevClose));
  });
}

export function atr(high: number[], low: number[], close: number[], period = 14): Series {
  return rollingMean(trueRange(high, low, close), period);
}

/**
 * ADX from +DM/-DM averaged over `period`, normalised by ATR into DI lines,
 * then DX smoothed by a second rolling mean. First value at bar 2*period-2.
 */
export function adx(high: number[], low: number[], close: number[], period = 14): Series {
  const plusDm: number[] = [];
  const minusDm: number[] = [];
  for (let i = 0; i < high.length; i++) {
    const up = i === 0 ? 0 : high[i] - high[i - 1];
    const down = i === 0 ? 0 : low[i - 1] - low[i];
    plusDm.push(up > down && up > 0 ? up : 0);
    minusDm.push(down > up && down > 0 ? down : 0);
  }

  const range = atr(high, low, close, period);
  const plusAvg = rollingMean(plusDm, period);
  const minusAvg = rollingMean(minusDm, period);

  const dx: Series = range.map((a, i) => {
    const p = divide(plusAvg[i], a);
    const m = divide(minusAvg[i], a);
    if (p === null || m === null) return null;
    const plusDi = 100 * p;
    const minusDi = 100 * m;
    const ratio = divide(Math.abs(plusDi - minusDi), plusDi + minusDi);
    return ratio === null ? null : 100 * ratio;
  });

  return rollingMean(dx, period);
}

// ── Volume ───────────────────────────────────────────────────────────────

/** The library starts counting at the second bar; the first bar is 0. */
export function obv(close: number[], volume: number[]): Series {
  const out = alignToEnd(OBV.calculate({ close, volume }), close.length);
  if (out.length > 0) out[0] = 0;
  return out;
}

export function vwap(high: number[], low: number[], close: number[], volume: number[]): Series {
  return alignToEnd(VWAP.calculate({ high, low, close, volume }), close.length);
}
