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
  rsi,
  sma,
  stochastic,
  vwap,
  williamsR,
  wma,
} from './indicators.js';
import type { Bar, IndicatorName, IndicatorParam, OhlcvColumns, Series } from './types.js';

export type SourceColumn = keyof OhlcvColumns;

/** An indicator call with defaults filled in and arguments checked. */
export interface ResolvedIndicator {
  name: IndicatorName;
  source: SourceColumn;
  params: number[];
  /** Canonical table key, e.g. `sma(200)`, `macd(12,26,9)`, `sma(volume,20)`. */
  key: string;
}

interface IndicatorDefinition {
  defaults: number[];
  /** Leading numeric arguments that must be given explicitly. */
  required: number;
  /** Whether a column name may replace the default close series. */
  takesSource: boolean;
  /** Argument positions that are multipliers rather than periods. */
  multipliers?: number[];
}

const DEFINITIONS: Record<IndicatorName, IndicatorDefinition> = {
  sma: { defaults: [], required: 1, takesSource: true },
  ema: { defaults: [], required: 1, takesSource: true },
  wma: { defaults: [], required: 1, takesSource: true },
  rsi: { defaults: [14], required: 0, takesSource: true },
  macd: { defaults: [12, 26, 9], required: 0, takesSource: true },
  macd_signal: { defaults: [12, 26, 9], required: 0, takesSource: true },
  macd_hist: { defaults: [12, 26, 9], required: 0, takesSource: true },
  bb_upper: { defaults: [20, 2], required: 0, takesSource: true, multipliers: [1] },
  bb_middle: { defaults: [20, 2], required: 0, takesSource: true, multipliers: [1] },
  bb_lower: { defaults: [20, 2], required: 0, takesSource: true, multipliers: [1] },
  atr: { defaults: [14], required: 0, takesSource: false },
  stoch_k: { defaults: [14, 3], required: 0, takesSource: false },
  stoch_d: { defaults: [14, 3], required: 0, takesSource: false },
  adx: { defaults: [14], required: 0, takesSource: false },
  obv: { defaults: [], required: 0, takesSource: false },
  vwap: { defaults: [], required: 0, takesSource: false },
  cci: { defaults: [20], required: 0, takesSource: false },
  roc: { defaults: [12], required: 0, takesSource: true },
  williams_r: { defaults: [14], required: 0, takesSource: false },
  momentum: { defaults: [10], required: 0, takesSource: true },
};

const SOURCE_ALIASES = new Map<string, SourceColumn>([
  ['price', 'close'],
  ['close', 'close'],
  ['open', 'open'],
  ['high', 'high'],
  ['low', 'low'],
  ['volume', 'volume'],
]);

/** Periods computed up front for SMA and EMA. */
export const MOVING_AVERAGE_PERIODS = [10, 20, 50, 100, 200] as const;

export function columnsFromBars(bars: readonly Bar[]): OhlcvColumns {
  return {
    open: bars.map((b) => b.open),
    high: bars.map((b) => b.high),
    low: bars.map((b) => b.low),
    close: bars.map((b) => b.close),
    volume: bars.map((b) => b.volume),
  };
}

export function indicatorKey(name: IndicatorName, source: SourceColumn, params: number[]): string {
  const args = source === 'close' ? params.map(String) : [source, ...params.map(String)];
  return `${name}(${args.join(',')})`;
}

/**
 * Fills defaults and validates the arguments of an indicator call.
 * Returns null when the call cannot produce a series: a missing required
 * period, too many arguments, a non-positive or fractional period, or a
 * name argument that is not a price column.
 */
export function resolveIndicator(
  name: IndicatorName,
  args: readonly IndicatorParam[],
): ResolvedIndicator | null {
  const definition = DEFINITIONS[name];
  const numbers: number[] = [];
  let source: SourceColumn = 'close';
  let sawSource = false;

  for (const arg of args) {
    if (typeof arg === 'number') {
      numbers.push(arg);
      continue;
    }
    const column = SOURCE_ALIASES.get(arg);
    if (!definition.takesSource || column === undefined || sawSource) return null;
    source = column;
    sawSource = true;
  }

  const maxParams = Math.max(definition.defaults.length, definition.required);
  if (numbers.length < definition.required || numbers.length > maxParams) {
    return null;
  }

  const params = [...numbers, ...definition.defaults.slice(numbers.length)];
  for (let i = 0; i < params.length; i++) {
    const p = params[i];
    const isMultiplier = definition.multipliers?.includes(i) ?? false;
    const ok = isMultiplier ? Number.isFinite(p) && p > 0 : Number.isInteger(p) && p > 0;
    if (!ok) return null;
  }

  return { name, source, params, key: indicatorKey(name, source, params) };
}

/** Computes one resolved indicator over the given columns. */
export function computeIndicator(call: ResolvedIndicator, columns: OhlcvColumns): Series {
  const values = columns[call.source];
  const { high, low, close, volume } = columns;
  const [p1, p2, p3] = call.params;

  switch (call.name) {
    case 'sma':
      return sma(values, p1);
    case 'ema':
      return ema(values, p1);
    case 'wma':
      return wma(values, p1);
    case 'rsi':
      return rsi(values, p1);
    case 'macd':
      return macd(values, p1, p2, p3).macd;
    case 'macd_signal':
      return macd(values, p1, p2, p3).signal;
    case 'macd_hist':
      return macd(values, p1, p2, p3).histogram;
    case 'bb_upper':
      return bollingerBands(values, p1, p2).upper;
    case 'bb_middle':
      return bollingerBands(values, p1, p2).middle;
    case 'bb_lower':
      return bollingerBands(values, p1, p2).lower;
    case 'atr':
      return atr(high, low, close, p1);
    case 'stoch_k':
      return stochastic(high, low, close, p1, p2).k;
    case 'stoch_d':
      return stochastic(high, low, close, p1, p2).d;
    case 'adx':
      return adx(high, low, close, p1);
    case 'obv':
      return obv(close, volume);
    case 'vwap':
      return vwap(high, low, close, volume);
    case 'cci':
      return cci(high, low, close, p1);
    case 'roc':
      return roc(values, p1);
    case 'williams_r':
      return williamsR(high, low, close, p1);
    case 'momentum':
      return momentum(values, p1);
    default: {
      const unreachable: never = call.name;
      throw new Error(`Unhandled indicator: ${String(unreachable)}`);
    }
  }
}

/**
 * Computes the standard indicator set once per bar sequence, keyed by the
 * same canonical keys `resolveIndicator` produces.
 */
export function calculateAll(columns: OhlcvColumns): Map<string, Series> {
  const { high, low, close, volume } = columns;
  const table = new Map<string, Series>();

  for (const period of MOVING_AVERAGE_PERIODS) {
    table.set(`sma(${period})`, sma(close, period));
    table.set(`ema(${period})`, ema(close, period));
  }

  table.set('rsi(14)', rsi(close, 14));

  const m = macd(close, 12, 26, 9);
  table.set('macd(12,26,9)', m.macd);
  table.set('macd_signal(12,26,9)', m.signal);
  table.set('macd_hist(12,26,9)', m.histogram);

  const bb = bollingerBands(close, 20, 2);
  table.set('bb_upper(20,2)', bb.upper);
  table.set('bb_middle(20,2)', bb.middle);
  table.set('bb_lower(20,2)', bb.lower);

  table.set('atr(14)', atr(high, low, close, 14));

  const stoch = stochastic(high, low, close, 14, 3);
  table.set('stoch_k(14,3)', stoch.k);
  table.set('stoch_d(14,3)', stoch.d);

  table.set('adx(14)', adx(high, low, close, 14));
  table.set('obv()', obv(close, volume));
  table.set('vwap()', vwap(high, low, close, volume));
  table.set('cci(20)', cci(high, low, close, 20));
  table.set('roc(12)', roc(close, 12));
  table.set('williams_r(14)', williamsR(high, low, close, 14));

  return table;
}
