// ── Market data ──────────────────────────────────────────────────────────

export interface Bar {
  /** ISO date, YYYY-MM-DD */
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

/** One value per bar; `null` where the value is undefined (warm-up, zero division, missing data). */
export type Series = (number | null)[];

export interface OhlcvColumns {
  open: number[];
  high: number[];
  low: number[];
  close: number[];
  volume: number[];
}

// ── Rule language ────────────────────────────────────────────────────────

export const COMPARISON_OPERATORS = ['>=', '<=', '==', '!=', '>', '<'] as const;
export type ComparisonOperator = (typeof COMPARISON_OPERATORS)[number];

export const LOGICAL_OPERATORS = ['AND', 'OR', 'NOT'] as const;
export type LogicalOperator = (typeof LOGICAL_OPERATORS)[number];

export const ARITHMETIC_OPERATORS = ['*', '/', '+', '-'] as const;
export type ArithmeticOperator = (typeof ARITHMETIC_OPERATORS)[number];

export const VARIABLE_NAMES = [
  'price',
  'open',
  'high',
  'low',
  'close',
  'volume',
  'entry_price',
] as const;
export type VariableName = (typeof VARIABLE_NAMES)[number];

export const INDICATOR_NAMES = [
  'sma',
  'ema',
  'wma',
  'rsi',
  'macd',
  'macd_signal',
  'macd_hist',
  'bb_upper',
  'bb_middle',
  'bb_lower',
  'atr',
  'stoch_k',
  'stoch_d',
  'adx',
  'obv',
  'vwap',
  'cci',
  'roc',
  'williams_r',
  'momentum',
] as const;
export type IndicatorName = (typeof INDICATOR_NAMES)[number];

/** A call argument: a number, or a bare lowercase name such as `volume`. */
export type IndicatorParam = number | string;

export type Expression =
  | { readonly type: 'value'; readonly value: number }
  | { readonly type: 'variable'; readonly name: VariableName }
  | {
      readonly type: 'indicator';
      readonly name: IndicatorName;
      readonly params: readonly IndicatorParam[];
    }
  | {
      readonly type: 'arithmetic';
      readonly operator: ArithmeticOperator;
      readonly left: Expression;
      readonly right: Expression;
    };

export interface ComparisonNode {
  readonly type: 'comparison';
  readonly operator: ComparisonOperator;
  readonly left: Expression;
  readonly right: Expression;
}

export interface OperatorNode {
  readonly type: 'operator';
  readonly operator: LogicalOperator;
}

export type RuleNode = ComparisonNode | OperatorNode;

// ── Strategy ─────────────────────────────────────────────────────────────

export const SIZING_METHODS = ['fixed', 'percentage', 'risk_based'] as const;
export type SizingMethod = (typeof SIZING_METHODS)[number];

export interface PositionSizing {
  method: SizingMethod;
  /** Dollars for `fixed`, percent of cash for `percentage`, percent of cash at risk for `risk_based`. */
  value: number;
}

export interface RiskManagement {
  stopLossPct: number | null;
  takeProfitPct: number | null;
  trailingStop: boolean;
  trailingStopPct: number | null;
}

export interface Strategy {
  name: string;
  description: string;
  entryRules: string;
  exitRules: string;
  positionSizing: PositionSizing;
  riskManagement: RiskManagement;
}

// ── Type guards ──────────────────────────────────────────────────────────

export function isIndicatorName(name: string): name is IndicatorName {
  return INDICATOR_NAMES.some((n) => n === name);
}

export function isVariableName(name: string): name is VariableName {
  return VARIABLE_NAMES.some((n) => n === name);
}

export function isLogicalOperator(token: string): token is LogicalOperator {
  return LOGICAL_OPERATORS.some((op) => op === token);
}

export function isSizingMethod(method: string): method is SizingMethod {
  return SIZING_METHODS.some((m) => m === method);
}
