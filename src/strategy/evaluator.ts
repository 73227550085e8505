import { errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import {
  calculateAll,
  columnsFromBars,
  computeIndicator,
  resolveIndicator,
} from './indicator-table.js';
import { parseRules } from './parser.js';
import type {
  ArithmeticOperator,
  Bar,
  ComparisonNode,
  ComparisonOperator,
  Expression,
  OhlcvColumns,
  RuleNode,
  Series,
  VariableName,
} from './types.js';

const log = createLogger('rule-evaluator');

/**
 * A bar sequence prepared for rule evaluation: its OHLCV columns and an
 * indicator table keyed by canonical indicator keys. Indicators computed on
 * demand are memoised into `indicators`, so a frame belongs to one run.
 */
export interface BarFrame {
  bars: readonly Bar[];
  columns: OhlcvColumns;
  indicators: Map<string, Series>;
}

export interface EvaluationContext {
  /** Price `entry_price` resolves to; without it the variable has no value. */
  entryPrice?: number;
}

export function createBarFrame(bars: readonly Bar[], precompute = true): BarFrame {
  const columns = columnsFromBars(bars);
  return {
    bars,
    columns,
    indicators: precompute ? calculateAll(columns) : new Map(),
  };
}

function constant(length: number, value: number | null): Series {
  return new Array<number | null>(length).fill(value);
}

function arithmetic(op: ArithmeticOperator, a: number, b: number): number {
  switch (op) {
    case '*':
      return a * b;
    case '/':
      return a / b;
    case '+':
      return a + b;
    case '-':
      return a - b;
  }
}

/** 0/0 and similar have no value; division of a non-zero by zero stays infinite. */
function applyArithmetic(op: ArithmeticOperator, a: number, b: number): number | null {
  const result = arithmetic(op, a, b);
  return Number.isNaN(result) ? null : result;
}

function variableSeries(name: VariableName, frame: BarFrame, context: EvaluationContext): Series {
  switch (name) {
    case 'price':
    case 'close':
      return frame.columns.close;
    case 'open':
    case 'high':
    case 'low':
    case 'volume':
      return frame.columns[name];
    case 'entry_price':
      return constant(frame.bars.length, context.entryPrice ?? null);
  }
}

function compare(op: ComparisonOperator, a: number, b: number): boolean {
  switch (op) {
    case '>=':
      return a >= b;
    case '<=':
      return a <= b;
    case '==':
      return a === b;
    case '!=':
      return a !== b;
    case '>':
      return a > b;
    case '<':
      return a < b;
  }
}

export function evaluateExpression(
  expr: Expression,
  frame: BarFrame,
  context: EvaluationContext = {},
): Series {
  const length = frame.bars.length;

  switch (expr.type) {
    case 'value':
      return constant(length, expr.value);

    case 'variable':
      return variableSeries(expr.name, frame, context);

    case 'indicator': {
      const call = resolveIndicator(expr.name, expr.params);
      if (!call) return constant(length, null);
      const cached = frame.indicators.get(call.key);
      if (cached) return cached;
      const series = computeIndicator(call, frame.columns);
      frame.indicators.set(call.key, series);
      return series;
    }

    case 'arithmetic': {
      const left = evaluateExpression(expr.left, frame, context);
      const right = evaluateExpression(expr.right, frame, context);
      return left.map((a, i) => {
        const b = right[i];
        return a === null || b === null ? null : applyArithmetic(expr.operator, a, b);
      });
    }
  }
}

/** Per-bar comparison; a bar with an undefined operand is false for every operator. */
export function evaluateComparison(
  node: ComparisonNode,
  frame: BarFrame,
  context: EvaluationContext = {},
): boolean[] {
  const left = evaluateExpression(node.left, frame, context);
  const right = evaluateExpression(node.right, frame, context);
  return left.map((a, i) => {
    const b = right[i];
    return a !== null && b !== null && compare(node.operator, a, b);
  });
}

/**
 * Reduces a parsed rule list to one signal per bar, strictly left to right:
 * `A AND B OR C` is `(A AND B) OR C`. A binary operator combines the running
 * result with the condition that follows it. `NOT` negates the condition that
 * follows it, or the latest result when it ends the rule. If conditions are
 * left over without an operator between them, the first one is the signal.
 */
export function evaluateRules(
  nodes: readonly RuleNode[],
  frame: BarFrame,
  context: EvaluationContext = {},
): boolean[] {
  const stack: boolean[][] = [];
  let pendingBinary: 'AND' | 'OR' | null = null;
  let negateNext = false;

  for (const node of nodes) {
    if (node.type === 'operator') {
      if (node.operator === 'NOT') {
        negateNext = !negateNext;
      } else {
        pendingBinary = node.operator;
      }
      continue;
    }

    const raw = evaluateComparison(node, frame, context);
    const right = negateNext ? raw.map((v) => !v) : raw;
    negateNext = false;

    const left = pendingBinary !== null ? stack.pop() : undefined;
    if (left && pendingBinary === 'AND') {
      stack.push(left.map((v, i) => v && right[i]));
    } else if (left && pendingBinary === 'OR') {
      stack.push(left.map((v, i) => v || right[i]));
    } else {
      stack.push(right);
    }
    pendingBinary = null;
  }

  if (negateNext && stack.length > 0) {
    const top = stack.pop();
    if (top) stack.push(top.map((v) => !v));
  }

  return stack[0] ?? new Array<boolean>(frame.bars.length).fill(false);
}

/**
 * Parses and evaluates a rules string for a backtest run. An empty string
 * never fires; an unparseable one is logged and never fires either.
 */
export function evaluateRuleText(
  rules: string,
  frame: BarFrame,
  context: EvaluationContext = {},
): boolean[] {
  if (rules.trim() === '') return new Array<boolean>(frame.bars.length).fill(false);
  try {
    return evaluateRules(parseRules(rules), frame, context);
  } catch (err) {
    log.warn({ rules, err: errorMessage(err) }, 'Rule parse failed, signal disabled');
    return new Array<boolean>(frame.bars.length).fill(false);
  }
}
