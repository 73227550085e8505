import { RuleParseError } from '../utils/errors.js';
import {
  ARITHMETIC_OPERATORS,
  COMPARISON_OPERATORS,
  type ComparisonNode,
  type Expression,
  type IndicatorParam,
  type RuleNode,
  isIndicatorName,
  isLogicalOperator,
  isVariableName,
} from './types.js';

const NUMBER_RE = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const CALL_RE = /^(\w+)\(([^()]*)\)$/;
const BARE_NAME_RE = /^[a-z_]\w*$/;

function parseNumber(text: string): number | null {
  return NUMBER_RE.test(text) ? Number(text) : null;
}

function parseArgument(raw: string, call: string): IndicatorParam {
  const arg = raw.trim();
  const num = parseNumber(arg);
  if (num !== null) return num;
  const name = arg.toLowerCase();
  if (!BARE_NAME_RE.test(name)) {
    throw new RuleParseError(`Invalid argument '${arg}' in ${call}`, call);
  }
  return name;
}

/**
 * Parses one side of a comparison. Forms are tried in order: numeric literal,
 * indicator call, variable, then arithmetic split on `* / + -`. Every
 * occurrence of each arithmetic operator is tried before giving up, so
 * `close - sma(20) * 2` still parses when an earlier split point fails.
 */
export function parseExpression(input: string): Expression {
  const expr = input.trim();

  const value = parseNumber(expr);
  if (value !== null) return { type: 'value', value };

  const call = CALL_RE.exec(expr);
  if (call) {
    const name = call[1].toLowerCase();
    const argText = call[2].trim();
    if (!isIndicatorName(name)) {
      throw new RuleParseError(`Unknown indicator: ${name}`, expr);
    }
    const params = argText === '' ? [] : argText.split(',').map((a) => parseArgument(a, expr));
    return { type: 'indicator', name, params };
  }

  const lowered = expr.toLowerCase();
  if (isVariableName(lowered)) return { type: 'variable', name: lowered };

  let firstFailure: RuleParseError | null = null;
  for (const op of ARITHMETIC_OPERATORS) {
    let at = expr.indexOf(op);
    while (at !== -1) {
      const left = expr.slice(0, at);
      const right = expr.slice(at + op.length);
      try {
        return {
          type: 'arithmetic',
          operator: op,
          left: parseExpression(left),
          right: parseExpression(right),
        };
      } catch (err) {
        if (!(err instanceof RuleParseError)) throw err;
        firstFailure ??= err;
      }
      at = expr.indexOf(op, at + 1);
    }
  }

  if (firstFailure) throw firstFailure;
  if (expr.includes('(') || expr.includes(')')) {
    throw new RuleParseError(`Unmatched function call syntax: ${expr}`, expr);
  }
  throw new RuleParseError(`Invalid expression: ${expr}`, expr);
}

export function parseCondition(input: string): ComparisonNode {
  const clause = input.trim();
  for (const op of COMPARISON_OPERATORS) {
    const at = clause.indexOf(op);
    if (at === -1) continue;
    return {
      type: 'comparison',
      operator: op,
      left: parseExpression(clause.slice(0, at)),
      right: parseExpression(clause.slice(at + op.length)),
    };
  }
  throw new RuleParseError(`Invalid condition: ${clause}`, clause);
}

/**
 * Splits a rules string into conditions and logical operators, in source
 * order. `AND`, `OR` and `NOT` are recognised as whole tokens in any case;
 * the words between them form one condition.
 */
export function parseRules(text: string): RuleNode[] {
  const nodes: RuleNode[] = [];
  let clause: string[] = [];

  const flush = (): void => {
    if (clause.length === 0) return;
    const condition = clause.join(' ');
    clause = [];
    try {
      nodes.push(parseCondition(condition));
    } catch (err) {
      if (err instanceof RuleParseError) {
        throw new RuleParseError(
          `Error parsing condition '${condition}': ${err.message}`,
          err.fragment,
        );
      }
      throw err;
    }
  };

  for (const word of text.split(/\s+/)) {
    if (word === '') continue;
    const upper = word.toUpperCase();
    if (isLogicalOperator(upper)) {
      flush();
      nodes.push({ type: 'operator', operator: upper });
    } else {
      clause.push(word);
    }
  }
  flush();

  return nodes;
}

/** True when any expression in the rule list reads `entry_price`. */
export function referencesEntryPrice(nodes: readonly RuleNode[]): boolean {
  const visit = (expr: Expression): boolean => {
    switch (expr.type) {
      case 'variable':
        return expr.name === 'entry_price';
      case 'arithmetic':
        return visit(expr.left) || visit(expr.right);
      default:
        return false;
    }
  };
  return nodes.some((n) => n.type === 'comparison' && (visit(n.left) || visit(n.right)));
}
