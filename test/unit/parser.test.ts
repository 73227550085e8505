import { describe, expect, it } from 'vitest';
import {
  parseCondition,
  parseExpression,
  parseRules,
  referencesEntryPrice,
} from '../../src/strategy/parser.js';
import { RuleParseError } from '../../src/utils/errors.js';

function parseError(fn: () => unknown): RuleParseError {
  try {
    fn();
  } catch (err) {
    if (err instanceof RuleParseError) return err;
    throw err;
  }
  throw new Error('expected a RuleParseError');
}

describe('parseExpression', () => {
  it('parses numeric literals', () => {
    expect(parseExpression('42')).toEqual({ type: 'value', value: 42 });
    expect(parseExpression(' -1.5 ')).toEqual({ type: 'value', value: -1.5 });
    expect(parseExpression('.5')).toEqual({ type: 'value', value: 0.5 });
  });

  it('parses indicator calls case-insensitively', () => {
    expect(parseExpression('SMA(20)')).toEqual({ type: 'indicator', name: 'sma', params: [20] });
    expect(parseExpression('obv()')).toEqual({ type: 'indicator', name: 'obv', params: [] });
    expect(parseExpression('sma(volume, 20)')).toEqual({
      type: 'indicator',
      name: 'sma',
      params: ['volume', 20],
    });
  });

  it('parses variables case-insensitively', () => {
    expect(parseExpression('Price')).toEqual({ type: 'variable', name: 'price' });
    expect(parseExpression('entry_price')).toEqual({ type: 'variable', name: 'entry_price' });
  });

  it('parses arithmetic around a call', () => {
    expect(parseExpression('sma(20) * 1.02')).toEqual({
      type: 'arithmetic',
      operator: '*',
      left: { type: 'indicator', name: 'sma', params: [20] },
      right: { type: 'value', value: 1.02 },
    });
  });

  it('splits on * before -', () => {
    const expr = parseExpression('close - sma(20) * 2');
    expect(expr).toEqual({
      type: 'arithmetic',
      operator: '*',
      left: {
        type: 'arithmetic',
        operator: '-',
        left: { type: 'variable', name: 'close' },
        right: { type: 'indicator', name: 'sma', params: [20] },
      },
      right: { type: 'value', value: 2 },
    });
  });

  it('rejects unknown indicators', () => {
    const err = parseError(() => parseExpression('foo(3)'));
    expect(err.message).toBe('Unknown indicator: foo');
    expect(err.fragment).toBe('foo(3)');
  });

  it('reports the first inner failure of an arithmetic split', () => {
    expect(parseError(() => parseExpression('foo(3) * 2')).message).toBe('Unknown indicator: foo');
  });

  it('rejects unbalanced calls', () => {
    expect(parseError(() => parseExpression('sma(20')).message).toBe(
      'Unmatched function call syntax: sma(20',
    );
  });

  it('rejects unknown names', () => {
    expect(parseError(() => parseExpression('banana')).message).toBe('Invalid expression: banana');
  });

  it('rejects malformed call arguments', () => {
    expect(parseError(() => parseExpression('sma(2x)')).message).toBe(
      "Invalid argument '2x' in sma(2x)",
    );
  });
});

describe('parseCondition', () => {
  it('prefers two-character operators', () => {
    expect(parseCondition('price >= 10').operator).toBe('>=');
    expect(parseCondition('price != 10').operator).toBe('!=');
    expect(parseCondition('price > 10').operator).toBe('>');
  });

  it('parses both sides', () => {
    expect(parseCondition('rsi(14) < 30')).toEqual({
      type: 'comparison',
      operator: '<',
      left: { type: 'indicator', name: 'rsi', params: [14] },
      right: { type: 'value', value: 30 },
    });
  });

  it('rejects a clause without a comparison', () => {
    expect(parseError(() => parseCondition('price 10')).message).toBe('Invalid condition: price 10');
  });
});

describe('parseRules', () => {
  it('keeps conditions and operators in source order', () => {
    const nodes = parseRules('rsi(14) < 30 AND price > sma(200)');
    expect(nodes.map((n) => n.type)).toEqual(['comparison', 'operator', 'comparison']);
    expect(nodes[1]).toEqual({ type: 'operator', operator: 'AND' });
  });

  it('recognises logical operators in any case', () => {
    const nodes = parseRules('price > 1 and not price > 5 Or price < 0');
    expect(nodes.map((n) => (n.type === 'operator' ? n.operator : 'C'))).toEqual([
      'C',
      'AND',
      'NOT',
      'C',
      'OR',
      'C',
    ]);
  });

  it('returns no nodes for an empty string', () => {
    expect(parseRules('   ')).toEqual([]);
  });

  it('wraps condition errors with the condition text', () => {
    const err = parseError(() => parseRules('price > 1 AND price > banana'));
    expect(err.message).toBe("Error parsing condition 'price > banana': Invalid expression: banana");
    expect(err.fragment).toBe('banana');
  });
});

describe('referencesEntryPrice', () => {
  it('finds entry_price inside arithmetic', () => {
    expect(referencesEntryPrice(parseRules('price < entry_price * 0.95'))).toBe(true);
  });

  it('is false for rules without it', () => {
    expect(referencesEntryPrice(parseRules('rsi(14) > 70'))).toBe(false);
  });
});
