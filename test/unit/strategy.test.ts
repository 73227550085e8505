import { readFileSync, readdirSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { describe, expect, it } from 'vitest';
import {
  createDefaultStrategy,
  deserializeStrategy,
  serializeStrategy,
  validateStrategy,
} from '../../src/strategy/strategy.js';
import { StrategyValidationError } from '../../src/utils/errors.js';

const baseDocument = {
  name: 'Dip buyer',
  entry_rules: 'rsi(14) < 30',
  exit_rules: 'rsi(14) > 70',
};

function errorOf(input: unknown): string | undefined {
  const result = validateStrategy(input);
  return result.valid ? undefined : result.error;
}

describe('validateStrategy', () => {
  it('accepts a minimal document', () => {
    expect(validateStrategy(baseDocument)).toEqual({ valid: true });
  });

  it('accepts empty rule strings', () => {
    expect(validateStrategy({ ...baseDocument, exit_rules: '' })).toEqual({ valid: true });
  });

  it('rejects non-objects', () => {
    expect(errorOf('strategy')).toBe('Strategy must be an object');
    expect(errorOf(null)).toBe('Strategy must be an object');
    expect(errorOf([])).toBe('Strategy must be an object');
  });

  it('names the first missing field', () => {
    expect(errorOf({ name: 'x', entry_rules: 'price > 1' })).toBe(
      'Missing required field: exit_rules',
    );
  });

  it('reports field type errors with their path', () => {
    expect(errorOf({ ...baseDocument, name: 5 })).toBe('name: Expected string, received number');
  });

  it('bounds the name length', () => {
    expect(errorOf({ ...baseDocument, name: '' })).toBe('Strategy name must be 1-100 characters');
    expect(errorOf({ ...baseDocument, name: 'x'.repeat(101) })).toBe(
      'Strategy name must be 1-100 characters',
    );
  });

  it('rejects rules that do not parse', () => {
    expect(errorOf({ ...baseDocument, entry_rules: 'price > banana' })).toBe(
      "Invalid entry rules: Error parsing condition 'price > banana': Invalid expression: banana",
    );
    expect(errorOf({ ...baseDocument, exit_rules: 'foo(1) > 2' })).toBe(
      "Invalid exit rules: Error parsing condition 'foo(1) > 2': Unknown indicator: foo",
    );
  });

  it('rejects unknown sizing methods', () => {
    expect(errorOf({ ...baseDocument, position_sizing: { method: 'kelly', value: 1 } })).toBe(
      'Invalid position sizing method: kelly',
    );
  });

  it('bounds the risk percentages', () => {
    const withRisk = (risk: Record<string, unknown>) =>
      errorOf({ ...baseDocument, risk_management: risk });
    expect(withRisk({ stop_loss_pct: 0 })).toBe('Stop loss percentage must be between 0 and 100');
    expect(withRisk({ stop_loss_pct: 150 })).toBe(
      'Stop loss percentage must be between 0 and 100',
    );
    expect(withRisk({ take_profit_pct: 1001 })).toBe(
      'Take profit percentage must be between 0 and 1000',
    );
    expect(withRisk({ trailing_stop_pct: -1 })).toBe(
      'Trailing stop percentage must be between 0 and 100',
    );
    expect(withRisk({ stop_loss_pct: 100, take_profit_pct: 1000, trailing_stop_pct: null })).toBe(
      undefined,
    );
  });
});

describe('deserializeStrategy', () => {
  it('fills defaults for optional sections', () => {
    expect(deserializeStrategy(baseDocument)).toEqual({
      name: 'Dip buyer',
      description: '',
      entryRules: 'rsi(14) < 30',
      exitRules: 'rsi(14) > 70',
      positionSizing: { method: 'percentage', value: 10 },
      riskManagement: {
        stopLossPct: null,
        takeProfitPct: null,
        trailingStop: false,
        trailingStopPct: null,
      },
    });
  });

  it('throws a StrategyValidationError for invalid documents', () => {
    expect(() => deserializeStrategy({ name: 'x' })).toThrow(StrategyValidationError);
    expect(() => deserializeStrategy({ name: 'x' })).toThrow('Missing required field: entry_rules');
  });

  it('reads back what serializeStrategy writes', () => {
    const strategy = {
      ...createDefaultStrategy(),
      name: 'Trend',
      riskManagement: { stopLossPct: 4, takeProfitPct: null, trailingStop: true, trailingStopPct: 8 },
    };
    expect(deserializeStrategy(serializeStrategy(strategy))).toEqual(strategy);
  });
});

describe('createDefaultStrategy', () => {
  it('is itself a valid strategy', () => {
    expect(validateStrategy(serializeStrategy(createDefaultStrategy()))).toEqual({ valid: true });
  });
});

describe('bundled strategy documents', () => {
  const dir = fileURLToPath(new URL('../../strategies/', import.meta.url));
  const files = readdirSync(dir).filter((f) => f.endsWith('.json'));

  it('ships at least one document', () => {
    expect(files.length).toBeGreaterThan(0);
  });

  it.each(files)('%s is valid', (file) => {
    const document: unknown = JSON.parse(readFileSync(`${dir}${file}`, 'utf8'));
    expect(validateStrategy(document)).toEqual({ valid: true });
  });
});
