import { describe, expect, it } from 'vitest';
import { CONFIG_DEFAULTS } from '../../src/config/defaults.js';
import { configSchemas, validateConfigValue } from '../../src/config/schema-validator.js';

describe('config schemas', () => {
  it('every default has a schema and satisfies it', () => {
    for (const def of CONFIG_DEFAULTS) {
      expect(configSchemas.has(def.key)).toBe(true);
      expect(validateConfigValue(def.key, JSON.parse(def.value))).toEqual({ valid: true });
    }
    expect(configSchemas.size).toBe(CONFIG_DEFAULTS.length);
  });

  it('default keys are unique', () => {
    const keys = CONFIG_DEFAULTS.map((d) => d.key);
    expect(new Set(keys).size).toBe(keys.length);
  });

  it('rejects out-of-range values', () => {
    expect(validateConfigValue('backtest.initialCapital', 0)).toEqual({
      valid: false,
      error: 'Number must be greater than 0',
    });
    expect(validateConfigValue('backtest.commissionRate', 0.5).valid).toBe(false);
    expect(validateConfigValue('data.lookbackDays', 10.5).valid).toBe(false);
  });

  it('rejects values of the wrong type', () => {
    expect(validateConfigValue('metrics.riskFreeRate', '0.02')).toEqual({
      valid: false,
      error: 'Expected number, received string',
    });
  });

  it('accepts unknown keys', () => {
    expect(configSchemas.has('custom.flag')).toBe(false);
    expect(validateConfigValue('custom.flag', 'anything')).toEqual({ valid: true });
  });
});
