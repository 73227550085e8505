import { describe, expect, it } from 'vitest';
import { CONFIG_DEFAULTS } from '../../../src/config/defaults.js';
import { configManager } from '../../../src/config/manager.js';

describe('Config Seeding', () => {
  it('should seed every default config entry', () => {
    expect(Object.keys(configManager.list())).toHaveLength(CONFIG_DEFAULTS.length);
  });

  it('should not overwrite stored values when seeding again', async () => {
    await configManager.set('backtest.initialCapital', 50_000);
    await configManager.seedDefaults();
    configManager.invalidateCache();

    expect(configManager.getNumber('backtest.initialCapital')).toBe(50_000);
  });

  it('should return typed numbers via getNumber()', () => {
    expect(configManager.getNumber('backtest.initialCapital')).toBe(100_000);
    expect(configManager.getNumber('backtest.commissionRate')).toBe(0.001);
    expect(configManager.getNumber('data.lookbackDays')).toBe(365);
  });

  it('should support set() + invalidateCache() round-trip', async () => {
    await configManager.set('backtest.commissionRate', 0.002);
    configManager.invalidateCache('backtest.commissionRate');

    expect(configManager.getNumber('backtest.commissionRate')).toBe(0.002);
  });

  it('should reject values outside the schema', async () => {
    await expect(configManager.set('backtest.commissionRate', 5)).rejects.toThrow(
      'Invalid value for backtest.commissionRate: Number must be less than or equal to 0.1',
    );
    expect(configManager.getNumber('backtest.commissionRate')).toBe(0.001);
  });

  it('should store unknown keys under the custom category', async () => {
    await configManager.set('custom.flag', true);

    expect(configManager.get('custom.flag')).toBe(true);
    expect(configManager.list('custom')).toEqual({ 'custom.flag': true });
  });

  it('should prefer environment overrides', () => {
    process.env.BACKTEST_INITIAL_CAPITAL = '250000';
    expect(configManager.getNumber('backtest.initialCapital')).toBe(250_000);
  });

  it('should reject environment overrides of the wrong type', () => {
    process.env.DATA_LOOKBACK_DAYS = 'many';
    expect(() => configManager.getNumber('data.lookbackDays')).toThrow(
      'Invalid value for data.lookbackDays: Expected number, received string',
    );
  });

  it('should group config by category via list(category)', () => {
    expect(configManager.list('data')).toEqual({
      'data.lookbackDays': 365,
      'data.timeoutSeconds': 30,
    });
  });

  it('should support list() returning parsed values', () => {
    const all = configManager.list();
    expect(all['metrics.riskFreeRate']).toBe(0.02);
    expect(all['backtest.slippageRate']).toBe(0.0005);
  });

  it('should return nothing for an unknown category', () => {
    expect(configManager.list('nope')).toEqual({});
  });

  it('should throw for unknown config keys', () => {
    expect(() => configManager.get('nonexistent.key')).toThrow(
      'Config key not found: nonexistent.key',
    );
  });
});
