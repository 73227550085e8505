import { describe, expect, it } from 'vitest';
import { calculatePositionSize } from '../../src/strategy/position-sizing.js';

describe('calculatePositionSize', () => {
  it('fixed buys a dollar amount rounded down', () => {
    expect(calculatePositionSize({ method: 'fixed', value: 1000 }, 100_000, 30)).toBe(33);
  });

  it('percentage spends a share of cash', () => {
    expect(calculatePositionSize({ method: 'percentage', value: 10 }, 100_000, 50)).toBe(200);
  });

  it('risk_based divides the risked cash by twice the ATR', () => {
    expect(calculatePositionSize({ method: 'risk_based', value: 1 }, 100_000, 50, 2.5)).toBe(200);
  });

  it('risk_based falls back to percentage without a usable ATR', () => {
    const sizing = { method: 'risk_based', value: 1 } as const;
    expect(calculatePositionSize(sizing, 100_000, 50)).toBe(20);
    expect(calculatePositionSize(sizing, 100_000, 50, null)).toBe(20);
    expect(calculatePositionSize(sizing, 100_000, 50, 0)).toBe(20);
  });

  it('returns zero for a non-positive price or cash', () => {
    expect(calculatePositionSize({ method: 'percentage', value: 10 }, 100_000, 0)).toBe(0);
    expect(calculatePositionSize({ method: 'percentage', value: 10 }, -500, 10)).toBe(0);
  });

  it('returns zero when the budget buys less than one share', () => {
    expect(calculatePositionSize({ method: 'fixed', value: 40 }, 100_000, 50)).toBe(0);
  });
});
