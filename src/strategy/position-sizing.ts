import type { PositionSizing } from './types.js';

/** Multiple of ATR treated as the per-share risk in `risk_based` sizing. */
export const ATR_RISK_MULTIPLE = 2;

/**
 * Whole shares to buy at `price` given available `cash`.
 *
 * - `fixed`: `value` dollars per position.
 * - `percentage`: `value` percent of cash.
 * - `risk_based`: `value` percent of cash at risk over 2x ATR per share;
 *   falls back to `percentage` when ATR is missing or not positive.
 *
 * Negative, fractional or non-finite results round down to zero shares.
 */
export function calculatePositionSize(
  sizing: PositionSizing,
  cash: number,
  price: number,
  atr?: number | null,
): number {
  let raw: number;
  switch (sizing.method) {
    case 'fixed':
      raw = sizing.value / price;
      break;
    case 'percentage':
      raw = (cash * (sizing.value / 100)) / price;
      break;
    case 'risk_based':
      raw =
        atr != null && atr > 0
          ? (cash * (sizing.value / 100)) / (atr * ATR_RISK_MULTIPLE)
          : (cash * (sizing.value / 100)) / price;
      break;
    default: {
      const unreachable: never = sizing.method;
      throw new Error(`Unknown sizing method: ${String(unreachable)}`);
    }
  }
  return Number.isFinite(raw) && raw > 0 ? Math.floor(raw) : 0;
}
