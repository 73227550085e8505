import { z } from 'zod';

// ── Backtest ─────────────────────────────────────────────────────────────────
const backtestSchemas = {
  'backtest.initialCapital': z.number().positive().max(1_000_000_000),
  'backtest.commissionRate': z.number().min(0).max(0.1),
  'backtest.slippageRate': z.number().min(0).max(0.1),
};

// ── Metrics ──────────────────────────────────────────────────────────────────
const metricsSchemas = {
  'metrics.riskFreeRate': z.number().min(0).max(1),
};

// ── Data ─────────────────────────────────────────────────────────────────────
const dataSchemas = {
  'data.lookbackDays': z.number().int().min(0).max(3650),
  'data.timeoutSeconds': z.number().int().min(1).max(600),
};

export const numberSchemas = { ...backtestSchemas, ...metricsSchemas, ...dataSchemas };

export type NumberConfigKey = keyof typeof numberSchemas;

// ── Merged schema map ────────────────────────────────────────────────────────
export const configSchemas: Map<string, z.ZodTypeAny> = new Map<string, z.ZodTypeAny>(
  Object.entries(numberSchemas),
);

/**
 * Validate a value against the schema for the given config key.
 * Unknown keys are considered valid (forward-compatibility).
 */
export function validateConfigValue(
  key: string,
  value: unknown,
): { valid: boolean; error?: string } {
  const schema = configSchemas.get(key);
  if (!schema) {
    return { valid: true };
  }

  const result = schema.safeParse(value);
  if (result.success) {
    return { valid: true };
  }

  const messages = result.error.issues.map((i) => i.message).join('; ');
  return { valid: false, error: messages };
}
