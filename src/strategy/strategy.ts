import { z } from 'zod';
import { RuleParseError, StrategyValidationError } from '../utils/errors.js';
import { parseRules } from './parser.js';
import { type PositionSizing, type RiskManagement, type Strategy, isSizingMethod } from './types.js';

// ── Document form ────────────────────────────────────────────────────────

const optionalPct = z.number().finite().nullable().optional();

/** Structural shape of a stored strategy document (snake_case keys). */
export const strategyDocumentSchema = z.object({
  name: z.string(),
  description: z.string().nullable().optional(),
  entry_rules: z.string(),
  exit_rules: z.string(),
  position_sizing: z
    .object({
      method: z.string(),
      value: z.number().finite(),
    })
    .optional(),
  risk_management: z
    .object({
      stop_loss_pct: optionalPct,
      take_profit_pct: optionalPct,
      trailing_stop: z.boolean().optional(),
      trailing_stop_pct: optionalPct,
    })
    .optional(),
});

export type StrategyDocument = z.infer<typeof strategyDocumentSchema>;

export type StrategyValidation = { valid: true } | { valid: false; error: string };

const REQUIRED_FIELDS = ['name', 'entry_rules', 'exit_rules'] as const;

export const DEFAULT_POSITION_SIZING: PositionSizing = { method: 'percentage', value: 10 };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function checkRules(label: string, rules: string): string | null {
  if (rules.trim() === '') return null;
  try {
    parseRules(rules);
    return null;
  } catch (err) {
    if (err instanceof RuleParseError) return `Invalid ${label} rules: ${err.message}`;
    throw err;
  }
}

function inRange(value: number | null | undefined, max: number): boolean {
  return value == null || (value > 0 && value <= max);
}

/**
 * Checks a strategy document: required fields, field types, name length,
 * both rule strings parse, a known sizing method and the risk percentages
 * in range. Empty rule strings are allowed and never fire.
 */
export function validateStrategy(input: unknown): StrategyValidation {
  if (!isRecord(input)) return { valid: false, error: 'Strategy must be an object' };

  for (const field of REQUIRED_FIELDS) {
    if (!(field in input)) return { valid: false, error: `Missing required field: ${field}` };
  }

  const parsed = strategyDocumentSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return { valid: false, error: `${issue.path.join('.')}: ${issue.message}` };
  }
  const doc = parsed.data;

  if (doc.name.length < 1 || doc.name.length > 100) {
    return { valid: false, error: 'Strategy name must be 1-100 characters' };
  }

  const rulesError = checkRules('entry', doc.entry_rules) ?? checkRules('exit', doc.exit_rules);
  if (rulesError) return { valid: false, error: rulesError };

  if (doc.position_sizing && !isSizingMethod(doc.position_sizing.method)) {
    return {
      valid: false,
      error: `Invalid position sizing method: ${doc.position_sizing.method}`,
    };
  }

  const risk = doc.risk_management;
  if (risk) {
    if (!inRange(risk.stop_loss_pct, 100)) {
      return { valid: false, error: 'Stop loss percentage must be between 0 and 100' };
    }
    if (!inRange(risk.take_profit_pct, 1000)) {
      return { valid: false, error: 'Take profit percentage must be between 0 and 1000' };
    }
    if (!inRange(risk.trailing_stop_pct, 100)) {
      return { valid: false, error: 'Trailing stop percentage must be between 0 and 100' };
    }
  }

  return { valid: true };
}

/** Validates a document and converts it to a Strategy, filling defaults for optional sections. */
export function deserializeStrategy(input: unknown): Strategy {
  const validation = validateStrategy(input);
  if (!validation.valid) throw new StrategyValidationError(validation.error);

  const doc = strategyDocumentSchema.parse(input);
  const sizing = doc.position_sizing;
  const positionSizing: PositionSizing =
    sizing && isSizingMethod(sizing.method)
      ? { method: sizing.method, value: sizing.value }
      : { ...DEFAULT_POSITION_SIZING };

  const risk = doc.risk_management;
  const riskManagement: RiskManagement = {
    stopLossPct: risk?.stop_loss_pct ?? null,
    takeProfitPct: risk?.take_profit_pct ?? null,
    trailingStop: risk?.trailing_stop ?? false,
    trailingStopPct: risk?.trailing_stop_pct ?? null,
  };

  return {
    name: doc.name,
    description: doc.description ?? '',
    entryRules: doc.entry_rules,
    exitRules: doc.exit_rules,
    positionSizing,
    riskManagement,
  };
}

export function serializeStrategy(strategy: Strategy): StrategyDocument {
  return {
    name: strategy.name,
    description: strategy.description,
    entry_rules: strategy.entryRules,
    exit_rules: strategy.exitRules,
    position_sizing: {
      method: strategy.positionSizing.method,
      value: strategy.positionSizing.value,
    },
    risk_management: {
      stop_loss_pct: strategy.riskManagement.stopLossPct,
      take_profit_pct: strategy.riskManagement.takeProfitPct,
      trailing_stop: strategy.riskManagement.trailingStop,
      trailing_stop_pct: strategy.riskManagement.trailingStopPct,
    },
  };
}

/** Starter template: buy oversold dips in an uptrend, sell overbought or 5% under entry. */
export function createDefaultStrategy(): Strategy {
  return {
    name: 'New Strategy',
    description: '',
    entryRules: 'rsi(14) < 30 AND price > sma(200)',
    exitRules: 'rsi(14) > 70 OR price < entry_price * 0.95',
    positionSizing: { ...DEFAULT_POSITION_SIZING },
    riskManagement: {
      stopLossPct: 5,
      takeProfitPct: 15,
      trailingStop: false,
      trailingStopPct: null,
    },
  };
}
