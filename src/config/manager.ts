import { eq } from 'drizzle-orm';
import type { z } from 'zod';
import { getDb } from '../db/index.js';
import { config } from '../db/schema.js';
import { RulebenchError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { CONFIG_DEFAULTS } from './defaults.js';
import { type NumberConfigKey, numberSchemas, validateConfigValue } from './schema-validator.js';

const log = createLogger('config');

export class ConfigManager {
  private cache = new Map<string, { value: unknown; expiresAt: number }>();
  private cacheTTL = 30_000;

  async seedDefaults(): Promise<void> {
    const db = getDb();
    for (const def of CONFIG_DEFAULTS) {
      const existing = db.select().from(config).where(eq(config.key, def.key)).get();
      if (!existing) {
        db.insert(config)
          .values({
            key: def.key,
            value: def.value,
            category: def.category,
            description: def.description,
            updatedAt: new Date().toISOString(),
          })
          .run();
      }
    }
    log.info(`Config seeded with ${CONFIG_DEFAULTS.length} defaults`);
  }

  /**
   * Raw value for `key`: environment override, then cache, then the stored
   * row, then the default. Throws for a key that exists nowhere.
   */
  get(key: string): unknown {
    const envOverride = this.getEnvOverride(key);
    if (envOverride !== undefined) return envOverride;

    const cached = this.cache.get(key);
    if (cached && cached.expiresAt > Date.now()) {
      return cached.value;
    }

    const db = getDb();
    const row = db.select().from(config).where(eq(config.key, key)).get();
    if (row) {
      const parsed: unknown = JSON.parse(row.value);
      this.cache.set(key, { value: parsed, expiresAt: Date.now() + this.cacheTTL });
      return parsed;
    }

    const def = CONFIG_DEFAULTS.find((d) => d.key === key);
    if (def) {
      const parsed: unknown = JSON.parse(def.value);
      return parsed;
    }

    throw new RulebenchError(`Config key not found: ${key}`, 'CONFIG_NOT_FOUND');
  }

  getNumber(key: NumberConfigKey): number {
    return this.parseWith(key, numberSchemas[key]);
  }

  /** Stores `value` after validating it against the key's schema. */
  async set(key: string, value: unknown): Promise<void> {
    const validation = validateConfigValue(key, value);
    if (!validation.valid) {
      throw new RulebenchError(
        `Invalid value for ${key}: ${validation.error ?? 'rejected by schema'}`,
        'CONFIG_INVALID',
      );
    }

    const db = getDb();
    const serialized = JSON.stringify(value);
    const existing = db.select().from(config).where(eq(config.key, key)).get();

    if (existing) {
      db.update(config)
        .set({ value: serialized, updatedAt: new Date().toISOString() })
        .where(eq(config.key, key))
        .run();
    } else {
      const def = CONFIG_DEFAULTS.find((d) => d.key === key);
      db.insert(config)
        .values({
          key,
          value: serialized,
          category: def?.category || 'custom',
          description: def?.description || '',
          updatedAt: new Date().toISOString(),
        })
        .run();
    }

    this.cache.delete(key);
    log.info({ key, value }, 'Config updated');
  }

  /** Stored values by key, optionally limited to one category. Env overrides are not applied. */
  list(category?: string): Record<string, unknown> {
    const rows = getDb()
      .select()
      .from(config)
      .where(category === undefined ? undefined : eq(config.category, category))
      .all();
    return Object.fromEntries(rows.map((row): [string, unknown] => [row.key, JSON.parse(row.value)]));
  }

  invalidateCache(key?: string): void {
    if (key) {
      this.cache.delete(key);
    } else {
      this.cache.clear();
    }
  }

  private parseWith<T>(key: string, schema: z.ZodType<T>): T {
    const result = schema.safeParse(this.get(key));
    if (!result.success) {
      const messages = result.error.issues.map((i) => i.message).join('; ');
      throw new RulebenchError(`Invalid value for ${key}: ${messages}`, 'CONFIG_INVALID');
    }
    return result.data;
  }

  /**
   * Converts a config key to an environment variable name.
   * e.g. "backtest.initialCapital" → "BACKTEST_INITIAL_CAPITAL"
   *      "data.lookbackDays" → "DATA_LOOKBACK_DAYS"
   */
  private configKeyToEnvVar(key: string): string {
    return key
      .replace(/\./g, '_')
      .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
      .toUpperCase();
  }

  /**
   * Values are parsed as JSON when possible, otherwise used as raw strings.
   */
  private getEnvOverride(key: string): unknown {
    const envName = this.configKeyToEnvVar(key);
    const envValue = process.env[envName];

    if (envValue === undefined) return undefined;

    try {
      const parsed: unknown = JSON.parse(envValue);
      return parsed;
    } catch {
      return envValue;
    }
  }
}

export const configManager = new ConfigManager();
