import { asc, eq } from 'drizzle-orm';
import { deserializeStrategy, serializeStrategy } from '../../strategy/strategy.js';
import type { Strategy } from '../../strategy/types.js';
import { getDb } from '../index.js';
import { strategies } from '../schema.js';

export interface StrategySummary {
  id: number;
  name: string;
  description: string | null;
  createdAt: string;
  updatedAt: string | null;
}

/** Inserts a strategy or replaces the stored one with the same name. Returns its id. */
export function saveStrategy(strategy: Strategy): number {
  const db = getDb();
  const now = new Date().toISOString();
  const document = JSON.stringify(serializeStrategy(strategy));

  const existing = db
    .select({ id: strategies.id })
    .from(strategies)
    .where(eq(strategies.name, strategy.name))
    .get();

  if (existing) {
    db.update(strategies)
      .set({ description: strategy.description, document, updatedAt: now })
      .where(eq(strategies.id, existing.id))
      .run();
    return existing.id;
  }

  const result = db
    .insert(strategies)
    .values({
      name: strategy.name,
      description: strategy.description,
      document,
      createdAt: now,
      updatedAt: now,
    })
    .returning({ id: strategies.id })
    .get();

  return result.id;
}

/** The stored strategy, re-validated on the way out. */
export function getStrategy(name: string): Strategy | undefined {
  const db = getDb();
  const row = db.select().from(strategies).where(eq(strategies.name, name)).get();
  if (!row) return undefined;
  const document: unknown = JSON.parse(row.document);
  return deserializeStrategy(document);
}

export function listStrategies(): StrategySummary[] {
  const db = getDb();
  return db
    .select({
      id: strategies.id,
      name: strategies.name,
      description: strategies.description,
      createdAt: strategies.createdAt,
      updatedAt: strategies.updatedAt,
    })
    .from(strategies)
    .orderBy(asc(strategies.name))
    .all();
}

/** Returns false when no strategy had that name. */
export function deleteStrategy(name: string): boolean {
  const db = getDb();
  const result = db.delete(strategies).where(eq(strategies.name, name)).run();
  return result.changes > 0;
}
