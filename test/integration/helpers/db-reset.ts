import { getDb } from '../../../src/db/index.js';
import * as schema from '../../../src/db/schema.js';

/**
 * Empties every table between tests, config included; the setup file seeds
 * the config defaults again afterwards.
 */
export function resetAllTables(): void {
  const db = getDb();
  const tables = [schema.strategies, schema.backtestRuns, schema.config];

  for (const table of tables) {
    db.delete(table).run();
  }
}
