import { readFile } from 'node:fs/promises';
import { parseArgs } from 'node:util';
import { BacktestDataLoader } from './backtest/data-loader.js';
import { BacktestEngine } from './backtest/engine.js';
import { generateMonthlyReturns, generateSummary, generateTickerBreakdown } from './backtest/reporter.js';
import { type BarSource, isBacktestFailure } from './backtest/types.js';
import { configManager } from './config/manager.js';
import { YahooFinanceClient } from './data/yahoo-finance.js';
import { closeDatabase, initDatabase } from './db/index.js';
import {
  getRecentRuns,
  getRunsForStrategy,
  recordBacktestRun,
} from './db/repositories/backtest-runs.js';
import { deleteStrategy, getStrategy, listStrategies, saveStrategy } from './db/repositories/strategies.js';
import {
  createDefaultStrategy,
  deserializeStrategy,
  serializeStrategy,
  validateStrategy,
} from './strategy/strategy.js';
import type { Strategy } from './strategy/types.js';
import { RulebenchError, errorMessage } from './utils/errors.js';
import { formatPercent } from './utils/helpers.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('cli');

const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

export const USAGE = [
  'Usage: rulebench <command> [options]',
  '',
  'Commands:',
  '  validate <file>                       Check a strategy document',
  '  template                              Print the default strategy document',
  '  backtest <file|name> --ticker T [--ticker U ...] --start YYYY-MM-DD --end YYYY-MM-DD',
  '           [--capital N] [--save]       Run a backtest; --save stores strategy and run',
  '  strategies                            List saved strategies',
  '  strategies save <file>                Save a strategy document',
  '  strategies delete <name>              Delete a saved strategy',
  '  runs [--limit N] [--strategy NAME]    Show recent saved runs',
  '  config [category]                     Show stored settings',
  '  config set <key> <value>              Change a setting',
].join('\n');

export interface CliDependencies {
  /** Receives each line of command output. */
  out?: (line: string) => void;
  /** Bar source for `backtest`; defaults to the Yahoo Finance loader. */
  dataLoader?: BarSource;
  /** Database file; defaults to DB_PATH. */
  dbPath?: string;
}

class UsageError extends RulebenchError {
  constructor(message: string) {
    super(message, 'USAGE');
  }
}

class MissingFileError extends UsageError {}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

async function readDocument(file: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(file, 'utf8');
  } catch (err) {
    if (isMissingFile(err)) throw new MissingFileError(`File not found: ${file}`);
    throw err;
  }
  try {
    const document: unknown = JSON.parse(text);
    return document;
  } catch (err) {
    throw new UsageError(`${file} is not valid JSON: ${errorMessage(err)}`);
  }
}

/** Strategy from a JSON file, or from the library when no such file exists. */
async function resolveStrategy(ref: string): Promise<Strategy> {
  try {
    return deserializeStrategy(await readDocument(ref));
  } catch (err) {
    if (!(err instanceof MissingFileError)) throw err;
    const stored = getStrategy(ref);
    if (stored) return stored;
    throw new UsageError(`No strategy file or saved strategy named '${ref}'`);
  }
}

function requireDate(value: string | undefined, flag: string): string {
  if (value === undefined) throw new UsageError(`Missing --${flag}`);
  if (!ISO_DATE_RE.test(value) || Number.isNaN(Date.parse(value))) {
    throw new UsageError(`--${flag} must be a date in YYYY-MM-DD form, got '${value}'`);
  }
  return value;
}

function parsePositiveNumber(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0) throw new UsageError(`--${flag} must be a positive number`);
  return n;
}

function parsePositiveInteger(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) throw new UsageError(`--${flag} must be a positive integer`);
  return n;
}

/**
 * Runs one CLI command and resolves to the process exit code. Expected
 * failures (bad input, invalid strategies, missing data) print a message and
 * return 1; anything else is rethrown.
 */
export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const out = deps.out ?? ((line: string) => process.stdout.write(`${line}\n`));

  let parsed: ReturnType<typeof parseCommandLine>;
  try {
    parsed = parseCommandLine(argv);
  } catch (err) {
    out(errorMessage(err));
    out(USAGE);
    return 1;
  }
  const { values, positionals } = parsed;
  const [command, ...rest] = positionals;

  if (command === undefined || command === 'help') {
    out(USAGE);
    return command === undefined ? 1 : 0;
  }

  try {
    switch (command) {
      case 'validate':
        return await validateCommand(rest, out);
      case 'template':
        out(JSON.stringify(serializeStrategy(createDefaultStrategy()), null, 2));
        return 0;
      case 'backtest':
      case 'strategies':
      case 'runs':
      case 'config':
        return await withDatabase(deps.dbPath, async () => {
          if (command === 'backtest') return backtestCommand(rest, values, deps, out);
          if (command === 'strategies') return strategiesCommand(rest, out);
          if (command === 'config') return configCommand(rest, out);
          return runsCommand(values, out);
        });
      default:
        throw new UsageError(`Unknown command: ${command}`);
    }
  } catch (err) {
    if (err instanceof RulebenchError) {
      out(err instanceof UsageError ? `${err.message}\n\n${USAGE}` : `Error: ${err.message}`);
      log.debug({ code: err.code, err: err.message }, 'Command failed');
      return 1;
    }
    throw err;
  }
}

function parseCommandLine(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      ticker: { type: 'string', short: 't', multiple: true },
      start: { type: 'string' },
      end: { type: 'string' },
      capital: { type: 'string' },
      limit: { type: 'string' },
      strategy: { type: 'string' },
      save: { type: 'boolean', default: false },
    },
  });
}

type CliValues = ReturnType<typeof parseCommandLine>['values'];

async function withDatabase(dbPath: string | undefined, fn: () => Promise<number>): Promise<number> {
  initDatabase(dbPath);
  try {
    await configManager.seedDefaults();
    return await fn();
  } finally {
    configManager.invalidateCache();
    closeDatabase();
  }
}

// ── Commands ─────────────────────────────────────────────────────────────

async function validateCommand(args: string[], out: (line: string) => void): Promise<number> {
  const [file] = args;
  if (!file) throw new UsageError('validate needs a strategy file');

  const validation = validateStrategy(await readDocument(file));
  if (!validation.valid) {
    out(`Invalid strategy: ${validation.error}`);
    return 1;
  }
  out(`Strategy in ${file} is valid`);
  return 0;
}

async function backtestCommand(
  args: string[],
  values: CliValues,
  deps: CliDependencies,
  out: (line: string) => void,
): Promise<number> {
  const [ref] = args;
  if (!ref) throw new UsageError('backtest needs a strategy file or saved strategy name');

  const tickers = (values.ticker ?? []).map((t) => t.trim().toUpperCase()).filter((t) => t !== '');
  if (tickers.length === 0) throw new UsageError('backtest needs at least one --ticker');
  const startDate = requireDate(values.start, 'start');
  const endDate = requireDate(values.end, 'end');
  if (startDate > endDate) throw new UsageError('--start must not be after --end');

  const strategy = await resolveStrategy(ref);

  const dataLoader =
    deps.dataLoader ??
    new BacktestDataLoader(
      new YahooFinanceClient({ timeoutMs: configManager.getNumber('data.timeoutSeconds') * 1000 }),
      { lookbackDays: configManager.getNumber('data.lookbackDays') },
    );

  const engine = new BacktestEngine({
    initialCapital:
      parsePositiveNumber(values.capital, 'capital') ?? configManager.getNumber('backtest.initialCapital'),
    commissionRate: configManager.getNumber('backtest.commissionRate'),
    slippageRate: configManager.getNumber('backtest.slippageRate'),
    riskFreeRate: configManager.getNumber('metrics.riskFreeRate'),
    dataLoader,
  });

  const outcome =
    tickers.length === 1
      ? await engine.run(tickers[0], strategy, startDate, endDate)
      : await engine.runPortfolio(tickers, strategy, startDate, endDate);

  if (isBacktestFailure(outcome)) {
    out(`Backtest failed: ${outcome.error}`);
    return 1;
  }

  out(generateSummary(outcome));
  if (tickers.length > 1) {
    out('');
    out(generateTickerBreakdown(outcome));
  }
  out('');
  out(generateMonthlyReturns(outcome));

  if (values.save) {
    saveStrategy(strategy);
    const runId = recordBacktestRun(outcome);
    out('');
    out(`Saved run #${runId} for strategy '${strategy.name}'`);
  }
  return 0;
}

async function strategiesCommand(args: string[], out: (line: string) => void): Promise<number> {
  const [action, target] = args;

  if (action === undefined) {
    const rows = listStrategies();
    if (rows.length === 0) {
      out('No saved strategies.');
      return 0;
    }
    for (const row of rows) {
      out(row.description ? `${row.name}: ${row.description}` : row.name);
    }
    return 0;
  }

  if (action === 'save') {
    if (!target) throw new UsageError('strategies save needs a strategy file');
    const strategy = deserializeStrategy(await readDocument(target));
    const id = saveStrategy(strategy);
    out(`Saved strategy '${strategy.name}' (#${id})`);
    return 0;
  }

  if (action === 'delete') {
    if (!target) throw new UsageError('strategies delete needs a strategy name');
    if (!deleteStrategy(target)) {
      out(`No saved strategy named '${target}'`);
      return 1;
    }
    out(`Deleted strategy '${target}'`);
    return 0;
  }

  throw new UsageError(`Unknown strategies action: ${action}`);
}

async function runsCommand(values: CliValues, out: (line: string) => void): Promise<number> {
  const limit = parsePositiveInteger(values.limit, 'limit') ?? 20;
  const runs =
    values.strategy === undefined ? getRecentRuns(limit) : getRunsForStrategy(values.strategy, limit);
  if (runs.length === 0) {
    out('No saved runs.');
    return 0;
  }
  for (const run of runs) {
    out(
      `#${run.id} ${run.strategyName} [${run.tickers.join(', ')}] ${run.startDate}..${run.endDate}: ` +
        `${formatPercent(run.totalReturnPct)} over ${run.tradeCount} trades`,
    );
  }
  return 0;
}

/** Parses a command-line value as JSON, falling back to the raw string. */
function parseConfigValue(raw: string): unknown {
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch {
    return raw;
  }
}

async function configCommand(args: string[], out: (line: string) => void): Promise<number> {
  const [action, key, raw] = args;

  if (action === 'set') {
    if (!key || raw === undefined) throw new UsageError('config set needs a key and a value');
    const value = parseConfigValue(raw);
    await configManager.set(key, value);
    out(`${key} = ${JSON.stringify(value)}`);
    return 0;
  }

  const entries = configManager.list(action);
  const keys = Object.keys(entries).sort();
  if (keys.length === 0) {
    out(action === undefined ? 'No stored settings.' : `No settings in category '${action}'.`);
    return 1;
  }
  for (const k of keys) out(`${k} = ${JSON.stringify(entries[k])}`);
  return 0;
}
