export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function formatCurrency(n: number, currency = 'USD'): string {
  return new Intl.NumberFormat('en-US', { style: 'currency', currency }).format(n);
}

/** Formats a value that is already expressed in percent, e.g. 12.5 -> "12.50%". */
export function formatPercent(pct: number): string {
  if (!Number.isFinite(pct)) return pct > 0 ? '∞' : 'N/A';
  return `${pct.toFixed(2)}%`;
}

export function formatRatio(n: number): string {
  if (n === Number.POSITIVE_INFINITY) return '∞';
  return n.toFixed(2);
}

export async function retryAsync<T>(fn: () => Promise<T>, attempts = 3, delay = 1000): Promise<T> {
  let lastError: Error = new Error('retryAsync called with no attempts');
  for (let i = 0; i < attempts; i++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));
      if (i < attempts - 1) {
        await sleep(delay * (i + 1));
      }
    }
  }
  throw lastError;
}

export function round(n: number, decimals = 2): number {
  const factor = 10 ** decimals;
  return Math.round(n * factor) / factor;
}

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/** Whole calendar days between two ISO dates (YYYY-MM-DD), floored. */
export function daysBetween(from: string, to: string): number {
  return Math.floor((Date.parse(to) - Date.parse(from)) / MS_PER_DAY);
}

export function addDays(date: string, days: number): string {
  return new Date(Date.parse(date) + days * MS_PER_DAY).toISOString().slice(0, 10);
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

/** Standard deviation; `ddof` 1 gives the sample estimate, 0 the population one. */
export function stdDev(values: readonly number[], ddof: 0 | 1 = 1): number {
  const n = values.length;
  if (n - ddof <= 0) return Number.NaN;
  const m = mean(values);
  let acc = 0;
  for (const v of values) acc += (v - m) ** 2;
  return Math.sqrt(acc / (n - ddof));
}

export function median(values: readonly number[]): number {
  if (values.length === 0) return Number.NaN;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}
