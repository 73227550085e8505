import { daysBetween } from '../utils/helpers.js';
import type {
  EquityPoint,
  ExitReason,
  PortfolioStatistics,
  Position,
  Trade,
} from './types.js';

export const DEFAULT_COMMISSION_RATE = 0.001;

export interface PortfolioOptions {
  initialCapital: number;
  /** Fraction of traded value charged on every buy and sell. */
  commissionRate?: number;
}

export interface OpenPositionRequest {
  ticker: string;
  date: string;
  price: number;
  quantity: number;
  stopLoss?: number | null;
  takeProfit?: number | null;
  trailingStopPct?: number | null;
}

// ── Trade accessors ──────────────────────────────────────────────────────

export function tradePnl(trade: Trade): number {
  return (trade.exitPrice - trade.entryPrice) * trade.quantity - trade.commission;
}

export function tradePnlPct(trade: Trade): number {
  return ((trade.exitPrice - trade.entryPrice) / trade.entryPrice) * 100;
}

export function tradeHoldingDays(trade: Trade): number {
  return daysBetween(trade.entryDate, trade.exitDate);
}

/**
 * Cash, open positions, closed trades and the equity curve of one run.
 * Holds at most one position per ticker; a ticker goes FLAT -> OPEN -> FLAT.
 */
export class Portfolio {
  readonly initialCapital: number;
  readonly commissionRate: number;
  private _cash: number;
  private _totalCommission = 0;
  private positions = new Map<string, Position>();
  private trades: Trade[] = [];
  private equityCurve: EquityPoint[] = [];

  constructor(options: PortfolioOptions) {
    this.initialCapital = options.initialCapital;
    this.commissionRate = options.commissionRate ?? DEFAULT_COMMISSION_RATE;
    this._cash = options.initialCapital;
  }

  get cash(): number {
    return this._cash;
  }

  get totalCommission(): number {
    return this._totalCommission;
  }

  hasPosition(ticker: string): boolean {
    return this.positions.has(ticker);
  }

  getPosition(ticker: string): Readonly<Position> | undefined {
    return this.positions.get(ticker);
  }

  getOpenPositions(): Readonly<Position>[] {
    return [...this.positions.values()];
  }

  getTrades(): readonly Trade[] {
    return this.trades;
  }

  getEquityCurve(): readonly EquityPoint[] {
    return this.equityCurve;
  }

  /**
   * Buys `quantity` shares. Returns false, changing nothing, when the quantity
   * is not positive, the ticker is already held, or price * quantity plus
   * commission exceeds cash.
   */
  openPosition(request: OpenPositionRequest): boolean {
    const { ticker, date, price, quantity } = request;
    if (quantity <= 0 || this.positions.has(ticker)) return false;

    const cost = price * quantity;
    const commission = cost * this.commissionRate;
    if (cost + commission > this._cash) return false;

    this.positions.set(ticker, {
      ticker,
      entryDate: date,
      entryPrice: price,
      quantity,
      stopLoss: request.stopLoss ?? null,
      takeProfit: request.takeProfit ?? null,
      trailingStopPct: request.trailingStopPct ?? null,
      entryCommission: commission,
    });
    this._cash -= cost + commission;
    this._totalCommission += commission;
    return true;
  }

  /** Sells the whole position. Returns null when the ticker is flat. */
  closePosition(
    ticker: string,
    date: string,
    price: number,
    reason: ExitReason = 'signal',
  ): Trade | null {
    const position = this.positions.get(ticker);
    if (!position) return null;

    const proceeds = price * position.quantity;
    const commission = proceeds * this.commissionRate;

    const trade: Trade = {
      ticker,
      entryDate: position.entryDate,
      exitDate: date,
      entryPrice: position.entryPrice,
      exitPrice: price,
      quantity: position.quantity,
      commission: position.entryCommission + commission,
      exitReason: reason,
    };

    this._cash += proceeds - commission;
    this._totalCommission += commission;
    this.trades.push(trade);
    this.positions.delete(ticker);
    return trade;
  }

  /** Raises the stop to `currentPrice * (1 - pct/100)` when that is higher. Never lowers it. */
  updateTrailingStop(ticker: string, currentPrice: number): void {
    const position = this.positions.get(ticker);
    if (!position || position.trailingStopPct == null) return;

    const candidate = currentPrice * (1 - position.trailingStopPct / 100);
    if (position.stopLoss == null || candidate > position.stopLoss) {
      position.stopLoss = candidate;
    }
  }

  /** Stop-loss is checked against the bar's low, take-profit against its close. */
  checkExitConditions(
    ticker: string,
    closePrice: number,
    lowPrice: number,
  ): 'stop_loss' | 'take_profit' | null {
    const position = this.positions.get(ticker);
    if (!position) return null;
    if (position.stopLoss != null && lowPrice <= position.stopLoss) return 'stop_loss';
    if (position.takeProfit != null && closePrice >= position.takeProfit) return 'take_profit';
    return null;
  }

  /** Cash plus open positions marked at `prices`; a ticker without a price counts at entry. */
  getTotalValue(prices: ReadonlyMap<string, number>): number {
    let positionsValue = 0;
    for (const [ticker, position] of this.positions) {
      positionsValue += (prices.get(ticker) ?? position.entryPrice) * position.quantity;
    }
    return this._cash + positionsValue;
  }

  recordEquity(date: string, prices: ReadonlyMap<string, number>): EquityPoint {
    const equity = this.getTotalValue(prices);
    const point: EquityPoint = {
      date,
      equity,
      cash: this._cash,
      positionsValue: equity - this._cash,
    };
    this.equityCurve.push(point);
    return point;
  }

  getStatistics(): PortfolioStatistics {
    const trades = this.trades;
    if (trades.length === 0) {
      return {
        totalTrades: 0,
        winningTrades: 0,
        losingTrades: 0,
        winRatePct: 0,
        totalPnl: 0,
        avgWin: 0,
        avgLoss: 0,
        totalCommission: this._totalCommission,
        avgHoldingDays: 0,
      };
    }

    const pnls = trades.map(tradePnl);
    const wins = pnls.filter((p) => p > 0);
    const losses = pnls.filter((p) => p <= 0);
    const sum = (values: number[]): number => values.reduce((a, b) => a + b, 0);

    return {
      totalTrades: trades.length,
      winningTrades: wins.length,
      losingTrades: losses.length,
      winRatePct: (wins.length / trades.length) * 100,
      totalPnl: sum(pnls),
      avgWin: wins.length > 0 ? sum(wins) / wins.length : 0,
      avgLoss: losses.length > 0 ? sum(losses) / losses.length : 0,
      totalCommission: this._totalCommission,
      avgHoldingDays: sum(trades.map(tradeHoldingDays)) / trades.length,
    };
  }
}
