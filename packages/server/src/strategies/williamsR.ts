import type { Bar, FeedData, OrderInstruction } from '../core/types.js';
import { getCosts, getHoldings } from '../execution/interface.js';
import { cmo, crossOver, sma, williamsR } from './indicators.js';
import type { Strategy, StrategyContext } from './interface.js';

export interface MomentumWilliamsROptions {
  quote: string;
  hedge: string;
  currency?: string;
  capital?: number;
  /** Fractional drawdown from cost that forces a rotation. */
  stopLoss?: number;
  cmoPeriod?: number;
  cmoSmaPeriod?: number;
  williamsPeriod?: number;
  williamsLower?: number;
  williamsUpper?: number;
}

export interface QuoteSignal {
  cross: number;
  williamsR: number;
}

/** Share of expected cash actually deployed, leaving room for slippage. */
const DEPLOY_RATIO = 0.95;

/**
 * Rotates capital between a leveraged quote ticker and its inverse hedge ticker.
 * Buys the quote when CMO crosses above its SMA while Williams %R is oversold,
 * rotates into the hedge on the opposite cross while overbought, and rotates
 * out of a holding whose close drops below cost by more than the stop loss.
 */
export class MomentumWilliamsR implements Strategy {
  readonly name = 'momentum-williams-r';
  readonly quote: string;
  readonly hedge: string;
  private readonly currency: string;
  private readonly capital: number;
  private readonly stopLoss: number;
  private readonly cmoPeriod: number;
  private readonly cmoSmaPeriod: number;
  private readonly williamsPeriod: number;
  private readonly williamsLower: number;
  private readonly williamsUpper: number;
  private ctx: StrategyContext | null = null;
  private cashLeft = 0;

  constructor(options: MomentumWilliamsROptions) {
    this.quote = options.quote.toUpperCase();
    this.hedge = options.hedge.toUpperCase();
    this.currency = options.currency ?? 'USD';
    this.capital = options.capital ?? 10_000;
    this.stopLoss = options.stopLoss ?? 0.005;
    this.cmoPeriod = options.cmoPeriod ?? 10;
    this.cmoSmaPeriod = options.cmoSmaPeriod ?? 10;
    this.williamsPeriod = options.williamsPeriod ?? 14;
    this.williamsLower = options.williamsLower ?? -60;
    this.williamsUpper = options.williamsUpper ?? -40;
  }

  get availableCash(): number {
    return this.cashLeft;
  }

  async init(ctx: StrategyContext): Promise<void> {
    this.ctx = ctx;
    await this.refreshCash(ctx);
  }

  /** Cross and %R on the newest quote bar, or null when history is too short. */
  signal(bars: readonly Bar[]): QuoteSignal | null {
    const closes = bars.map((b) => b.close);
    const momentum = cmo(closes, this.cmoPeriod);
    const crosses = crossOver(momentum, sma(momentum, this.cmoSmaPeriod));
    const percentR = williamsR(
      bars.map((b) => b.high),
      bars.map((b) => b.low),
      closes,
      this.williamsPeriod
    );
    const last = bars.length - 1;
    if (last < 0 || Number.isNaN(percentR[last])) return null;
    return { cross: crosses[last], williamsR: percentR[last] };
  }

  async decide(feedData: FeedData): Promise<OrderInstruction[]> {
    const ctx = this.ctx;
    if (!ctx) return [];
    const quoteBars = feedData.get(this.quote) ?? [];
    const hedgeBars = feedData.get(this.hedge) ?? [];
    const quoteClose = quoteBars[quoteBars.length - 1]?.close;
    const hedgeClose = hedgeBars[hedgeBars.length - 1]?.close;
    if (quoteClose === undefined || hedgeClose === undefined) {
      ctx.logger.warn('Missing quote or hedge data; skipping decision');
      return [];
    }

    await this.refreshCash(ctx);
    const holdings = await getHoldings(ctx.broker, [this.quote, this.hedge]);
    const quoteSize = holdings.get(this.quote) ?? 0;
    const hedgeSize = holdings.get(this.hedge) ?? 0;
    const costs = await getCosts(ctx.broker, [this.quote, this.hedge]);

    let src = this.quote;
    let dest = this.hedge;
    let size = 0;
    let srcClose = 1;
    let destClose = 1;
    let cost = -1;
    if (quoteSize > 0) {
      size = quoteSize;
      srcClose = quoteClose;
      destClose = hedgeClose;
      cost = costs.get(this.quote) ?? -1;
    } else if (hedgeSize > 0) {
      src = this.hedge;
      dest = this.quote;
      size = hedgeSize;
      srcClose = hedgeClose;
      destClose = quoteClose;
      cost = costs.get(this.hedge) ?? -1;
    }

    const expectedCash = Math.min(Math.max(this.cashLeft + size * srcClose, 1), this.capital);
    const rotateSize = Math.floor((expectedCash / destClose) * DEPLOY_RATIO);

    if (cost > 0 && srcClose / cost < 1 - this.stopLoss) {
      ctx.logger.info('Stop loss triggered.', { symbol: src, cost, close: srcClose });
      return this.rotate(src, dest, size, rotateSize);
    }

    const signal = this.signal(quoteBars);
    if (!signal) return [];

    if (signal.cross === 1 && signal.williamsR <= this.williamsLower) {
      ctx.logger.info('Buy signal.', { ...signal });
      if (hedgeSize > 0) return this.rotate(src, dest, size, rotateSize);
      if (quoteSize === 0) {
        return this.open(this.quote, Math.floor((expectedCash / quoteClose) * DEPLOY_RATIO));
      }
    } else if (signal.cross === -1 && signal.williamsR >= this.williamsUpper) {
      ctx.logger.info('Sell signal.', { ...signal });
      if (quoteSize > 0) return this.rotate(src, dest, size, rotateSize);
      if (hedgeSize === 0) {
        return this.open(this.hedge, Math.floor((expectedCash / hedgeClose) * DEPLOY_RATIO));
      }
    }
    return [];
  }

  private async refreshCash(ctx: StrategyContext): Promise<void> {
    const holdings = await getHoldings(ctx.broker, [this.quote, this.hedge]);
    const quoteSize = holdings.get(this.quote) ?? 0;
    const hedgeSize = holdings.get(this.hedge) ?? 0;
    let positionValue = 0;
    if (quoteSize > 0) {
      positionValue = quoteSize * (ctx.lastClose(this.quote) ?? 0);
    } else if (hedgeSize > 0) {
      positionValue = hedgeSize * (ctx.lastClose(this.hedge) ?? 0);
    }
    this.cashLeft = Math.max(this.capital - positionValue, 0);
  }

  private instrument(symbol: string): string {
    return `${symbol}-${this.currency}-SPOT`;
  }

  private open(symbol: string, qty: number): OrderInstruction[] {
    if (qty <= 0) return [];
    return [{ instrument: this.instrument(symbol), qty, orderType: 'MARKET' }];
  }

  private rotate(src: string, dest: string, srcSize: number, destSize: number): OrderInstruction[] {
    const orders: OrderInstruction[] = [];
    if (srcSize > 0) orders.push({ instrument: this.instrument(src), qty: -srcSize, orderType: 'MARKET' });
    if (destSize > 0) orders.push({ instrument: this.instrument(dest), qty: destSize, orderType: 'MARKET' });
    return orders;
  }
}
