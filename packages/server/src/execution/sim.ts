import { ConnectionError, OrderNotFoundError } from '../core/errors.js';
import { SystemClock, type ClockSource } from '../core/clock.js';
import type { Order, OrderAction, Position } from '../core/types.js';
import { createLogger, type TraderLogger } from '../utils/logger.js';
import type { Broker, OrderStatusReport, PlaceOrderRequest, PlacementReport } from './interface.js';

export type SimStatus = 'pending' | 'working' | 'partial' | 'filled' | 'cancelled' | 'rejected';

/** Reject code used when a market order arrives for a symbol with no known price. */
export const SIM_NO_PRICE_ERROR = 201;

export interface SimBrokerOptions {
  cash?: number;
  currency?: string;
  /** Latest price lookup, consulted before prices set with `setPrice`. */
  priceSource?: (symbol: string) => number | undefined;
  clock?: ClockSource;
  logger?: TraderLogger;
  /** Price impact per unit of notional/equity. */
  impactFactor?: number;
  feeRate?: number;
}

interface SimOrder {
  order: Order;
  action: OrderAction;
  qty: number;
  status: SimStatus;
  filledQty: number;
  avgFillPrice: number;
  fee: number;
}

interface SimHolding {
  quantity: number;
  avgCost: number;
}

/**
 * In-process brokerage. Market orders fill immediately at the last known price
 * plus a size-dependent impact; limit and stop orders rest until `setPrice`
 * crosses them.
 */
export class SimBroker implements Broker {
  readonly name = 'sim';
  readonly vocabulary = 'sim' as const;

  private cash: number;
  private readonly currency: string;
  private readonly priceSource?: (symbol: string) => number | undefined;
  private readonly clock: ClockSource;
  private readonly logger: TraderLogger;
  private readonly impactFactor: number;
  private readonly feeRate: number;
  private readonly prices = new Map<string, number>();
  private readonly holdings = new Map<string, SimHolding>();
  private readonly orders = new Map<string, SimOrder>();
  private nextId = 1;
  private connected = false;

  constructor(options: SimBrokerOptions = {}) {
    this.cash = options.cash ?? 10_000;
    this.currency = options.currency ?? 'USD';
    this.priceSource = options.priceSource;
    this.clock = options.clock ?? new SystemClock();
    this.logger = options.logger ?? createLogger('sim-broker');
    this.impactFactor = options.impactFactor ?? 0.0015;
    this.feeRate = options.feeRate ?? 0.0004;
  }

  get isConnected(): boolean {
    return this.connected;
  }

  async start(): Promise<void> {
    this.connected = true;
    this.logger.info('Simulated broker started', { cash: this.cash });
  }

  async stop(): Promise<void> {
    this.connected = false;
  }

  now(): Date {
    return this.clock.now();
  }

  async update(): Promise<void> {
    this.ensureConnected();
  }

  async getCash(): Promise<number> {
    this.ensureConnected();
    return this.cash;
  }

  async getPositions(symbols: string[] = []): Promise<Map<string, Position>> {
    this.ensureConnected();
    const wanted = symbols.map((s) => s.toUpperCase());
    const result = new Map<string, Position>();
    for (const [symbol, holding] of this.holdings) {
      if (wanted.length > 0 && !wanted.includes(symbol)) continue;
      const price = this.priceOf(symbol) ?? holding.avgCost;
      result.set(symbol, {
        symbol,
        currency: this.currency,
        quantity: holding.quantity,
        avgCost: holding.avgCost,
        unrealizedPnl: (price - holding.avgCost) * holding.quantity,
      });
    }
    return result;
  }

  setPrice(symbol: string, price: number): void {
    const upper = symbol.toUpperCase();
    this.prices.set(upper, price);
    for (const record of this.orders.values()) {
      if (record.status !== 'working' || record.order.instrument.symbol !== upper) continue;
      this.tryTrigger(record, price);
    }
  }

  async placeOrder(req: PlaceOrderRequest): Promise<PlacementReport> {
    this.ensureConnected();
    const orderId = `SIM-${this.nextId++}`;
    const signed = req.action === 'BUY' ? req.qty : -req.qty;
    const record: SimOrder = {
      order: {
        orderId,
        instrument: req.instrument,
        quantity: signed,
        orderType: req.orderType,
        timeInForce: req.timeInForce,
        limitPrice: req.limitPrice,
        stopPrice: req.stopPrice,
        brokerStatus: 'pending',
      },
      action: req.action,
      qty: req.qty,
      status: 'pending',
      filledQty: 0,
      avgFillPrice: 0,
      fee: 0,
    };
    this.orders.set(orderId, record);

    if (req.orderType === 'MARKET' || req.orderType === 'MARKET_ON_CLOSE') {
      const price = this.priceOf(req.instrument.symbol);
      if (price === undefined) {
        this.setStatus(record, 'rejected');
        return {
          orderId,
          status: record.status,
          errorCode: SIM_NO_PRICE_ERROR,
          message: `No price available for ${req.instrument.symbol}`,
        };
      }
      this.fill(record, this.withImpact(req.action, req.qty, price));
    } else {
      this.setStatus(record, 'working');
      const price = this.priceOf(req.instrument.symbol);
      if (price !== undefined) this.tryTrigger(record, price);
    }

    return {
      orderId,
      status: record.status,
      avgFillPrice: record.status === 'filled' ? record.avgFillPrice : undefined,
      errorCode: 0,
    };
  }

  async cancelOrder(orderId: string): Promise<void> {
    this.ensureConnected();
    const record = this.orders.get(orderId);
    if (!record) throw new OrderNotFoundError(orderId);
    if (record.status === 'working' || record.status === 'pending' || record.status === 'partial') {
      this.setStatus(record, 'cancelled');
    }
  }

  async getOrderStatus(orderId: string): Promise<OrderStatusReport | null> {
    this.ensureConnected();
    const record = this.orders.get(orderId);
    if (!record) return null;
    return {
      orderId,
      status: record.status,
      filledQty: record.filledQty,
      avgFillPrice: record.avgFillPrice,
    };
  }

  async getOpenOrders(): Promise<Order[]> {
    this.ensureConnected();
    return [...this.orders.values()]
      .filter((r) => r.status === 'working' || r.status === 'pending' || r.status === 'partial')
      .map((r) => ({ ...r.order }));
  }

  private ensureConnected(): void {
    if (!this.connected) {
      throw new ConnectionError('Simulated broker is not started.');
    }
  }

  private priceOf(symbol: string): number | undefined {
    const upper = symbol.toUpperCase();
    return this.priceSource?.(upper) ?? this.prices.get(upper);
  }

  private equity(): number {
    let value = this.cash;
    for (const [symbol, holding] of this.holdings) {
      value += holding.quantity * (this.priceOf(symbol) ?? holding.avgCost);
    }
    return value;
  }

  private withImpact(action: OrderAction, qty: number, price: number): number {
    const equity = this.equity();
    const impact = equity > 0 ? ((qty * price) / equity) * this.impactFactor : 0;
    return action === 'BUY' ? price * (1 + impact) : price * (1 - impact);
  }

  private tryTrigger(record: SimOrder, price: number): void {
    const { orderType, limitPrice, stopPrice } = record.order;
    const buying = record.action === 'BUY';
    if (orderType === 'LIMIT' && limitPrice !== undefined) {
      if (buying ? price <= limitPrice : price >= limitPrice) {
        this.fill(record, limitPrice);
      }
    } else if (orderType === 'STOP' && stopPrice !== undefined) {
      if (buying ? price >= stopPrice : price <= stopPrice) {
        this.fill(record, this.withImpact(record.action, record.qty, price));
      }
    }
  }

  private fill(record: SimOrder, fillPrice: number): void {
    const symbol = record.order.instrument.symbol;
    const qty = record.qty;
    const fee = fillPrice * qty * this.feeRate;
    const signed = record.action === 'BUY' ? qty : -qty;

    this.cash -= signed * fillPrice + fee;
    const holding = this.holdings.get(symbol) ?? { quantity: 0, avgCost: 0 };
    const nextQty = holding.quantity + signed;
    if (nextQty === 0) {
      this.holdings.delete(symbol);
    } else {
      const growing = holding.quantity === 0 || Math.sign(holding.quantity) === Math.sign(signed);
      const crossed = !growing && Math.sign(nextQty) !== Math.sign(holding.quantity);
      let avgCost = holding.avgCost;
      if (growing) {
        avgCost = (holding.avgCost * holding.quantity + fillPrice * signed) / nextQty;
      } else if (crossed) {
        avgCost = fillPrice;
      }
      this.holdings.set(symbol, { quantity: nextQty, avgCost });
    }

    record.filledQty = qty;
    record.avgFillPrice = fillPrice;
    record.fee = fee;
    this.setStatus(record, 'filled');
    this.logger.debug(`Filled ${record.order.orderId} ${record.action} ${qty} ${symbol} @ ${fillPrice.toFixed(4)}`, {
      orderId: record.order.orderId,
      fee,
    });
  }

  private setStatus(record: SimOrder, status: SimStatus): void {
    record.status = status;
    record.order.brokerStatus = status;
  }
}
