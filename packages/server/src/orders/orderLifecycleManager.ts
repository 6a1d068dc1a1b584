import { SystemClock, type ClockSource } from '../core/clock.js';
import { InvalidOrderError, OrderNotFoundError, describeError } from '../core/errors.js';
import { formatInstrument, parseInstrument } from '../core/instrument.js';
import { isTerminal, type Instrument, type OrderAction, type OrderInstruction, type OrderState } from '../core/types.js';
import { getFilledPrice, type Broker } from '../execution/interface.js';
import { isMappedStatus, toOrderState } from '../execution/statusMap.js';
import { createLogger, type TraderLogger } from '../utils/logger.js';

export interface JournalEntry {
  orderId: string;
  instruction: OrderInstruction;
  instrument: Instrument;
  action: OrderAction;
  submittedAt: Date;
  /** Last canonical state observed from the broker. */
  state: OrderState;
}

export interface OrderManagerOptions {
  /** Spacing between consecutive cancel requests. */
  cancelDelayMs?: number;
  clock?: ClockSource;
  logger?: TraderLogger;
}

/**
 * Submits orders through the broker and answers status queries by always asking
 * the broker. The journal it keeps is a local record of what was submitted.
 */
export class OrderLifecycleManager {
  private readonly journal = new Map<string, JournalEntry>();
  private readonly cancelDelayMs: number;
  private readonly clock: ClockSource;
  private readonly logger: TraderLogger;

  constructor(private broker: Broker, options: OrderManagerOptions = {}) {
    this.cancelDelayMs = options.cancelDelayMs ?? 1;
    this.clock = options.clock ?? new SystemClock();
    this.logger = options.logger ?? createLogger('orders');
  }

  get entries(): JournalEntry[] {
    return [...this.journal.values()];
  }

  entry(orderId: string): JournalEntry | undefined {
    return this.journal.get(orderId);
  }

  async submit(instruction: OrderInstruction): Promise<string> {
    if (!Number.isFinite(instruction.qty) || instruction.qty === 0) {
      throw new InvalidOrderError(`Order quantity must be a non-zero number, got ${instruction.qty}`);
    }
    const instrument = parseInstrument(instruction.instrument);
    const action: OrderAction = instruction.qty > 0 ? 'BUY' : 'SELL';
    const qty = Math.abs(instruction.qty);
    const timeInForce = instruction.tif ?? 'DAY';

    this.logger.logOrderPlacement({
      instrument: formatInstrument(instrument),
      action,
      qty,
      orderType: instruction.orderType,
      timeInForce,
      limitPrice: instruction.price,
      stopPrice: instruction.stopPrice,
      broker: this.broker.name,
    });

    const report = await this.broker.placeOrder({
      instrument,
      action,
      qty,
      orderType: instruction.orderType,
      timeInForce,
      limitPrice: instruction.price,
      stopPrice: instruction.stopPrice,
    });

    const state = this.mapStatus(report.status);
    this.journal.set(report.orderId, {
      orderId: report.orderId,
      instruction,
      instrument,
      action,
      submittedAt: this.clock.now(),
      state,
    });

    this.logger.logOrderResult({
      orderId: report.orderId,
      instrument: formatInstrument(instrument),
      status: state,
      brokerStatus: report.status,
      avgFillPrice: report.avgFillPrice,
      errorCode: report.errorCode,
      message: report.message,
    });
    return report.orderId;
  }

  /**
   * Canonical state as the broker reports it now. Journal entries that already
   * reached a terminal state keep it.
   */
  async status(orderId: string): Promise<OrderState> {
    const report = await this.broker.getOrderStatus(orderId);
    if (!report) throw new OrderNotFoundError(orderId);

    const state = this.mapStatus(report.status);
    const entry = this.journal.get(orderId);
    if (!entry) return state;
    if (isTerminal(entry.state)) {
      if (entry.state !== state) {
        this.logger.warn(`Ignoring ${state} for order ${orderId}, already ${entry.state}`, { orderId });
      }
      return entry.state;
    }
    entry.state = state;
    return state;
  }

  /**
   * Cancels open orders. An empty list cancels every open order at the broker.
   * Returns the ids a cancel was issued for.
   */
  async cancel(orderIds: string[] = []): Promise<string[]> {
    const open = await this.broker.getOpenOrders();
    const requested = new Set(orderIds);
    const targets = open.filter((o) => requested.size === 0 || requested.has(o.orderId));

    const cancelled: string[] = [];
    for (const order of targets) {
      await this.broker.cancelOrder(order.orderId);
      this.logger.logCancellation(order.orderId, formatInstrument(order.instrument));
      cancelled.push(order.orderId);
      await this.clock.sleep(this.cancelDelayMs);
    }
    return cancelled;
  }

  isPending(orderId: string): Promise<boolean> {
    return this.stateIs(orderId, ['Pending']);
  }

  isSubmitted(orderId: string): Promise<boolean> {
    return this.stateIs(orderId, ['Submitted', 'PartiallyFilled']);
  }

  isFilled(orderId: string): Promise<boolean> {
    return this.stateIs(orderId, ['Filled']);
  }

  isCancelled(orderId: string): Promise<boolean> {
    return this.stateIs(orderId, ['Cancelled']);
  }

  /** Average fill price, or 0 when the broker has no record of the order. */
  async filledPrice(orderId: string): Promise<number> {
    const price = await getFilledPrice(this.broker, orderId);
    if (price === undefined) {
      this.logger.error(`Order ${orderId} not found.`, { orderId });
      return 0;
    }
    return price;
  }

  /**
   * Flattens the holdings of the given symbols (every holding when empty) with
   * offsetting market orders. Returns the submitted order ids.
   */
  async closePosition(symbols: string[] = []): Promise<string[]> {
    const positions = await this.broker.getPositions(symbols);
    const wanted = symbols.length > 0 ? symbols.map((s) => s.toUpperCase()) : [...positions.keys()];

    const orderIds: string[] = [];
    for (const symbol of wanted) {
      const position = positions.get(symbol);
      if (!position || position.quantity === 0) continue;
      try {
        const orderId = await this.submit({
          instrument: `${symbol}-${position.currency || 'USD'}-SPOT`,
          qty: -position.quantity,
          orderType: 'MARKET',
        });
        orderIds.push(orderId);
      } catch (error) {
        this.logger.error(`Closing ${symbol} failed: ${describeError(error)}`, { symbol });
      }
    }
    return orderIds;
  }

  private async stateIs(orderId: string, states: OrderState[]): Promise<boolean> {
    try {
      return states.includes(await this.status(orderId));
    } catch (error) {
      if (error instanceof OrderNotFoundError) {
        this.logger.error(error.message, { orderId });
        return false;
      }
      throw error;
    }
  }

  private mapStatus(brokerStatus: string): OrderState {
    if (!isMappedStatus(this.broker.vocabulary, brokerStatus)) {
      this.logger.warn(`Unmapped ${this.broker.vocabulary} order status "${brokerStatus}"`, { brokerStatus });
    }
    return toOrderState(this.broker.vocabulary, brokerStatus);
  }
}
