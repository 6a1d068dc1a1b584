import type { Instrument, Order, OrderAction, OrderType, Position, TimeInForce } from '../core/types.js';
import type { BrokerVocabulary } from './statusMap.js';

export interface PlaceOrderRequest {
  instrument: Instrument;
  action: OrderAction;
  /** Absolute size; direction is carried by `action`. */
  qty: number;
  orderType: OrderType;
  timeInForce: TimeInForce;
  limitPrice?: number;
  stopPrice?: number;
}

/** What the broker says right after accepting an order. */
export interface PlacementReport {
  orderId: string;
  status: string;
  avgFillPrice?: number;
  /** Non-zero when the broker flagged a problem without rejecting the call. */
  errorCode: number;
  message?: string;
}

export interface OrderStatusReport {
  orderId: string;
  status: string;
  filledQty: number;
  avgFillPrice: number;
}

/**
 * Capabilities the trading core needs from a brokerage account. Statuses are in the
 * broker's own vocabulary; the order manager maps them to canonical states.
 */
export interface Broker {
  readonly name: string;
  readonly vocabulary: BrokerVocabulary;
  start(): Promise<void>;
  stop(): Promise<void>;
  now(): Date;
  /** Refresh cached account information. */
  update(): Promise<void>;
  getCash(): Promise<number>;
  /** Positions keyed by symbol. Empty `symbols` returns every holding. */
  getPositions(symbols?: string[]): Promise<Map<string, Position>>;
  placeOrder(req: PlaceOrderRequest): Promise<PlacementReport>;
  cancelOrder(orderId: string): Promise<void>;
  /** `null` when the broker has no record of the order. */
  getOrderStatus(orderId: string): Promise<OrderStatusReport | null>;
  getOpenOrders(): Promise<Order[]>;
}

export async function getHoldings(broker: Broker, symbols: string[]): Promise<Map<string, number>> {
  const positions = await broker.getPositions(symbols);
  const holdings = new Map<string, number>();
  for (const symbol of symbols) {
    holdings.set(symbol, positions.get(symbol)?.quantity ?? 0);
  }
  return holdings;
}

export async function getCosts(broker: Broker, symbols: string[]): Promise<Map<string, number>> {
  const positions = await broker.getPositions(symbols);
  const costs = new Map<string, number>();
  for (const symbol of symbols) {
    costs.set(symbol, positions.get(symbol)?.avgCost ?? 0);
  }
  return costs;
}

/** Average fill price, or undefined when the broker has no record of the order. */
export async function getFilledPrice(broker: Broker, orderId: string): Promise<number | undefined> {
  const report = await broker.getOrderStatus(orderId);
  return report?.avgFillPrice;
}
