export type TradeType = 'SPOT' | 'PERP';

export interface Instrument {
  symbol: string;
  currency: string;
  tradeType: TradeType;
}

export type OrderAction = 'BUY' | 'SELL';

export type OrderType =
  | 'MARKET'
  | 'LIMIT'
  | 'STOP'
  | 'STOP_LIMIT'
  | 'TRAILING'
  | 'MARKET_ON_CLOSE'
  | 'LIMIT_ON_CLOSE';

export type TimeInForce = 'DAY' | 'GTC' | 'IOC' | 'FOK' | 'EXTENDED';

/**
 * Canonical, broker-agnostic order state. Filled, Cancelled and Rejected are terminal.
 */
export type OrderState =
  | 'Pending'
  | 'Submitted'
  | 'PartiallyFilled'
  | 'Filled'
  | 'Cancelled'
  | 'Rejected'
  | 'Unknown';

export const TERMINAL_STATES: ReadonlySet<OrderState> = new Set<OrderState>(['Filled', 'Cancelled', 'Rejected']);

export function isTerminal(state: OrderState): boolean {
  return TERMINAL_STATES.has(state);
}

/**
 * What a strategy asks for. `instrument` is the SYMBOL-CURRENCY-TRADETYPE triple,
 * `qty` is signed (positive buys, negative sells).
 */
export interface OrderInstruction {
  instrument: string;
  qty: number;
  orderType: OrderType;
  tif?: TimeInForce;
  price?: number;
  stopPrice?: number;
}

/** An order as the broker reports it. */
export interface Order {
  orderId: string;
  instrument: Instrument;
  quantity: number;
  orderType: OrderType;
  timeInForce: TimeInForce;
  limitPrice?: number;
  stopPrice?: number;
  brokerStatus: string;
}

export interface Position {
  symbol: string;
  currency: string;
  quantity: number;
  avgCost: number;
  unrealizedPnl: number;
}

/** One row of a historical data table. */
export interface Bar {
  timestamp: Date;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export type FeedData = ReadonlyMap<string, readonly Bar[]>;
