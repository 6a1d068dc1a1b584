import { randomUUID } from 'crypto';
import type { RequestInit } from 'node-fetch';
import { ConnectionError, InvalidOrderError, OrderNotFoundError, UnknownTradeTypeError } from '../core/errors.js';
import { defaultFetch, isRecord, readNumber, readString, type HttpFetch, type HttpResponse } from '../core/http.js';
import { formatInstrument } from '../core/instrument.js';
import type { Order, OrderType, Position, TimeInForce } from '../core/types.js';
import { createLogger, type TraderLogger } from '../utils/logger.js';
import type { Broker, OrderStatusReport, PlaceOrderRequest, PlacementReport } from './interface.js';

export interface AlpacaBrokerOptions {
  apiKey?: string;
  apiSecret?: string;
  baseUrl?: string;
  fetchImpl?: HttpFetch;
  logger?: TraderLogger;
  now?: () => Date;
}

const ORDER_TYPES: Record<OrderType, string> = {
  MARKET: 'market',
  LIMIT: 'limit',
  STOP: 'stop',
  STOP_LIMIT: 'stop_limit',
  TRAILING: 'trailing_stop',
  MARKET_ON_CLOSE: 'market',
  LIMIT_ON_CLOSE: 'limit',
};

const TIME_IN_FORCE: Record<TimeInForce, string> = {
  DAY: 'day',
  GTC: 'gtc',
  IOC: 'ioc',
  FOK: 'fok',
  EXTENDED: 'day',
};

function fromAlpacaType(type: string | undefined, tif: string | undefined): OrderType {
  const onClose = tif === 'cls';
  switch (type) {
    case 'limit':
      return onClose ? 'LIMIT_ON_CLOSE' : 'LIMIT';
    case 'stop':
      return 'STOP';
    case 'stop_limit':
      return 'STOP_LIMIT';
    case 'trailing_stop':
      return 'TRAILING';
    default:
      return onClose ? 'MARKET_ON_CLOSE' : 'MARKET';
  }
}

function fromAlpacaTif(tif: string | undefined, extended: boolean): TimeInForce {
  if (extended) return 'EXTENDED';
  switch (tif) {
    case 'gtc':
      return 'GTC';
    case 'ioc':
      return 'IOC';
    case 'fok':
      return 'FOK';
    default:
      return 'DAY';
  }
}

/**
 * Alpaca trading account over REST. Only SPOT stock instruments are supported.
 */
export class AlpacaBroker implements Broker {
  readonly name = 'alpaca';
  readonly vocabulary = 'alpaca' as const;

  private apiKey: string;
  private apiSecret: string;
  private baseUrl: string;
  private fetchImpl: HttpFetch;
  private logger: TraderLogger;
  private clockNow: () => Date;
  private cash = 0;

  constructor(options: AlpacaBrokerOptions = {}) {
    this.apiKey = options.apiKey ?? process.env.ALPACA_API_KEY ?? '';
    this.apiSecret = options.apiSecret ?? process.env.ALPACA_API_SECRET ?? '';
    this.baseUrl = options.baseUrl ?? 'https://paper-api.alpaca.markets';
    this.fetchImpl = options.fetchImpl ?? defaultFetch;
    this.logger = options.logger ?? createLogger('alpaca-broker');
    this.clockNow = options.now ?? (() => new Date());

    if (!this.apiKey || !this.apiSecret) {
      this.logger.warn('Alpaca API credentials not provided! Account requests will be rejected.');
    }
  }

  async start(): Promise<void> {
    await this.update();
    this.logger.info(`Alpaca account ready, cash ${this.cash}`);
  }

  async stop(): Promise<void> {
    this.logger.info('Alpaca broker stopped');
  }

  now(): Date {
    return this.clockNow();
  }

  async update(): Promise<void> {
    const response = await this.send('/v2/account');
    if (!response.ok) {
      throw new ConnectionError(`Alpaca account request failed: ${response.status} ${response.statusText}`);
    }
    const account = await this.readRecord(response);
    this.cash = readNumber(account, 'cash') ?? 0;
  }

  async getCash(): Promise<number> {
    await this.update();
    return this.cash;
  }

  async getPositions(symbols: string[] = []): Promise<Map<string, Position>> {
    const response = await this.send('/v2/positions');
    if (!response.ok) {
      throw new ConnectionError(`Alpaca positions request failed: ${response.status} ${response.statusText}`);
    }
    const body = await response.json();
    const wanted = symbols.map((s) => s.toUpperCase());
    const positions = new Map<string, Position>();
    if (!Array.isArray(body)) return positions;

    for (const raw of body) {
      if (!isRecord(raw)) continue;
      const symbol = readString(raw, 'symbol');
      if (!symbol || (wanted.length > 0 && !wanted.includes(symbol))) continue;
      positions.set(symbol, {
        symbol,
        currency: 'USD',
        quantity: readNumber(raw, 'qty') ?? 0,
        avgCost: readNumber(raw, 'avg_entry_price') ?? 0,
        unrealizedPnl: readNumber(raw, 'unrealized_pl') ?? 0,
      });
    }
    return positions;
  }

  async placeOrder(req: PlaceOrderRequest): Promise<PlacementReport> {
    if (req.instrument.tradeType !== 'SPOT') {
      throw new UnknownTradeTypeError(formatInstrument(req.instrument), req.instrument.tradeType);
    }

    const onClose = req.orderType === 'MARKET_ON_CLOSE' || req.orderType === 'LIMIT_ON_CLOSE';
    const body: Record<string, string | boolean> = {
      symbol: req.instrument.symbol,
      qty: String(req.qty),
      side: req.action === 'BUY' ? 'buy' : 'sell',
      type: ORDER_TYPES[req.orderType],
      time_in_force: onClose ? 'cls' : TIME_IN_FORCE[req.timeInForce],
      client_order_id: randomUUID(),
    };
    if (req.timeInForce === 'EXTENDED') body.extended_hours = true;
    if (req.limitPrice !== undefined) body.limit_price = String(req.limitPrice);
    if (req.stopPrice !== undefined) {
      if (req.orderType === 'TRAILING') {
        body.trail_price = String(req.stopPrice);
      } else {
        body.stop_price = String(req.stopPrice);
      }
    }

    const response = await this.send('/v2/orders', {
      method: 'POST',
      body: JSON.stringify(body),
    });
    if (!response.ok) {
      const errorText = await response.text();
      const message = `Alpaca API error: ${response.status} ${response.statusText} - ${errorText}`;
      if (response.status >= 500) throw new ConnectionError(message);
      throw new InvalidOrderError(message);
    }

    const order = await this.readRecord(response);
    const orderId = readString(order, 'id');
    if (!orderId) {
      throw new ConnectionError('Alpaca order response carried no id');
    }
    return {
      orderId,
      status: readString(order, 'status') ?? 'new',
      avgFillPrice: readNumber(order, 'filled_avg_price'),
      errorCode: 0,
    };
  }

  async cancelOrder(orderId: string): Promise<void> {
    const response = await this.send(`/v2/orders/${encodeURIComponent(orderId)}`, { method: 'DELETE' });
    if (response.status === 404) throw new OrderNotFoundError(orderId);
    if (response.status === 422) {
      this.logger.warn(`Order ${orderId} is no longer cancelable`, { orderId });
      return;
    }
    if (!response.ok) {
      throw new ConnectionError(`Alpaca cancel failed: ${response.status} ${response.statusText}`);
    }
  }

  async getOrderStatus(orderId: string): Promise<OrderStatusReport | null> {
    const response = await this.send(`/v2/orders/${encodeURIComponent(orderId)}`);
    if (response.status === 404) return null;
    if (!response.ok) {
      throw new ConnectionError(`Alpaca order request failed: ${response.status} ${response.statusText}`);
    }
    const order = await this.readRecord(response);
    return {
      orderId,
      status: readString(order, 'status') ?? 'unknown',
      filledQty: readNumber(order, 'filled_qty') ?? 0,
      avgFillPrice: readNumber(order, 'filled_avg_price') ?? 0,
    };
  }

  async getOpenOrders(): Promise<Order[]> {
    const response = await this.send('/v2/orders?status=open&limit=500');
    if (!response.ok) {
      throw new ConnectionError(`Alpaca orders request failed: ${response.status} ${response.statusText}`);
    }
    const body = await response.json();
    if (!Array.isArray(body)) return [];

    const orders: Order[] = [];
    for (const raw of body) {
      if (!isRecord(raw)) continue;
      const orderId = readString(raw, 'id');
      const symbol = readString(raw, 'symbol');
      if (!orderId || !symbol) continue;
      const qty = readNumber(raw, 'qty') ?? 0;
      const tif = readString(raw, 'time_in_force');
      orders.push({
        orderId,
        instrument: { symbol, currency: 'USD', tradeType: 'SPOT' },
        quantity: readString(raw, 'side') === 'sell' ? -qty : qty,
        orderType: fromAlpacaType(readString(raw, 'type'), tif),
        timeInForce: fromAlpacaTif(tif, raw['extended_hours'] === true),
        limitPrice: readNumber(raw, 'limit_price'),
        stopPrice: readNumber(raw, 'stop_price'),
        brokerStatus: readString(raw, 'status') ?? 'unknown',
      });
    }
    return orders;
  }

  private async send(path: string, init: RequestInit = {}): Promise<HttpResponse> {
    try {
      return await this.fetchImpl(`${this.baseUrl}${path}`, {
        ...init,
        headers: {
          'APCA-API-KEY-ID': this.apiKey,
          'APCA-API-SECRET-KEY': this.apiSecret,
          'Content-Type': 'application/json',
        },
      });
    } catch (error) {
      throw new ConnectionError(`Alpaca request to ${path} failed: ${String(error)}`, { cause: error });
    }
  }

  private async readRecord(response: HttpResponse): Promise<Record<string, unknown>> {
    const body = await response.json();
    if (!isRecord(body)) {
      throw new ConnectionError('Alpaca API returned an unexpected payload');
    }
    return body;
  }
}
