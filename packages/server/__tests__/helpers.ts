import { ConnectionError } from '../src/core/errors.js';
import type { Bar, Order, Position } from '../src/core/types.js';
import type { Broker, OrderStatusReport, PlaceOrderRequest, PlacementReport } from '../src/execution/interface.js';
import type { BrokerVocabulary } from '../src/execution/statusMap.js';
import type { DataGrabber, HistoricalRequest } from '../src/feeds/interface.js';
import type { HttpFetch, HttpResponse } from '../src/core/http.js';
import { createLogger } from '../src/utils/logger.js';

export const silentLogger = (context = 'test') => createLogger(context, { silent: true });

export function bar(timestamp: string, close: number, extra: Partial<Bar> = {}): Bar {
  return {
    timestamp: new Date(timestamp),
    open: close,
    high: close,
    low: close,
    close,
    volume: 100,
    ...extra,
  };
}

/**
 * Grabber returning queued responses per symbol. An Error in the queue is thrown;
 * once a queue is drained the last response repeats.
 */
export class ScriptedGrabber implements DataGrabber {
  readonly source = 'scripted';
  readonly requests: HistoricalRequest[] = [];
  private queues = new Map<string, Array<Bar[] | Error>>();

  script(symbol: string, ...responses: Array<Bar[] | Error>): this {
    this.queues.set(symbol.toUpperCase(), responses);
    return this;
  }

  callsFor(symbol: string): number {
    return this.requests.filter((r) => r.symbol === symbol.toUpperCase()).length;
  }

  async fetchHistorical(req: HistoricalRequest): Promise<Bar[]> {
    this.requests.push(req);
    const queue = this.queues.get(req.symbol.toUpperCase()) ?? [];
    const next = queue.length > 1 ? queue.shift() : queue[0];
    if (next instanceof Error) throw next;
    return next ?? [];
  }
}

export interface RecordedRequest {
  url: string;
  method: string;
  body?: string;
}

/** In-process stand-in for node-fetch that serves canned JSON by URL prefix. */
export function fakeFetch(
  routes: Array<{ match: (url: string, method: string) => boolean; status?: number; body: unknown }>
): { fetchImpl: HttpFetch; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];
  const fetchImpl: HttpFetch = async (url, init) => {
    const method = init?.method ?? 'GET';
    requests.push({ url, method, body: typeof init?.body === 'string' ? init.body : undefined });
    const route = routes.find((r) => r.match(url, method));
    const status = route ? route.status ?? 200 : 404;
    const body = route ? route.body : { message: 'not found' };
    const response: HttpResponse = {
      ok: status >= 200 && status < 300,
      status,
      statusText: status === 200 ? 'OK' : 'Error',
      json: async () => body,
      text: async () => JSON.stringify(body),
    };
    return response;
  };
  return { fetchImpl, requests };
}

/** Broker stand-in with scripted account state; records every placement and cancel. */
export class FakeBroker implements Broker {
  readonly name = 'fake';
  readonly vocabulary: BrokerVocabulary = 'ib';
  readonly placed: PlaceOrderRequest[] = [];
  readonly cancelled: string[] = [];
  positions = new Map<string, Position>();
  statuses = new Map<string, string>();
  openOrders: Order[] = [];
  placementStatus = 'Submitted';
  placementErrorCode = 0;
  startFailures = 0;
  started = 0;
  stopped = 0;
  private nextId = 100;

  async start(): Promise<void> {
    if (this.startFailures > 0) {
      this.startFailures--;
      throw new ConnectionError('connection refused');
    }
    this.started++;
  }

  async stop(): Promise<void> {
    this.stopped++;
  }

  now(): Date {
    return new Date('2024-03-04T15:00:00Z');
  }

  async update(): Promise<void> {}

  async getCash(): Promise<number> {
    return 10_000;
  }

  async getPositions(symbols: string[] = []): Promise<Map<string, Position>> {
    if (symbols.length === 0) return new Map(this.positions);
    const result = new Map<string, Position>();
    for (const symbol of symbols) {
      const position = this.positions.get(symbol);
      if (position) result.set(symbol, position);
    }
    return result;
  }

  async placeOrder(req: PlaceOrderRequest): Promise<PlacementReport> {
    this.placed.push(req);
    const orderId = String(this.nextId++);
    this.statuses.set(orderId, this.placementStatus);
    return { orderId, status: this.placementStatus, errorCode: this.placementErrorCode };
  }

  async cancelOrder(orderId: string): Promise<void> {
    this.cancelled.push(orderId);
    this.statuses.set(orderId, 'Cancelled');
  }

  async getOrderStatus(orderId: string): Promise<OrderStatusReport | null> {
    const status = this.statuses.get(orderId);
    if (status === undefined) return null;
    return { orderId, status, filledQty: 0, avgFillPrice: status === 'Filled' ? 12.5 : 0 };
  }

  async getOpenOrders(): Promise<Order[]> {
    return this.openOrders;
  }

  hold(symbol: string, quantity: number, avgCost = 10): void {
    this.positions.set(symbol, { symbol, currency: 'USD', quantity, avgCost, unrealizedPnl: 0 });
  }
}
