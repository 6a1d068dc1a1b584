import { ConnectionError, FetchError } from '../core/errors.js';
import { SystemClock, type ClockSource } from '../core/clock.js';
import { defaultFetch, isRecord, readNumber, type HttpFetch, type HttpResponse } from '../core/http.js';
import { parseInterval, type IntervalUnit } from '../core/interval.js';
import type { Bar } from '../core/types.js';
import { createLogger, type TraderLogger } from '../utils/logger.js';
import type { DataGrabber, HistoricalRequest } from './interface.js';
import { resolveWindow } from './window.js';

const TIMESPANS: Record<IntervalUnit, string> = {
  s: 'second',
  m: 'minute',
  h: 'hour',
  d: 'day',
  w: 'week',
  M: 'month',
  y: 'year',
};

/**
 * Sliding-window limiter for the Polygon free tier (5 calls per minute).
 */
export class RateLimiter {
  private calls: number[] = [];
  private readonly maxCalls: number;
  private readonly windowMs: number;

  constructor(maxCalls: number = 5, windowMinutes: number = 1, private clock: ClockSource = new SystemClock()) {
    this.maxCalls = maxCalls;
    this.windowMs = windowMinutes * 60 * 1000;
  }

  async waitIfNeeded(): Promise<number> {
    const now = this.clock.now().getTime();
    this.calls = this.calls.filter((callTime) => now - callTime < this.windowMs);

    let waited = 0;
    if (this.calls.length >= this.maxCalls) {
      const oldestCall = Math.min(...this.calls);
      waited = this.windowMs - (now - oldestCall) + 100;
      await this.clock.sleep(waited);

      const newNow = this.clock.now().getTime();
      this.calls = this.calls.filter((callTime) => newNow - callTime < this.windowMs);
    }

    this.calls.push(this.clock.now().getTime());
    return waited;
  }

  getStatus(): { callsUsed: number; maxCalls: number; resetIn: number } {
    const now = this.clock.now().getTime();
    this.calls = this.calls.filter((callTime) => now - callTime < this.windowMs);

    const resetIn = this.calls.length > 0
      ? Math.max(0, this.windowMs - (now - Math.min(...this.calls)))
      : 0;

    return {
      callsUsed: this.calls.length,
      maxCalls: this.maxCalls,
      resetIn: Math.ceil(resetIn / 1000),
    };
  }
}

export interface PolygonBarsOptions {
  apiKey?: string;
  baseUrl?: string;
  fetchImpl?: HttpFetch;
  clock?: ClockSource;
  rateLimiter?: RateLimiter;
  logger?: TraderLogger;
}

export class PolygonBarsGrabber implements DataGrabber {
  readonly source = 'polygon';
  private apiKey: string;
  private baseUrl: string;
  private fetchImpl: HttpFetch;
  private clock: ClockSource;
  private rateLimiter: RateLimiter;
  private logger: TraderLogger;

  constructor(options: PolygonBarsOptions = {}) {
    this.apiKey = options.apiKey ?? process.env.POLYGON_API_KEY ?? '';
    this.baseUrl = options.baseUrl ?? 'https://api.polygon.io';
    this.fetchImpl = options.fetchImpl ?? defaultFetch;
    this.clock = options.clock ?? new SystemClock();
    this.rateLimiter = options.rateLimiter ?? new RateLimiter(5, 1, this.clock);
    this.logger = options.logger ?? createLogger('polygon-bars');
  }

  checkInterval(interval: string): void {
    parseInterval(interval);
  }

  async fetchHistorical(req: HistoricalRequest): Promise<Bar[]> {
    const { count, unit } = parseInterval(req.interval);
    const { start, end } = resolveWindow(req, this.clock.now(), unit === 's' || unit === 'm' ? '30d' : '730d');
    const symbol = req.symbol.toUpperCase();
    const url =
      `${this.baseUrl}/v2/aggs/ticker/${encodeURIComponent(symbol)}/range/${count}/${TIMESPANS[unit]}` +
      `/${start.getTime()}/${end.getTime()}?adjusted=true&sort=asc&limit=50000&apiKey=${encodeURIComponent(this.apiKey)}`;

    const waited = await this.rateLimiter.waitIfNeeded();
    if (waited > 0) {
      this.logger.info(`🚦 RATE LIMIT: waited ${Math.ceil(waited / 1000)}s before Polygon call`, { symbol });
    }
    this.logger.info(`Getting ${symbol} ${req.interval} data from ${start.toISOString()}...`, { symbol });

    let response: HttpResponse;
    try {
      response = await this.fetchImpl(url);
    } catch (error) {
      throw new ConnectionError(`Polygon request failed: ${String(error)}`, { cause: error });
    }
    if (!response.ok) {
      const errorText = await response.text();
      throw new FetchError(this.source, `Polygon API error: ${response.status} ${response.statusText} - ${errorText}`);
    }

    const body = await response.json();
    if (!isRecord(body)) {
      throw new FetchError(this.source, 'Polygon API returned an unexpected payload');
    }
    const results = body['results'];
    if (!Array.isArray(results)) {
      return [];
    }

    const bars: Bar[] = [];
    for (const raw of results) {
      if (!isRecord(raw)) continue;
      const t = readNumber(raw, 't');
      const open = readNumber(raw, 'o');
      const high = readNumber(raw, 'h');
      const low = readNumber(raw, 'l');
      const close = readNumber(raw, 'c');
      if (t === undefined || open === undefined || high === undefined || low === undefined || close === undefined) {
        continue;
      }
      bars.push({ timestamp: new Date(t), open, high, low, close, volume: readNumber(raw, 'v') ?? 0 });
    }
    return bars;
  }
}
