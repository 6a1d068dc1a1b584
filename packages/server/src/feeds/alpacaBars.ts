import { ConnectionError, FetchError, InvalidIntervalFormatError } from '../core/errors.js';
import { defaultFetch, isRecord, readNumber, readString, type HttpFetch, type HttpResponse } from '../core/http.js';
import { parseInterval } from '../core/interval.js';
import type { Bar } from '../core/types.js';
import { createLogger, type TraderLogger } from '../utils/logger.js';
import type { DataGrabber, HistoricalRequest } from './interface.js';
import { resolveWindow } from './window.js';

export interface AlpacaBarsOptions {
  apiKey?: string;
  apiSecret?: string;
  dataUrl?: string;
  /** Alpaca market data feed: "iex" on free plans, "sip" otherwise. */
  feed?: string;
  fetchImpl?: HttpFetch;
  now?: () => Date;
  logger?: TraderLogger;
}

const TIMEFRAME_UNITS: Record<string, string> = {
  m: 'Min',
  h: 'Hour',
  d: 'Day',
  w: 'Week',
  M: 'Month',
};

const PAGE_LIMIT = 10000;

export function toAlpacaTimeframe(interval: string): string {
  const { count, unit } = parseInterval(interval);
  const suffix = TIMEFRAME_UNITS[unit];
  if (!suffix) {
    throw new InvalidIntervalFormatError(interval, 'not served by Alpaca');
  }
  return `${count}${suffix}`;
}

function maxPeriodFor(interval: string): string {
  const { unit } = parseInterval(interval);
  if (unit === 'm') return '7d';
  if (unit === 'h') return '730d';
  return '5y';
}

function toBar(raw: unknown): Bar | null {
  if (!isRecord(raw)) return null;
  const t = readString(raw, 't');
  const open = readNumber(raw, 'o');
  const high = readNumber(raw, 'h');
  const low = readNumber(raw, 'l');
  const close = readNumber(raw, 'c');
  if (!t || open === undefined || high === undefined || low === undefined || close === undefined) {
    return null;
  }
  const timestamp = new Date(t);
  if (Number.isNaN(timestamp.getTime())) return null;
  return { timestamp, open, high, low, close, volume: readNumber(raw, 'v') ?? 0 };
}

/**
 * Historical stock bars from the Alpaca market data REST API.
 */
export class AlpacaBarsGrabber implements DataGrabber {
  readonly source = 'alpaca';
  private apiKey: string;
  private apiSecret: string;
  private dataUrl: string;
  private feed: string;
  private fetchImpl: HttpFetch;
  private now: () => Date;
  private logger: TraderLogger;

  constructor(options: AlpacaBarsOptions = {}) {
    this.apiKey = options.apiKey ?? process.env.ALPACA_API_KEY ?? '';
    this.apiSecret = options.apiSecret ?? process.env.ALPACA_API_SECRET ?? '';
    this.dataUrl = options.dataUrl ?? 'https://data.alpaca.markets';
    this.feed = options.feed ?? 'iex';
    this.fetchImpl = options.fetchImpl ?? defaultFetch;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? createLogger('alpaca-bars');

    if (!this.apiKey || !this.apiSecret) {
      this.logger.warn('Alpaca API credentials not provided! Bar requests will be rejected.');
    }
  }

  checkInterval(interval: string): void {
    toAlpacaTimeframe(interval);
  }

  async fetchHistorical(req: HistoricalRequest): Promise<Bar[]> {
    const timeframe = toAlpacaTimeframe(req.interval);
    const { start, end } = resolveWindow(req, this.now(), maxPeriodFor(req.interval));
    const symbol = req.symbol.toUpperCase();

    this.logger.info(`Getting ${symbol} ${req.interval} data from ${start.toISOString()}...`, { symbol });

    const bars: Bar[] = [];
    let pageToken: string | undefined;
    do {
      const params = new URLSearchParams({
        timeframe,
        start: start.toISOString(),
        end: end.toISOString(),
        limit: String(PAGE_LIMIT),
        adjustment: 'raw',
        feed: this.feed,
      });
      if (pageToken) params.set('page_token', pageToken);

      const body = await this.request(`${this.dataUrl}/v2/stocks/${encodeURIComponent(symbol)}/bars?${params.toString()}`);
      const rawBars = body['bars'];
      if (Array.isArray(rawBars)) {
        for (const raw of rawBars) {
          const bar = toBar(raw);
          if (bar) bars.push(bar);
        }
      }
      pageToken = readString(body, 'next_page_token') || undefined;
    } while (pageToken);

    bars.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
    return bars;
  }

  private async request(url: string): Promise<Record<string, unknown>> {
    let response: HttpResponse;
    try {
      response = await this.fetchImpl(url, {
        headers: {
          'APCA-API-KEY-ID': this.apiKey,
          'APCA-API-SECRET-KEY': this.apiSecret,
        },
      });
    } catch (error) {
      throw new ConnectionError(`Alpaca data request failed: ${String(error)}`, { cause: error });
    }

    if (!response.ok) {
      const errorText = await response.text();
      throw new FetchError(this.source, `Alpaca API error: ${response.status} ${response.statusText} - ${errorText}`);
    }

    const body = await response.json();
    if (!isRecord(body)) {
      throw new FetchError(this.source, 'Alpaca API returned an unexpected payload');
    }
    return body;
  }
}
