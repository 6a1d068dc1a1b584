import { ConfigError } from './core/errors.js';
import { parseInterval } from './core/interval.js';

export type BrokerKind = 'sim' | 'alpaca';
export type DataSourceKind = 'alpaca' | 'polygon';

export type Env = Record<string, string | undefined>;

export interface TraderConfig {
  quoteSymbol: string;
  hedgeSymbol: string;
  currency: string;
  interval: string;
  period: string;
  pollIntervalMs: number;
  actionWindowSeconds: number;
  syncRetryDelayMs: number;
  staleBackoffMs: number;
  maxSyncRetries: number;
  cancelDelayMs: number;
  endOfDay: { hour: number; minute: number };
  connectAttempts: number;
  connectRetryDelayMs: number;
  broker: BrokerKind;
  dataSource: DataSourceKind;
  simCash: number;
  alpaca: {
    apiKey: string;
    apiSecret: string;
    tradingUrl: string;
    dataUrl: string;
    feed: string;
  };
  polygon: {
    apiKey: string;
    baseUrl: string;
  };
  api: {
    enabled: boolean;
    port: number;
    host: string;
    logRequests: boolean;
  };
  strategy: {
    capital: number;
    stopLoss: number;
    cmoPeriod: number;
    cmoSmaPeriod: number;
    williamsPeriod: number;
    williamsLower: number;
    williamsUpper: number;
  };
}

function readText(env: Env, key: string, fallback: string): string {
  const value = env[key]?.trim();
  return value ? value : fallback;
}

function readNumber(env: Env, key: string, fallback: number, opts: { integer?: boolean; min?: number; max?: number } = {}): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(key, `${key} must be a number, got "${raw}"`);
  }
  if (opts.integer && !Number.isInteger(value)) {
    throw new ConfigError(key, `${key} must be an integer, got "${raw}"`);
  }
  if (opts.min !== undefined && value < opts.min) {
    throw new ConfigError(key, `${key} must be >= ${opts.min}, got ${value}`);
  }
  if (opts.max !== undefined && value > opts.max) {
    throw new ConfigError(key, `${key} must be <= ${opts.max}, got ${value}`);
  }
  return value;
}

function readBoolean(env: Env, key: string, fallback: boolean): boolean {
  const raw = env[key]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (raw === 'true' || raw === '1' || raw === 'yes') return true;
  if (raw === 'false' || raw === '0' || raw === 'no') return false;
  throw new ConfigError(key, `${key} must be true or false, got "${raw}"`);
}

function readChoice<T extends string>(env: Env, key: string, choices: readonly T[], fallback: T): T {
  const raw = env[key]?.trim().toLowerCase();
  if (!raw) return fallback;
  const match = choices.find((c) => c === raw);
  if (!match) {
    throw new ConfigError(key, `${key} must be one of ${choices.join(', ')}, got "${raw}"`);
  }
  return match;
}

function readInterval(env: Env, key: string, fallback: string): string {
  const value = readText(env, key, fallback);
  try {
    parseInterval(value);
  } catch (error) {
    throw new ConfigError(key, `${key} is not a valid interval: "${value}"`);
  }
  return value;
}

export function loadConfig(env: Env = process.env): TraderConfig {
  return {
    quoteSymbol: readText(env, 'TRADER_QUOTE_SYMBOL', 'SOXL').toUpperCase(),
    hedgeSymbol: readText(env, 'TRADER_HEDGE_SYMBOL', 'SOXS').toUpperCase(),
    currency: readText(env, 'TRADER_CURRENCY', 'USD').toUpperCase(),
    interval: readInterval(env, 'TRADER_INTERVAL', '1m'),
    period: readText(env, 'TRADER_PERIOD', '2d'),
    pollIntervalMs: readNumber(env, 'TRADER_POLL_INTERVAL_MS', 1000, { min: 0 }),
    actionWindowSeconds: readNumber(env, 'TRADER_ACTION_WINDOW_SECONDS', 10, { min: 0, max: 60 }),
    syncRetryDelayMs: readNumber(env, 'TRADER_SYNC_RETRY_DELAY_MS', 300, { min: 0 }),
    staleBackoffMs: readNumber(env, 'TRADER_STALE_BACKOFF_MS', 50_000, { min: 0 }),
    maxSyncRetries: readNumber(env, 'TRADER_MAX_SYNC_RETRIES', 20, { integer: true, min: 0 }),
    cancelDelayMs: readNumber(env, 'TRADER_CANCEL_DELAY_MS', 1, { min: 0 }),
    endOfDay: {
      hour: readNumber(env, 'TRADER_EOD_HOUR', 20, { integer: true, min: 0, max: 23 }),
      minute: readNumber(env, 'TRADER_EOD_MINUTE', 59, { integer: true, min: 0, max: 59 }),
    },
    connectAttempts: readNumber(env, 'TRADER_CONNECT_ATTEMPTS', 5, { integer: true, min: 1 }),
    connectRetryDelayMs: readNumber(env, 'TRADER_CONNECT_RETRY_DELAY_MS', 1000, { min: 0 }),
    broker: readChoice(env, 'TRADER_BROKER', ['sim', 'alpaca'] as const, 'sim'),
    dataSource: readChoice(env, 'TRADER_DATA_SOURCE', ['alpaca', 'polygon'] as const, 'alpaca'),
    simCash: readNumber(env, 'SIM_STARTING_CASH', 10_000, { min: 0 }),
    alpaca: {
      apiKey: readText(env, 'ALPACA_API_KEY', ''),
      apiSecret: readText(env, 'ALPACA_API_SECRET', ''),
      tradingUrl: readText(env, 'ALPACA_BASE_URL', 'https://paper-api.alpaca.markets'),
      dataUrl: readText(env, 'ALPACA_DATA_URL', 'https://data.alpaca.markets'),
      feed: readText(env, 'ALPACA_DATA_FEED', 'iex'),
    },
    polygon: {
      apiKey: readText(env, 'POLYGON_API_KEY', ''),
      baseUrl: readText(env, 'POLYGON_BASE_URL', 'https://api.polygon.io'),
    },
    api: {
      enabled: readBoolean(env, 'API_ENABLED', true),
      port: readNumber(env, 'PORT', 3334, { integer: true, min: 0, max: 65535 }),
      host: readText(env, 'HOST', '0.0.0.0'),
      logRequests: readBoolean(env, 'API_LOG_REQUESTS', false),
    },
    strategy: {
      capital: readNumber(env, 'STRATEGY_CAPITAL', 10_000, { min: 0 }),
      stopLoss: readNumber(env, 'STRATEGY_STOP_LOSS', 0.005, { min: 0, max: 1 }),
      cmoPeriod: readNumber(env, 'STRATEGY_CMO_PERIOD', 10, { integer: true, min: 1 }),
      cmoSmaPeriod: readNumber(env, 'STRATEGY_CMO_SMA_PERIOD', 10, { integer: true, min: 1 }),
      williamsPeriod: readNumber(env, 'STRATEGY_WILLIAMS_PERIOD', 14, { integer: true, min: 1 }),
      williamsLower: readNumber(env, 'STRATEGY_WILLIAMS_LOWER', -60, { min: -100, max: 0 }),
      williamsUpper: readNumber(env, 'STRATEGY_WILLIAMS_UPPER', -40, { min: -100, max: 0 }),
    },
  };
}
