import winston from 'winston';

// Structured logging contexts for the trading pipeline
export type LogMeta = Record<string, unknown>;

export interface OrderPlacementContext {
  instrument: string;
  action: 'BUY' | 'SELL';
  qty: number;
  orderType: string;
  timeInForce: string;
  limitPrice?: number;
  stopPrice?: number;
  broker?: string;
}

export interface OrderResultContext {
  orderId: string;
  instrument: string;
  status: string;
  brokerStatus: string;
  avgFillPrice?: number;
  errorCode?: number;
  message?: string;
}

export interface FreshnessContext {
  feed: string;
  result: string;
  ageSeconds?: number;
  intervalSeconds: number;
  lastUpdate: Date;
}

export interface LoggerOptions {
  level?: string;
  silent?: boolean;
}

function defaultLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}

function buildWinston(context: string, options: LoggerOptions): winston.Logger {
  return winston.createLogger({
    level: options.level ?? defaultLevel(),
    silent: options.silent ?? process.env.NODE_ENV === 'test',
    format: winston.format.combine(
      winston.format.timestamp({
        format: 'YYYY-MM-DD HH:mm:ss.SSS'
      }),
      winston.format.errors({ stack: true }),
      winston.format.splat(),
      winston.format.json()
    ),
    defaultMeta: { service: 'intraday-trader', context },
    transports: [
      new winston.transports.Console({
        format: winston.format.combine(
          winston.format.colorize(),
          winston.format.printf(({ timestamp, level, message, context: ctx, orderId, feed, service: _service, ...rest }) => {
            const orderInfo = orderId ? `[${String(orderId)}]` : '';
            const feedInfo = feed ? `[${String(feed)}]` : '';
            const restStr = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : '';
            return `[${String(timestamp)}] [${String(ctx)}]${orderInfo}${feedInfo} ${level}: ${String(message)}${restStr}`;
          })
        ),
      }),
    ],
  });
}

/**
 * Context-bound logger handed to each component at construction.
 */
export class TraderLogger {
  private logger: winston.Logger;
  readonly context: string;

  constructor(context: string, options: LoggerOptions = {}) {
    this.context = context;
    this.logger = buildWinston(context, options);
  }

  debug(message: string, meta: LogMeta = {}) {
    this.logger.debug(message, meta);
  }

  info(message: string, meta: LogMeta = {}) {
    this.logger.info(message, meta);
  }

  warn(message: string, meta: LogMeta = {}) {
    this.logger.warn(message, meta);
  }

  error(message: string, meta: LogMeta = {}) {
    this.logger.error(message, meta);
  }

  /**
   * Child logger sharing level and silence with a narrower context name.
   */
  child(context: string): TraderLogger {
    return new TraderLogger(`${this.context}:${context}`, {
      level: this.logger.level,
      silent: this.logger.silent,
    });
  }

  logOrderPlacement(ctx: OrderPlacementContext) {
    this.info('📤 ORDER PLACEMENT', {
      instrument: ctx.instrument,
      action: ctx.action,
      qty: ctx.qty,
      orderType: ctx.orderType,
      timeInForce: ctx.timeInForce,
      limitPrice: ctx.limitPrice,
      stopPrice: ctx.stopPrice,
      broker: ctx.broker ?? 'unknown',
    });
  }

  logOrderResult(ctx: OrderResultContext) {
    const filled = ctx.status === 'Filled' && ctx.avgFillPrice !== undefined;
    const suffix = filled ? ` at price ${ctx.avgFillPrice}` : '';
    this.info(`🔄 Order ${ctx.orderId} ${ctx.status}${suffix}`, {
      orderId: ctx.orderId,
      instrument: ctx.instrument,
      brokerStatus: ctx.brokerStatus,
      avgFillPrice: ctx.avgFillPrice,
    });
    if (ctx.errorCode !== undefined && ctx.errorCode !== 0) {
      this.warn(`⚠️ Broker reported error ${ctx.errorCode} for order ${ctx.orderId}: ${ctx.message ?? 'no message'}`, {
        orderId: ctx.orderId,
        errorCode: ctx.errorCode,
      });
    }
  }

  logCancellation(orderId: string, instrument?: string) {
    this.warn(`❌ Cancelled order ${orderId}`, { orderId, instrument });
  }

  logFreshness(ctx: FreshnessContext) {
    const meta = {
      feed: ctx.feed,
      result: ctx.result,
      ageSeconds: ctx.ageSeconds,
      intervalSeconds: ctx.intervalSeconds,
      lastUpdate: ctx.lastUpdate.toISOString(),
    };
    switch (ctx.result) {
      case 'UpdatedButLate':
        this.warn(`Data ${ctx.feed} is not updated yet. Latest update time: ${meta.lastUpdate}`, meta);
        break;
      case 'Stale':
        this.error(`Data ${ctx.feed} is too old. Latest update time: ${meta.lastUpdate}`, meta);
        break;
      case 'FetchError':
        this.error(`Getting data ${ctx.feed} failed. No data retrieved.`, meta);
        break;
      default:
        this.debug(`Data ${ctx.feed} ${ctx.result}`, meta);
    }
  }

  logSyncOutcome(kind: string, meta: LogMeta = {}) {
    const message = `📊 SYNC ${kind}`;
    if (kind === 'Abort') {
      this.error(message, meta);
    } else if (kind === 'NeedsRetry') {
      this.warn(message, meta);
    } else {
      this.debug(message, meta);
    }
  }

  logTickPhase(phase: string, meta: LogMeta = {}) {
    this.debug(`⏱️ TICK ${phase}`, meta);
  }
}

export const createLogger = (context: string, options: LoggerOptions = {}): TraderLogger => {
  return new TraderLogger(context, options);
};
