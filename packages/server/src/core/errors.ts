export type TradingErrorCode =
  | 'CONNECTION_ERROR'
  | 'FETCH_ERROR'
  | 'INVALID_INTERVAL_FORMAT'
  | 'INVALID_INSTRUMENT_FORMAT'
  | 'UNKNOWN_TRADE_TYPE'
  | 'INVALID_ORDER'
  | 'ORDER_NOT_FOUND'
  | 'SETUP_ERROR'
  | 'CONFIG_ERROR';

export class TradingError extends Error {
  readonly code: TradingErrorCode;

  constructor(code: TradingErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Broker or data transport failure. */
export class ConnectionError extends TradingError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONNECTION_ERROR', message, options);
  }
}

/** A data fetch returned nothing usable. */
export class FetchError extends TradingError {
  constructor(readonly source: string, message: string, options?: { cause?: unknown }) {
    super('FETCH_ERROR', message, options);
  }
}

export class InvalidIntervalFormatError extends TradingError {
  constructor(readonly interval: string, reason?: string) {
    super('INVALID_INTERVAL_FORMAT', `Invalid interval: ${interval}${reason ? ` (${reason})` : ''}`);
  }
}

export class InvalidInstrumentFormatError extends TradingError {
  constructor(
    readonly instrument: string,
    message = `Invalid instrument format: ${instrument}. Expected SYMBOL-CURRENCY-TRADETYPE`,
    code: TradingErrorCode = 'INVALID_INSTRUMENT_FORMAT'
  ) {
    super(code, message);
  }
}

export class UnknownTradeTypeError extends InvalidInstrumentFormatError {
  constructor(instrument: string, readonly tradeType: string) {
    super(instrument, `Unknown trade type: ${tradeType}`, 'UNKNOWN_TRADE_TYPE');
  }
}

export class InvalidOrderError extends TradingError {
  constructor(message: string) {
    super('INVALID_ORDER', message);
  }
}

export class OrderNotFoundError extends TradingError {
  constructor(readonly orderId: string) {
    super('ORDER_NOT_FOUND', `Order ${orderId} not found.`);
  }
}

/** Missing collaborators at start; fatal before the loop begins. */
export class SetupError extends TradingError {
  constructor(message: string) {
    super('SETUP_ERROR', message);
  }
}

export class ConfigError extends TradingError {
  constructor(readonly key: string, message: string) {
    super('CONFIG_ERROR', message);
  }
}

export function isTradingError(err: unknown, code?: TradingErrorCode): err is TradingError {
  return err instanceof TradingError && (code === undefined || err.code === code);
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return `${err.name}: ${err.message}`;
  return String(err);
}
