import { InvalidInstrumentFormatError, UnknownTradeTypeError } from './errors.js';
import type { Instrument, TradeType } from './types.js';

const TRADE_TYPES: readonly TradeType[] = ['SPOT', 'PERP'];

function isTradeType(value: string): value is TradeType {
  return TRADE_TYPES.some((t) => t === value);
}

/**
 * Parses "SOXL-USD-SPOT" style identifiers. Case-insensitive; always returns upper case.
 */
export function parseInstrument(raw: string): Instrument {
  const parts = raw.trim().toUpperCase().split('-');
  if (parts.length !== 3 || parts.some((p) => p.length === 0)) {
    throw new InvalidInstrumentFormatError(raw);
  }
  const [symbol, currency, tradeType] = parts;
  if (!isTradeType(tradeType)) {
    throw new UnknownTradeTypeError(raw, tradeType);
  }
  return { symbol, currency, tradeType };
}

export function formatInstrument(instrument: Instrument): string {
  return `${instrument.symbol}-${instrument.currency}-${instrument.tradeType}`;
}
