import { describe, expect, it } from '@jest/globals';
import { InvalidInstrumentFormatError, UnknownTradeTypeError } from '../src/core/errors.js';
import { formatInstrument, parseInstrument } from '../src/core/instrument.js';

describe('parseInstrument', () => {
  it('splits a SYMBOL-CURRENCY-TRADETYPE triple', () => {
    expect(parseInstrument('SOXL-USD-SPOT')).toEqual({ symbol: 'SOXL', currency: 'USD', tradeType: 'SPOT' });
  });

  it('upper-cases its input', () => {
    expect(parseInstrument('btc-usd-perp')).toEqual({ symbol: 'BTC', currency: 'USD', tradeType: 'PERP' });
  });

  it('rejects the wrong number of parts', () => {
    expect(() => parseInstrument('SOXL-USD')).toThrow(InvalidInstrumentFormatError);
    expect(() => parseInstrument('SOXL-USD-SPOT-X')).toThrow(InvalidInstrumentFormatError);
    expect(() => parseInstrument('SOXL--SPOT')).toThrow(InvalidInstrumentFormatError);
  });

  it('rejects an unknown trade type with its own error', () => {
    const attempt = () => parseInstrument('SOXL-USD-FUTURE');
    expect(attempt).toThrow(UnknownTradeTypeError);
    expect(attempt).toThrow('Unknown trade type: FUTURE');
  });

  it('formats back to the triple', () => {
    expect(formatInstrument({ symbol: 'AAPL', currency: 'USD', tradeType: 'SPOT' })).toBe('AAPL-USD-SPOT');
  });
});
