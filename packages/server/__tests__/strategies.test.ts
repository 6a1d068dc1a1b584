import { beforeEach, describe, expect, it } from '@jest/globals';
import type { Bar, FeedData } from '../src/core/types.js';
import { MomentumWilliamsR } from '../src/strategies/williamsR.js';
import { FakeBroker, bar, silentLogger } from './helpers.js';

function series(closes: number[]): Bar[] {
  return closes.map((close, i) => bar(new Date(Date.UTC(2024, 2, 4, 14, i)).toISOString(), close));
}

// CMO(2) crosses above its SMA(2) on the last bar while %R(3) sits at -75.
const BULLISH = [10, 12, 14, 12, 10, 10.5];

describe('MomentumWilliamsR', () => {
  let broker: FakeBroker;
  let strategy: MomentumWilliamsR;
  let closes: Record<string, number>;

  function feedData(quote: number[], hedgeClose: number): FeedData {
    closes = { SOXL: quote[quote.length - 1], SOXS: hedgeClose };
    return new Map([
      ['SOXL', series(quote)],
      ['SOXS', series([hedgeClose])],
    ]);
  }

  beforeEach(async () => {
    broker = new FakeBroker();
    closes = {};
    strategy = new MomentumWilliamsR({
      quote: 'soxl',
      hedge: 'soxs',
      cmoPeriod: 2,
      cmoSmaPeriod: 2,
      williamsPeriod: 3,
    });
    await strategy.init({ broker, lastClose: (symbol) => closes[symbol], logger: silentLogger() });
  });

  it('reads the signal from the newest quote bar', () => {
    expect(strategy.signal(series(BULLISH))).toEqual({ cross: 1, williamsR: -75 });
    expect(strategy.signal(series([10, 11]))).toBeNull();
  });

  it('opens the quote position on a buy signal when flat', async () => {
    const orders = await strategy.decide(feedData(BULLISH, 5));

    expect(orders).toEqual([{ instrument: 'SOXL-USD-SPOT', qty: 904, orderType: 'MARKET' }]);
  });

  it('rotates out of the hedge on a buy signal', async () => {
    broker.hold('SOXS', 100, 5);

    const orders = await strategy.decide(feedData(BULLISH, 5));

    expect(orders).toEqual([
      { instrument: 'SOXS-USD-SPOT', qty: -100, orderType: 'MARKET' },
      { instrument: 'SOXL-USD-SPOT', qty: 904, orderType: 'MARKET' },
    ]);
  });

  it('rotates into the hedge when the stop loss triggers', async () => {
    broker.hold('SOXL', 100, 11);

    const orders = await strategy.decide(feedData(BULLISH, 5));

    expect(orders).toEqual([
      { instrument: 'SOXL-USD-SPOT', qty: -100, orderType: 'MARKET' },
      { instrument: 'SOXS-USD-SPOT', qty: 1900, orderType: 'MARKET' },
    ]);
  });

  it('holds when there is no crossing', async () => {
    expect(await strategy.decide(feedData([10, 10, 10, 10, 10, 10], 5))).toEqual([]);
  });

  it('does nothing without both feeds', async () => {
    expect(await strategy.decide(new Map([['SOXL', series(BULLISH)]]))).toEqual([]);
  });

  it('does nothing before init', async () => {
    const fresh = new MomentumWilliamsR({ quote: 'SOXL', hedge: 'SOXS' });
    expect(await fresh.decide(feedData(BULLISH, 5))).toEqual([]);
  });
});
