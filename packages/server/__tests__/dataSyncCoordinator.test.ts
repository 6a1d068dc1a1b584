import { describe, expect, it } from '@jest/globals';
import { ManualClock } from '../src/core/clock.js';
import { InvalidIntervalFormatError } from '../src/core/errors.js';
import { AlpacaBarsGrabber } from '../src/feeds/alpacaBars.js';
import { DataSyncCoordinator, type SyncOptions } from '../src/sync/dataSyncCoordinator.js';
import { Feed } from '../src/sync/feed.js';
import { DataFreshnessTracker } from '../src/sync/freshnessTracker.js';
import { ScriptedGrabber, bar, fakeFetch, silentLogger } from './helpers.js';

const NOW = new Date('2024-03-04T12:00:05Z');

function setup(options: SyncOptions = {}) {
  const clock = new ManualClock(NOW);
  const grabber = new ScriptedGrabber();
  const quote = new Feed({ symbol: 'SOXL', interval: '1m' });
  const hedge = new Feed({ symbol: 'SOXS', interval: '1m' });
  const coordinator = new DataSyncCoordinator([quote, hedge], new DataFreshnessTracker(grabber, silentLogger()), {
    clock,
    logger: silentLogger(),
    ...options,
  });
  return { clock, grabber, quote, hedge, coordinator };
}

describe('DataSyncCoordinator', () => {
  it('aborts the tick when one feed is stale and the other up to date', async () => {
    const { grabber, hedge, coordinator } = setup();
    hedge.applyFetch([bar('2024-03-04T12:00:00Z', 20)]);
    grabber.script('SOXL', [bar('2024-03-04T11:57:00Z', 10)]);

    const outcome = await coordinator.syncTick(NOW);

    expect(outcome).toEqual({
      kind: 'Abort',
      staleFeeds: ['SOXL'],
      backoffMs: 50_000,
      results: { SOXL: 'Stale', SOXS: 'UpToDate' },
    });
    expect(grabber.callsFor('SOXS')).toBe(0);
  });

  it('returns AllUpToDate without fetching when nothing is due', async () => {
    const { grabber, quote, hedge, coordinator } = setup();
    quote.applyFetch([bar('2024-03-04T12:00:00Z', 10)]);
    hedge.applyFetch([bar('2024-03-04T12:00:00Z', 20)]);

    const outcome = await coordinator.syncTick(NOW);

    expect(outcome.kind).toBe('AllUpToDate');
    expect(grabber.requests).toHaveLength(0);
  });

  it('returns AllFresh when every feed updated', async () => {
    const { grabber, coordinator } = setup();
    grabber.script('SOXL', [bar('2024-03-04T12:00:00Z', 10)]);
    grabber.script('SOXS', [bar('2024-03-04T12:00:00Z', 20)]);

    const outcome = await coordinator.syncTick(NOW);

    expect(outcome.kind).toBe('AllFresh');
    expect(coordinator.lastOutcome).toBe(outcome);
  });

  it('retries a FetchError feed after the short delay', async () => {
    const { clock, grabber, coordinator } = setup();
    grabber.script('SOXL', [], [bar('2024-03-04T12:00:00Z', 10)]);
    grabber.script('SOXS', [bar('2024-03-04T12:00:00Z', 20)]);

    const outcome = await coordinator.syncTick(NOW);

    expect(outcome).toEqual({ kind: 'AllFresh', results: { SOXL: 'Updated', SOXS: 'Updated' } });
    expect(clock.sleeps).toEqual([300]);
    expect(grabber.callsFor('SOXL')).toBe(2);
    expect(grabber.callsFor('SOXS')).toBe(1);
  });

  it('retries a late feed until it catches up', async () => {
    const { clock, grabber, coordinator } = setup({ retryDelayMs: 250 });
    grabber.script('SOXL', [bar('2024-03-04T11:59:00Z', 10)], [bar('2024-03-04T12:00:00Z', 11)]);
    grabber.script('SOXS', [bar('2024-03-04T12:00:00Z', 20)]);

    const outcome = await coordinator.syncTick(NOW);

    expect(outcome.kind).toBe('AllFresh');
    expect(clock.sleeps).toEqual([250]);
  });

  it('aborts when a retried feed turns out stale', async () => {
    const { clock, grabber, coordinator } = setup();
    grabber.script('SOXL', [bar('2024-03-04T11:59:00Z', 10)], [bar('2024-03-04T11:58:00Z', 9)]);
    grabber.script('SOXS', [bar('2024-03-04T12:00:00Z', 20)]);

    const outcome = await coordinator.syncTick(NOW);

    expect(outcome.kind).toBe('Abort');
    expect(outcome.results).toEqual({ SOXL: 'Stale', SOXS: 'Updated' });
    expect(clock.sleeps).toEqual([300]);
  });

  it('gives up with NeedsRetry after the retry bound', async () => {
    const { clock, grabber, coordinator } = setup({ maxRetries: 3 });
    grabber.script('SOXL', []);
    grabber.script('SOXS', [bar('2024-03-04T12:00:00Z', 20)]);

    const outcome = await coordinator.syncTick(NOW);

    expect(outcome).toEqual({
      kind: 'NeedsRetry',
      delayMs: 300,
      pendingFeeds: ['SOXL'],
      results: { SOXL: 'FetchError', SOXS: 'Updated' },
    });
    expect(clock.sleeps).toEqual([300, 300, 300]);
    expect(grabber.callsFor('SOXL')).toBe(4);
  });

  it('exposes cached tables by feed name', async () => {
    const { grabber, coordinator } = setup();
    grabber.script('SOXL', [bar('2024-03-04T11:59:00Z', 10), bar('2024-03-04T12:00:00Z', 11)]);
    grabber.script('SOXS', [bar('2024-03-04T12:00:00Z', 20)]);
    await coordinator.syncTick(NOW);

    const data = coordinator.feedData();
    expect([...data.keys()]).toEqual(['SOXL', 'SOXS']);
    expect(data.get('SOXL')).toHaveLength(2);
    expect(coordinator.lastClose('soxl')).toBe(11);
    expect(coordinator.lastClose('TQQQ')).toBeUndefined();
  });

  it('rejects duplicate feed names', () => {
    const grabber = new ScriptedGrabber();
    const feeds = [new Feed({ symbol: 'SOXL', interval: '1m' }), new Feed({ symbol: 'SOXL', interval: '5m' })];
    expect(() => new DataSyncCoordinator(feeds, new DataFreshnessTracker(grabber, silentLogger()))).toThrow(
      'Duplicate feed name: SOXL'
    );
  });

  describe('feeds the grabber cannot serve', () => {
    function alpacaSetup() {
      const clock = new ManualClock(NOW);
      const { fetchImpl, requests } = fakeFetch([]);
      const grabber = new AlpacaBarsGrabber({
        apiKey: 'test-key',
        apiSecret: 'test-secret',
        fetchImpl,
        now: () => clock.now(),
        logger: silentLogger(),
      });
      const coordinator = new DataSyncCoordinator(
        [new Feed({ symbol: 'SOXL', interval: '30s' })],
        new DataFreshnessTracker(grabber, silentLogger()),
        { clock, logger: silentLogger() }
      );
      return { clock, requests, coordinator };
    }

    it('fails the tick at once without retry sleeps', async () => {
      const { clock, requests, coordinator } = alpacaSetup();

      await expect(coordinator.syncTick(NOW)).rejects.toThrow(InvalidIntervalFormatError);
      expect(clock.sleeps).toEqual([]);
      expect(requests).toHaveLength(0);
    });

    it('reports them from checkFeeds', () => {
      const { coordinator } = alpacaSetup();

      expect(() => coordinator.checkFeeds()).toThrow('Invalid interval: 30s (not served by Alpaca)');
    });
  });
});
