import { describe, expect, it, jest } from '@jest/globals';
import { ManualClock } from '../src/core/clock.js';
import { ConnectionError } from '../src/core/errors.js';
import { connectWithRetry } from '../src/execution/connect.js';
import { FakeBroker, silentLogger } from './helpers.js';

describe('connectWithRetry', () => {
  const clock = () => new ManualClock(new Date('2024-03-04T12:00:00Z'));

  it('returns the attempt that succeeded', async () => {
    const broker = new FakeBroker();
    broker.startFailures = 1;
    const manual = clock();

    const attempt = await connectWithRetry(broker, { attempts: 3, retryDelayMs: 250, clock: manual, logger: silentLogger() });

    expect(attempt).toBe(2);
    expect(manual.sleeps).toEqual([250]);
    expect(broker.started).toBe(1);
  });

  it('gives up after the last attempt without sleeping again', async () => {
    const broker = new FakeBroker();
    broker.startFailures = 10;
    const manual = clock();

    await expect(
      connectWithRetry(broker, { attempts: 2, retryDelayMs: 250, clock: manual, logger: silentLogger() })
    ).rejects.toThrow('Failed to connect to fake after 2 attempts.');
    expect(manual.sleeps).toEqual([250]);
  });

  it('does not retry errors other than connection failures', async () => {
    const broker = new FakeBroker();
    const start = jest.spyOn(broker, 'start').mockRejectedValue(new Error('bad credentials'));
    const manual = clock();

    await expect(connectWithRetry(broker, { clock: manual, logger: silentLogger() })).rejects.toThrow('bad credentials');
    expect(start).toHaveBeenCalledTimes(1);
    expect(manual.sleeps).toEqual([]);
  });

  it('wraps the last failure as the cause', async () => {
    const broker = new FakeBroker();
    broker.startFailures = 1;

    const error = await connectWithRetry(broker, { attempts: 1, clock: clock(), logger: silentLogger() }).catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(ConnectionError);
    expect(error instanceof Error ? error.cause : undefined).toBeInstanceOf(ConnectionError);
  });
});
