import { describe, expect, it, jest } from '@jest/globals';
import type { LoopStatus } from '../src/botRunner/tradingLoop.js';
import { initHeartbeat, recordHeartbeat } from '../src/services/heartbeat.js';
import { silentLogger } from './helpers.js';

function status(overrides: Partial<LoopStatus> = {}): LoopStatus {
  return {
    state: 'AwaitingWindow',
    tickCount: 7,
    lastTickAt: '2024-03-04T12:00:30.000Z',
    lastOutcome: 'AllFresh',
    submittedOrders: 2,
    failedSubmissions: 0,
    stopRequested: false,
    ...overrides,
  };
}

describe('heartbeat', () => {
  it('logs the loop state at info while running', () => {
    const logger = silentLogger();
    const info = jest.spyOn(logger, 'info');

    const recorded = recordHeartbeat({ status: () => status() }, logger);

    expect(recorded.tickCount).toBe(7);
    expect(info).toHaveBeenCalledWith('💓 heartbeat: AwaitingWindow, 7 ticks', status());
  });

  it('warns once the loop has stopped', () => {
    const logger = silentLogger();
    const warn = jest.spyOn(logger, 'warn');

    recordHeartbeat({ status: () => status({ state: 'Stopped' }) }, logger);

    expect(warn).toHaveBeenCalledWith('💓 heartbeat: loop stopped', status({ state: 'Stopped' }));
  });

  it('records immediately when scheduled', () => {
    const source = { status: jest.fn(() => status()) };

    const task = initHeartbeat(source, { logger: silentLogger() });
    task.stop();

    expect(source.status).toHaveBeenCalledTimes(1);
  });

  it('rejects an invalid schedule', () => {
    expect(() => initHeartbeat({ status: () => status() }, { schedule: 'every minute', logger: silentLogger() })).toThrow(
      'Invalid heartbeat schedule: every minute'
    );
  });
});
