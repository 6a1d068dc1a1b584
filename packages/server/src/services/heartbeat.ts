import cron, { type ScheduledTask } from 'node-cron';
import type { LoopStatus } from '../botRunner/tradingLoop.js';
import { createLogger, type TraderLogger } from '../utils/logger.js';

export interface HeartbeatSource {
  status(): LoopStatus;
}

export interface HeartbeatOptions {
  /** Cron expression; every minute by default. */
  schedule?: string;
  logger?: TraderLogger;
}

/**
 * Logs the loop's state and counters once.
 */
export function recordHeartbeat(source: HeartbeatSource, logger: TraderLogger = createLogger('heartbeat')): LoopStatus {
  const status = source.status();
  const meta = { ...status };
  if (status.state === 'Stopped') {
    logger.warn('💓 heartbeat: loop stopped', meta);
  } else {
    logger.info(`💓 heartbeat: ${status.state}, ${status.tickCount} ticks`, meta);
  }
  return status;
}

/**
 * Records a heartbeat at startup and then on the cron schedule.
 */
export function initHeartbeat(source: HeartbeatSource, options: HeartbeatOptions = {}): ScheduledTask {
  const logger = options.logger ?? createLogger('heartbeat');
  const schedule = options.schedule ?? '* * * * *';
  if (!cron.validate(schedule)) {
    throw new Error(`Invalid heartbeat schedule: ${schedule}`);
  }

  recordHeartbeat(source, logger);
  const task = cron.schedule(schedule, () => {
    recordHeartbeat(source, logger);
  });

  logger.info(`[heartbeat] Service initialized, schedule "${schedule}"`);
  return task;
}
