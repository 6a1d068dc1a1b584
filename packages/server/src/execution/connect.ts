import { ConnectionError, describeError } from '../core/errors.js';
import { SystemClock, type ClockSource } from '../core/clock.js';
import { createLogger, type TraderLogger } from '../utils/logger.js';
import type { Broker } from './interface.js';

export interface ConnectOptions {
  attempts?: number;
  retryDelayMs?: number;
  clock?: ClockSource;
  logger?: TraderLogger;
}

/**
 * Starts the broker, retrying ConnectionError with a fixed delay. Any other error
 * propagates immediately.
 */
export async function connectWithRetry(broker: Broker, options: ConnectOptions = {}): Promise<number> {
  const attempts = options.attempts ?? 5;
  const retryDelayMs = options.retryDelayMs ?? 1000;
  const clock = options.clock ?? new SystemClock();
  const logger = options.logger ?? createLogger('connect');

  let lastError: unknown;
  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      await broker.start();
      logger.info(`Connected to ${broker.name}`, { attempt, maxAttempts: attempts });
      return attempt;
    } catch (error) {
      if (!(error instanceof ConnectionError)) throw error;
      lastError = error;
      logger.warn(`Connection to ${broker.name} failed: ${describeError(error)}`, { attempt, maxAttempts: attempts });
      if (attempt < attempts) {
        await clock.sleep(retryDelayMs);
      }
    }
  }
  throw new ConnectionError(`Failed to connect to ${broker.name} after ${attempts} attempts.`, { cause: lastError });
}
