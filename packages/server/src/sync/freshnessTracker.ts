import { differenceInMilliseconds } from 'date-fns';
import { describeError, isTradingError } from '../core/errors.js';
import type { Bar } from '../core/types.js';
import type { DataGrabber } from '../feeds/interface.js';
import { createLogger, type TraderLogger } from '../utils/logger.js';
import type { Feed } from './feed.js';

export type FreshnessResult = 'UpToDate' | 'Updated' | 'UpdatedButLate' | 'Stale' | 'FetchError';

function ageSeconds(now: Date, since: Date): number {
  return differenceInMilliseconds(now, since) / 1000;
}

// Transport and payload failures are retryable; a request the source can never serve is not.
function isConfigurationError(error: unknown): boolean {
  return isTradingError(error) && !isTradingError(error, 'CONNECTION_ERROR') && !isTradingError(error, 'FETCH_ERROR');
}

/**
 * Classifies a single feed's freshness at a reference instant, fetching only when
 * the feed's interval has elapsed since its last update.
 */
export class DataFreshnessTracker {
  private logger: TraderLogger;

  constructor(private grabber: DataGrabber, logger?: TraderLogger) {
    this.logger = logger ?? createLogger('freshness');
  }

  /** Throws when the grabber cannot serve the feed's interval. */
  checkFeed(feed: Feed): void {
    this.grabber.checkInterval?.(feed.interval);
  }

  async classify(feed: Feed, now: Date): Promise<FreshnessResult> {
    const interval = feed.intervalSeconds;
    if (ageSeconds(now, feed.lastUpdateTimestamp) < interval) {
      return 'UpToDate';
    }

    let rows: Bar[];
    try {
      rows = await this.grabber.fetchHistorical({
        symbol: feed.symbol,
        interval: feed.interval,
        period: feed.period,
      });
    } catch (error) {
      if (isConfigurationError(error)) throw error;
      this.logger.error(`Fetch for ${feed.name} failed: ${describeError(error)}`, { feed: feed.name });
      rows = [];
    }

    if (rows.length === 0) {
      this.logger.logFreshness({ feed: feed.name, result: 'FetchError', intervalSeconds: interval, lastUpdate: feed.lastUpdateTimestamp });
      return 'FetchError';
    }

    const latest = feed.applyFetch(rows);
    const age = ageSeconds(now, latest);
    let result: FreshnessResult;
    if (age < interval) {
      result = 'Updated';
    } else if (age < 2 * interval) {
      result = 'UpdatedButLate';
    } else {
      result = 'Stale';
    }
    this.logger.logFreshness({ feed: feed.name, result, ageSeconds: age, intervalSeconds: interval, lastUpdate: latest });
    return result;
  }
}
