import { SystemClock, type ClockSource } from '../core/clock.js';
import type { Bar, FeedData } from '../core/types.js';
import { createLogger, type TraderLogger } from '../utils/logger.js';
import type { Feed } from './feed.js';
import type { DataFreshnessTracker, FreshnessResult } from './freshnessTracker.js';

export type SyncOutcome =
  | { kind: 'AllFresh'; results: Record<string, FreshnessResult> }
  | { kind: 'AllUpToDate'; results: Record<string, FreshnessResult> }
  | { kind: 'NeedsRetry'; delayMs: number; pendingFeeds: string[]; results: Record<string, FreshnessResult> }
  | { kind: 'Abort'; staleFeeds: string[]; backoffMs: number; results: Record<string, FreshnessResult> };

export type SyncOutcomeKind = SyncOutcome['kind'];

export interface SyncOptions {
  /** Spacing between re-classifications of retryable feeds. */
  retryDelayMs?: number;
  /** Recommended wait before the next full tick after a stale feed. */
  staleBackoffMs?: number;
  /** Upper bound on re-classification rounds within one tick. */
  maxRetries?: number;
  clock?: ClockSource;
  logger?: TraderLogger;
}

export const DEFAULT_RETRY_DELAY_MS = 300;
export const DEFAULT_STALE_BACKOFF_MS = 50_000;
export const DEFAULT_MAX_SYNC_RETRIES = 20;

const RETRYABLE: ReadonlySet<FreshnessResult> = new Set<FreshnessResult>(['FetchError', 'UpdatedButLate']);

/**
 * Drives every registered feed to a consistent freshness tier before a tick is
 * released to the strategy. A single stale feed aborts the whole tick.
 */
export class DataSyncCoordinator {
  private readonly feeds: Feed[];
  private readonly retryDelayMs: number;
  private readonly staleBackoffMs: number;
  private readonly maxRetries: number;
  private readonly clock: ClockSource;
  private readonly logger: TraderLogger;
  private last: SyncOutcome | null = null;

  constructor(feeds: Feed[], private tracker: DataFreshnessTracker, options: SyncOptions = {}) {
    const names = new Set<string>();
    for (const feed of feeds) {
      if (names.has(feed.name)) {
        throw new Error(`Duplicate feed name: ${feed.name}`);
      }
      names.add(feed.name);
    }
    this.feeds = [...feeds];
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.staleBackoffMs = options.staleBackoffMs ?? DEFAULT_STALE_BACKOFF_MS;
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_SYNC_RETRIES;
    this.clock = options.clock ?? new SystemClock();
    this.logger = options.logger ?? createLogger('data-sync');
  }

  get feedCount(): number {
    return this.feeds.length;
  }

  get feedNames(): string[] {
    return this.feeds.map((f) => f.name);
  }

  get feedSymbols(): string[] {
    return this.feeds.map((f) => f.symbol);
  }

  get lastOutcome(): SyncOutcome | null {
    return this.last;
  }

  /** Throws when a feed asks for an interval the grabber cannot serve. */
  checkFeeds(): void {
    for (const feed of this.feeds) {
      this.tracker.checkFeed(feed);
    }
  }

  async syncTick(now: Date = this.clock.now()): Promise<SyncOutcome> {
    const results: Record<string, FreshnessResult> = {};
    for (const feed of this.feeds) {
      results[feed.name] = await this.tracker.classify(feed, now);
    }

    const outcome = await this.settle(results);
    this.last = outcome;
    this.logger.logSyncOutcome(outcome.kind, { results: outcome.results });
    return outcome;
  }

  private async settle(results: Record<string, FreshnessResult>): Promise<SyncOutcome> {
    const values = Object.values(results);
    if (values.every((r) => r === 'UpToDate')) {
      return { kind: 'AllUpToDate', results };
    }
    if (values.every((r) => r === 'Updated')) {
      return { kind: 'AllFresh', results };
    }

    let pending = this.feeds.filter((f) => RETRYABLE.has(results[f.name]));
    let attempts = 0;
    while (pending.length > 0 && this.staleFeeds(results).length === 0) {
      if (attempts >= this.maxRetries) {
        return {
          kind: 'NeedsRetry',
          delayMs: this.retryDelayMs,
          pendingFeeds: pending.map((f) => f.name),
          results,
        };
      }
      attempts++;
      await this.clock.sleep(this.retryDelayMs);
      const now = this.clock.now();
      for (const feed of pending) {
        results[feed.name] = await this.tracker.classify(feed, now);
      }
      pending = pending.filter((f) => RETRYABLE.has(results[f.name]));
    }

    const stale = this.staleFeeds(results);
    if (stale.length > 0) {
      return { kind: 'Abort', staleFeeds: stale, backoffMs: this.staleBackoffMs, results };
    }
    // Every feed settled on UpToDate or Updated: all are within their interval.
    return Object.values(results).some((r) => r === 'Updated')
      ? { kind: 'AllFresh', results }
      : { kind: 'AllUpToDate', results };
  }

  private staleFeeds(results: Record<string, FreshnessResult>): string[] {
    return this.feeds.filter((f) => results[f.name] === 'Stale').map((f) => f.name);
  }

  /** Strategy-visible snapshot: each feed's most recently fetched table. */
  feedData(): FeedData {
    const data = new Map<string, readonly Bar[]>();
    for (const feed of this.feeds) {
      data.set(feed.name, feed.data);
    }
    return data;
  }

  lastClose(symbol: string): number | undefined {
    const upper = symbol.toUpperCase();
    for (const feed of this.feeds) {
      if (feed.symbol === upper && feed.lastClose !== undefined) return feed.lastClose;
    }
    return undefined;
  }
}
