import { intervalToSeconds } from '../core/interval.js';
import type { Bar } from '../core/types.js';

/** Initial `lastUpdateTimestamp`: far enough back that the first check always fetches. */
export const NEVER_UPDATED = new Date(Date.UTC(1990, 0, 1));

export interface FeedSpec {
  symbol: string;
  interval: string;
  period?: string;
  /** Key under which the strategy sees this feed's table. Defaults to the symbol. */
  name?: string;
}

/**
 * One (symbol, interval, period) data subscription and its most recent rows.
 */
export class Feed {
  readonly name: string;
  readonly symbol: string;
  readonly interval: string;
  readonly period: string;
  readonly intervalSeconds: number;
  private lastUpdate: Date = NEVER_UPDATED;
  private rows: readonly Bar[] = [];

  constructor(spec: FeedSpec) {
    this.symbol = spec.symbol.toUpperCase();
    this.name = spec.name ?? this.symbol;
    this.interval = spec.interval;
    this.period = spec.period ?? 'max';
    // Parsed eagerly so a malformed interval fails at configuration time.
    this.intervalSeconds = intervalToSeconds(spec.interval);
  }

  get lastUpdateTimestamp(): Date {
    return this.lastUpdate;
  }

  get data(): readonly Bar[] {
    return this.rows;
  }

  get lastClose(): number | undefined {
    const last = this.rows[this.rows.length - 1];
    return last?.close;
  }

  /**
   * Replaces the cached table with a non-empty fetch and advances
   * `lastUpdateTimestamp` to the latest row.
   */
  applyFetch(rows: readonly Bar[]): Date {
    if (rows.length === 0) return this.lastUpdate;
    let latest = rows[0].timestamp;
    for (const row of rows) {
      if (row.timestamp.getTime() > latest.getTime()) latest = row.timestamp;
    }
    this.rows = rows;
    this.lastUpdate = new Date(latest.getTime());
    return this.lastUpdate;
  }
}
