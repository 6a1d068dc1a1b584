import type { Bar } from '../core/types.js';

export interface HistoricalRequest {
  symbol: string;
  interval: string;
  /** Lookback window such as "2d"; "max" asks for the source's longest window. */
  period?: string;
  start?: Date;
  end?: Date;
}

/**
 * Source of historical bars. Rows come back ordered oldest first; an empty array
 * means nothing was retrieved.
 */
export interface DataGrabber {
  readonly source: string;
  fetchHistorical(req: HistoricalRequest): Promise<Bar[]>;
  /** Throws InvalidIntervalFormatError for an interval this source cannot serve. */
  checkInterval?(interval: string): void;
}
