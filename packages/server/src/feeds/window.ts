import { subSeconds } from 'date-fns';
import { intervalToSeconds } from '../core/interval.js';
import type { HistoricalRequest } from './interface.js';

/**
 * Resolves a request's period/start/end into concrete bounds. "max" falls back to
 * `maxPeriod`, the longest lookback the source serves for that interval.
 */
export function resolveWindow(req: HistoricalRequest, now: Date, maxPeriod: string): { start: Date; end: Date } {
  const end = req.end ?? now;
  if (req.start) {
    return { start: req.start, end };
  }
  const period = !req.period || req.period === 'max' ? maxPeriod : req.period;
  return { start: subSeconds(end, intervalToSeconds(period)), end };
}
