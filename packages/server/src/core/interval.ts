import { InvalidIntervalFormatError } from './errors.js';

export type IntervalUnit = 's' | 'm' | 'h' | 'd' | 'w' | 'M' | 'y';

// M and y are fixed 30 and 365 day approximations, not calendar-exact.
const UNIT_SECONDS: Record<IntervalUnit, number> = {
  s: 1,
  m: 60,
  h: 60 * 60,
  d: 60 * 60 * 24,
  w: 60 * 60 * 24 * 7,
  M: 60 * 60 * 24 * 30,
  y: 60 * 60 * 24 * 365,
};

const INTERVAL_PATTERN = /^(\d+)([smhdwMy])$/;

export interface ParsedInterval {
  count: number;
  unit: IntervalUnit;
}

function isIntervalUnit(value: string): value is IntervalUnit {
  return Object.prototype.hasOwnProperty.call(UNIT_SECONDS, value);
}

export function parseInterval(interval: string): ParsedInterval {
  const match = INTERVAL_PATTERN.exec(interval.trim());
  if (!match) {
    throw new InvalidIntervalFormatError(interval);
  }
  const [, digits, unit] = match;
  if (!isIntervalUnit(unit)) {
    throw new InvalidIntervalFormatError(interval, `unknown unit ${unit}`);
  }
  const count = Number.parseInt(digits, 10);
  if (count <= 0) {
    throw new InvalidIntervalFormatError(interval, 'count must be positive');
  }
  return { count, unit };
}

/**
 * Converts an interval string such as "5s", "2h" or "3d" to seconds.
 *
 * @example intervalToSeconds('3d') // 259200
 */
export function intervalToSeconds(interval: string): number {
  const { count, unit } = parseInterval(interval);
  return count * UNIT_SECONDS[unit];
}
