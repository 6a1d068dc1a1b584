import { describe, expect, it } from '@jest/globals';
import { InvalidIntervalFormatError } from '../src/core/errors.js';
import { intervalToSeconds, parseInterval } from '../src/core/interval.js';

describe('intervalToSeconds', () => {
  it('converts each unit with fixed multipliers', () => {
    expect(intervalToSeconds('3d')).toBe(259200);
    expect(intervalToSeconds('2h')).toBe(7200);
    expect(intervalToSeconds('1m')).toBe(60);
    expect(intervalToSeconds('45s')).toBe(45);
    expect(intervalToSeconds('1w')).toBe(604800);
    expect(intervalToSeconds('1M')).toBe(2592000);
    expect(intervalToSeconds('1y')).toBe(31536000);
  });

  it('rejects an unknown unit', () => {
    expect(() => intervalToSeconds('3x')).toThrow(InvalidIntervalFormatError);
  });

  it('rejects missing counts, zero counts and garbage', () => {
    expect(() => intervalToSeconds('m')).toThrow(InvalidIntervalFormatError);
    expect(() => intervalToSeconds('0m')).toThrow(InvalidIntervalFormatError);
    expect(() => intervalToSeconds('')).toThrow(InvalidIntervalFormatError);
    expect(() => intervalToSeconds('1.5h')).toThrow(InvalidIntervalFormatError);
  });
});

describe('parseInterval', () => {
  it('distinguishes minutes from months', () => {
    expect(parseInterval('5m')).toEqual({ count: 5, unit: 'm' });
    expect(parseInterval('5M')).toEqual({ count: 5, unit: 'M' });
  });
});
