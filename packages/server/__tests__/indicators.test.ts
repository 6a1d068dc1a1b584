import { describe, expect, it } from '@jest/globals';
import { cmo, crossOver, sma, williamsR } from '../src/strategies/indicators.js';

describe('indicators', () => {
  it('computes a simple moving average', () => {
    expect(sma([1, 2, 3, 4, 5], 3)).toEqual([NaN, NaN, 2, 3, 4]);
  });

  it('propagates gaps through the moving average', () => {
    expect(sma([NaN, 2, 4], 2)).toEqual([NaN, NaN, 3]);
  });

  it('computes the Chande momentum oscillator', () => {
    expect(cmo([10, 11, 12, 11, 12], 2)).toEqual([NaN, NaN, 100, 0, 0]);
  });

  it('computes Williams %R', () => {
    expect(williamsR([10, 12, 11], [8, 9, 7], [9, 11, 8], 2)).toEqual([NaN, -25, -80]);
  });

  it('flags crossings in both directions', () => {
    expect(crossOver([1, 2, 3, 1], [2, 2, 2, 2])).toEqual([0, 0, 1, -1]);
  });

  it('ignores crossings next to missing values', () => {
    expect(crossOver([NaN, 3], [2, 2])).toEqual([0, 0]);
  });
});
