// Series helpers over plain number arrays. Positions without enough history hold NaN.

export function sma(values: readonly number[], period: number): number[] {
  const out = new Array<number>(values.length).fill(NaN);
  if (period <= 0) return out;
  for (let i = period - 1; i < values.length; i++) {
    let sum = 0;
    for (let j = i - period + 1; j <= i; j++) sum += values[j];
    out[i] = sum / period;
  }
  return out;
}

/** Chande momentum oscillator over `period` price changes, in [-100, 100]. */
export function cmo(closes: readonly number[], period: number): number[] {
  const out = new Array<number>(closes.length).fill(NaN);
  if (period <= 0) return out;
  for (let i = period; i < closes.length; i++) {
    let up = 0;
    let down = 0;
    for (let j = i - period + 1; j <= i; j++) {
      const change = closes[j] - closes[j - 1];
      if (change > 0) up += change;
      else down -= change;
    }
    out[i] = up + down === 0 ? 0 : (100 * (up - down)) / (up + down);
  }
  return out;
}

/** Williams %R, in [-100, 0]. */
export function williamsR(
  highs: readonly number[],
  lows: readonly number[],
  closes: readonly number[],
  period: number
): number[] {
  const length = Math.min(highs.length, lows.length, closes.length);
  const out = new Array<number>(length).fill(NaN);
  if (period <= 0) return out;
  for (let i = period - 1; i < length; i++) {
    let highest = -Infinity;
    let lowest = Infinity;
    for (let j = i - period + 1; j <= i; j++) {
      highest = Math.max(highest, highs[j]);
      lowest = Math.min(lowest, lows[j]);
    }
    out[i] = highest === lowest ? -50 : (-100 * (highest - closes[i])) / (highest - lowest);
  }
  return out;
}

/**
 * 1 where `a` crosses above `b`, -1 where it crosses below, 0 otherwise.
 */
export function crossOver(a: readonly number[], b: readonly number[]): number[] {
  const length = Math.min(a.length, b.length);
  const out = new Array<number>(length).fill(0);
  for (let i = 1; i < length; i++) {
    const values = [a[i - 1], b[i - 1], a[i], b[i]];
    if (values.some((v) => Number.isNaN(v))) continue;
    if (a[i - 1] <= b[i - 1] && a[i] > b[i]) out[i] = 1;
    else if (a[i - 1] >= b[i - 1] && a[i] < b[i]) out[i] = -1;
  }
  return out;
}
