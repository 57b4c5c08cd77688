import { describe, expect, it } from 'vitest';
import { adx, ema, mean } from '../../src/analytics/indicators';
import { flatBars, trendingBars } from '../helpers/bars';

describe('mean', () => {
  it('returns zero for an empty series', () => {
    expect(mean([])).toBe(0);
    expect(mean([1, 2, 3, 6])).toBe(3);
  });
});

describe('ema', () => {
  it('seeds with the first value and smooths with 2/(period+1)', () => {
    expect(ema([0, 10, 10], 3)).toEqual([0, 5, 7.5]);
    expect(ema([4, 6, 9], 1)).toEqual([4, 6, 9]);
    expect(ema([], 5)).toEqual([]);
  });
});

describe('adx', () => {
  it('is NaN throughout without twice the period of history', () => {
    const result = adx(trendingBars(28, 'up'), 14);

    expect(result).toHaveLength(28);
    expect(result.every(Number.isNaN)).toBe(true);
  });

  it('reads 100 for a one-directional market, first defined once DX has a full window', () => {
    const result = adx(trendingBars(40, 'up'), 14);

    expect(result.findIndex((value) => Number.isFinite(value))).toBe(27);
    expect(result[39]).toBeCloseTo(100, 8);
  });

  it('reads 100 for a steady decline as well', () => {
    const result = adx(trendingBars(40, 'down', 500), 14);

    expect(result[39]).toBeCloseTo(100, 8);
  });

  it('stays undefined when the range is zero', () => {
    const result = adx(flatBars(40), 14);

    expect(Number.isNaN(result[39])).toBe(true);
  });
});
