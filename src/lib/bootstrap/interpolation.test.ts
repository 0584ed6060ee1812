import { describe, expect, it } from 'vitest';
import { OutOfRangeInterpolation } from '../errors';
import { buildCurve } from './curve';
import { interpolateLinear, interpolateRate, lookupRate, nearestPointIndex } from './interpolation';

const curve = buildCurve(
  [
    { tenor: 5, rate: 3.6 },
    { tenor: 1, rate: 2.0 },
    { tenor: 2, rate: 3.0 },
  ],
  { issuer: 'Germany', instrument: 'Government', kind: 'Par', unit: 'Percent', currency: 'EUR' }
);

describe('interpolateLinear', () => {
  it('returns the left rate for a degenerate segment', () => {
    expect(interpolateLinear(2, 1.5, 2, 9, 2)).toBe(1.5);
  });

  it('interpolates at the midpoint', () => {
    expect(interpolateLinear(1, 2, 2, 3, 1.5)).toBe(2.5);
  });
});

describe('lookupRate', () => {
  it('returns the stored rate on a grid point', () => {
    expect(lookupRate(curve, 2, 'Strict')).toEqual({ ok: true, rate: 3.0, exact: true, clamped: false });
    expect(lookupRate(curve, 2 + 1e-12, 'Strict')).toEqual({
      ok: true,
      rate: 3.0,
      exact: true,
      clamped: false,
    });
  });

  it('stays between the bracketing rates inside the grid', () => {
    for (const t of [1.1, 1.5, 1.9, 2.5, 3.5, 4.9]) {
      const rate = interpolateRate(curve, t);
      const [lo, hi] = t < 2 ? [2.0, 3.0] : [3.0, 3.6];
      expect(rate).toBeGreaterThan(lo);
      expect(rate).toBeLessThan(hi);
    }
    expect(interpolateRate(curve, 3.5)).toBeCloseTo(3.3, 12);
  });

  it('fails outside the grid under Strict alignment', () => {
    const result = lookupRate(curve, 7, 'Strict');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(OutOfRangeInterpolation);
      expect(result.error.tenor).toBe(7);
      expect(result.error.minTenor).toBe(1);
      expect(result.error.maxTenor).toBe(5);
    }
    expect(() => interpolateRate(curve, 0.5, 'Strict')).toThrow(OutOfRangeInterpolation);
  });

  it('clamps to the nearest endpoint under Nearest alignment', () => {
    expect(lookupRate(curve, 0.5, 'Nearest')).toEqual({ ok: true, rate: 2.0, exact: false, clamped: true });
    expect(interpolateRate(curve, 30, 'Nearest')).toBe(3.6);
  });

  it('rejects an empty curve', () => {
    const empty = buildCurve([], { issuer: 'EUR', instrument: 'Swap', kind: 'Par', unit: 'Percent' });
    expect(() => lookupRate(empty, 1, 'Nearest')).toThrow('has no points');
  });
});

describe('nearestPointIndex', () => {
  it('picks the closest grid point', () => {
    expect(nearestPointIndex(curve, 0.2)).toBe(0);
    expect(nearestPointIndex(curve, 2.4)).toBe(1);
    expect(nearestPointIndex(curve, 4)).toBe(2);
  });
});
