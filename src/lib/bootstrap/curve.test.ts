import { describe, expect, it } from 'vitest';
import { InvalidQuoteError } from '../errors';
import {
  buildCurve,
  curveId,
  discountFactorFromRate,
  getDiscountFactor,
  shiftCurve,
  zeroRateFromDiscountFactor,
} from './curve';
import type { Compounding } from './types';

const options = {
  issuer: 'Germany',
  instrument: 'Government',
  kind: 'Par',
  unit: 'Percent',
  currency: 'EUR',
  referenceDate: '2025-01-15',
} as const;

describe('buildCurve', () => {
  it('sorts points and freezes the result', () => {
    const curve = buildCurve(
      [
        { tenor: 10, rate: 2.5 },
        { tenor: 2, rate: 2.2, label: '2Y' },
      ],
      options
    );
    expect(curve.points.map(p => p.tenor)).toEqual([2, 10]);
    expect(curve.points[0].label).toBe('2Y');
    expect(curve.id).toBe('germany:government:par');
    expect(curve.referenceDate).toBe('2025-01-15');
    expect(Object.isFrozen(curve)).toBe(true);
    expect(Object.isFrozen(curve.points)).toBe(true);
  });

  it('defaults the currency to the issuer', () => {
    const curve = buildCurve([{ tenor: 1, rate: 3.4 }], {
      issuer: 'EUR',
      instrument: 'Swap',
      kind: 'Par',
      unit: 'Percent',
    });
    expect(curve.currency).toBe('EUR');
  });

  it('rejects duplicated and non-positive tenors', () => {
    expect(() =>
      buildCurve(
        [
          { tenor: 2, rate: 2.2 },
          { tenor: 2, rate: 2.3 },
        ],
        options
      )
    ).toThrow(InvalidQuoteError);
    expect(() => buildCurve([{ tenor: 0, rate: 2.2 }], options)).toThrow(InvalidQuoteError);
    expect(() => buildCurve([{ tenor: 1, rate: Number.NaN }], options)).toThrow('non-finite rate');
  });
});

describe('curveId', () => {
  it('lowercases issuer, instrument and kind', () => {
    expect(curveId('United States', 'Government', 'Zero')).toBe('united states:government:zero');
  });
});

describe('discount factor conversions', () => {
  const conventions: Compounding[] = ['Annual', 'SemiAnnual', 'Continuous'];

  it.each(conventions)('inverts %s compounding', compounding => {
    const df = discountFactorFromRate(0.035, 7, compounding);
    expect(zeroRateFromDiscountFactor(df, 7, compounding)).toBeCloseTo(0.035, 12);
  });

  it('uses the closed forms', () => {
    expect(discountFactorFromRate(0.05, 2, 'Annual')).toBeCloseTo(1 / 1.1025, 12);
    expect(discountFactorFromRate(0.04, 1, 'SemiAnnual')).toBeCloseTo(1 / 1.0404, 12);
    expect(discountFactorFromRate(0.03, 2, 'Continuous')).toBeCloseTo(Math.exp(-0.06), 12);
    expect(discountFactorFromRate(0.03, 0, 'Continuous')).toBe(1);
  });
});

describe('getDiscountFactor', () => {
  it('discounts on a zero curve in its own unit', () => {
    const zero = buildCurve([{ tenor: 2, rate: 3 }], {
      ...options,
      kind: 'Zero',
      compounding: 'Continuous',
    });
    expect(getDiscountFactor(zero, 2)).toBeCloseTo(Math.exp(-0.06), 12);
    expect(getDiscountFactor(zero, 0)).toBe(1);
  });

  it('refuses a par curve', () => {
    const par = buildCurve([{ tenor: 2, rate: 3 }], options);
    expect(() => getDiscountFactor(par, 1)).toThrow('is not a zero curve');
  });
});

describe('shiftCurve', () => {
  const curve = buildCurve(
    [
      { tenor: 2, rate: 2.0 },
      { tenor: 5, rate: 2.5 },
      { tenor: 10, rate: 3.0 },
    ],
    options
  );

  it('shifts every point in the curve unit', () => {
    const shifted = shiftCurve(curve, 10);
    expect(shifted.id).toBe('germany:government:par+10bp');
    const expected = [2.1, 2.6, 3.1];
    shifted.points.forEach((p, i) => expect(p.rate).toBeCloseTo(expected[i], 12));
  });

  it('moves only the nearest point for a key-rate bump', () => {
    const shifted = shiftCurve(curve, 1, 6);
    expect(shifted.id).toBe('germany:government:par+1bp@6y');
    expect(shifted.points[0].rate).toBe(2.0);
    expect(shifted.points[1].rate).toBeCloseTo(2.51, 12);
    expect(shifted.points[2].rate).toBe(3.0);
  });

  it('uses 1bp = 0.0001 on decimal curves', () => {
    const decimal = buildCurve([{ tenor: 1, rate: 0.02 }], { ...options, unit: 'Decimal' });
    expect(shiftCurve(decimal, 1).points[0].rate).toBeCloseTo(0.0201, 15);
  });
});
