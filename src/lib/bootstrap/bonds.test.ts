import { describe, expect, it } from 'vitest';
import {
  bondDV01,
  bootstrapBondCurve,
  calculateBondModelPrice,
  generateBondCashFlows,
  type BondPosition,
} from './bonds';
import { buildCurve } from './curve';

const flatAnnual = buildCurve(
  [
    { tenor: 1, rate: 0.04 },
    { tenor: 10, rate: 0.04 },
  ],
  {
    issuer: 'Germany',
    instrument: 'Government',
    kind: 'Zero',
    unit: 'Decimal',
    currency: 'EUR',
    compounding: 'Annual',
    frequency: 1,
  }
);

const threeYear: BondPosition = { face: 100, coupon: 0.04, maturity: 3, frequency: 1 };

describe('generateBondCashFlows', () => {
  it('adds the principal to the last coupon', () => {
    const flows = generateBondCashFlows({ face: 100, coupon: 0.04, maturity: 2, frequency: 2 });
    expect(flows.map(f => f.time)).toEqual([0.5, 1, 1.5, 2]);
    expect(flows.map(f => f.type)).toEqual(['coupon', 'coupon', 'coupon', 'principal']);
    expect(flows[0].amount).toBeCloseTo(2, 12);
    expect(flows[3].amount).toBeCloseTo(102, 12);
  });

  it('pays a short first coupon on a stub', () => {
    const flows = generateBondCashFlows({ face: 100, coupon: 0.04, maturity: 1.25, frequency: 2 });
    expect(flows[0].time).toBe(0.25);
    expect(flows[0].amount).toBeCloseTo(1, 12);
  });
});

describe('calculateBondModelPrice', () => {
  it('prices a bond at par when its coupon matches a flat curve', () => {
    expect(calculateBondModelPrice(threeYear, flatAnnual)).toBeCloseTo(100, 10);
  });
});

describe('bondDV01', () => {
  it('matches the modified duration for a parallel bump', () => {
    // Modified duration of a 3Y 4% annual par bond is about 2.775
    expect(bondDV01(threeYear, flatAnnual)).toBeCloseTo(0.02775, 4);
  });

  it('scales a larger bump back to 1bp', () => {
    const one = bondDV01(threeYear, flatAnnual);
    const ten = bondDV01(threeYear, flatAnnual, { sizeBp: 10 });
    expect(ten).toBeCloseTo(one, 3);
  });
});

describe('bootstrapBondCurve', () => {
  it('refuses swap quotes', () => {
    const swaps = buildCurve([{ tenor: 1, rate: 3.4 }], {
      issuer: 'EUR',
      instrument: 'Swap',
      kind: 'Par',
      unit: 'Percent',
    });
    expect(() => bootstrapBondCurve(swaps)).toThrow('not government yields');
  });

  it('bootstraps with the default conventions', () => {
    const par = buildCurve(
      [
        { tenor: 2, rate: 4.27 },
        { tenor: 10, rate: 4.65 },
      ],
      { issuer: 'United States', instrument: 'Government', kind: 'Par', unit: 'Percent', currency: 'USD' }
    );
    const result = bootstrapBondCurve(par);
    expect(result.curve.compounding).toBe('Continuous');
    expect(result.curve.frequency).toBe(2);
    expect(result.maxError).toBeLessThan(1e-8);
  });
});
