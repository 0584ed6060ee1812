import { describe, expect, it } from 'vitest';
import { buildCurve } from '../bootstrap/curve';
import { calculateCarryRoll } from './carry';

const curve = buildCurve(
  [
    { tenor: 1, rate: 2.0, label: '1Y' },
    { tenor: 2, rate: 2.5, label: '2Y' },
    { tenor: 5, rate: 3.1, label: '5Y' },
  ],
  { issuer: 'Canada', currency: 'CAD', instrument: 'Government', kind: 'Par', unit: 'Percent' }
);

describe('calculateCarryRoll', () => {
  const entries = calculateCarryRoll(curve);
  const find = (tenor: number, horizon: '1M' | '3M') => {
    const entry = entries.find(e => e.tenor === tenor && e.horizon === horizon);
    if (!entry) throw new Error(`no entry for ${tenor}y ${horizon}`);
    return entry;
  };

  it('produces one entry per tenor and horizon', () => {
    expect(entries).toHaveLength(6);
    expect(entries.map(e => e.horizon)).toEqual(['1M', '3M', '1M', '3M', '1M', '3M']);
  });

  it('rolls down the curve over the horizon', () => {
    const entry = find(2, '3M');
    // rate(1.75) = 2.375
    expect(entry.rollBp).toBeCloseTo(-12.5, 9);
    expect(entry.label).toBe('2Y');
  });

  it('accrues the yield over funding plus the slope', () => {
    // (250 - 200) / 4 + 20 / 4
    expect(find(2, '3M').carryBp).toBeCloseTo(17.5, 9);
    // (310 - 200) / 12 + 20 / 12
    expect(find(5, '1M').carryBp).toBeCloseTo(130 / 12, 9);
    // No pickup over funding, slope only
    expect(find(1, '3M').carryBp).toBeCloseTo(12.5, 9);
  });

  it('carries more on a steeper curve past the tenor', () => {
    const meta = { issuer: 'Canada', instrument: 'Government', kind: 'Par', unit: 'Percent' } as const;
    const flat = buildCurve(
      [
        { tenor: 1, rate: 2 },
        { tenor: 5, rate: 3 },
        { tenor: 10, rate: 3 },
      ],
      meta
    );
    const steep = buildCurve(
      [
        { tenor: 1, rate: 2 },
        { tenor: 5, rate: 3 },
        { tenor: 10, rate: 5 },
      ],
      meta
    );
    const at5y = (c: typeof flat) => {
      const entry = calculateCarryRoll(c, { horizons: ['3M'] }).find(e => e.tenor === 5);
      if (!entry) throw new Error('no 5y entry');
      return entry;
    };

    expect(at5y(flat).slopeBpPerYear).toBeCloseTo(0, 9);
    expect(at5y(flat).carryBp).toBeCloseTo(25, 9);
    expect(at5y(steep).slopeBpPerYear).toBeCloseTo(40, 9);
    expect(at5y(steep).carryBp).toBeCloseTo(35, 9);
  });

  it('clamps the roll below the first grid point', () => {
    expect(find(1, '3M').rollBp).toBe(0);
  });

  it('reports the local slope', () => {
    expect(find(1, '1M').slopeBpPerYear).toBeCloseTo(50, 9);
    expect(find(5, '1M').slopeBpPerYear).toBeCloseTo(20, 9);
  });

  it('takes an explicit funding rate and horizons', () => {
    const [entry] = calculateCarryRoll(curve, { horizons: ['3M'], fundingRate: 1.5 });
    expect(entry.horizon).toBe('3M');
    // (200 - 150) / 4 + 50 / 4
    expect(entry.carryBp).toBeCloseTo(25, 9);
  });

  it('returns nothing for an empty curve', () => {
    const empty = buildCurve([], { issuer: 'Canada', instrument: 'Government', kind: 'Par', unit: 'Percent' });
    expect(calculateCarryRoll(empty)).toEqual([]);
  });
});
