import { describe, expect, it } from 'vitest';
import { MissingReferenceCurve } from '../errors';
import { buildCurve } from '../bootstrap/curve';
import type { CurvePoint, InstrumentType, RateUnit } from '../bootstrap/types';
import { assetSwapSpread, calculateSpread, govVsBundSpread, irsVsEurIrsSpread } from './spreads';

function curve(
  issuer: string,
  currency: string,
  instrument: InstrumentType,
  points: CurvePoint[],
  unit: RateUnit = 'Percent'
) {
  return buildCurve(points, { issuer, currency, instrument, kind: 'Zero', unit, compounding: 'Continuous' });
}

const bund = curve('Germany', 'EUR', 'Government', [
  { tenor: 2, rate: 2.2, label: '2Y' },
  { tenor: 10, rate: 2.6, label: '10Y' },
]);

const oat = curve('France', 'EUR', 'Government', [
  { tenor: 2, rate: 2.4, label: '2Y' },
  { tenor: 5, rate: 2.8, label: '5Y' },
  { tenor: 10, rate: 3.2, label: '10Y' },
  { tenor: 30, rate: 3.9, label: '30Y' },
]);

const eurSwaps = curve('EUR', 'EUR', 'Swap', [
  { tenor: 1, rate: 3.4 },
  { tenor: 2, rate: 3.1 },
  { tenor: 10, rate: 2.55 },
  { tenor: 20, rate: 2.5 },
]);

describe('govVsBundSpread', () => {
  it('subtracts the reference yield in bp', () => {
    const series = govVsBundSpread(oat, bund, 'Nearest');
    expect(series.reference).toBe('Germany');
    expect(series.source).toBe('France');
    expect(series.points.map(p => p.label)).toEqual(['2Y', '5Y', '10Y', '30Y']);
    const expected = [20, 45, 60, 130];
    series.points.forEach((p, i) => expect(p.spreadBp).toBeCloseTo(expected[i], 9));
  });

  it('excludes tenors off the reference grid under Strict alignment', () => {
    const series = govVsBundSpread(oat, bund, 'Strict');
    expect(series.points.map(p => p.tenor)).toEqual([2, 5, 10]);
    expect(series.excluded).toHaveLength(1);
    expect(series.excluded[0].tenor).toBe(30);
    expect(series.excluded[0].label).toBe('30Y');
  });

  it('is exactly zero against itself', () => {
    const series = govVsBundSpread(bund, bund);
    expect(series.points.map(p => p.spreadBp)).toEqual([0, 0]);
  });

  it('converts each curve with its own unit', () => {
    const decimal = curve('Italy', 'EUR', 'Government', [{ tenor: 2, rate: 0.024 }], 'Decimal');
    const [point] = govVsBundSpread(decimal, bund).points;
    expect(point.spreadBp).toBeCloseTo(20, 9);
  });

  it('needs the reference curve', () => {
    expect(() => govVsBundSpread(oat, undefined)).toThrow(MissingReferenceCurve);
    expect(() => govVsBundSpread(oat, undefined)).toThrow(
      'GovVsBund spread for France needs reference curve Germany, which is absent'
    );
  });
});

describe('assetSwapSpread', () => {
  it('substitutes the nearest swap rate off-grid under Nearest alignment', () => {
    const series = assetSwapSpread(oat, eurSwaps, 'Nearest');
    expect(series.reference).toBe('EUR');
    expect(series.excluded).toEqual([]);
    // 30Y clamps to the 20Y swap rate
    expect(series.points[3].spreadBp).toBeCloseTo(140, 9);
    // 5Y swap = 3.1 + 3/8 * (2.55 - 3.1)
    expect(series.points[1].spreadBp).toBeCloseTo((2.8 - (3.1 + (3 / 8) * (2.55 - 3.1))) * 100, 9);
  });

  it('drops off-grid tenors under Strict alignment', () => {
    const series = assetSwapSpread(oat, eurSwaps, 'Strict');
    expect(series.points.map(p => p.tenor)).toEqual([2, 5, 10]);
    expect(series.excluded.map(e => e.tenor)).toEqual([30]);
    expect(series.points[0].spreadBp).toBeCloseTo(-70, 9);
  });

  it('needs a swap curve in the bond currency', () => {
    const usdSwaps = curve('USD', 'USD', 'Swap', [{ tenor: 2, rate: 4.3 }]);
    expect(() => assetSwapSpread(oat, undefined, 'Nearest')).toThrow(MissingReferenceCurve);
    expect(() => assetSwapSpread(oat, usdSwaps, 'Nearest')).toThrow('needs reference curve EUR swaps');
  });
});

describe('irsVsEurIrsSpread', () => {
  it('is exactly zero for EUR, with or without a reference curve', () => {
    const series = irsVsEurIrsSpread(eurSwaps, undefined);
    expect(series.points.map(p => p.spreadBp)).toEqual([0, 0, 0, 0]);
    expect(series.excluded).toEqual([]);
  });

  it('subtracts EUR swaps for another currency', () => {
    const usd = curve('USD', 'USD', 'Swap', [{ tenor: 10, rate: 3.75 }]);
    const series = irsVsEurIrsSpread(usd, eurSwaps);
    expect(series.reference).toBe('EUR');
    expect(series.points[0].spreadBp).toBeCloseTo(120, 9);
  });

  it('needs the EUR curve for another currency', () => {
    const usd = curve('USD', 'USD', 'Swap', [{ tenor: 10, rate: 3.75 }]);
    expect(() => irsVsEurIrsSpread(usd, undefined)).toThrow(MissingReferenceCurve);
  });
});

describe('calculateSpread', () => {
  it('dispatches on the mode', () => {
    const gov = calculateSpread({ mode: 'GovVsBund', target: oat, reference: bund });
    const asw = calculateSpread({ mode: 'ASW', bondCurve: oat, swapCurve: eurSwaps, alignment: 'Strict' });
    const irs = calculateSpread({ mode: 'IrsVsEurIrs', target: eurSwaps, eurCurve: eurSwaps });
    expect([gov.mode, asw.mode, irs.mode]).toEqual(['GovVsBund', 'ASW', 'IrsVsEurIrs']);
    expect(asw.excluded).toHaveLength(1);
  });
});
