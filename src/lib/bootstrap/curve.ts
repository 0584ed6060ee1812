// =============================================================================
// Curve Representation
// Immutable curve construction, discounting and bumping
// =============================================================================

import { InvalidQuoteError } from '../errors';
import { interpolateRate, nearestPointIndex } from './interpolation';
import {
  GRID_TOLERANCE,
  basisPointFactor,
  toDecimal,
  type AlignmentPolicy,
  type Compounding,
  type CurveKind,
  type CurvePoint,
  type InstrumentType,
  type RateUnit,
  type YieldCurve,
} from './types';

export interface CurveOptions {
  issuer: string;
  instrument: InstrumentType;
  kind: CurveKind;
  unit: RateUnit;
  currency?: string;
  id?: string;
  referenceDate?: string;
  compounding?: Compounding;
  frequency?: number;
}

/**
 * Build a frozen curve from tenor/rate points.
 * Points are sorted by tenor; non-positive tenors, non-finite rates and
 * duplicated tenors are rejected.
 */
export function buildCurve(points: readonly CurvePoint[], options: CurveOptions): YieldCurve {
  const sorted = [...points].sort((a, b) => a.tenor - b.tenor);

  for (let i = 0; i < sorted.length; i++) {
    const p = sorted[i];
    if (!Number.isFinite(p.tenor) || p.tenor <= 0) {
      throw new InvalidQuoteError(`${options.issuer} has a non-positive tenor ${p.tenor}`);
    }
    if (!Number.isFinite(p.rate)) {
      throw new InvalidQuoteError(`${options.issuer} has a non-finite rate at ${p.tenor}y`);
    }
    if (i > 0 && p.tenor - sorted[i - 1].tenor <= GRID_TOLERANCE) {
      throw new InvalidQuoteError(`${options.issuer} quotes tenor ${p.tenor}y twice`);
    }
  }

  const curve: YieldCurve = {
    id: options.id ?? curveId(options.issuer, options.instrument, options.kind),
    issuer: options.issuer,
    currency: options.currency ?? options.issuer,
    instrument: options.instrument,
    kind: options.kind,
    unit: options.unit,
    referenceDate: options.referenceDate ?? new Date().toISOString().split('T')[0],
    points: Object.freeze(sorted.map(p => Object.freeze({ ...p }))),
    ...(options.compounding !== undefined ? { compounding: options.compounding } : {}),
    ...(options.frequency !== undefined ? { frequency: options.frequency } : {}),
  };

  return Object.freeze(curve);
}

/**
 * Conventional id, e.g. "germany:government:zero"
 */
export function curveId(issuer: string, instrument: InstrumentType, kind: CurveKind): string {
  return `${issuer}:${instrument}:${kind}`.toLowerCase();
}

/**
 * Discount factor for a decimal zero rate under a compounding convention
 */
export function discountFactorFromRate(
  rate: number,
  tenor: number,
  compounding: Compounding
): number {
  if (tenor <= 0) return 1.0;
  switch (compounding) {
    case 'Annual':
      return Math.pow(1 + rate, -tenor);
    case 'SemiAnnual':
      return Math.pow(1 + rate / 2, -2 * tenor);
    case 'Continuous':
      return Math.exp(-rate * tenor);
  }
}

/**
 * Decimal zero rate implied by a discount factor (inverse of the above)
 */
export function zeroRateFromDiscountFactor(
  df: number,
  tenor: number,
  compounding: Compounding
): number {
  switch (compounding) {
    case 'Annual':
      return Math.pow(df, -1 / tenor) - 1;
    case 'SemiAnnual':
      return 2 * (Math.pow(df, -1 / (2 * tenor)) - 1);
    case 'Continuous':
      return -Math.log(df) / tenor;
  }
}

/**
 * Discount factor at a tenor on a zero curve.
 * Throws OutOfRangeInterpolation under Strict alignment.
 */
export function getDiscountFactor(
  curve: YieldCurve,
  tenor: number,
  alignment: AlignmentPolicy = 'Nearest'
): number {
  if (tenor <= 0) return 1.0;
  if (curve.kind !== 'Zero' || curve.compounding === undefined) {
    throw new Error(`Curve ${curve.id} is not a zero curve`);
  }
  const rate = toDecimal(interpolateRate(curve, tenor, alignment), curve.unit);
  return discountFactorFromRate(rate, tenor, curve.compounding);
}

/**
 * Shift a curve by an amount in basis points.
 * Without `atTenor` the shift is parallel; with it, only the grid point
 * closest to that tenor moves (key-rate bump).
 */
export function shiftCurve(
  curve: YieldCurve,
  shiftBps: number,
  atTenor?: number
): YieldCurve {
  const shift = shiftBps / basisPointFactor(curve.unit);
  const target = atTenor === undefined ? -1 : nearestPointIndex(curve, atTenor);
  const suffix = atTenor === undefined ? `${shiftBps}bp` : `${shiftBps}bp@${atTenor}y`;

  return Object.freeze({
    ...curve,
    id: `${curve.id}+${suffix}`,
    points: Object.freeze(
      curve.points.map((p, i) =>
        Object.freeze(target < 0 || i === target ? { ...p, rate: p.rate + shift } : p)
      )
    ),
  });
}
