// =============================================================================
// Curve Shape
// Two-leg slopes and butterflies on a single curve
// =============================================================================

import { RvEngineError } from '../errors';
import { interpolateRate } from '../bootstrap/interpolation';
import {
  formatTenor,
  toBasisPoints,
  type AlignmentPolicy,
  type YieldCurve,
} from '../bootstrap/types';
import type { OmittedMetric, ShapeMetric, ShapeResult } from './types';

export interface TenorPair {
  name?: string;
  short: number;
  long: number;
}

export interface FlyTenors {
  name?: string;
  short: number;
  mid: number;
  long: number;
}

export const DEFAULT_SLOPE_PAIRS: readonly TenorPair[] = [
  { name: '2s5s', short: 2, long: 5 },
  { name: '2s10s', short: 2, long: 10 },
  { name: '5s30s', short: 5, long: 30 },
];

export const DEFAULT_FLIES: readonly FlyTenors[] = [
  { name: '2s5s10s', short: 2, mid: 5, long: 10 },
];

/**
 * Slope = rate(long) - rate(short), in bp.
 * Positive for an upward-sloping curve.
 */
export function calculateSlope(
  curve: YieldCurve,
  pair: TenorPair,
  alignment: AlignmentPolicy = 'Strict'
): ShapeMetric {
  if (!(pair.short < pair.long)) {
    throw new Error(`Slope ${slopeName(pair)} needs short < long`);
  }
  const short = rateBp(curve, pair.short, alignment);
  const long = rateBp(curve, pair.long, alignment);

  return {
    name: slopeName(pair),
    type: 'Slope',
    tenors: [pair.short, pair.long],
    valueBp: long - short,
  };
}

/**
 * Butterfly = 2 * rate(mid) - rate(short) - rate(long), in bp.
 * Positive means the belly is cheap (yields more) against the wings.
 */
export function calculateFly(
  curve: YieldCurve,
  fly: FlyTenors,
  alignment: AlignmentPolicy = 'Strict'
): ShapeMetric {
  if (!(fly.short < fly.mid && fly.mid < fly.long)) {
    throw new Error(`Fly ${flyName(fly)} needs short < mid < long`);
  }
  const short = rateBp(curve, fly.short, alignment);
  const mid = rateBp(curve, fly.mid, alignment);
  const long = rateBp(curve, fly.long, alignment);

  return {
    name: flyName(fly),
    type: 'Fly',
    tenors: [fly.short, fly.mid, fly.long],
    valueBp: 2 * mid - short - long,
  };
}

export function calculateSlopes(
  curve: YieldCurve,
  pairs: readonly TenorPair[] = DEFAULT_SLOPE_PAIRS,
  alignment: AlignmentPolicy = 'Strict'
): ShapeResult {
  return collect(pairs, p => calculateSlope(curve, p, alignment), slopeName);
}

export function calculateFlies(
  curve: YieldCurve,
  flies: readonly FlyTenors[] = DEFAULT_FLIES,
  alignment: AlignmentPolicy = 'Strict'
): ShapeResult {
  return collect(flies, f => calculateFly(curve, f, alignment), flyName);
}

function collect<T>(
  items: readonly T[],
  compute: (item: T) => ShapeMetric,
  nameOf: (item: T) => string
): ShapeResult {
  const metrics: ShapeMetric[] = [];
  const omitted: OmittedMetric[] = [];

  for (const item of items) {
    try {
      metrics.push(compute(item));
    } catch (error) {
      if (!(error instanceof RvEngineError)) throw error;
      omitted.push({ name: nameOf(item), reason: error.message });
    }
  }

  return { metrics, omitted };
}

function rateBp(curve: YieldCurve, tenor: number, alignment: AlignmentPolicy): number {
  return toBasisPoints(interpolateRate(curve, tenor, alignment), curve.unit);
}

function shortLabel(years: number): string {
  return formatTenor(years).replace(/Y$/, '').toLowerCase();
}

function slopeName(pair: TenorPair): string {
  return pair.name ?? `${shortLabel(pair.short)}s${shortLabel(pair.long)}s`;
}

function flyName(fly: FlyTenors): string {
  return fly.name ?? `${shortLabel(fly.short)}s${shortLabel(fly.mid)}s${shortLabel(fly.long)}s`;
}
