// =============================================================================
// Grid Interpolation
// Rate lookup on a sparse tenor grid with Strict / Nearest alignment
// =============================================================================

import { OutOfRangeInterpolation } from '../errors';
import { GRID_TOLERANCE, type AlignmentPolicy, type YieldCurve } from './types';

/**
 * Linear interpolation between two points
 */
export function interpolateLinear(
  t1: number,
  r1: number,
  t2: number,
  r2: number,
  t: number
): number {
  if (t2 === t1) return r1;
  const alpha = (t - t1) / (t2 - t1);
  return r1 + alpha * (r2 - r1);
}

/**
 * Outcome of a grid lookup.
 * `exact` is set when the tenor sits on a grid point, `clamped` when
 * Nearest alignment substituted an endpoint.
 */
export type RateLookup =
  | { ok: true; rate: number; exact: boolean; clamped: boolean }
  | { ok: false; error: OutOfRangeInterpolation };

/**
 * Look up a rate on a curve without throwing.
 *
 * - On a grid point (within GRID_TOLERANCE): the stored rate, untouched
 * - Inside the grid: linear in tenor between the bracketing points
 * - Outside: Strict fails, Nearest returns the closest endpoint's rate
 */
export function lookupRate(
  curve: YieldCurve,
  tenor: number,
  alignment: AlignmentPolicy
): RateLookup {
  const { points } = curve;
  if (points.length === 0) {
    throw new Error(`Curve ${curve.id} has no points`);
  }

  const first = points[0];
  const last = points[points.length - 1];

  if (tenor < first.tenor - GRID_TOLERANCE || tenor > last.tenor + GRID_TOLERANCE) {
    if (alignment === 'Strict') {
      return {
        ok: false,
        error: new OutOfRangeInterpolation(curve.id, tenor, first.tenor, last.tenor),
      };
    }
    const nearest = tenor < first.tenor ? first : last;
    return { ok: true, rate: nearest.rate, exact: false, clamped: true };
  }

  // Binary search for the first point at or beyond the tenor
  let lo = 0;
  let hi = points.length - 1;
  while (lo < hi) {
    const mid = (lo + hi) >> 1;
    if (points[mid].tenor < tenor - GRID_TOLERANCE) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }

  const upper = points[lo];
  if (Math.abs(upper.tenor - tenor) <= GRID_TOLERANCE) {
    return { ok: true, rate: upper.rate, exact: true, clamped: false };
  }

  const lower = points[lo - 1];
  return {
    ok: true,
    rate: interpolateLinear(lower.tenor, lower.rate, upper.tenor, upper.rate, tenor),
    exact: false,
    clamped: false,
  };
}

/**
 * Rate at a tenor; throws OutOfRangeInterpolation under Strict alignment
 */
export function interpolateRate(
  curve: YieldCurve,
  tenor: number,
  alignment: AlignmentPolicy = 'Strict'
): number {
  const result = lookupRate(curve, tenor, alignment);
  if (!result.ok) {
    throw result.error;
  }
  return result.rate;
}

/**
 * Index of the grid point closest to a tenor
 */
export function nearestPointIndex(curve: YieldCurve, tenor: number): number {
  let best = 0;
  for (let i = 1; i < curve.points.length; i++) {
    if (Math.abs(curve.points[i].tenor - tenor) < Math.abs(curve.points[best].tenor - tenor)) {
      best = i;
    }
  }
  return best;
}
