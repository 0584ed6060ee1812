// =============================================================================
// Carry & Roll
// First-order 1M / 3M carry and roll-down on an unchanged curve
// =============================================================================

import { interpolateRate } from '../bootstrap/interpolation';
import { toBasisPoints, type YieldCurve } from '../bootstrap/types';
import { HORIZON_YEARS, type CarryHorizon, type CarryRollEntry } from './types';

export interface CarryRollOptions {
  horizons?: readonly CarryHorizon[];
  fundingRate?: number;     // In the curve's unit; defaults to the shortest rate
}

export const DEFAULT_CARRY_HORIZONS: readonly CarryHorizon[] = ['1M', '3M'];

/**
 * Carry and roll for every grid tenor and horizon.
 *
 * - roll  = rate(T - h) - rate(T); below the first grid point the short
 *           end is clamped (Nearest) instead of failing
 * - slope = local slope past the tenor (towards the previous point for
 *           the last tenor), bp per year
 * - carry = (rate(T) - funding) * h + slope * h, the running yield over
 *           funding accrued across the horizon plus the slope pickup
 */
export function calculateCarryRoll(
  curve: YieldCurve,
  options: CarryRollOptions = {}
): CarryRollEntry[] {
  const { points, unit } = curve;
  const first = points[0];
  if (!first) return [];

  const horizons = options.horizons ?? DEFAULT_CARRY_HORIZONS;
  const funding = options.fundingRate ?? first.rate;
  const entries: CarryRollEntry[] = [];

  points.forEach((p, i) => {
    const slopeBpPerYear = toBasisPoints(localSlope(curve, i), unit);

    for (const horizon of horizons) {
      const years = HORIZON_YEARS[horizon];
      const rolled = interpolateRate(curve, p.tenor - years, 'Nearest');

      entries.push({
        tenor: p.tenor,
        ...(p.label !== undefined ? { label: p.label } : {}),
        horizon,
        carryBp: (toBasisPoints(p.rate - funding, unit) + slopeBpPerYear) * years,
        rollBp: toBasisPoints(rolled, unit) - toBasisPoints(p.rate, unit),
        slopeBpPerYear,
      });
    }
  });

  return entries;
}

function localSlope(curve: YieldCurve, i: number): number {
  const { points } = curve;
  const p = points[i];
  const next = points[i + 1];
  if (next) {
    return (next.rate - p.rate) / (next.tenor - p.tenor);
  }
  const prev = points[i - 1];
  if (prev) {
    return (p.rate - prev.rate) / (p.tenor - prev.tenor);
  }
  return 0;
}
