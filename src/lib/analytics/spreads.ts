// =============================================================================
// Spread Calculator
// Gov-vs-Bund, asset-swap and IRS-vs-EUR-IRS spread series
// =============================================================================

import { MissingReferenceCurve } from '../errors';
import { lookupRate } from '../bootstrap/interpolation';
import { toBasisPoints, type AlignmentPolicy, type YieldCurve } from '../bootstrap/types';
import type { ExcludedTenor, SpreadMode, SpreadPoint, SpreadSeries } from './types';

export const DEFAULT_REFERENCE_ISSUER = 'Germany';
export const DEFAULT_REFERENCE_SWAP_CURRENCY = 'EUR';

/**
 * One spread computation; `mode` selects the variant
 */
export type SpreadRequest =
  | {
      mode: 'GovVsBund';
      target: YieldCurve;
      reference: YieldCurve | undefined;
      referenceIssuer?: string;
      alignment?: AlignmentPolicy;
    }
  | {
      mode: 'ASW';
      bondCurve: YieldCurve;
      swapCurve: YieldCurve | undefined;
      alignment: AlignmentPolicy;
    }
  | {
      mode: 'IrsVsEurIrs';
      target: YieldCurve;
      eurCurve: YieldCurve | undefined;
      referenceCurrency?: string;
      alignment?: AlignmentPolicy;
    };

/**
 * Compute a spread series.
 * Throws MissingReferenceCurve when the mode's reference is absent;
 * tenors outside the reference grid under Strict alignment are listed
 * in `excluded` instead of failing the series.
 */
export function calculateSpread(request: SpreadRequest): SpreadSeries {
  switch (request.mode) {
    case 'GovVsBund':
      return govVsBundSpread(
        request.target,
        request.reference,
        request.alignment,
        request.referenceIssuer
      );
    case 'ASW':
      return assetSwapSpread(request.bondCurve, request.swapCurve, request.alignment);
    case 'IrsVsEurIrs':
      return irsVsEurIrsSpread(
        request.target,
        request.eurCurve,
        request.referenceCurrency,
        request.alignment
      );
    default:
      return assertNever(request);
  }
}

/**
 * Government yield minus the reference (Bund) yield at each target tenor
 */
export function govVsBundSpread(
  target: YieldCurve,
  reference: YieldCurve | undefined,
  alignment: AlignmentPolicy = 'Nearest',
  referenceIssuer: string = reference?.issuer ?? DEFAULT_REFERENCE_ISSUER
): SpreadSeries {
  if (!reference) {
    throw new MissingReferenceCurve('GovVsBund', target.issuer, referenceIssuer);
  }
  return spreadAgainst('GovVsBund', target, reference, alignment);
}

/**
 * ASW: government zero rate minus the same-currency swap zero rate,
 * interpolated across the two grids
 */
export function assetSwapSpread(
  bondCurve: YieldCurve,
  swapCurve: YieldCurve | undefined,
  alignment: AlignmentPolicy
): SpreadSeries {
  const wanted = `${bondCurve.currency} swaps`;
  if (!swapCurve || swapCurve.instrument !== 'Swap' || swapCurve.currency !== bondCurve.currency) {
    throw new MissingReferenceCurve('ASW', bondCurve.issuer, wanted);
  }
  return spreadAgainst('ASW', bondCurve, swapCurve, alignment);
}

/**
 * Swap zero rate minus the EUR swap zero rate.
 * A EUR target is its own reference: every point is exactly zero.
 */
export function irsVsEurIrsSpread(
  target: YieldCurve,
  eurCurve: YieldCurve | undefined,
  referenceCurrency: string = DEFAULT_REFERENCE_SWAP_CURRENCY,
  alignment: AlignmentPolicy = 'Nearest'
): SpreadSeries {
  if (target.currency === referenceCurrency) {
    return {
      mode: 'IrsVsEurIrs',
      source: target.issuer,
      reference: referenceCurrency,
      points: target.points.map(p => pointOf(p.tenor, p.label, 0)),
      excluded: [],
    };
  }
  if (!eurCurve || eurCurve.currency !== referenceCurrency) {
    throw new MissingReferenceCurve('IrsVsEurIrs', target.issuer, `${referenceCurrency} swaps`);
  }
  return spreadAgainst('IrsVsEurIrs', target, eurCurve, alignment);
}

function spreadAgainst(
  mode: SpreadMode,
  target: YieldCurve,
  reference: YieldCurve,
  alignment: AlignmentPolicy
): SpreadSeries {
  const points: SpreadPoint[] = [];
  const excluded: ExcludedTenor[] = [];

  for (const p of target.points) {
    const ref = lookupRate(reference, p.tenor, alignment);
    if (!ref.ok) {
      excluded.push({
        tenor: p.tenor,
        ...(p.label !== undefined ? { label: p.label } : {}),
        reason: ref.error.message,
      });
      continue;
    }
    const spreadBp = toBasisPoints(p.rate, target.unit) - toBasisPoints(ref.rate, reference.unit);
    points.push(pointOf(p.tenor, p.label, spreadBp));
  }

  return {
    mode,
    source: target.issuer,
    reference: mode === 'GovVsBund' ? reference.issuer : reference.currency,
    points,
    excluded,
  };
}

function pointOf(tenor: number, label: string | undefined, spreadBp: number): SpreadPoint {
  return label !== undefined ? { tenor, label, spreadBp } : { tenor, spreadBp };
}

function assertNever(value: never): never {
  throw new Error(`Unhandled spread request: ${JSON.stringify(value)}`);
}
