// =============================================================================
// Swap Curves
// Fixed-leg par rates -> zero curve, annuity, par rate and DV01
// =============================================================================

import { CurveBootstrapFailure } from '../errors';
import { getDiscountFactor, shiftCurve } from './curve';
import type { CurveBump } from './bonds';
import {
  bootstrapParCurve,
  couponSchedule,
  type BootstrapResult,
  type ParBootstrapOptions,
} from './piecewise';
import type { AlignmentPolicy, Compounding, YieldCurve } from './types';

/**
 * Fixed-leg payments per year by currency
 */
export const DEFAULT_FIXED_LEG_FREQUENCY: Readonly<Record<string, number>> = {
  EUR: 1,
  SEK: 1,
  USD: 2,
  GBP: 2,
  AUD: 2,
  CAD: 2,
  JPY: 2,
  NZD: 2,
};

/**
 * Swap curve conventions, injected per call
 */
export interface SwapCurveConfig {
  fixedLegFrequency: Readonly<Record<string, number>>;
  compounding: Compounding;
  alignment: AlignmentPolicy;
}

export const DEFAULT_SWAP_CURVE_CONFIG: SwapCurveConfig = {
  fixedLegFrequency: DEFAULT_FIXED_LEG_FREQUENCY,
  compounding: 'Continuous',
  alignment: 'Nearest',
};

/**
 * Bootstrap a swap zero curve.
 *
 * Single-curve setup: the floating leg prices at par, so each par swap is
 * a par bond paying the fixed rate at the currency's fixed-leg frequency.
 */
export function bootstrapSwapCurve(
  parCurve: YieldCurve,
  config: SwapCurveConfig = DEFAULT_SWAP_CURVE_CONFIG,
  options: ParBootstrapOptions = {}
): BootstrapResult {
  if (parCurve.instrument !== 'Swap') {
    throw new Error(`Curve ${parCurve.id} holds ${parCurve.instrument} quotes, not swap rates`);
  }

  const frequency = config.fixedLegFrequency[parCurve.currency.toUpperCase()];
  if (frequency === undefined) {
    throw new CurveBootstrapFailure(
      parCurve.issuer,
      parCurve.points[0]?.tenor ?? 0,
      `no fixed-leg frequency configured for ${parCurve.currency}`
    );
  }

  return bootstrapParCurve(
    parCurve,
    { compounding: config.compounding, frequency, alignment: config.alignment },
    options
  );
}

/**
 * Fixed leg annuity
 * Annuity = Σ τ_i * DF(T_i)
 */
export function calculateAnnuity(
  zeroCurve: YieldCurve,
  tenor: number,
  frequency: number,
  alignment: AlignmentPolicy = 'Nearest'
): number {
  let annuity = 0;
  for (const cf of couponSchedule(tenor, frequency)) {
    annuity += cf.accrual * getDiscountFactor(zeroCurve, cf.time, alignment);
  }
  return annuity;
}

/**
 * Par swap rate (decimal) implied by a zero curve
 * Par rate = (1 - DF(T)) / Annuity
 */
export function calculateSwapParRate(
  zeroCurve: YieldCurve,
  tenor: number,
  frequency: number,
  alignment: AlignmentPolicy = 'Nearest'
): number {
  const annuity = calculateAnnuity(zeroCurve, tenor, frequency, alignment);
  if (annuity < 1e-10) {
    return 0;
  }
  return (1 - getDiscountFactor(zeroCurve, tenor, alignment)) / annuity;
}

/**
 * DV01 of a receive-fixed par swap by bump-and-reprice.
 * The fixed rate is struck at today's par rate, so the base value is zero
 * and the DV01 is the value lost when the curve moves up by the bump.
 */
export function swapDV01(
  zeroCurve: YieldCurve,
  tenor: number,
  frequency: number,
  notional: number,
  bump: Partial<CurveBump> = {},
  alignment: AlignmentPolicy = 'Nearest'
): number {
  const sizeBp = bump.sizeBp ?? 1;
  const fixedRate = calculateSwapParRate(zeroCurve, tenor, frequency, alignment);

  const receiverValue = (curve: YieldCurve): number =>
    notional *
    (fixedRate * calculateAnnuity(curve, tenor, frequency, alignment) -
      (1 - getDiscountFactor(curve, tenor, alignment)));

  const bumped = shiftCurve(zeroCurve, sizeBp, bump.atTenor);
  return (receiverValue(zeroCurve) - receiverValue(bumped)) / sizeBp;
}
