// =============================================================================
// Government Bond Curves
// Par yields -> zero curve, and bond pricing / DV01 on that curve
// =============================================================================

import { shiftCurve, getDiscountFactor } from './curve';
import {
  bootstrapParCurve,
  couponSchedule,
  type BootstrapResult,
  type ParBootstrapOptions,
} from './piecewise';
import {
  DEFAULT_BOOTSTRAP_CONVENTIONS,
  type AlignmentPolicy,
  type BootstrapConventions,
  type YieldCurve,
} from './types';

/**
 * Bootstrap a government zero curve from its par yields.
 * Coupon frequency and compounding come from the issuer's conventions.
 */
export function bootstrapBondCurve(
  parCurve: YieldCurve,
  conventions: BootstrapConventions = DEFAULT_BOOTSTRAP_CONVENTIONS,
  options: ParBootstrapOptions = {}
): BootstrapResult {
  if (parCurve.instrument !== 'Government') {
    throw new Error(`Curve ${parCurve.id} holds ${parCurve.instrument} quotes, not government yields`);
  }
  return bootstrapParCurve(parCurve, conventions, options);
}

/**
 * Fixed-coupon bond held as a position
 */
export interface BondPosition {
  description?: string;
  face: number;         // Face amount held
  coupon: number;       // Annual coupon rate as decimal
  maturity: number;     // Years to maturity
  frequency: number;    // Coupon payments per year
}

/**
 * Bond cash flow
 */
export interface BondCashFlow {
  time: number;       // Years from settlement
  amount: number;     // Cash flow amount (coupon or principal)
  type: 'coupon' | 'principal';
}

/**
 * Generate cash flows for a bond
 */
export function generateBondCashFlows(bond: BondPosition): BondCashFlow[] {
  const schedule = couponSchedule(bond.maturity, bond.frequency);
  const cashFlows: BondCashFlow[] = schedule.map(cf => ({
    time: cf.time,
    amount: bond.coupon * bond.face * cf.accrual,
    type: 'coupon',
  }));

  const last = cashFlows[cashFlows.length - 1];
  if (last) {
    last.amount += bond.face;
    last.type = 'principal';
  }

  return cashFlows;
}

/**
 * Model price of a bond on a zero curve
 * Model Price = Σ CF_i * DF(T_i)
 */
export function calculateBondModelPrice(
  bond: BondPosition,
  zeroCurve: YieldCurve,
  alignment: AlignmentPolicy = 'Nearest'
): number {
  let modelPrice = 0;
  for (const cf of generateBondCashFlows(bond)) {
    modelPrice += cf.amount * getDiscountFactor(zeroCurve, cf.time, alignment);
  }
  return modelPrice;
}

/**
 * Curve bump used for first-difference sensitivities
 */
export interface CurveBump {
  sizeBp: number;       // Shift size, default 1bp
  atTenor?: number;     // Key-rate bump of the nearest grid point; parallel when absent
}

/**
 * Bond DV01 by bump-and-reprice: value on the curve minus value on the
 * curve shifted up by the bump, scaled to 1bp
 */
export function bondDV01(
  bond: BondPosition,
  zeroCurve: YieldCurve,
  bump: Partial<CurveBump> = {},
  alignment: AlignmentPolicy = 'Nearest'
): number {
  const sizeBp = bump.sizeBp ?? 1;
  const base = calculateBondModelPrice(bond, zeroCurve, alignment);
  const bumped = calculateBondModelPrice(
    bond,
    shiftCurve(zeroCurve, sizeBp, bump.atTenor),
    alignment
  );
  return (base - bumped) / sizeBp;
}
