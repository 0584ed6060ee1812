// =============================================================================
// Piecewise Bootstrapper
// Tenor-by-tenor par -> zero recursion shared by bond and swap curves
// =============================================================================

import { CurveBootstrapFailure } from '../errors';
import {
  buildCurve,
  curveId,
  discountFactorFromRate,
  getDiscountFactor,
  zeroRateFromDiscountFactor,
} from './curve';
import { brent } from './solver';
import {
  DEFAULT_SOLVER_CONFIG,
  GRID_TOLERANCE,
  fromDecimal,
  toDecimal,
  type AlignmentPolicy,
  type BootstrapConventions,
  type Compounding,
  type CurvePoint,
  type SolverConfig,
  type YieldCurve,
} from './types';

/**
 * Scheduled fixed cash flow of a par instrument
 */
export interface CouponDate {
  time: number;       // Years from settlement
  accrual: number;    // Year fraction of the period ending at `time`
}

/**
 * Par instrument: coupon (decimal) equal to its par rate
 */
export interface ParInstrument {
  tenor: number;
  coupon: number;
}

/**
 * How each tenor was solved
 */
export type BootstrapStep = 'SingleCashFlow' | 'ClosedForm' | 'RootFind';

/**
 * Bootstrap result
 */
export interface BootstrapResult {
  curve: YieldCurve;
  residuals: number[];        // Re-priced value minus 100, per instrument
  maxError: number;
  iterations: number;         // Root-finder iterations over all tenors
  steps: BootstrapStep[];
  durationMs: number;
}

export interface ParBootstrapOptions {
  solverConfig?: Partial<SolverConfig>;
  referenceDate?: string;
}

const PAR = 100;

// Upper bound on a closed-form discount factor (deeply negative rates)
const MAX_DISCOUNT_FACTOR = 1.5;

/**
 * Coupon dates generated backward from maturity at 1/frequency steps.
 * A first period shorter than a full one accrues its real fraction.
 */
export function couponSchedule(maturity: number, frequency: number): CouponDate[] {
  const period = 1 / frequency;
  const times: number[] = [];

  for (let k = 0; ; k++) {
    const t = maturity - k * period;
    if (t <= GRID_TOLERANCE) break;
    times.push(t);
  }
  times.reverse();

  return times.map((time, i) => ({
    time,
    accrual: time - (i === 0 ? 0 : times[i - 1]),
  }));
}

/**
 * Value per 100 of a par instrument discounted on a zero curve.
 * Model Price = 100 * (c * Σ τ_i * DF(T_i) + DF(T))
 */
export function priceParInstrument(
  zeroCurve: YieldCurve,
  inst: ParInstrument,
  frequency: number,
  alignment: AlignmentPolicy = 'Nearest'
): number {
  let value = 0;
  for (const cf of couponSchedule(inst.tenor, frequency)) {
    value += inst.coupon * cf.accrual * getDiscountFactor(zeroCurve, cf.time, alignment);
  }
  value += getDiscountFactor(zeroCurve, inst.tenor, alignment);
  return value * PAR;
}

/**
 * Value per 100 of the first par point, a single cash flow compounded at
 * the par rate to maturity
 */
export function priceFirstInstrument(
  zeroCurve: YieldCurve,
  inst: ParInstrument,
  compounding: Compounding,
  alignment: AlignmentPolicy = 'Nearest'
): number {
  const redemption = PAR / discountFactorFromRate(inst.coupon, inst.tenor, compounding);
  return redemption * getDiscountFactor(zeroCurve, inst.tenor, alignment);
}

/**
 * Re-price every par point of a curve on a zero curve; returns value - 100.
 * The first point is priced as a single cash flow, the rest as par bonds.
 */
export function repriceParCurve(
  parCurve: YieldCurve,
  zeroCurve: YieldCurve,
  frequency: number,
  alignment: AlignmentPolicy = 'Nearest'
): number[] {
  const compounding = zeroCurve.compounding;
  if (compounding === undefined) {
    throw new Error(`Curve ${zeroCurve.id} is not a zero curve`);
  }
  return parCurve.points.map((p, i) => {
    const inst = { tenor: p.tenor, coupon: toDecimal(p.rate, parCurve.unit) };
    const price =
      i === 0
        ? priceFirstInstrument(zeroCurve, inst, compounding, alignment)
        : priceParInstrument(zeroCurve, inst, frequency, alignment);
    return price - PAR;
  });
}

/**
 * Piecewise par bootstrap.
 *
 * For each par point in tenor order:
 * 1. Discount the coupons already covered by solved tenors (interpolated
 *    on the partial zero curve under the configured alignment)
 * 2. If no coupon falls between the last solved tenor and maturity,
 *    isolate the final discount factor in closed form:
 *      DF(T) = (1 - c * Σ τ_k * DF_k) / (1 + c * τ_N)
 * 3. Otherwise those coupons depend on the unknown through interpolation,
 *    so Brent's method solves for the zero rate that prices the
 *    instrument at par
 *
 * The first tenor is a single cash flow: its zero rate is the par rate,
 * read in the curve's compounding convention.
 */
export function bootstrapParCurve(
  parCurve: YieldCurve,
  conventions: BootstrapConventions,
  options: ParBootstrapOptions = {}
): BootstrapResult {
  const startTime = performance.now();
  const { compounding, frequency, alignment } = conventions;
  const config = { ...DEFAULT_SOLVER_CONFIG, ...options.solverConfig };
  const referenceDate = options.referenceDate ?? parCurve.referenceDate;

  if (parCurve.kind !== 'Par') {
    throw new Error(`Curve ${parCurve.id} is not a par curve`);
  }
  if (!Number.isInteger(frequency) || frequency <= 0) {
    throw new CurveBootstrapFailure(
      parCurve.issuer,
      parCurve.points[0]?.tenor ?? 0,
      `invalid coupon frequency ${frequency}`
    );
  }

  // Solved points, decimal zero rates
  const solved: CurvePoint[] = [];
  const steps: BootstrapStep[] = [];
  let totalIterations = 0;

  const partialCurve = (extra?: CurvePoint): YieldCurve =>
    buildCurve(extra ? [...solved, extra] : solved, {
      issuer: parCurve.issuer,
      currency: parCurve.currency,
      instrument: parCurve.instrument,
      kind: 'Zero',
      unit: 'Decimal',
      referenceDate,
      compounding,
      frequency,
    });

  for (const point of parCurve.points) {
    const T = point.tenor;
    const c = toDecimal(point.rate, parCurve.unit);
    const label = point.label !== undefined ? { label: point.label } : {};

    const first = solved[0];
    if (!first) {
      solved.push({ tenor: T, rate: c, ...label });
      steps.push('SingleCashFlow');
      continue;
    }

    const schedule = couponSchedule(T, frequency);
    const final = schedule[schedule.length - 1];
    const coupons = schedule.slice(0, -1);
    const lastSolved = solved[solved.length - 1].tenor;

    // A coupon before the first grid point has no discount factor under Strict
    if (alignment === 'Strict') {
      const orphan = coupons.find(cf => cf.time < first.tenor - GRID_TOLERANCE);
      if (orphan) {
        throw new CurveBootstrapFailure(
          parCurve.issuer,
          T,
          `no discount factor for coupon at ${orphan.time.toFixed(4)}y under Strict alignment`
        );
      }
    }

    const pending = coupons.filter(cf => cf.time > lastSolved + GRID_TOLERANCE);

    let zero: number;

    if (pending.length === 0) {
      let known = 0;
      if (coupons.length > 0) {
        const curve = partialCurve();
        for (const cf of coupons) {
          known += cf.accrual * getDiscountFactor(curve, cf.time, alignment);
        }
      }

      const dfT = (1 - c * known) / (1 + c * final.accrual);
      if (!(dfT > 0 && dfT <= MAX_DISCOUNT_FACTOR)) {
        throw new CurveBootstrapFailure(
          parCurve.issuer,
          T,
          `implied discount factor ${dfT} is outside (0, ${MAX_DISCOUNT_FACTOR}]`
        );
      }

      zero = zeroRateFromDiscountFactor(dfT, T, compounding);
      steps.push('ClosedForm');
    } else {
      const objective = (rate: number): number => {
        const curve = partialCurve({ tenor: T, rate });
        let value = 0;
        for (const cf of coupons) {
          value += c * cf.accrual * getDiscountFactor(curve, cf.time, alignment);
        }
        value += (1 + c * final.accrual) * discountFactorFromRate(rate, T, compounding);
        return value * PAR - PAR;
      };

      const result = brent(objective, c - 0.05, c + 0.05, config);
      totalIterations += result.iterations;

      if (!result.converged) {
        throw new CurveBootstrapFailure(
          parCurve.issuer,
          T,
          `root-find did not converge (residual ${result.error.toExponential(2)})`
        );
      }

      zero = result.root;
      steps.push('RootFind');
    }

    solved.push({ tenor: T, rate: zero, ...label });
  }

  const curve = buildCurve(
    solved.map(p => ({ ...p, rate: fromDecimal(p.rate, parCurve.unit) })),
    {
      id: curveId(parCurve.issuer, parCurve.instrument, 'Zero'),
      issuer: parCurve.issuer,
      currency: parCurve.currency,
      instrument: parCurve.instrument,
      kind: 'Zero',
      unit: parCurve.unit,
      referenceDate,
      compounding,
      frequency,
    }
  );

  const residuals = repriceParCurve(parCurve, curve, frequency, alignment);

  return {
    curve,
    residuals,
    maxError: residuals.length > 0 ? Math.max(...residuals.map(Math.abs)) : 0,
    iterations: totalIterations,
    steps,
    durationMs: performance.now() - startTime,
  };
}
