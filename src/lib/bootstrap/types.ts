// =============================================================================
// Curve Bootstrapping Types
// Core type definitions for par and zero curves
// =============================================================================

// Instrument families quoted on a par basis
export type InstrumentType = 'Government' | 'Swap';

// Rates arrive tagged; the engine never guesses a unit
export type RateUnit = 'Percent' | 'Decimal';

// Curve content
export type CurveKind = 'Par' | 'Zero';

// Compounding convention used to turn a discount factor into a zero rate
export type Compounding = 'Annual' | 'SemiAnnual' | 'Continuous';

// Handling of a tenor outside a curve's grid
export type AlignmentPolicy = 'Strict' | 'Nearest';

// Market quote for one instrument in one snapshot
export interface Quote {
  readonly issuer: string;          // Country ("Germany") or currency ("EUR")
  readonly instrument: InstrumentType;
  readonly tenor: string;           // Label, e.g. "10Y", "6M"
  readonly years: number;           // Tenor in years, > 0
  readonly rate: number;
  readonly unit: RateUnit;
  readonly currency?: string;
  readonly previous?: number;
  readonly high?: number;
  readonly low?: number;
  readonly change?: number;
  readonly changePercent?: number;
  readonly timestamp?: string;
}

// Curve point (tenor, rate)
export interface CurvePoint {
  readonly tenor: number;           // Years
  readonly rate: number;            // In the curve's unit
  readonly label?: string;
}

// Immutable par or zero curve for one issuer / currency
export interface YieldCurve {
  readonly id: string;
  readonly issuer: string;
  readonly currency: string;
  readonly instrument: InstrumentType;
  readonly kind: CurveKind;
  readonly unit: RateUnit;
  readonly referenceDate: string;
  readonly points: readonly CurvePoint[];
  readonly compounding?: Compounding;  // Zero curves only
  readonly frequency?: number;         // Coupon / fixed-leg payments per year
}

// Bootstrap conventions for one issuer or currency
export interface BootstrapConventions {
  compounding: Compounding;
  frequency: number;
  alignment: AlignmentPolicy;
}

// Default conventions: semi-annual coupons, continuous zero rates
export const DEFAULT_BOOTSTRAP_CONVENTIONS: BootstrapConventions = {
  compounding: 'Continuous',
  frequency: 2,
  alignment: 'Nearest',
};

// Piecewise solver configuration
export interface SolverConfig {
  tolerance: number;          // Root-finding tolerance on price per 100
  maxIterations: number;      // Max iterations per root
  lowerBound: number;         // Lower search bound for decimal zero rates
  upperBound: number;         // Upper search bound for decimal zero rates
}

// Default solver configuration
export const DEFAULT_SOLVER_CONFIG: SolverConfig = {
  tolerance: 1e-12,
  maxIterations: 200,
  lowerBound: -0.10,          // -10% rate
  upperBound: 0.50,           // 50% rate
};

// Two tenors closer than this are the same grid point
export const GRID_TOLERANCE = 1e-9;

// Round-trip repricing tolerance per 100 notional
export const REPRICE_TOLERANCE = 1e-8;

// Basis points per unit of rate for each unit tag
export function basisPointFactor(unit: RateUnit): number {
  return unit === 'Percent' ? 100 : 10000;
}

export function toBasisPoints(rate: number, unit: RateUnit): number {
  return rate * basisPointFactor(unit);
}

// Convert a rate in the given unit to a decimal
export function toDecimal(rate: number, unit: RateUnit): number {
  return unit === 'Percent' ? rate / 100 : rate;
}

// Convert a decimal rate back to the given unit
export function fromDecimal(rate: number, unit: RateUnit): number {
  return unit === 'Percent' ? rate * 100 : rate;
}

// Helper to format tenor as string
export function formatTenor(years: number): string {
  if (years < 1) {
    const months = Math.round(years * 12);
    return `${months}M`;
  } else if (years === Math.floor(years)) {
    return `${years}Y`;
  } else {
    return `${years.toFixed(1)}Y`;
  }
}

/**
 * Parse a tenor label into years: "10Y" -> 10, "6M" -> 0.5.
 * Returns undefined for anything else.
 */
export function parseTenor(label: string): number | undefined {
  const match = /^\s*(\d+(?:\.\d+)?)\s*([MY])\s*$/i.exec(label);
  if (!match) return undefined;
  const value = Number(match[1]);
  return match[2].toUpperCase() === 'Y' ? value : value / 12;
}
