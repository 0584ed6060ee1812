// =============================================================================
// Relative-Value Types
// Value objects produced by the analytics stage
// =============================================================================

// Spread modes offered to the presentation layer
export type SpreadMode = 'GovVsBund' | 'ASW' | 'IrsVsEurIrs';

export const SPREAD_MODES: readonly SpreadMode[] = ['GovVsBund', 'ASW', 'IrsVsEurIrs'];

export interface SpreadPoint {
  readonly tenor: number;         // Years
  readonly label?: string;
  readonly spreadBp: number;
}

// Tenor dropped from a series under Strict alignment
export interface ExcludedTenor {
  readonly tenor: number;
  readonly label?: string;
  readonly reason: string;
}

export interface SpreadSeries {
  readonly mode: SpreadMode;
  readonly source: string;        // Issuer or currency of the target curve
  readonly reference: string;     // Issuer or currency of the reference curve
  readonly points: readonly SpreadPoint[];
  readonly excluded: readonly ExcludedTenor[];
}

export type ShapeMetricType = 'Slope' | 'Fly';

export interface ShapeMetric {
  readonly name: string;          // e.g. "2s10s", "2s5s10s"
  readonly type: ShapeMetricType;
  readonly tenors: readonly number[];
  readonly valueBp: number;
}

// Metric that could not be computed, with the reason
export interface OmittedMetric {
  readonly name: string;
  readonly reason: string;
}

export interface ShapeResult {
  readonly metrics: readonly ShapeMetric[];
  readonly omitted: readonly OmittedMetric[];
}

export type CarryHorizon = '1M' | '3M';

export const HORIZON_YEARS: Readonly<Record<CarryHorizon, number>> = {
  '1M': 1 / 12,
  '3M': 0.25,
};

export interface CarryRollEntry {
  readonly tenor: number;
  readonly label?: string;
  readonly horizon: CarryHorizon;
  readonly carryBp: number;
  readonly rollBp: number;
  readonly slopeBpPerYear: number;
}

export interface HedgeProposal {
  readonly position: string;
  readonly hedgeInstrument: string;
  readonly positionDv01: number;
  readonly hedgeDv01PerUnit: number;
  readonly hedgeRatio: number;        // Unrounded units
  readonly proposedUnits: number;     // Rounded to the instrument's lot size
  readonly residualDv01: number;      // positionDv01 - proposedUnits * hedgeDv01PerUnit
}
