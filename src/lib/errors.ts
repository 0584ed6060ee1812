// =============================================================================
// Engine Errors
// Failure kinds and the omission records the refresh cycle reports
// =============================================================================

import type { SpreadMode } from './analytics/types';

export type RvErrorKind =
  | 'CurveBootstrapFailure'
  | 'MissingReferenceCurve'
  | 'OutOfRangeInterpolation'
  | 'InsufficientHedgeData'
  | 'InvalidQuote';

/**
 * Base class for every failure the engine scopes and reports.
 * Anything that is not an RvEngineError is a bug and propagates.
 */
export abstract class RvEngineError extends Error {
  abstract readonly kind: RvErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * A par quote could not be turned into a zero rate.
 * The issuer's zero curve is omitted downstream.
 */
export class CurveBootstrapFailure extends RvEngineError {
  readonly kind = 'CurveBootstrapFailure' as const;

  constructor(
    public readonly issuer: string,
    public readonly tenor: number,
    reason: string
  ) {
    super(`Bootstrap of ${issuer} failed at ${tenor}y: ${reason}`);
    Object.setPrototypeOf(this, CurveBootstrapFailure.prototype);
  }
}

export class MissingReferenceCurve extends RvEngineError {
  readonly kind = 'MissingReferenceCurve' as const;

  constructor(
    public readonly mode: SpreadMode,
    public readonly source: string,
    public readonly reference: string
  ) {
    super(`${mode} spread for ${source} needs reference curve ${reference}, which is absent`);
    Object.setPrototypeOf(this, MissingReferenceCurve.prototype);
  }
}

export class OutOfRangeInterpolation extends RvEngineError {
  readonly kind = 'OutOfRangeInterpolation' as const;

  constructor(
    public readonly curveId: string,
    public readonly tenor: number,
    public readonly minTenor: number,
    public readonly maxTenor: number
  ) {
    super(`Tenor ${tenor}y is outside ${curveId} grid [${minTenor}y, ${maxTenor}y]`);
    Object.setPrototypeOf(this, OutOfRangeInterpolation.prototype);
  }
}

export class InsufficientHedgeData extends RvEngineError {
  readonly kind = 'InsufficientHedgeData' as const;

  constructor(
    public readonly field: string,
    public readonly value: number | undefined
  ) {
    super(`Hedge sizing needs a positive ${field}, got ${value ?? 'nothing'}`);
    Object.setPrototypeOf(this, InsufficientHedgeData.prototype);
  }
}

export class InvalidQuoteError extends RvEngineError {
  readonly kind = 'InvalidQuote' as const;

  constructor(
    message: string,
    public readonly issues: readonly string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    Object.setPrototypeOf(this, InvalidQuoteError.prototype);
  }
}

// =============================================================================
// Omissions
// =============================================================================

export interface Omission {
  kind: RvErrorKind;
  issuer: string;
  mode?: SpreadMode;
  tenor?: number;
  message: string;
}

/**
 * Convert a caught engine failure into an omission record.
 * Errors the engine does not own are rethrown untouched.
 */
export function toOmission(
  error: unknown,
  context: { issuer: string; mode?: SpreadMode; tenor?: number }
): Omission {
  if (!(error instanceof RvEngineError)) {
    throw error;
  }

  let tenor = context.tenor;
  if (error instanceof CurveBootstrapFailure || error instanceof OutOfRangeInterpolation) {
    tenor = error.tenor;
  }

  return {
    kind: error.kind,
    issuer: context.issuer,
    ...(context.mode !== undefined ? { mode: context.mode } : {}),
    ...(tenor !== undefined ? { tenor } : {}),
    message: error.message,
  };
}
