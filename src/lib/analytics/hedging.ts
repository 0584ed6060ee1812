// =============================================================================
// Hedge Sizing
// DV01 matching against futures and swaps
// =============================================================================

import { InsufficientHedgeData, toOmission, type Omission } from '../errors';
import { bondDV01, type BondPosition, type CurveBump } from '../bootstrap/bonds';
import { swapDV01 } from '../bootstrap/swaps';
import { formatTenor, type YieldCurve } from '../bootstrap/types';
import type { HedgeProposal } from './types';

/**
 * Position to hedge; DV01 is the value change per 1bp, in currency
 */
export interface HedgePosition {
  description: string;
  dv01: number | undefined;
}

export interface HedgeInstrument {
  id: string;
  kind: 'Future' | 'Swap';
  dv01PerUnit: number | undefined;    // Per contract, or per unit of notional
  lotSize?: number;                   // Rounding granularity in units, default 1
}

/**
 * Average DV01 per contract per bp (currency of the contract).
 * Order-of-magnitude figures; CTD and conversion factor are not modelled.
 */
export const FUTURES_DV01_PER_CONTRACT: Readonly<Record<string, number>> = {
  FGBS: 30.0,     // Schatz 2Y
  FGBM: 55.0,     // Bobl 5Y
  FGBL: 85.0,     // Bund 10Y
  ZN: 80.0,       // UST 10Y note
  ZB: 120.0,      // UST bond 30Y
};

export function futuresHedgeInstrument(symbol: string): HedgeInstrument {
  const id = symbol.toUpperCase();
  return { id, kind: 'Future', dv01PerUnit: FUTURES_DV01_PER_CONTRACT[id], lotSize: 1 };
}

/**
 * Receive-fixed par swap sized in units of `notionalPerUnit`
 */
export function swapHedgeInstrument(
  zeroCurve: YieldCurve,
  tenor: number,
  frequency: number,
  notionalPerUnit = 1_000_000,
  lotSize = 1
): HedgeInstrument {
  return {
    id: `${zeroCurve.currency} ${formatTenor(tenor)} IRS`,
    kind: 'Swap',
    dv01PerUnit: swapDV01(zeroCurve, tenor, frequency, notionalPerUnit),
    lotSize,
  };
}

/**
 * Bond position whose DV01 is bumped off its zero curve
 */
export function bondHedgePosition(
  bond: BondPosition,
  zeroCurve: YieldCurve,
  bump: Partial<CurveBump> = {}
): HedgePosition {
  return {
    description:
      bond.description ??
      `${zeroCurve.issuer} ${(bond.coupon * 100).toFixed(2)}% ${formatTenor(bond.maturity)}`,
    dv01: bondDV01(bond, zeroCurve, bump),
  };
}

/**
 * Hedge ratio = position DV01 / hedge DV01 per unit, rounded to the lot
 * size. Integral units leave a residual DV01 that is reported.
 */
export function sizeHedge(position: HedgePosition, hedge: HedgeInstrument): HedgeProposal {
  const positionDv01 = requirePositive('position DV01', position.dv01);
  const perUnit = requirePositive(`${hedge.id} DV01 per unit`, hedge.dv01PerUnit);
  const lot = hedge.lotSize ?? 1;
  if (!(lot > 0)) {
    throw new Error(`Lot size of ${hedge.id} must be positive`);
  }

  const hedgeRatio = positionDv01 / perUnit;
  const proposedUnits = Math.round(hedgeRatio / lot) * lot;

  return {
    position: position.description,
    hedgeInstrument: hedge.id,
    positionDv01,
    hedgeDv01PerUnit: perUnit,
    hedgeRatio,
    proposedUnits,
    residualDv01: positionDv01 - proposedUnits * perUnit,
  };
}

/**
 * Size every candidate; failures become omissions for that candidate
 */
export function proposeHedges(
  position: HedgePosition,
  candidates: readonly HedgeInstrument[]
): { proposals: HedgeProposal[]; omitted: Omission[] } {
  const proposals: HedgeProposal[] = [];
  const omitted: Omission[] = [];

  for (const hedge of candidates) {
    try {
      proposals.push(sizeHedge(position, hedge));
    } catch (error) {
      omitted.push(toOmission(error, { issuer: hedge.id }));
    }
  }

  return { proposals, omitted };
}

function requirePositive(field: string, value: number | undefined): number {
  if (value === undefined || !Number.isFinite(value) || value <= 0) {
    throw new InsufficientHedgeData(field, value);
  }
  return value;
}
