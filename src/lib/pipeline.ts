// =============================================================================
// Refresh Cycle
// Snapshot of quotes -> par and zero curves -> every relative-value view
// =============================================================================

import { bondConventionsFor, currencyOf, DEFAULT_ENGINE_CONFIG, type EngineConfig } from '../config/engine';
import { calculateCarryRoll } from './analytics/carry';
import { buildSpreadMatrix, type SpreadMatrix } from './analytics/matrix';
import { calculateFlies, calculateSlopes } from './analytics/shape';
import { calculateSpread, type SpreadRequest } from './analytics/spreads';
import {
  SPREAD_MODES,
  type CarryRollEntry,
  type ShapeResult,
  type SpreadMode,
  type SpreadSeries,
} from './analytics/types';
import { bootstrapBondCurve } from './bootstrap/bonds';
import type { BootstrapResult } from './bootstrap/piecewise';
import { buildParCurve, groupQuotes } from './bootstrap/quotes';
import { bootstrapSwapCurve } from './bootstrap/swaps';
import type { Quote, YieldCurve } from './bootstrap/types';
import { MissingReferenceCurve, toOmission, type Omission } from './errors';
import { createLogger } from './logger';

const log = createLogger('refresh');

/**
 * Par curve of one issuer (or swap currency) and, when the bootstrap
 * succeeded, its zero curve
 */
export interface CurveSet {
  readonly parCurve: YieldCurve;
  readonly zeroCurve?: YieldCurve;
  readonly bootstrap?: BootstrapResult;
}

export interface IssuerAnalytics {
  readonly shape: ShapeResult;
  readonly carryRoll: readonly CarryRollEntry[];
}

export interface RefreshResult {
  readonly government: ReadonlyMap<string, CurveSet>;   // By issuer
  readonly swaps: ReadonlyMap<string, CurveSet>;        // By currency
  readonly spreads: readonly SpreadSeries[];
  readonly analytics: ReadonlyMap<string, IssuerAnalytics>;
  readonly matrix: SpreadMatrix;
  readonly omissions: readonly Omission[];
  readonly durationMs: number;
}

/**
 * Run one refresh over a validated quote snapshot.
 *
 * Failures are scoped to the smallest unit that owns them: a tenor drops
 * from its series, a mode from its issuer, an issuer from the cycle.
 * Every omission is reported; nothing is silently dropped.
 */
export function runRefreshCycle(
  snapshot: readonly Quote[],
  config: EngineConfig = DEFAULT_ENGINE_CONFIG
): RefreshResult {
  const startTime = performance.now();
  const omissions: Omission[] = [];

  const omit = (error: unknown, context: { issuer: string; mode?: SpreadMode; tenor?: number }) => {
    const omission = toOmission(error, context);
    omissions.push(omission);
    log.warn(omission, 'omitted');
  };

  // Curves
  const government = new Map<string, CurveSet>();
  const swaps = new Map<string, CurveSet>();

  for (const quotes of groupQuotes(snapshot).values()) {
    const { issuer, instrument } = quotes[0];

    let parCurve: YieldCurve;
    try {
      const currency = instrument === 'Government' ? currencyOf(config, issuer) : undefined;
      parCurve = buildParCurve(quotes, currency !== undefined ? { currency } : {});
    } catch (error) {
      omit(error, { issuer });
      continue;
    }

    const target = instrument === 'Government' ? government : swaps;
    const key = instrument === 'Government' ? issuer : parCurve.currency;
    try {
      const bootstrap =
        instrument === 'Government'
          ? bootstrapBondCurve(parCurve, bondConventionsFor(config, issuer), {
              solverConfig: config.solver,
            })
          : bootstrapSwapCurve(parCurve, config.swapCurve, { solverConfig: config.solver });
      target.set(key, { parCurve, zeroCurve: bootstrap.curve, bootstrap });
      log.debug(
        { curve: bootstrap.curve.id, maxError: bootstrap.maxError, iterations: bootstrap.iterations },
        'bootstrapped'
      );
    } catch (error) {
      omit(error, { issuer });
      target.set(key, { parCurve });
    }
  }

  // Spreads
  const reference = government.get(config.referenceIssuer)?.parCurve;
  const referenceSwaps = swaps.get(config.referenceSwapCurrency)?.zeroCurve;
  const spreads: SpreadSeries[] = [];

  for (const [issuer, curves] of government) {
    for (const mode of SPREAD_MODES) {
      try {
        const request = spreadRequest(mode, issuer, curves, swaps, reference, referenceSwaps, config);
        if (!request) continue;

        const series = { ...calculateSpread(request), source: issuer };
        for (const excluded of series.excluded) {
          const omission: Omission = {
            kind: 'OutOfRangeInterpolation',
            issuer,
            mode,
            tenor: excluded.tenor,
            message: excluded.reason,
          };
          omissions.push(omission);
          log.warn(omission, 'tenor excluded');
        }
        spreads.push(series);
      } catch (error) {
        omit(error, { issuer, mode });
      }
    }
  }

  // Shape, carry and roll on par curves
  const analytics = new Map<string, IssuerAnalytics>();
  for (const [issuer, { parCurve }] of government) {
    const slopes = calculateSlopes(parCurve, config.slopePairs, config.alignment.shape);
    const flies = calculateFlies(parCurve, config.flies, config.alignment.shape);
    const shape: ShapeResult = {
      metrics: [...slopes.metrics, ...flies.metrics],
      omitted: [...slopes.omitted, ...flies.omitted],
    };
    for (const metric of shape.omitted) {
      log.warn({ issuer, metric: metric.name, reason: metric.reason }, 'shape metric omitted');
    }
    analytics.set(issuer, {
      shape,
      carryRoll: calculateCarryRoll(parCurve, { horizons: config.carryHorizons }),
    });
  }

  const matrix = buildSpreadMatrix(spreads, config.matrixTenors, 'GovVsBund');
  const durationMs = performance.now() - startTime;

  log.info(
    {
      governmentCurves: government.size,
      swapCurves: swaps.size,
      series: spreads.length,
      omissions: omissions.length,
      durationMs,
    },
    'refresh complete'
  );

  return { government, swaps, spreads, analytics, matrix, omissions, durationMs };
}

function spreadRequest(
  mode: SpreadMode,
  issuer: string,
  curves: CurveSet,
  swaps: ReadonlyMap<string, CurveSet>,
  reference: YieldCurve | undefined,
  referenceSwaps: YieldCurve | undefined,
  config: EngineConfig
): SpreadRequest | undefined {
  const alignment = config.alignment[mode];
  const currency = curves.parCurve.currency;

  switch (mode) {
    case 'GovVsBund':
      return {
        mode,
        target: curves.parCurve,
        reference,
        alignment,
        referenceIssuer: config.referenceIssuer,
      };
    case 'ASW':
      // Bootstrap failure is already reported for the issuer
      if (!curves.zeroCurve) return undefined;
      return {
        mode,
        bondCurve: curves.zeroCurve,
        swapCurve: swaps.get(currency)?.zeroCurve,
        alignment,
      };
    case 'IrsVsEurIrs': {
      const target = swaps.get(currency)?.zeroCurve;
      if (!target) {
        throw new MissingReferenceCurve(mode, issuer, `${currency} swaps`);
      }
      return {
        mode,
        target,
        eurCurve: referenceSwaps,
        referenceCurrency: config.referenceSwapCurrency,
        alignment,
      };
    }
  }
}
