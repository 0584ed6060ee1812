// =============================================================================
// Curve Snapshot Cache
// Previous-cycle curves, owned by the caller, for realised roll-down
// =============================================================================

import { lookupRate } from '../bootstrap/interpolation';
import { toBasisPoints, type YieldCurve } from '../bootstrap/types';

export interface CurveSnapshot {
  readonly timestamp: string;     // ISO-8601
  readonly curve: YieldCurve;
}

/**
 * Bounded history of curves keyed by curve id and timestamp.
 * The engine never holds one itself; the refresh scheduler passes it in.
 */
export class CurveSnapshotCache {
  private readonly snapshots = new Map<string, CurveSnapshot[]>();

  constructor(private readonly maxPerCurve: number = 2) {
    if (!Number.isInteger(maxPerCurve) || maxPerCurve < 1) {
      throw new Error('maxPerCurve must be a positive integer');
    }
  }

  put(curve: YieldCurve, timestamp: string = curve.referenceDate): void {
    const list = (this.snapshots.get(curve.id) ?? []).filter(s => s.timestamp !== timestamp);
    list.push({ timestamp, curve });
    list.sort((a, b) => a.timestamp.localeCompare(b.timestamp));
    this.snapshots.set(curve.id, list.slice(-this.maxPerCurve));
  }

  latest(curveId: string): CurveSnapshot | undefined {
    const list = this.snapshots.get(curveId);
    return list?.[list.length - 1];
  }

  /**
   * Most recent snapshot strictly older than `timestamp`
   */
  before(curveId: string, timestamp: string): CurveSnapshot | undefined {
    const list = this.snapshots.get(curveId) ?? [];
    for (let i = list.length - 1; i >= 0; i--) {
      if (list[i].timestamp < timestamp) return list[i];
    }
    return undefined;
  }

  get size(): number {
    return this.snapshots.size;
  }

  clear(): void {
    this.snapshots.clear();
  }
}

export interface RealizedChange {
  readonly tenor: number;
  readonly label?: string;
  readonly changeBp: number;
}

/**
 * Per-tenor change between two snapshots of the same curve, in bp.
 * Tenors the previous grid does not cover are skipped.
 */
export function realizedChange(previous: YieldCurve, current: YieldCurve): RealizedChange[] {
  const changes: RealizedChange[] = [];
  for (const p of current.points) {
    const before = lookupRate(previous, p.tenor, 'Strict');
    if (!before.ok) continue;
    changes.push({
      tenor: p.tenor,
      ...(p.label !== undefined ? { label: p.label } : {}),
      changeBp: toBasisPoints(p.rate, current.unit) - toBasisPoints(before.rate, previous.unit),
    });
  }
  return changes;
}
