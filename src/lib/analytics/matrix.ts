// =============================================================================
// Spread Matrix
// Issuer x tenor table of spreads for the rich/cheap heatmap
// =============================================================================

import { GRID_TOLERANCE, parseTenor } from '../bootstrap/types';
import type { SpreadMode, SpreadSeries } from './types';

export const DEFAULT_MATRIX_TENORS: readonly string[] = ['2Y', '5Y', '10Y', '30Y'];

export interface SpreadMatrixRow {
  readonly issuer: string;
  readonly cells: readonly (number | null)[];   // null = no spread at that tenor
}

export interface SpreadMatrix {
  readonly mode: SpreadMode;
  readonly tenors: readonly string[];
  readonly rows: readonly SpreadMatrixRow[];
}

/**
 * Wide table: one row per series of the requested mode, one column per
 * display tenor. A tenor missing from a series stays null, never zero.
 */
export function buildSpreadMatrix(
  series: readonly SpreadSeries[],
  tenors: readonly string[] = DEFAULT_MATRIX_TENORS,
  mode: SpreadMode = 'GovVsBund'
): SpreadMatrix {
  const columns = tenors.map(label => {
    const years = parseTenor(label);
    if (years === undefined) {
      throw new Error(`Unknown matrix tenor "${label}"`);
    }
    return years;
  });

  const rows = series
    .filter(s => s.mode === mode)
    .map(s => ({
      issuer: s.source,
      cells: columns.map(years => {
        const point = s.points.find(p => Math.abs(p.tenor - years) <= GRID_TOLERANCE);
        return point ? point.spreadBp : null;
      }),
    }));

  return { mode, tenors: [...tenors], rows };
}

/**
 * Cell lookup by issuer and tenor label; undefined when the row or column
 * does not exist
 */
export function matrixCell(
  matrix: SpreadMatrix,
  issuer: string,
  tenor: string
): number | null | undefined {
  const row = matrix.rows.find(r => r.issuer === issuer);
  const column = matrix.tenors.indexOf(tenor);
  if (!row || column < 0) return undefined;
  return row.cells[column];
}
