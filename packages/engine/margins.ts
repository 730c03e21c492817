/**
 * Margin Augmenter
 *
 * Appends row totals (last column), column totals (last row) and the grand
 * total. All totals come from the original cells, so the corner never counts
 * a margin twice.
 */

import type { ContingencyMatrix, MarginAxis } from './table-spec.js';
import { AlreadyAugmentedError } from './errors.js';

export interface MarginOptions {
  /** Label of the appended row/column (default: "Total") */
  label?: string;
}

export const DEFAULT_TOTAL_LABEL = 'Total';

/**
 * Return a new matrix with the requested margins appended.
 *
 * @throws AlreadyAugmentedError if the matrix already carries margins
 */
export function addMargins(
  matrix: ContingencyMatrix,
  axes: readonly MarginAxis[],
  options: MarginOptions = {}
): ContingencyMatrix {
  if (matrix.margins) {
    throw new AlreadyAugmentedError(
      `Matrix ${matrix.rows.variable} × ${matrix.cols.variable} already has margins`,
      { variable: matrix.rows.variable, stratum: matrix.stratum }
    );
  }

  const rowTotals = axes.includes('row');
  const colTotals = axes.includes('col');
  if (!rowTotals && !colTotals) {
    return matrix;
  }

  const label = options.label ?? DEFAULT_TOTAL_LABEL;
  const body = matrix.counts;
  const width = matrix.colLabels.length;

  const rowSums = body.map(row => sum(row));
  const colSums = Array.from({ length: width }, (_, j) => sum(body.map(row => row[j])));
  const grandTotal = sum(rowSums);

  const counts: number[][] = body.map((row, i) =>
    rowTotals ? [...row, rowSums[i]] : [...row]
  );
  if (colTotals) {
    counts.push(rowTotals ? [...colSums, grandTotal] : colSums);
  }

  return {
    ...matrix,
    rowLabels: colTotals ? [...matrix.rowLabels, label] : matrix.rowLabels,
    colLabels: rowTotals ? [...matrix.colLabels, label] : matrix.colLabels,
    counts,
    margins: { row: rowTotals, col: colTotals, label },
  };
}

/**
 * The original count body of a matrix, without any margins.
 */
export function stripMargins(matrix: ContingencyMatrix): number[][] {
  const rows = matrix.margins?.col ? matrix.counts.length - 1 : matrix.counts.length;
  const cols = matrix.margins?.row ? matrix.colLabels.length - 1 : matrix.colLabels.length;
  return matrix.counts.slice(0, rows).map(row => row.slice(0, cols));
}

function sum(values: readonly number[]): number {
  let total = 0;
  for (const v of values) total += v;
  return total;
}
