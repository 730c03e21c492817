/**
 * Percentage Normalizer
 *
 * Pairs each count with its percentage along an axis:
 * - 'row': divide by the row's total (each row sums to 100%)
 * - 'col': divide by the column's total (each column sums to 100%)
 * - 'cell': divide by the grand total
 * - 'none': counts only
 *
 * Divisors always come from the original cells, never from margins. The
 * totals row under 'row' (and the totals column under 'col') divides by the
 * grand total, so it shows each column's share and 100% in the corner.
 * A zero divisor yields 0%. Percentages are left unrounded.
 */

import type {
  ContingencyMatrix,
  NormalizedMatrix,
  PercentAxis,
  PercentCell,
} from './table-spec.js';
import { stripMargins } from './margins.js';
import { assertDigits, assertPercentAxis } from './config.js';

export function normalize(
  matrix: ContingencyMatrix,
  axis: PercentAxis,
  digits?: number
): NormalizedMatrix {
  assertPercentAxis(axis);
  if (digits !== undefined) assertDigits(digits);

  if (axis === 'none') {
    return {
      source: matrix,
      axis,
      cells: matrix.counts.map(row => row.map((count): PercentCell => ({ count }))),
      digits,
    };
  }

  const pctAxis: Exclude<PercentAxis, 'none'> = axis;
  const body = stripMargins(matrix);
  const bodyRows = body.length;
  const bodyCols = body[0]?.length ?? 0;

  const rowSums = body.map(row => row.reduce((a, b) => a + b, 0));
  const colSums = Array.from({ length: bodyCols }, (_, j) =>
    body.reduce((acc, row) => acc + row[j], 0)
  );
  const grandTotal = rowSums.reduce((a, b) => a + b, 0);

  const divisorFor = (i: number, j: number): number => {
    const inTotalRow = i >= bodyRows;
    const inTotalCol = j >= bodyCols;
    switch (pctAxis) {
      case 'row':
        return inTotalRow ? grandTotal : rowSums[i];
      case 'col':
        return inTotalCol ? grandTotal : colSums[j];
      case 'cell':
        return grandTotal;
    }
  };

  const cells = matrix.counts.map((row, i) =>
    row.map((count, j): PercentCell => ({
      count,
      percentage: percentOf(count, divisorFor(i, j)),
    }))
  );

  return { source: matrix, axis, cells, digits };
}

/**
 * 100 × count / divisor, or 0 when the divisor is 0.
 */
export function percentOf(count: number, divisor: number): number {
  return divisor === 0 ? 0 : (100 * count) / divisor;
}
