/**
 * Cell Formatter
 *
 * Renders normalized cells as display strings. Always formats from the
 * stored count/percentage pair, so formatting the same matrix with different
 * digits never compounds rounding.
 */

import type {
  FormattedTable,
  HeaderGroup,
  NormalizedMatrix,
  PercentCell,
} from './table-spec.js';
import { assertDigits } from './config.js';

/** Significant digits a double reliably carries in decimal */
const SIGNIFICANT_DIGITS = 15;

/**
 * Round half to even at `digits` decimal places.
 *
 * Rounding works on the value's 15-significant-digit decimal form, so 2.675
 * rounds as a half (to 2.68) even though its binary representation is
 * slightly below it. Values with no more decimal digits than requested come
 * back unchanged.
 */
export function roundHalfEven(value: number, digits: number): number {
  if (value === 0 || !Number.isFinite(value)) return value;

  // d.dddddddddddddde±x
  const [mantissa, exponent] = Math.abs(value).toExponential(SIGNIFICANT_DIGITS - 1).split('e');
  const significand = mantissa.replace('.', '');
  const keep = Number(exponent) + 1 + digits;

  if (keep >= SIGNIFICANT_DIGITS) return value;
  if (keep < 0) return 0;

  const kept = keep > 0 ? Number(significand.slice(0, keep)) : 0;
  const rest = significand.slice(keep);
  const half = '5'.padEnd(rest.length, '0');

  let rounded = kept;
  if (rest > half || (rest === half && kept % 2 === 1)) {
    rounded = kept + 1;
  }
  const magnitude = Number(`${rounded}e-${digits}`);
  return value < 0 && magnitude !== 0 ? -magnitude : magnitude;
}

/**
 * Format a percentage: `83%` at 0 digits, `82.7%` at 1.
 */
export function formatPercentage(value: number, digits: number): string {
  return `${roundHalfEven(value, digits).toFixed(digits)}%`;
}

/**
 * Format one cell. Cells without a percentage render their count.
 */
export function formatCell(cell: PercentCell, digits: number, showCounts: boolean): string {
  if (cell.percentage === undefined) {
    return String(cell.count);
  }
  const pct = formatPercentage(cell.percentage, digits);
  return showCounts ? `${pct} (${cell.count})` : pct;
}

/**
 * Render a normalized matrix into a formatted table.
 *
 * @param digits Decimal places (default: the matrix's digits, else 0)
 * @param showCounts Render "pct% (count)"
 */
export function format(
  matrix: NormalizedMatrix,
  digits: number = matrix.digits ?? 0,
  showCounts: boolean = false
): FormattedTable {
  assertDigits(digits);

  const source = matrix.source;
  const hasRowTotals = source.margins?.row ?? false;
  const hasColTotals = source.margins?.col ?? false;

  const cells = matrix.cells.map(row =>
    row.map(cell => formatCell(cell, digits, showCounts))
  );

  return {
    rowVariable: source.rows.variable,
    colVariable: source.cols.variable,
    rowTitle: source.rows.label ?? source.rows.variable,
    rowLabels: [...source.rowLabels],
    colLabels: [...source.colLabels],
    cells,
    headerGroups: buildHeaderGroups(matrix),
    hasRowTotals,
    hasColTotals,
    stratum: source.stratum,
  };
}

/**
 * The category columns share a parent header named after the column
 * variable; a totals column stands on its own.
 */
function buildHeaderGroups(matrix: NormalizedMatrix): HeaderGroup[] {
  const source = matrix.source;
  const categoryCols = source.margins?.row
    ? source.colLabels.length - 1
    : source.colLabels.length;

  return [
    {
      label: source.cols.label ?? source.cols.variable,
      start: 0,
      span: categoryCols,
    },
  ];
}
