/**
 * Test suite for cell formatting
 */

import { describe, it, expect } from 'vitest';
import {
  format,
  formatCell,
  formatPercentage,
  roundHalfEven,
} from '../packages/engine/cell-formatter.js';
import { addMargins } from '../packages/engine/margins.js';
import { normalize } from '../packages/engine/normalizer.js';
import { ConfigError } from '../packages/engine/errors.js';
import { handednessMatrix } from './fixtures/handedness.js';
import { COUNT_GRIDS, matrixOf } from './fixtures/matrices.js';

describe('roundHalfEven', () => {
  it('rounds exact halves to the even neighbour', () => {
    expect(roundHalfEven(0.5, 0)).toBe(0);
    expect(roundHalfEven(1.5, 0)).toBe(2);
    expect(roundHalfEven(2.5, 0)).toBe(2);
    expect(roundHalfEven(12.5, 0)).toBe(12);
    expect(roundHalfEven(13.5, 0)).toBe(14);
  });

  it('detects decimal halves below the binary value', () => {
    expect(roundHalfEven(2.675, 2)).toBe(2.68);
    expect(roundHalfEven(2.665, 2)).toBe(2.66);
  });

  it('rounds non-halves to the nearest value', () => {
    expect(roundHalfEven(82.6923, 0)).toBe(83);
    expect(roundHalfEven(17.3077, 0)).toBe(17);
    expect(roundHalfEven(8.3333, 0)).toBe(8);
    expect(roundHalfEven(82.6923, 1)).toBe(82.7);
  });

  it('keeps ordinary fractions at 7 and 8 digits', () => {
    expect(roundHalfEven(100 / 3, 7)).toBe(33.3333333);
    expect(roundHalfEven(200 / 3, 7)).toBe(66.6666667);
    expect(roundHalfEven(100 / 3, 8)).toBe(33.33333333);
  });

  it('rounds decimal halves to even at 8 digits', () => {
    expect(roundHalfEven(0.123456785, 8)).toBe(0.12345678);
    expect(roundHalfEven(0.123456775, 8)).toBe(0.12345678);
  });

  it('leaves values with fewer decimals than requested unchanged', () => {
    expect(roundHalfEven(100 / 3, 20)).toBe(100 / 3);
    expect(roundHalfEven(2.675, 20)).toBe(2.675);
    expect(roundHalfEven(0.125, 3)).toBe(0.125);
  });

  it('rounds negative values symmetrically', () => {
    expect(roundHalfEven(-2.5, 0)).toBe(-2);
    expect(roundHalfEven(-2.675, 2)).toBe(-2.68);
    expect(roundHalfEven(-0.4, 0)).toBe(0);
  });
});

describe('formatPercentage', () => {
  it('has no decimal point at 0 digits', () => {
    expect(formatPercentage(100, 0)).toBe('100%');
    expect(formatPercentage(82.6923, 0)).toBe('83%');
  });

  it('pads to the requested digits', () => {
    expect(formatPercentage(50, 1)).toBe('50.0%');
    expect(formatPercentage(82.69230769, 2)).toBe('82.69%');
  });

  it('formats long fractions at high digits', () => {
    expect(formatPercentage(100 / 3, 8)).toBe('33.33333333%');
    expect(formatPercentage(0.125, 20)).toBe('0.12500000000000000000%');
  });
});

describe('formatCell', () => {
  it('renders the percentage, optionally with the count', () => {
    expect(formatCell({ count: 43, percentage: 82.6923 }, 0, false)).toBe('83%');
    expect(formatCell({ count: 43, percentage: 82.6923 }, 0, true)).toBe('83% (43)');
  });

  it('renders the count when there is no percentage', () => {
    expect(formatCell({ count: 43 }, 0, true)).toBe('43');
  });
});

describe('format', () => {
  const withMargins = addMargins(handednessMatrix(), ['row', 'col']);

  it('renders the row-percentage table with counts', () => {
    const table = format(normalize(withMargins, 'row'), 0, true);

    expect(table.cells).toEqual([
      ['83% (43)', '17% (9)', '100% (52)'],
      ['92% (44)', '8% (4)', '100% (48)'],
      ['87% (87)', '13% (13)', '100% (100)'],
    ]);
    expect(table.rowLabels).toEqual(['Male', 'Female', 'Total']);
    expect(table.colLabels).toEqual(['Right', 'Left', 'Total']);
    expect(table.hasRowTotals).toBe(true);
    expect(table.hasColTotals).toBe(true);
    expect(table.rowVariable).toBe('gender');
    expect(table.colVariable).toBe('hand');
    expect(table.rowTitle).toBe('gender');
  });

  it('groups the category columns under the column variable', () => {
    const table = format(normalize(withMargins, 'row'));
    expect(table.headerGroups).toEqual([{ label: 'hand', start: 0, span: 2 }]);
  });

  it('prefers display labels for headers', () => {
    const labelled = {
      ...handednessMatrix(),
      rows: { variable: 'gender', levels: ['Male', 'Female'], label: 'Gender' },
      cols: { variable: 'hand', levels: ['Right', 'Left'], label: 'Handedness' },
    };
    const table = format(normalize(addMargins(labelled, ['row']), 'none'));
    expect(table.rowTitle).toBe('Gender');
    expect(table.headerGroups).toEqual([{ label: 'Handedness', start: 0, span: 2 }]);
  });

  it('uses the digits carried by the matrix by default', () => {
    const table = format(normalize(withMargins, 'row', 1));
    expect(table.cells[0]).toEqual(['82.7%', '17.3%', '100.0%']);
  });

  it('formats the same matrix independently at different digits', () => {
    const matrix = normalize(withMargins, 'row');
    expect(format(matrix, 0).cells[0][0]).toBe('83%');
    expect(format(matrix, 2).cells[0][0]).toBe('82.69%');
    expect(format(matrix, 0).cells[0][0]).toBe('83%');
  });

  it("renders counts for axis 'none'", () => {
    const table = format(normalize(withMargins, 'none'), 0, true);
    expect(table.cells).toEqual([
      ['43', '9', '52'],
      ['44', '4', '48'],
      ['87', '13', '100'],
    ]);
  });

  it('reports no totals for a matrix without margins', () => {
    const table = format(normalize(handednessMatrix(), 'cell'));
    expect(table.hasRowTotals).toBe(false);
    expect(table.hasColTotals).toBe(false);
    expect(table.cells).toEqual([
      ['43%', '9%'],
      ['44%', '4%'],
    ]);
  });

  it('formats row percentages at 7 digits', () => {
    const table = format(normalize(matrixOf([[1, 2], [1, 1]]), 'row'), 7);
    expect(table.cells).toEqual([
      ['33.3333333%', '66.6666667%'],
      ['50.0000000%', '50.0000000%'],
    ]);
  });

  it.each(COUNT_GRIDS)('%s: formatting twice gives identical strings', (_name, counts) => {
    const matrix = normalize(addMargins(matrixOf(counts), ['row', 'col']), 'row');
    for (const digits of [0, 1, 3, 8]) {
      expect(format(matrix, digits, true).cells).toEqual(format(matrix, digits, true).cells);
    }
  });

  it('rejects invalid digits', () => {
    expect(() => format(normalize(withMargins, 'row'), 21)).toThrow(ConfigError);
  });
});
