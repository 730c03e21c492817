/**
 * Test suite for percentage normalization
 */

import { describe, it, expect } from 'vitest';
import { normalize, percentOf } from '../packages/engine/normalizer.js';
import { addMargins } from '../packages/engine/margins.js';
import type { NormalizedMatrix } from '../packages/engine/table-spec.js';
import { ConfigError } from '../packages/engine/errors.js';
import { handednessMatrix } from './fixtures/handedness.js';
import { COUNT_GRIDS, matrixOf, sum } from './fixtures/matrices.js';

function percentages(matrix: NormalizedMatrix): (number | undefined)[][] {
  return matrix.cells.map(row => row.map(cell => cell.percentage));
}

describe('normalize', () => {
  const withMargins = addMargins(handednessMatrix(), ['row', 'col']);

  it("'row' divides by the row total; the totals row shows column shares", () => {
    const result = normalize(withMargins, 'row');
    const pct = percentages(result);

    expect(pct[0][0]).toBeCloseTo(82.6923, 4);
    expect(pct[0][1]).toBeCloseTo(17.3077, 4);
    expect(pct[0][2]).toBe(100);
    expect(pct[1][0]).toBeCloseTo(91.6667, 4);
    expect(pct[1][1]).toBeCloseTo(8.3333, 4);
    expect(pct[1][2]).toBe(100);
    expect(pct[2]).toEqual([87, 13, 100]);
  });

  it("'col' divides by the column total; the totals column shows row shares", () => {
    const pct = percentages(normalize(withMargins, 'col'));

    expect(pct[0][0]).toBeCloseTo(49.4253, 4);
    expect(pct[1][0]).toBeCloseTo(50.5747, 4);
    expect(pct[2][0]).toBe(100);
    expect(pct[0][1]).toBeCloseTo(69.2308, 4);
    expect(pct[1][1]).toBeCloseTo(30.7692, 4);
    expect(pct[2][1]).toBe(100);
    expect(pct.map(row => row[2])).toEqual([52, 48, 100]);
  });

  it("'cell' divides every cell, margins included, by the grand total", () => {
    const pct = percentages(normalize(withMargins, 'cell'));
    expect(pct).toEqual([
      [43, 9, 52],
      [44, 4, 48],
      [87, 13, 100],
    ]);
  });

  it("'none' keeps counts only", () => {
    const result = normalize(withMargins, 'none');
    expect(result.cells[0][0]).toEqual({ count: 43 });
    expect(result.cells[0][0].percentage).toBeUndefined();
  });

  it('keeps counts alongside percentages', () => {
    const result = normalize(withMargins, 'row');
    expect(result.cells[2].map(cell => cell.count)).toEqual([87, 13, 100]);
    expect(result.axis).toBe('row');
    expect(result.source).toBe(withMargins);
  });

  it('divides by the original cells when there are no margins', () => {
    const pct = percentages(normalize(handednessMatrix([[1, 3], [2, 2]]), 'row'));
    expect(pct).toEqual([
      [25, 75],
      [50, 50],
    ]);
  });

  it('yields 0 for a zero divisor', () => {
    const matrix = addMargins(handednessMatrix([[0, 0], [1, 1]]), ['row']);
    const pct = percentages(normalize(matrix, 'row'));
    expect(pct).toEqual([
      [0, 0, 0],
      [50, 50, 100],
    ]);
  });

  it('carries digits as the formatting default without rounding', () => {
    const result = normalize(withMargins, 'row', 1);
    expect(result.digits).toBe(1);
    expect(result.cells[0][0].percentage).not.toBe(82.7);
  });

  it('rejects invalid digits', () => {
    expect(() => normalize(withMargins, 'row', -1)).toThrow(ConfigError);
    expect(() => normalize(withMargins, 'row', 1.5)).toThrow(ConfigError);
  });
});

describe('percentOf', () => {
  it('scales to 100', () => {
    expect(percentOf(1, 4)).toBe(25);
  });

  it('is 0 for a zero divisor', () => {
    expect(percentOf(0, 0)).toBe(0);
    expect(percentOf(3, 0)).toBe(0);
  });
});

describe('normalize over generated grids', () => {
  it.each(COUNT_GRIDS)("%s: each non-empty row sums to 100 under 'row'", (_name, counts) => {
    const result = normalize(matrixOf(counts), 'row');
    result.cells.forEach((row, i) => {
      const total = sum(row.map(cell => cell.percentage ?? 0));
      expect(total).toBeCloseTo(sum(counts[i]) === 0 ? 0 : 100, 9);
    });
  });

  it.each(COUNT_GRIDS)("%s: each non-empty column sums to 100 under 'col'", (_name, counts) => {
    const result = normalize(matrixOf(counts), 'col');
    counts[0].forEach((_count, j) => {
      const total = sum(result.cells.map(row => row[j].percentage ?? 0));
      expect(total).toBeCloseTo(sum(counts.map(row => row[j])) === 0 ? 0 : 100, 9);
    });
  });
});
