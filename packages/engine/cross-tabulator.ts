/**
 * Cross Tabulator
 *
 * Counts records per (row label, column label) cell against pre-declared
 * level sets. New categories are never discovered here: a label outside the
 * declared levels is a configuration mismatch between recoding and
 * tabulation.
 */

import {
  MISSING,
  isMissing,
  type ContingencyMatrix,
  type DataRecord,
  type LevelSet,
  type MissingPolicy,
  type RawValue,
} from './table-spec.js';
import { EmptyLevelSetError, UnknownCategoryError } from './errors.js';
import { debugLog, isDebugEnabled, printMatrix } from './debug.js';
import { stripMargins } from './margins.js';

export interface TabulateOptions {
  /**
   * - 'exclude' (default): complete-case, skip records missing either label
   * - 'own_category': count missing labels under the level set's reserved
   *   missing category
   */
  missingPolicy?: MissingPolicy;

  /** Stratum being tabulated (carried into errors and the matrix) */
  stratum?: string;
}

/**
 * Build a contingency matrix of `rowLevels × colLevels`, zero-filled.
 *
 * @param records Records whose row/col fields are already recoded
 */
export function tabulate(
  records: readonly DataRecord[],
  rowVar: string,
  colVar: string,
  rowLevels: LevelSet,
  colLevels: LevelSet,
  options: TabulateOptions = {}
): ContingencyMatrix {
  const policy = options.missingPolicy ?? 'exclude';
  const { stratum } = options;

  assertNotEmpty(rowLevels, rowVar, stratum);
  assertNotEmpty(colLevels, colVar, stratum);

  const rowIndex = indexOf(rowLevels);
  const colIndex = indexOf(colLevels);

  const counts = rowLevels.levels.map(() => colLevels.levels.map(() => 0));
  let excluded = 0;

  records.forEach((record, index) => {
    const rowValue = record[rowVar];
    const colValue = record[colVar];

    if (policy === 'exclude' && (isMissing(rowValue) || isMissing(colValue))) {
      excluded++;
      return;
    }

    const r = locate(rowValue, rowVar, rowLevels, rowIndex, index, stratum);
    const c = locate(colValue, colVar, colLevels, colIndex, index, stratum);
    counts[r][c] += 1;
  });

  const matrix: ContingencyMatrix = {
    rows: rowLevels,
    cols: colLevels,
    rowLabels: [...rowLevels.levels],
    colLabels: [...colLevels.levels],
    counts,
    excluded,
    stratum,
  };

  if (isDebugEnabled()) {
    debugLog(printMatrix(matrix));
  }

  return matrix;
}

function assertNotEmpty(levels: LevelSet, variable: string, stratum?: string): void {
  if (levels.levels.length === 0) {
    throw new EmptyLevelSetError(
      `Variable '${variable}' has no levels to tabulate against`,
      { variable, stratum }
    );
  }
}

function indexOf(levels: LevelSet): Map<string, number> {
  const index = new Map<string, number>();
  levels.levels.forEach((label, i) => {
    if (!index.has(label)) index.set(label, i);
  });
  return index;
}

/**
 * Position of a value in its level order. Missing values reaching this point
 * go to the reserved missing category.
 */
function locate(
  value: RawValue | undefined,
  variable: string,
  levels: LevelSet,
  index: Map<string, number>,
  recordIndex: number,
  stratum?: string
): number {
  if (value === undefined || value === MISSING) {
    const reserved = levels.missingLabel !== undefined ? index.get(levels.missingLabel) : undefined;
    if (reserved === undefined) {
      throw new UnknownCategoryError(
        `Missing value in '${variable}' at index ${recordIndex} but no missing category was declared`,
        { variable, index: recordIndex, stratum }
      );
    }
    return reserved;
  }

  const label = typeof value === 'number' ? String(value) : value;
  const position = index.get(label);
  if (position === undefined) {
    const where = stratum !== undefined ? ` (stratum '${stratum}')` : '';
    throw new UnknownCategoryError(
      `Unknown category '${label}' for '${variable}' at index ${recordIndex}${where}`,
      { variable, value: label, index: recordIndex, stratum }
    );
  }
  return position;
}

/**
 * Total number of counted records (sum of the original, non-margin cells).
 */
export function countTotal(matrix: ContingencyMatrix): number {
  return stripMargins(matrix).flat().reduce((a, b) => a + b, 0);
}
