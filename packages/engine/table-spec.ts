/**
 * Table Specification - shared value types
 *
 * The pipeline is an explicit data flow over immutable values:
 *
 *   DataRecord[] → (recode) → LevelSet + labelled records
 *     → ContingencyMatrix → (margins) → ContingencyMatrix
 *     → NormalizedMatrix → FormattedTable
 *
 * Level sets are created once per variable during recoding and shared
 * read-only by every later stage. No stage mutates a value it receives.
 */

import type { CrossTabError } from './errors.js';

// ---
// RECORDS
// ---

/**
 * The distinguished "absent/unknown" marker.
 * Never coerced to a label unless a recoding rule targets it explicitly.
 */
export const MISSING: unique symbol = Symbol('missing');
export type Missing = typeof MISSING;

export type RawValue = string | number | Missing;

/**
 * One row of input: an ordered mapping from field name to raw value.
 */
export type DataRecord = Readonly<Record<string, RawValue>>;

export function isMissing(value: RawValue | undefined): value is Missing | undefined {
  return value === MISSING || value === undefined;
}

// ---
// CATEGORIES
// ---

/**
 * The ordered categories of one variable.
 */
export interface LevelSet {
  /** The field this level set belongs to */
  readonly variable: string;

  /** Category labels in level order (reserved missing level last, if any) */
  readonly levels: readonly string[];

  /**
   * Label of the reserved "missing" category. Only present when the
   * own-category missing policy added it during recoding.
   */
  readonly missingLabel?: string;

  /** Display label for headers (e.g., "Gender") */
  readonly label?: string;
}

// ---
// CONFIGURATION
// ---

/**
 * 'row' appends row totals (an extra column), 'col' appends column totals
 * (an extra row).
 */
export type MarginAxis = 'row' | 'col';

export type PercentAxis = 'row' | 'col' | 'cell' | 'none';

export type MissingPolicy = 'exclude' | 'own_category';

/**
 * Resolved per-call configuration. See `resolveTableConfig` for defaults.
 */
export interface TableConfig {
  readonly rowVar: string;
  readonly colVar: string;
  readonly stratVar?: string;
  readonly margins: readonly MarginAxis[];
  readonly pctAxis: PercentAxis;
  readonly digits: number;
  readonly showCounts: boolean;
  readonly missingPolicy: MissingPolicy;
  /** Label of the reserved category under the own-category policy */
  readonly missingLabel: string;
  /** Label of appended total rows/columns */
  readonly totalLabel: string;
}

// ---
// MATRICES
// ---

export interface MarginState {
  /** Row totals were appended as the last column */
  readonly row: boolean;
  /** Column totals were appended as the last row */
  readonly col: boolean;
  readonly label: string;
}

/**
 * A count grid cross-classifying two variables.
 *
 * Row/column labels equal the level orders, followed by the total label
 * when margins were added. Shape is always rowLabels × colLabels.
 */
export interface ContingencyMatrix {
  readonly rows: LevelSet;
  readonly cols: LevelSet;
  readonly rowLabels: readonly string[];
  readonly colLabels: readonly string[];
  readonly counts: readonly (readonly number[])[];

  /** Present once margins have been added */
  readonly margins?: MarginState;

  /** Records skipped because a label was missing (complete-case policy) */
  readonly excluded: number;

  /** Stratum label, when produced by the stratifier */
  readonly stratum?: string;
}

/**
 * A count paired with its (unrounded) percentage.
 * `percentage` is absent when the axis is 'none'.
 */
export interface PercentCell {
  readonly count: number;
  readonly percentage?: number;
}

export interface NormalizedMatrix {
  readonly source: ContingencyMatrix;
  readonly axis: PercentAxis;
  readonly cells: readonly (readonly PercentCell[])[];
  /** Default rounding for formatting; the percentages themselves are unrounded */
  readonly digits?: number;
}

// ---
// PRESENTATION
// ---

/**
 * Header grouping hint: `span` columns starting at `start` share a parent
 * header labelled `label`. Interpreted by rendering sinks only.
 */
export interface HeaderGroup {
  readonly label: string;
  readonly start: number;
  readonly span: number;
}

/**
 * The presentation form handed to rendering sinks.
 */
export interface FormattedTable {
  readonly rowVariable: string;
  readonly colVariable: string;
  /** Display label of the row variable (falls back to its name) */
  readonly rowTitle: string;
  readonly rowLabels: readonly string[];
  readonly colLabels: readonly string[];
  readonly cells: readonly (readonly string[])[];
  readonly headerGroups: readonly HeaderGroup[];
  readonly hasRowTotals: boolean;
  readonly hasColTotals: boolean;
  readonly stratum?: string;
}

// ---
// STRATIFIED RESULTS
// ---

export interface TableResult {
  readonly matrix: NormalizedMatrix;
  readonly table: FormattedTable;
}

export type StratumEntry =
  | ({ readonly status: 'ok'; readonly stratum: string } & TableResult)
  | { readonly status: 'error'; readonly stratum: string; readonly error: CrossTabError };

/**
 * One entry per stratum present in the data, in the stratification
 * variable's level order. Failed strata keep their place as error entries.
 */
export interface StratifiedTableSet {
  readonly variable: string;
  readonly label?: string;
  readonly entries: readonly StratumEntry[];
}

/**
 * Get the successfully built tables of a set, keyed by stratum label
 * (insertion order = level order).
 */
export function tablesOf(set: StratifiedTableSet): Map<string, TableResult> {
  const result = new Map<string, TableResult>();
  for (const entry of set.entries) {
    if (entry.status === 'ok') {
      result.set(entry.stratum, { matrix: entry.matrix, table: entry.table });
    }
  }
  return result;
}

/**
 * Get the failed strata of a set.
 */
export function errorsOf(set: StratifiedTableSet): Map<string, CrossTabError> {
  const result = new Map<string, CrossTabError>();
  for (const entry of set.entries) {
    if (entry.status === 'error') {
      result.set(entry.stratum, entry.error);
    }
  }
  return result;
}
