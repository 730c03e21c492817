/**
 * Table configuration: defaults and validation.
 *
 * Every call takes an explicit configuration object; nothing is read from
 * global state.
 */

import type {
  MarginAxis,
  MissingPolicy,
  PercentAxis,
  TableConfig,
} from './table-spec.js';
import { ConfigError } from './errors.js';

/**
 * Caller-facing configuration. Only the row and column variables are
 * required.
 */
export interface TableConfigInput {
  rowVar: string;
  colVar: string;
  /** Stratification variable: one table per stratum when set */
  stratVar?: string;
  /** Which totals to append (default: none) */
  margins?: readonly MarginAxis[];
  /** Percentage axis (default: 'none') */
  pctAxis?: PercentAxis;
  /** Decimal places for percentages (default: 0) */
  digits?: number;
  /** Render "pct% (count)" instead of just the percentage (default: false) */
  showCounts?: boolean;
  /** Missing-value policy (default: 'exclude') */
  missingPolicy?: MissingPolicy;
  /** Label of the reserved missing category (default: "Missing") */
  missingLabel?: string;
  /** Label of total rows/columns (default: "Total") */
  totalLabel?: string;
}

export const DEFAULT_TABLE_CONFIG = {
  margins: [],
  pctAxis: 'none',
  digits: 0,
  showCounts: false,
  missingPolicy: 'exclude',
  missingLabel: 'Missing',
  totalLabel: 'Total',
} as const satisfies Omit<TableConfig, 'rowVar' | 'colVar' | 'stratVar'>;

/** toFixed() accepts up to 100, but nothing past 20 is meaningful here */
export const MAX_DIGITS = 20;

const PERCENT_AXES: readonly PercentAxis[] = ['row', 'col', 'cell', 'none'];
const MARGIN_AXES: readonly MarginAxis[] = ['row', 'col'];
const MISSING_POLICIES: readonly MissingPolicy[] = ['exclude', 'own_category'];

/**
 * Apply defaults and validate.
 *
 * @throws ConfigError on any invalid field
 */
export function resolveTableConfig(input: TableConfigInput): TableConfig {
  assertVariable(input.rowVar, 'rowVar');
  assertVariable(input.colVar, 'colVar');
  if (input.stratVar !== undefined) {
    assertVariable(input.stratVar, 'stratVar');
    if (input.stratVar === input.rowVar || input.stratVar === input.colVar) {
      throw new ConfigError(
        `Stratification variable '${input.stratVar}' cannot also be a table dimension`,
        { variable: input.stratVar }
      );
    }
  }

  const margins = input.margins ?? DEFAULT_TABLE_CONFIG.margins;
  for (const axis of margins) {
    if (!MARGIN_AXES.includes(axis)) {
      throw new ConfigError(`Invalid margin axis '${String(axis)}' (expected row or col)`);
    }
  }

  const pctAxis = input.pctAxis ?? DEFAULT_TABLE_CONFIG.pctAxis;
  assertPercentAxis(pctAxis);

  const digits = input.digits ?? DEFAULT_TABLE_CONFIG.digits;
  assertDigits(digits);

  const missingPolicy = input.missingPolicy ?? DEFAULT_TABLE_CONFIG.missingPolicy;
  if (!MISSING_POLICIES.includes(missingPolicy)) {
    throw new ConfigError(
      `Invalid missing policy '${String(missingPolicy)}' (expected exclude or own_category)`
    );
  }

  const missingLabel = input.missingLabel ?? DEFAULT_TABLE_CONFIG.missingLabel;
  const totalLabel = input.totalLabel ?? DEFAULT_TABLE_CONFIG.totalLabel;
  assertLabel(missingLabel, 'missingLabel');
  assertLabel(totalLabel, 'totalLabel');

  return {
    rowVar: input.rowVar,
    colVar: input.colVar,
    stratVar: input.stratVar,
    margins: [...new Set(margins)],
    pctAxis,
    digits,
    showCounts: input.showCounts ?? DEFAULT_TABLE_CONFIG.showCounts,
    missingPolicy,
    missingLabel,
    totalLabel,
  };
}

export function assertPercentAxis(value: unknown): asserts value is PercentAxis {
  if (!PERCENT_AXES.some(axis => axis === value)) {
    throw new ConfigError(
      `Invalid percentage axis '${String(value)}' (expected row, col, cell or none)`
    );
  }
}

export function assertDigits(value: number): void {
  if (!Number.isInteger(value) || value < 0 || value > MAX_DIGITS) {
    throw new ConfigError(
      `Digits must be an integer between 0 and ${MAX_DIGITS}, got ${value}`
    );
  }
}

function assertVariable(value: string, field: string): void {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigError(`'${field}' must name a variable`);
  }
}

function assertLabel(value: string, field: string): void {
  if (value.trim() === '') {
    throw new ConfigError(`'${field}' must not be blank`);
  }
}
