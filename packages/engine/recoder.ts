/**
 * Category Recoder
 *
 * Maps raw field values to labelled categories with an explicit level order.
 * Level order is decided here, once, and threaded read-only through every
 * later stage.
 */

import {
  MISSING,
  isMissing,
  type DataRecord,
  type LevelSet,
  type Missing,
  type RawValue,
} from './table-spec.js';
import { RecodeError, describeValue } from './errors.js';

// ---
// TYPES
// ---

/** A recoded value: a category label, or the missing marker */
export type Label = string | Missing;

/** Predicate rules never receive the missing marker. */
export type RecodePredicate = (value: string | number) => boolean;

export interface RecodeRule {
  /** Raw value (strict equality), MISSING, or a predicate */
  readonly match: RawValue | RecodePredicate;
  readonly label: string;
}

/**
 * What to do with a non-missing value no rule matches:
 * - 'error': throw RecodeError
 * - 'drop': emit MISSING
 * - { labelAs }: emit that label
 */
export type UnmappedPolicy = 'error' | 'drop' | { readonly labelAs: string };

/**
 * A complete recoding of one variable.
 */
export interface RecodeSpec {
  readonly rules: readonly RecodeRule[];
  readonly onUnmapped?: UnmappedPolicy;
  /** Explicit level order override */
  readonly levels?: readonly string[];
  /** Display label for headers */
  readonly label?: string;
}

export interface RecodeOptions {
  readonly levels?: readonly string[];
  /** Variable name, for error context */
  readonly variable?: string;
}

export interface RecodeResult {
  /** One label per input value, aligned 1:1 */
  readonly labels: readonly Label[];
  readonly levels: readonly string[];
}

export type ComparisonOperator = '<' | '<=' | '>' | '>=' | '=' | '!=';

// ---
// RECODING
// ---

/**
 * Recode raw values. First matching rule wins; the distinct rule labels in
 * rule order define the level order unless `options.levels` overrides it.
 *
 * @example
 * ```typescript
 * recode(['M', 'F', 'M'], [
 *   { match: 'M', label: 'Male' },
 *   { match: 'F', label: 'Female' },
 * ]);
 * // { labels: ['Male', 'Female', 'Male'], levels: ['Male', 'Female'] }
 * ```
 */
export function recode(
  values: readonly RawValue[],
  mapping: readonly RecodeRule[],
  onUnmapped: UnmappedPolicy = 'error',
  options: RecodeOptions = {}
): RecodeResult {
  const levels = declareLevels(mapping, onUnmapped, options);

  const labels = values.map((value, index): Label => {
    const rule = mapping.find(r => matches(r, value));
    if (rule) return rule.label;

    // a missing value nobody targets stays missing under every policy
    if (value === MISSING) return MISSING;

    if (onUnmapped === 'error') {
      const where = options.variable ? ` in '${options.variable}'` : '';
      throw new RecodeError(
        `Unmapped value ${describeValue(value)}${where} at index ${index}`,
        { variable: options.variable, value, index }
      );
    }
    if (onUnmapped === 'drop') return MISSING;
    return onUnmapped.labelAs;
  });

  return { labels, levels };
}

function matches(rule: RecodeRule, value: RawValue): boolean {
  if (value === MISSING) {
    return rule.match === MISSING;
  }
  if (typeof rule.match === 'function') {
    return rule.match(value);
  }
  return rule.match === value;
}

/**
 * Level order for a mapping: distinct rule labels, then the unmapped label.
 */
function declareLevels(
  mapping: readonly RecodeRule[],
  onUnmapped: UnmappedPolicy,
  options: RecodeOptions
): readonly string[] {
  const declared = distinct(mapping.map(r => r.label));
  if (typeof onUnmapped === 'object' && !declared.includes(onUnmapped.labelAs)) {
    declared.push(onUnmapped.labelAs);
  }

  if (!options.levels) return declared;

  const override = distinct(options.levels);
  for (const label of declared) {
    if (!override.includes(label)) {
      throw new RecodeError(
        `Label '${label}' is missing from the declared level order`,
        { variable: options.variable, value: label }
      );
    }
  }
  return override;
}

function distinct(labels: readonly string[]): string[] {
  return [...new Set(labels)];
}

/**
 * Build a numeric comparison rule matcher. Numeric strings are compared by
 * value; other strings never match.
 */
export function comparison(op: ComparisonOperator, bound: number): RecodePredicate {
  return (value) => {
    const n = typeof value === 'number' ? value : parseNumeric(value);
    if (n === null) return false;
    switch (op) {
      case '<': return n < bound;
      case '<=': return n <= bound;
      case '>': return n > bound;
      case '>=': return n >= bound;
      case '=': return n === bound;
      case '!=': return n !== bound;
    }
  };
}

function parseNumeric(value: string): number | null {
  if (value.trim() === '') return null;
  const n = Number(value);
  return Number.isFinite(n) ? n : null;
}

// ---
// IDENTITY RECODING (INFERRED LEVELS)
// ---

/**
 * First-seen order of the distinct non-missing values, as strings.
 */
export function inferLevels(values: readonly RawValue[]): string[] {
  const seen = new Set<string>();
  for (const value of values) {
    if (value !== MISSING) seen.add(String(value));
  }
  return [...seen];
}

/**
 * Recode each value to its string form, levels in first-seen order.
 */
export function recodeIdentity(values: readonly RawValue[]): RecodeResult {
  return {
    labels: values.map(v => (v === MISSING ? MISSING : String(v))),
    levels: inferLevels(values),
  };
}

// ---
// RECORD-LEVEL RECODING
// ---

export type Recodings = ReadonlyMap<string, RecodeSpec>;

export interface RecodedRecords {
  /** Copies of the input records with the recoded fields replaced by labels */
  readonly records: readonly DataRecord[];
  readonly levels: ReadonlyMap<string, LevelSet>;
}

/**
 * Recode the named variables of every record. Variables without an entry in
 * `recodings` keep their values (as strings) with first-seen level order.
 */
export function recodeRecords(
  records: readonly DataRecord[],
  variables: readonly string[],
  recodings: Recodings = new Map()
): RecodedRecords {
  const columns = new Map<string, readonly Label[]>();
  const levels = new Map<string, LevelSet>();

  for (const variable of distinct(variables)) {
    const values = records.map((r): RawValue => {
      const v = r[variable];
      return isMissing(v) ? MISSING : v;
    });
    const spec = recodings.get(variable);
    const result = spec
      ? recode(values, spec.rules, spec.onUnmapped, { levels: spec.levels, variable })
      : recodeIdentity(values);

    columns.set(variable, result.labels);
    levels.set(variable, { variable, levels: result.levels, label: spec?.label });
  }

  const recoded = records.map((record, i) => {
    const copy: Record<string, RawValue> = { ...record };
    for (const [variable, labels] of columns) {
      copy[variable] = labels[i];
    }
    return copy;
  });

  return { records: recoded, levels };
}

/**
 * Append the reserved "missing" category to a level set. This is the only
 * way the reserved category enters a level order, and it must happen before
 * any matrix is built.
 */
export function withMissingCategory(levelSet: LevelSet, label: string): LevelSet {
  if (levelSet.missingLabel !== undefined) return levelSet;
  if (levelSet.levels.includes(label)) {
    throw new RecodeError(
      `Reserved missing label '${label}' collides with an existing level of '${levelSet.variable}'`,
      { variable: levelSet.variable, value: label }
    );
  }
  return {
    ...levelSet,
    levels: [...levelSet.levels, label],
    missingLabel: label,
  };
}
