/**
 * Abstract Syntax Tree Type Definitions
 *
 * These types represent a parsed program of RECODE and TABLE statements.
 */

// ---
// TOP-LEVEL
// ---

export interface Program {
  type: 'program';
  statements: Statement[];
}

export type Statement = RecodeStatement | TableStatement;

// ---
// RECODE
// ---

/**
 * RECODE <variable> [AS "<label>"] (<rule>, ...) [UNMAPPED ...] [LEVELS (...)];
 *
 * Example: RECODE gender AS "Gender" ('M' => 'Male', 'F' => 'Female') UNMAPPED DROP;
 */
export interface RecodeStatement {
  type: 'recode';
  variable: string;
  /** Display label from the AS clause */
  label: string | null;
  rules: RuleNode[];
  /** null when the UNMAPPED clause is omitted (recoding fails on unmapped values) */
  unmapped: UnmappedClause | null;
  /** Explicit level order from the LEVELS clause */
  levels: string[] | null;
}

export interface RuleNode {
  matcher: Matcher;
  label: string;
}

export type ComparisonOperator = '<' | '<=' | '>' | '>=' | '=' | '!=';

/**
 * Left-hand side of a rule:
 * - literal: 'M' or 42 (equality)
 * - comparison: < 30 (numbers and numeric strings)
 * - missing: MISSING
 */
export type Matcher =
  | { type: 'literal'; value: string | number }
  | { type: 'comparison'; op: ComparisonOperator; bound: number }
  | { type: 'missing' };

export type UnmappedClause =
  | { type: 'error' }
  | { type: 'drop' }
  | { type: 'label'; label: string };

// ---
// TABLE
// ---

/**
 * TABLE ROWS <var> COLS <var> [BY <var>] [OPTIONS key:value ...];
 */
export interface TableStatement {
  type: 'table';
  rows: string;
  cols: string;
  /** Stratification variable */
  by: string | null;
  options: TableOptions;
}

/**
 * Table-level options set via OPTIONS clause.
 * Example: TABLE ROWS gender COLS hand OPTIONS margins:both pct:row;
 */
export interface TableOptions {
  margins?: 'none' | 'row' | 'col' | 'both';
  pct?: 'row' | 'col' | 'cell' | 'none';
  digits?: number;
  /** Render "pct% (count)" */
  counts?: boolean;
  /** 'own' counts missing values under their own category */
  missing?: 'exclude' | 'own';
  missingLabel?: string;
  total?: string;
}
