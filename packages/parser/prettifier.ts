/**
 * Prettifier - Formats a program AST back to readable statement source
 *
 * Formatting Rules:
 * 1. Short statements (< 60 chars) stay on one line
 * 2. Longer statements put each clause on its own indented line
 * 3. Statements are separated by a newline
 */

import type {
  Matcher,
  Program,
  RecodeStatement,
  RuleNode,
  Statement,
  TableOptions,
  TableStatement,
  UnmappedClause,
} from './ast.js';
import { isPlainIdentifier } from './chevrotain-parser.js';

// Configuration
const VERY_SHORT_THRESHOLD = 60;  // Keep on one line if total < this
const INDENT = '  ';

/**
 * Format a program AST into pretty-printed source, one statement after another.
 */
export function formatProgram(program: Program): string {
  return program.statements.map(formatStatement).join('\n');
}

/**
 * Format a single statement
 */
export function formatStatement(statement: Statement): string {
  const clauses = statement.type === 'recode'
    ? recodeClauses(statement)
    : tableClauses(statement);

  const oneLine = clauses.join(' ') + ';';
  if (oneLine.length < VERY_SHORT_THRESHOLD) {
    return oneLine;
  }

  const [head, ...rest] = clauses;
  return [head, ...rest.map(c => INDENT + c), ';'].join('\n');
}

// ---
// RECODE
// ---

function recodeClauses(statement: RecodeStatement): string[] {
  let head = `RECODE ${name(statement.variable)}`;
  if (statement.label !== null) {
    head += ` AS ${quote(statement.label)}`;
  }

  const clauses = [head, `(${statement.rules.map(formatRule).join(', ')})`];
  if (statement.unmapped) {
    clauses.push(`UNMAPPED ${formatUnmapped(statement.unmapped)}`);
  }
  if (statement.levels) {
    clauses.push(`LEVELS (${statement.levels.map(quote).join(', ')})`);
  }
  return clauses;
}

function formatRule(rule: RuleNode): string {
  return `${formatMatcher(rule.matcher)} => ${quote(rule.label)}`;
}

function formatMatcher(matcher: Matcher): string {
  switch (matcher.type) {
    case 'literal':
      return typeof matcher.value === 'number' ? String(matcher.value) : quote(matcher.value);
    case 'comparison':
      return `${matcher.op} ${matcher.bound}`;
    case 'missing':
      return 'MISSING';
  }
}

function formatUnmapped(clause: UnmappedClause): string {
  switch (clause.type) {
    case 'error':
      return 'ERROR';
    case 'drop':
      return 'DROP';
    case 'label':
      return quote(clause.label);
  }
}

// ---
// TABLE
// ---

function tableClauses(statement: TableStatement): string[] {
  const clauses = ['TABLE', `ROWS ${name(statement.rows)}`, `COLS ${name(statement.cols)}`];
  if (statement.by !== null) {
    clauses.push(`BY ${name(statement.by)}`);
  }
  const options = formatOptions(statement.options);
  if (options.length > 0) {
    clauses.push(`OPTIONS ${options.join(' ')}`);
  }
  return clauses;
}

function formatOptions(options: TableOptions): string[] {
  const parts: string[] = [];
  if (options.margins !== undefined) parts.push(`margins:${options.margins}`);
  if (options.pct !== undefined) parts.push(`pct:${options.pct}`);
  if (options.digits !== undefined) parts.push(`digits:${options.digits}`);
  if (options.counts !== undefined) parts.push(`counts:${options.counts}`);
  if (options.missing !== undefined) parts.push(`missing:${options.missing}`);
  if (options.missingLabel !== undefined) parts.push(`missingLabel:${quote(options.missingLabel)}`);
  if (options.total !== undefined) parts.push(`total:${quote(options.total)}`);
  return parts;
}

/**
 * Single quotes unless the text contains one and no double quote;
 * backslashes and the chosen quote are escaped.
 */
function quote(text: string): string {
  const mark = text.includes("'") && !text.includes('"') ? '"' : "'";
  return mark + escapeQuoted(text, mark) + mark;
}

/** Variable names that collide with a keyword go in backticks */
function name(variable: string): string {
  return isPlainIdentifier(variable) ? variable : '`' + escapeQuoted(variable, '`') + '`';
}

function escapeQuoted(text: string, mark: string): string {
  return text.replace(/\\/g, '\\\\').split(mark).join('\\' + mark);
}
