/**
 * Program compiler: statement AST → recodings + resolved table configurations.
 */

import type {
  Matcher,
  Program,
  RecodeStatement,
  TableOptions,
  TableStatement,
  UnmappedClause,
} from '../parser/ast.js';
import { MISSING, type MarginAxis, type TableConfig } from './table-spec.js';
import {
  comparison,
  type RecodeRule,
  type RecodeSpec,
  type UnmappedPolicy,
} from './recoder.js';
import { resolveTableConfig, type TableConfigInput } from './config.js';
import { ConfigError } from './errors.js';

/**
 * Instance-level defaults applied under each statement's own options.
 */
export type TableDefaults = Omit<TableConfigInput, 'rowVar' | 'colVar' | 'stratVar'>;

export interface CompiledProgram {
  /** One recoding per variable, keyed by variable name */
  recodings: Map<string, RecodeSpec>;
  /** One resolved configuration per TABLE statement, in source order */
  tables: TableConfig[];
}

/**
 * Compile a parsed program.
 *
 * @throws ConfigError when a variable is recoded twice or a table's options
 *   do not resolve
 */
export function compileProgram(program: Program, defaults: TableDefaults = {}): CompiledProgram {
  const recodings = new Map<string, RecodeSpec>();
  const tables: TableConfig[] = [];

  for (const statement of program.statements) {
    if (statement.type === 'recode') {
      if (recodings.has(statement.variable)) {
        throw new ConfigError(
          `Variable '${statement.variable}' is recoded more than once`,
          { variable: statement.variable }
        );
      }
      recodings.set(statement.variable, compileRecode(statement));
    } else {
      tables.push(resolveTableConfig(compileTable(statement, defaults)));
    }
  }

  return { recodings, tables };
}

export function compileRecode(statement: RecodeStatement): RecodeSpec {
  return {
    rules: statement.rules.map((rule): RecodeRule => ({
      match: compileMatcher(rule.matcher),
      label: rule.label,
    })),
    onUnmapped: compileUnmapped(statement.unmapped),
    levels: statement.levels ?? undefined,
    label: statement.label ?? undefined,
  };
}

function compileMatcher(matcher: Matcher): RecodeRule['match'] {
  switch (matcher.type) {
    case 'literal':
      return matcher.value;
    case 'comparison':
      return comparison(matcher.op, matcher.bound);
    case 'missing':
      return MISSING;
  }
}

function compileUnmapped(clause: UnmappedClause | null): UnmappedPolicy {
  if (clause === null) return 'error';
  switch (clause.type) {
    case 'error':
      return 'error';
    case 'drop':
      return 'drop';
    case 'label':
      return { labelAs: clause.label };
  }
}

/**
 * Statement options override the defaults; options the statement leaves
 * out keep the default.
 */
export function compileTable(statement: TableStatement, defaults: TableDefaults = {}): TableConfigInput {
  const input: TableConfigInput = {
    ...defaults,
    rowVar: statement.rows,
    colVar: statement.cols,
  };
  if (statement.by !== null) input.stratVar = statement.by;

  const options: TableOptions = statement.options;
  if (options.margins !== undefined) input.margins = marginAxes(options.margins);
  if (options.pct !== undefined) input.pctAxis = options.pct;
  if (options.digits !== undefined) input.digits = options.digits;
  if (options.counts !== undefined) input.showCounts = options.counts;
  if (options.missing !== undefined) {
    input.missingPolicy = options.missing === 'own' ? 'own_category' : 'exclude';
  }
  if (options.missingLabel !== undefined) input.missingLabel = options.missingLabel;
  if (options.total !== undefined) input.totalLabel = options.total;
  return input;
}

function marginAxes(margins: NonNullable<TableOptions['margins']>): MarginAxis[] {
  switch (margins) {
    case 'none':
      return [];
    case 'row':
      return ['row'];
    case 'col':
      return ['col'];
    case 'both':
      return ['row', 'col'];
  }
}
