/**
 * crosstab-engine - contingency tables from categorical records
 *
 * Recodes raw values into ordered categories, cross-tabulates two variables
 * (optionally stratified by a third), adds margins, normalizes percentages
 * and renders the result.
 *
 * @example
 * ```typescript
 * import { createCrossTab } from 'crosstab-engine';
 *
 * const crosstab = createCrossTab({ digits: 0 });
 *
 * const [output] = crosstab.run(`
 *   RECODE gender AS "Gender" ('M' => 'Male', 'F' => 'Female');
 *   TABLE ROWS gender COLS hand OPTIONS margins:both pct:row counts:true;
 * `, rows);
 *
 * output.html; // <table class="crosstab-table">...
 * ```
 */

// parser
export {
  parseProgram,
  parseProgramWithErrors,
  formatProgram,
  formatStatement,
  StatementParseError,
} from './parser/index.js';
export type {
  Program,
  Statement,
  RecodeStatement,
  TableStatement,
  TableOptions,
  ParseIssue,
  ParseResult,
} from './parser/index.js';

// engine
export * from './engine/index.js';

// renderer
export {
  renderTableToHTML,
  renderTableSetToHTML,
  parseCellPath,
  readCells,
  findCells,
  findCell,
  cellPercentage,
  cellCount,
} from './renderer/index.js';
export type { GridRenderOptions, CellAddress, RenderedCell } from './renderer/index.js';

// --- internal imports ---

import { parseProgram } from './parser/index.js';
import type { Program } from './parser/index.js';
import {
  compileProgram,
  crossTabulate,
  crossTabulateAsync,
  toRecords,
  type CompiledProgram,
  type CrossTabResult,
  type StratumRunner,
  type TableConfig,
  type TableDefaults,
} from './engine/index.js';
import {
  renderTableToHTML,
  renderTableSetToHTML,
  type GridRenderOptions,
} from './renderer/index.js';

/**
 * Options for creating a CrossTab instance
 */
export interface CrossTabOptions extends TableDefaults {
  /** options passed to the HTML renderer */
  render?: GridRenderOptions;
}

/**
 * One rendered TABLE statement
 */
export interface TableOutput {
  /** resolved configuration (instance defaults + statement options) */
  config: TableConfig;
  /** single table or stratified set */
  result: CrossTabResult;
  /** rendered HTML */
  html: string;
}

export interface RunAsyncOptions {
  /** schedules per-stratum work (default: one promise per stratum) */
  runner?: StratumRunner;
}

type Rows = readonly Readonly<Record<string, unknown>>[];

/**
 * High-level API for parsing, compiling, tabulating, and rendering.
 */
export class CrossTab {
  private options: CrossTabOptions;

  constructor(options: CrossTabOptions = {}) {
    this.options = options;
  }

  /** parse statement source into an AST */
  parse(source: string): Program {
    return parseProgram(source);
  }

  /** compile statement source into recodings and table configurations */
  compile(source: string): CompiledProgram {
    return compileProgram(parseProgram(source), this.defaults());
  }

  /** run every TABLE statement against the rows, in source order */
  run(source: string, rows: Rows): TableOutput[] {
    const { recodings, tables } = this.compile(source);
    const records = toRecords(rows);
    return tables.map(config => this.output(config, crossTabulate(records, config, recodings)));
  }

  /** like run(), but strata are built concurrently through the runner */
  async runAsync(source: string, rows: Rows, options: RunAsyncOptions = {}): Promise<TableOutput[]> {
    const { recodings, tables } = this.compile(source);
    const records = toRecords(rows);
    return Promise.all(
      tables.map(async config =>
        this.output(config, await crossTabulateAsync(records, config, recodings, options))
      )
    );
  }

  private defaults(): TableDefaults {
    const { margins, pctAxis, digits, showCounts, missingPolicy, missingLabel, totalLabel } = this.options;
    return { margins, pctAxis, digits, showCounts, missingPolicy, missingLabel, totalLabel };
  }

  private output(config: TableConfig, result: CrossTabResult): TableOutput {
    const html = result.kind === 'table'
      ? renderTableToHTML(result.result.table, this.options.render)
      : renderTableSetToHTML(result.set, this.options.render);
    return { config, result, html };
  }
}

/**
 * Create a CrossTab instance with instance-level table defaults.
 */
export function createCrossTab(options: CrossTabOptions = {}): CrossTab {
  return new CrossTab(options);
}
