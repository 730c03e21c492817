/**
 * Pipeline
 *
 * raw records → recode → (stratify) → tabulate → margins → normalize → format
 */

import type {
  DataRecord,
  LevelSet,
  StratifiedTableSet,
  TableConfig,
  TableResult,
} from './table-spec.js';
import { recodeRecords, withMissingCategory, type Recodings } from './recoder.js';
import { resolveTableConfig, type TableConfigInput } from './config.js';
import {
  buildTable,
  stratify,
  stratifyAsync,
  type StratifyAsyncOptions,
} from './stratifier.js';

/**
 * Level sets for one table run. `strata` is present when stratified.
 */
export interface TableLevels {
  readonly rows: LevelSet;
  readonly cols: LevelSet;
  readonly strata?: LevelSet;
}

export interface PreparedData {
  /** Records with the table's variables replaced by their labels */
  readonly records: readonly DataRecord[];
  readonly levels: TableLevels;
}

export type CrossTabResult =
  | { readonly kind: 'table'; readonly config: TableConfig; readonly result: TableResult }
  | { readonly kind: 'stratified'; readonly config: TableConfig; readonly set: StratifiedTableSet };

/**
 * Recode the row, column and stratification variables and settle the
 * missing-value policy into their level sets.
 */
export function prepareVariables(
  records: readonly DataRecord[],
  config: TableConfig,
  recodings?: Recodings
): PreparedData {
  const variables = [config.rowVar, config.colVar];
  if (config.stratVar !== undefined) variables.push(config.stratVar);

  const recoded = recodeRecords(records, variables, recodings);

  const levelsOf = (variable: string): LevelSet => {
    const set = recoded.levels.get(variable) ?? { variable, levels: [] };
    return config.missingPolicy === 'own_category'
      ? withMissingCategory(set, config.missingLabel)
      : set;
  };

  return {
    records: recoded.records,
    levels: {
      rows: levelsOf(config.rowVar),
      cols: levelsOf(config.colVar),
      strata: config.stratVar !== undefined ? levelsOf(config.stratVar) : undefined,
    },
  };
}

/**
 * Full run: recode, then build one table or one table per stratum.
 *
 * @example
 * ```typescript
 * const out = crossTabulate(records, {
 *   rowVar: 'gender',
 *   colVar: 'hand',
 *   margins: ['row', 'col'],
 *   pctAxis: 'row',
 * });
 * ```
 */
export function crossTabulate(
  records: readonly DataRecord[],
  input: TableConfigInput,
  recodings?: Recodings
): CrossTabResult {
  const config = resolveTableConfig(input);
  const prepared = prepareVariables(records, config, recodings);

  if (prepared.levels.strata) {
    const set = stratify(
      prepared.records,
      { ...prepared.levels, strata: prepared.levels.strata },
      config
    );
    return { kind: 'stratified', config, set };
  }

  const result = buildTable(prepared.records, prepared.levels, config);
  return { kind: 'table', config, result };
}

/**
 * Like crossTabulate, but strata are built through `stratifyAsync`.
 */
export async function crossTabulateAsync(
  records: readonly DataRecord[],
  input: TableConfigInput,
  recodings?: Recodings,
  options: StratifyAsyncOptions = {}
): Promise<CrossTabResult> {
  const config = resolveTableConfig(input);
  const prepared = prepareVariables(records, config, recodings);

  if (prepared.levels.strata) {
    const set = await stratifyAsync(
      prepared.records,
      { ...prepared.levels, strata: prepared.levels.strata },
      config,
      options
    );
    return { kind: 'stratified', config, set };
  }

  const result = buildTable(prepared.records, prepared.levels, config);
  return { kind: 'table', config, result };
}
