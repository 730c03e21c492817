/**
 * Engine - recode, tabulate, augment, normalize, format, stratify
 */

export * from './table-spec.js';
export * from './errors.js';

export {
  recode,
  recodeIdentity,
  recodeRecords,
  inferLevels,
  comparison,
  withMissingCategory,
} from './recoder.js';
export type {
  Label,
  RecodePredicate,
  RecodeRule,
  RecodeSpec,
  RecodeOptions,
  RecodeResult,
  RecodedRecords,
  Recodings,
  UnmappedPolicy,
  ComparisonOperator,
} from './recoder.js';

export { tabulate, countTotal } from './cross-tabulator.js';
export type { TabulateOptions } from './cross-tabulator.js';

export { addMargins, stripMargins, DEFAULT_TOTAL_LABEL } from './margins.js';
export type { MarginOptions } from './margins.js';

export { normalize, percentOf } from './normalizer.js';

export { format, formatCell, formatPercentage, roundHalfEven } from './cell-formatter.js';

export { buildTable, stratify, stratifyAsync } from './stratifier.js';
export type { StratumLevels, StratumRunner, StratifyAsyncOptions } from './stratifier.js';

export { prepareVariables, crossTabulate, crossTabulateAsync } from './pipeline.js';
export type { TableLevels, PreparedData, CrossTabResult } from './pipeline.js';

export {
  resolveTableConfig,
  assertDigits,
  assertPercentAxis,
  DEFAULT_TABLE_CONFIG,
  MAX_DIGITS,
} from './config.js';
export type { TableConfigInput } from './config.js';

export { compileProgram, compileRecode, compileTable } from './compile.js';
export type { CompiledProgram, TableDefaults } from './compile.js';

export { toRecords, toRawValue, column } from './records.js';

export { isDebugEnabled, debugLog, printMatrix, printNormalized, printTableSet } from './debug.js';
