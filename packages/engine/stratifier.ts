/**
 * Stratifier
 *
 * Partitions recoded records by the stratification label and runs each
 * partition through tabulate → margins → normalize → format with the same
 * configuration. Strata share only the read-only level sets, so a failure in
 * one stratum leaves its siblings intact: the set is a partial result, with
 * failed strata kept in place as error entries.
 */

import {
  MISSING,
  type DataRecord,
  type LevelSet,
  type RawValue,
  type StratifiedTableSet,
  type StratumEntry,
  type TableConfig,
  type TableResult,
} from './table-spec.js';
import {
  ConfigError,
  CrossTabError,
  EmptyLevelSetError,
  UnknownCategoryError,
} from './errors.js';
import { tabulate } from './cross-tabulator.js';
import { addMargins } from './margins.js';
import { normalize } from './normalizer.js';
import { format } from './cell-formatter.js';
import { debugLog } from './debug.js';

export interface StratumLevels {
  readonly rows: LevelSet;
  readonly cols: LevelSet;
  readonly strata: LevelSet;
}

/**
 * Schedules one stratum's work. The default settles each task as its own
 * promise; a caller may plug in a worker pool.
 */
export type StratumRunner = <T>(task: () => T) => Promise<T>;

export interface StratifyAsyncOptions {
  runner?: StratumRunner;
}

interface Partition {
  readonly stratum: string;
  readonly records: readonly DataRecord[];
  /** Set when the stratum label is not a declared level */
  readonly unknown?: UnknownCategoryError;
}

// ---
// PER-TABLE PIPELINE
// ---

/**
 * Run one (already recoded) partition through
 * tabulate → margins → normalize → format.
 */
export function buildTable(
  records: readonly DataRecord[],
  levels: Pick<StratumLevels, 'rows' | 'cols'>,
  config: TableConfig,
  stratum?: string
): TableResult {
  const counts = tabulate(records, config.rowVar, config.colVar, levels.rows, levels.cols, {
    missingPolicy: config.missingPolicy,
    stratum,
  });
  const withMargins = addMargins(counts, config.margins, { label: config.totalLabel });
  const matrix = normalize(withMargins, config.pctAxis, config.digits);
  const table = format(matrix, config.digits, config.showCounts);
  return { matrix, table };
}

// ---
// STRATIFY
// ---

/**
 * Build one table per stratum present in the data, in level order.
 */
export function stratify(
  records: readonly DataRecord[],
  levels: StratumLevels,
  config: TableConfig
): StratifiedTableSet {
  const partitions = partition(records, levels.strata, config);

  const entries = partitions.map((p): StratumEntry => {
    if (p.unknown) return failed(p.stratum, p.unknown);
    try {
      return { status: 'ok', stratum: p.stratum, ...buildTable(p.records, levels, config, p.stratum) };
    } catch (error) {
      return failed(p.stratum, error);
    }
  });

  return assemble(levels.strata, entries);
}

/**
 * Fan out one task per stratum, then reassemble in level order regardless
 * of completion order.
 */
export async function stratifyAsync(
  records: readonly DataRecord[],
  levels: StratumLevels,
  config: TableConfig,
  options: StratifyAsyncOptions = {}
): Promise<StratifiedTableSet> {
  const runner = options.runner ?? runAsPromise;
  const partitions = partition(records, levels.strata, config);

  const tasks = partitions.map(async (p): Promise<StratumEntry> => {
    if (p.unknown) return failed(p.stratum, p.unknown);
    try {
      const result = await runner(() => buildTable(p.records, levels, config, p.stratum));
      return { status: 'ok', stratum: p.stratum, ...result };
    } catch (error) {
      return failed(p.stratum, error);
    }
  });

  // Promise.all keeps input order, which is already level order
  return assemble(levels.strata, await Promise.all(tasks));
}

const runAsPromise: StratumRunner = task => Promise.resolve().then(task);

/**
 * Group records by stratum label. Ordered by level order; labels outside the
 * level order follow in first-seen order as error partitions.
 */
function partition(
  records: readonly DataRecord[],
  strata: LevelSet,
  config: TableConfig
): Partition[] {
  const stratVar = config.stratVar;
  if (stratVar === undefined) {
    throw new ConfigError('Stratification requires a stratification variable');
  }
  if (strata.levels.length === 0) {
    throw new EmptyLevelSetError(
      `Stratification variable '${stratVar}' has no levels`,
      { variable: stratVar }
    );
  }

  const groups = new Map<string, DataRecord[]>();
  let excluded = 0;

  for (const record of records) {
    const stratum = stratumOf(record[stratVar], strata, config);
    if (stratum === undefined) {
      excluded++;
      continue;
    }
    const group = groups.get(stratum);
    if (group) {
      group.push(record);
    } else {
      groups.set(stratum, [record]);
    }
  }

  if (excluded > 0) {
    debugLog(`stratify: ${excluded} record(s) with missing '${stratVar}' excluded`);
  }

  const partitions: Partition[] = [];
  for (const level of strata.levels) {
    const group = groups.get(level);
    if (group) partitions.push({ stratum: level, records: group });
  }
  for (const [stratum, group] of groups) {
    if (strata.levels.includes(stratum)) continue;
    partitions.push({
      stratum,
      records: group,
      unknown: new UnknownCategoryError(
        `Unknown stratum '${stratum}' for '${stratVar}'`,
        { variable: stratVar, value: stratum, stratum }
      ),
    });
  }
  return partitions;
}

function stratumOf(
  value: RawValue | undefined,
  strata: LevelSet,
  config: TableConfig
): string | undefined {
  if (value === undefined || value === MISSING) {
    return config.missingPolicy === 'own_category' ? strata.missingLabel : undefined;
  }
  return String(value);
}

/**
 * Turn a per-stratum failure into an error entry. Anything that is not an
 * engine error is a defect and propagates.
 */
function failed(stratum: string, error: unknown): StratumEntry {
  if (!(error instanceof CrossTabError)) {
    throw error;
  }
  debugLog(`stratum '${stratum}' failed: ${error.name}: ${error.message}`);
  return { status: 'error', stratum, error };
}

function assemble(strata: LevelSet, entries: StratumEntry[]): StratifiedTableSet {
  return { variable: strata.variable, label: strata.label, entries };
}
