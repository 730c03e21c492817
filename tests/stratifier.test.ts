/**
 * Test suite for stratification
 */

import { describe, it, expect } from 'vitest';
import {
  buildTable,
  stratify,
  stratifyAsync,
  type StratumLevels,
  type StratumRunner,
} from '../packages/engine/stratifier.js';
import { resolveTableConfig } from '../packages/engine/config.js';
import { withMissingCategory } from '../packages/engine/recoder.js';
import {
  MISSING,
  errorsOf,
  tablesOf,
  type StratifiedTableSet,
  type StratumEntry,
} from '../packages/engine/table-spec.js';
import {
  ConfigError,
  EmptyLevelSetError,
  UnknownCategoryError,
} from '../packages/engine/errors.js';
import { record } from './fixtures/handedness.js';

const LEVELS: StratumLevels = {
  rows: { variable: 'gender', levels: ['Male', 'Female'] },
  cols: { variable: 'hand', levels: ['Right', 'Left'] },
  strata: { variable: 'site', levels: ['A', 'B', 'C'] },
};

const CONFIG = resolveTableConfig({
  rowVar: 'gender',
  colVar: 'hand',
  stratVar: 'site',
  margins: ['row', 'col'],
  pctAxis: 'row',
});

// B appears first in the data; C never appears
const RECORDS = [
  record('Male', 'Left', 'B'),
  record('Male', 'Right', 'A'),
  record('Male', 'Right', 'A'),
  record('Female', 'Left', 'A'),
];

function strata(set: StratifiedTableSet): string[] {
  return set.entries.map(e => e.stratum);
}

function cellsOf(entry: StratumEntry): readonly (readonly string[])[] {
  if (entry.status !== 'ok') throw new Error(`stratum ${entry.stratum} failed`);
  return entry.table.cells;
}

describe('stratify', () => {
  it('builds one table per stratum present, in level order', () => {
    const set = stratify(RECORDS, LEVELS, CONFIG);

    expect(set.variable).toBe('site');
    expect(strata(set)).toEqual(['A', 'B']);
    expect(cellsOf(set.entries[0])).toEqual([
      ['100%', '0%', '100%'],
      ['0%', '100%', '100%'],
      ['67%', '33%', '100%'],
    ]);
    expect(cellsOf(set.entries[1])).toEqual([
      ['0%', '100%', '100%'],
      ['0%', '0%', '0%'],
      ['0%', '100%', '100%'],
    ]);
  });

  it('tags each table and matrix with its stratum', () => {
    const tables = tablesOf(stratify(RECORDS, LEVELS, CONFIG));
    expect([...tables.keys()]).toEqual(['A', 'B']);
    expect(tables.get('A')?.table.stratum).toBe('A');
    expect(tables.get('A')?.matrix.source.stratum).toBe('A');
  });

  it('matches building the partition on its own', () => {
    const set = stratify(RECORDS, LEVELS, CONFIG);
    const alone = buildTable(RECORDS.slice(1), LEVELS, CONFIG, 'A');
    expect(tablesOf(set).get('A')).toEqual(alone);
  });

  it('keeps the other strata when one fails', () => {
    const records = [...RECORDS, record('Other', 'Right', 'B')];
    const set = stratify(records, LEVELS, CONFIG);

    expect(strata(set)).toEqual(['A', 'B']);
    expect(set.entries[0].status).toBe('ok');

    const error = errorsOf(set).get('B');
    expect(error).toBeInstanceOf(UnknownCategoryError);
    expect(error?.message).toBe("Unknown category 'Other' for 'gender' at index 1 (stratum 'B')");
    expect(error?.context.stratum).toBe('B');
  });

  it('appends unknown strata as error entries', () => {
    const records = [record('Male', 'Right', 'Z'), ...RECORDS];
    const set = stratify(records, LEVELS, CONFIG);

    expect(strata(set)).toEqual(['A', 'B', 'Z']);
    const error = errorsOf(set).get('Z');
    expect(error).toBeInstanceOf(UnknownCategoryError);
    expect(error?.message).toBe("Unknown stratum 'Z' for 'site'");
  });

  it('excludes records with a missing stratum by default', () => {
    const records = [...RECORDS, record('Female', 'Right', MISSING)];
    const set = stratify(records, LEVELS, CONFIG);
    expect(strata(set)).toEqual(['A', 'B']);
  });

  it('puts missing strata last under own_category', () => {
    const config = resolveTableConfig({ ...CONFIG, missingPolicy: 'own_category' });
    const levels: StratumLevels = {
      ...LEVELS,
      strata: withMissingCategory(LEVELS.strata, 'Missing'),
    };
    const records = [record('Female', 'Right', MISSING), ...RECORDS];
    const set = stratify(records, levels, config);

    expect(strata(set)).toEqual(['A', 'B', 'Missing']);
    expect(cellsOf(set.entries[2])[1]).toEqual(['100%', '0%', '100%']);
  });

  it('requires a stratification variable', () => {
    const config = resolveTableConfig({ rowVar: 'gender', colVar: 'hand' });
    expect(() => stratify(RECORDS, LEVELS, config)).toThrow(ConfigError);
  });

  it('rejects an empty stratum level set', () => {
    const levels: StratumLevels = { ...LEVELS, strata: { variable: 'site', levels: [] } };
    expect(() => stratify(RECORDS, levels, CONFIG)).toThrow(EmptyLevelSetError);
  });
});

describe('stratifyAsync', () => {
  it('produces the same set as stratify', async () => {
    const records = [...RECORDS, record('Other', 'Right', 'B')];
    const sync = stratify(records, LEVELS, CONFIG);
    const concurrent = await stratifyAsync(records, LEVELS, CONFIG);
    expect(strata(concurrent)).toEqual(strata(sync));
    expect(tablesOf(concurrent)).toEqual(tablesOf(sync));
    expect(errorsOf(concurrent).get('B')?.message).toBe(errorsOf(sync).get('B')?.message);
  });

  it('reassembles in level order regardless of completion order', async () => {
    const completed: number[] = [];
    let calls = 0;

    // the first task finishes last
    const runner: StratumRunner = async <T>(task: () => T): Promise<T> => {
      const id = calls++;
      await new Promise<void>(resolve => setTimeout(() => resolve(), id === 0 ? 20 : 0));
      const result = task();
      completed.push(id);
      return result;
    };

    const set = await stratifyAsync(RECORDS, LEVELS, CONFIG, { runner });

    expect(completed).toEqual([1, 0]);
    expect(strata(set)).toEqual(['A', 'B']);
    expect(set.entries.every(e => e.status === 'ok')).toBe(true);
  });

  it('propagates errors that are not engine errors', async () => {
    const runner: StratumRunner = () => Promise.reject(new TypeError('worker crashed'));
    await expect(stratifyAsync(RECORDS, LEVELS, CONFIG, { runner })).rejects.toThrow(TypeError);
  });
});
