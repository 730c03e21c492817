/**
 * Test suite for compiling parsed statements into recodings and table configs
 */

import { describe, it, expect } from 'vitest';
import { parseProgram } from '../packages/parser/index.js';
import { compileProgram, compileTable } from '../packages/engine/compile.js';
import { ConfigError } from '../packages/engine/errors.js';
import { MISSING } from '../packages/engine/table-spec.js';

const WORKED = `
RECODE gender AS "Gender" ('M' => 'Male', 'F' => 'Female');
RECODE hand AS "Handedness" ('R' => 'Right', 'L' => 'Left');
TABLE ROWS gender COLS hand OPTIONS margins:both pct:row counts:true;
`;

describe('compileProgram', () => {
  it('compiles recodings keyed by variable', () => {
    const { recodings } = compileProgram(parseProgram(WORKED));
    expect([...recodings.keys()]).toEqual(['gender', 'hand']);
    expect(recodings.get('gender')).toEqual({
      rules: [
        { match: 'M', label: 'Male' },
        { match: 'F', label: 'Female' },
      ],
      onUnmapped: 'error',
      levels: undefined,
      label: 'Gender',
    });
  });

  it('resolves each table statement', () => {
    const { tables } = compileProgram(parseProgram(WORKED));
    expect(tables).toEqual([
      {
        rowVar: 'gender',
        colVar: 'hand',
        stratVar: undefined,
        margins: ['row', 'col'],
        pctAxis: 'row',
        digits: 0,
        showCounts: true,
        missingPolicy: 'exclude',
        missingLabel: 'Missing',
        totalLabel: 'Total',
      },
    ]);
  });

  it('applies defaults under statement options', () => {
    const { tables } = compileProgram(
      parseProgram('TABLE ROWS a COLS b OPTIONS digits:2;'),
      { digits: 1, pctAxis: 'cell', totalLabel: 'All' }
    );
    expect(tables[0]).toMatchObject({ digits: 2, pctAxis: 'cell', totalLabel: 'All' });
  });

  it('compiles comparison, missing and unmapped rules', () => {
    const { recodings } = compileProgram(
      parseProgram(
        `RECODE age (< 30 => 'Young', MISSING => 'Unknown') UNMAPPED 'Older' LEVELS ('Young', 'Older', 'Unknown');`
      )
    );
    const spec = recodings.get('age');
    expect(spec?.onUnmapped).toEqual({ labelAs: 'Older' });
    expect(spec?.levels).toEqual(['Young', 'Older', 'Unknown']);
    expect(spec?.label).toBeUndefined();

    const [young, missing] = spec?.rules ?? [];
    expect(missing.match).toBe(MISSING);
    const match = young.match;
    if (typeof match !== 'function') throw new Error('expected a predicate');
    expect(match(29)).toBe(true);
    expect(match('29.5')).toBe(true);
    expect(match(30)).toBe(false);
  });

  it('maps UNMAPPED DROP and ERROR', () => {
    const { recodings } = compileProgram(
      parseProgram(`RECODE a ('x' => 'X') UNMAPPED DROP; RECODE b (1 => 'One') UNMAPPED ERROR;`)
    );
    expect(recodings.get('a')?.onUnmapped).toBe('drop');
    expect(recodings.get('b')?.onUnmapped).toBe('error');
    expect(recodings.get('b')?.rules[0].match).toBe(1);
  });

  it('rejects a variable recoded twice', () => {
    const program = parseProgram(`RECODE a ('x' => 'X'); RECODE a ('y' => 'Y');`);
    expect(() => compileProgram(program)).toThrow(ConfigError);
    expect(() => compileProgram(program)).toThrow("Variable 'a' is recoded more than once");
  });

  it('rejects a stratification variable that is also a dimension', () => {
    expect(() => compileProgram(parseProgram('TABLE ROWS a COLS b BY a;'))).toThrow(ConfigError);
  });
});

describe('compileTable', () => {
  it.each([
    ['none', []],
    ['row', ['row']],
    ['col', ['col']],
    ['both', ['row', 'col']],
  ])('maps margins:%s', (margins, expected) => {
    const [statement] = parseProgram(`TABLE ROWS a COLS b OPTIONS margins:${margins};`).statements;
    if (statement.type !== 'table') throw new Error('expected a table');
    expect(compileTable(statement).margins).toEqual(expected);
  });

  it('maps missing, labels and the stratification variable', () => {
    const [statement] = parseProgram(
      `TABLE ROWS a COLS b BY c OPTIONS missing:own missingLabel:'N/A' total:'All';`
    ).statements;
    if (statement.type !== 'table') throw new Error('expected a table');
    expect(compileTable(statement)).toEqual({
      rowVar: 'a',
      colVar: 'b',
      stratVar: 'c',
      missingPolicy: 'own_category',
      missingLabel: 'N/A',
      totalLabel: 'All',
    });
  });

  it('keeps defaults the statement leaves out', () => {
    const [statement] = parseProgram('TABLE ROWS a COLS b OPTIONS missing:exclude;').statements;
    if (statement.type !== 'table') throw new Error('expected a table');
    expect(compileTable(statement, { missingPolicy: 'own_category', showCounts: true })).toEqual({
      rowVar: 'a',
      colVar: 'b',
      missingPolicy: 'exclude',
      showCounts: true,
    });
  });
});
