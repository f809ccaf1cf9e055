import fs from 'fs';
import os from 'os';
import path from 'path';
import { CsvTable, readCsvFile, writeCsvFile } from '../csvTable';
import { InputNotFoundError, MissingColumnError, SchemaMismatchError } from '../errors';
import { mergeCsvFolder, mergeTables, wildcardToRegExp } from '../tableMerger';

function table(source: string, header: string[], rows: string[][]): CsvTable {
  return {
    source,
    header,
    rows: rows.map(row => Object.fromEntries(header.map((column, i) => [column, row[i] ?? '']))),
  };
}

describe('mergeTables', () => {
  it('reorders columns to the first table', () => {
    const merged = mergeTables([
      table('a.csv', ['name', 'amount'], [['POMMES', '4.38']]),
      table('b.csv', ['amount', 'name'], [['2.00', 'POIRES']]),
    ]);

    expect(merged).toEqual({
      header: ['name', 'amount'],
      rows: [['POMMES', '4.38'], ['POIRES', '2.00']],
      files: 2,
      inputRows: 2,
    });
  });

  it('rejects tables with a different column set', () => {
    const tables = [
      table('a.csv', ['name', 'amount'], [['POMMES', '4.38']]),
      table('b.csv', ['name', 'price'], [['POIRES', '2.00']]),
    ];

    expect(() => mergeTables(tables)).toThrow(SchemaMismatchError);
    expect(() => mergeTables(tables)).toThrow(/Columns of 'b.csv' differ from the first file/);
  });

  it('skips tables without a header', () => {
    const merged = mergeTables([
      table('empty.csv', [], []),
      table('a.csv', ['name'], [['POMMES']]),
    ]);

    expect(merged.header).toEqual(['name']);
    expect(merged.files).toBe(1);
  });

  it('removes exact duplicates and keeps the first occurrence', () => {
    const tables = [
      table('a.csv', ['name', 'amount'], [['POMMES', '4.38'], ['PAIN', '1.20']]),
      table('b.csv', ['name', 'amount'], [['POMMES', '4.38'], ['POMMES', '4.39']]),
    ];

    expect(mergeTables(tables, { dedupe: true }).rows).toEqual([
      ['POMMES', '4.38'],
      ['PAIN', '1.20'],
      ['POMMES', '4.39'],
    ]);
    expect(mergeTables(tables).rows).toHaveLength(4);
  });

  it('sorts by a column, keeping the order of equal keys', () => {
    const merged = mergeTables(
      [table('a.csv', ['name', 'amount'], [['b', '1'], ['a', '2'], ['b', '0']])],
      { sortBy: 'name' }
    );

    expect(merged.rows).toEqual([['a', '2'], ['b', '1'], ['b', '0']]);
  });

  it('fails when the sort column is missing', () => {
    const tables = [table('a.csv', ['name'], [['POMMES']])];
    expect(() => mergeTables(tables, { sortBy: 'date' })).toThrow(MissingColumnError);
  });
});

describe('wildcardToRegExp', () => {
  it('matches shell-style patterns against whole names', () => {
    expect(wildcardToRegExp('*.csv').test('invoices.csv')).toBe(true);
    expect(wildcardToRegExp('*.csv').test('invoices.csv.bak')).toBe(false);
    expect(wildcardToRegExp('mai-?.csv').test('mai-1.csv')).toBe(true);
    expect(wildcardToRegExp('mai-?.csv').test('mai-10.csv')).toBe(false);
  });
});

describe('mergeCsvFolder', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'merge-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('merges the matching files of a folder', () => {
    writeCsvFile(path.join(tmpDir, 'b.csv'), [['name', 'amount'], ['POIRES', '2.00']]);
    writeCsvFile(path.join(tmpDir, 'a.csv'), [['amount', 'name'], ['4.38', 'POMMES']]);
    fs.writeFileSync(path.join(tmpDir, 'notes.txt'), 'not a table');
    const output = path.join(tmpDir, 'out', 'merged.csv');

    const result = mergeCsvFolder(tmpDir, output, { sortBy: 'name' });

    expect(result.outputPath).toBe(path.resolve(output));
    expect(result.files).toBe(2);
    expect(readCsvFile(output)).toEqual({
      source: 'merged.csv',
      header: ['amount', 'name'],
      rows: [
        { amount: '2.00', name: 'POIRES' },
        { amount: '4.38', name: 'POMMES' },
      ],
    });
  });

  it('counts rows of empty cells as data rows', () => {
    fs.writeFileSync(path.join(tmpDir, 'a.csv'), 'name,amount\nPOMMES,4.38\n,\n\nPAIN,1.20\n');

    const result = mergeCsvFolder(tmpDir, path.join(tmpDir, 'out', 'merged.csv'));

    expect(result.inputRows).toBe(3);
    expect(result.rows).toEqual([['POMMES', '4.38'], ['', ''], ['PAIN', '1.20']]);
  });

  it('writes nothing when the schemas differ', () => {
    writeCsvFile(path.join(tmpDir, 'a.csv'), [['name', 'amount'], ['POMMES', '4.38']]);
    writeCsvFile(path.join(tmpDir, 'b.csv'), [['name'], ['POIRES']]);
    const output = path.join(tmpDir, 'out', 'merged.csv');

    expect(() => mergeCsvFolder(tmpDir, output)).toThrow(SchemaMismatchError);
    expect(fs.existsSync(output)).toBe(false);
  });

  it('reports a missing folder or no matching file', () => {
    expect(() => mergeCsvFolder(path.join(tmpDir, 'missing'))).toThrow(InputNotFoundError);
    expect(() => mergeCsvFolder(tmpDir, path.join(tmpDir, 'merged.csv'))).toThrow(/No file matches '\*\.csv'/);
  });
});
