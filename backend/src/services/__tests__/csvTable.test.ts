import fs from 'fs';
import os from 'os';
import path from 'path';
import { decodeText, dropBlankLines, parseCsv, readCsvBuffer, readCsvFile, toTable, writeCsvFile } from '../csvTable';

describe('decodeText', () => {
  it('reads UTF-8 and drops a byte order mark', () => {
    const buffer = Buffer.concat([Buffer.from([0xef, 0xbb, 0xbf]), Buffer.from('prix,€', 'utf-8')]);
    expect(decodeText(buffer)).toBe('prix,€');
  });

  it('falls back to Latin-1 for invalid UTF-8', () => {
    expect(decodeText(Buffer.from([0x63, 0x61, 0x66, 0xe9]))).toBe('café');
  });
});

describe('parseCsv', () => {
  it('keeps every cell as text', () => {
    expect(parseCsv('name,amount,date\nPOMMES,4.70,12/05/2024\n')).toEqual([
      ['name', 'amount', 'date'],
      ['POMMES', '4.70', '12/05/2024'],
    ]);
  });

  it('handles quoted cells', () => {
    expect(parseCsv('name,amount\n"POMMES, BIO",4.70\n')).toEqual([
      ['name', 'amount'],
      ['POMMES, BIO', '4.70'],
    ]);
  });

  it('keeps rows whose cells are all empty', () => {
    expect(parseCsv('a,b,c\n,,\nx,,\n')).toEqual([
      ['a', 'b', 'c'],
      ['', '', ''],
      ['x', '', ''],
    ]);
  });

  it('skips empty lines', () => {
    expect(parseCsv('a,b\n\n1,2\r\n\r\n3,4\n')).toEqual([
      ['a', 'b'],
      ['1', '2'],
      ['3', '4'],
    ]);
  });

  it('returns nothing for an empty file', () => {
    expect(parseCsv('')).toEqual([]);
    expect(parseCsv('  \n')).toEqual([]);
  });
});

describe('dropBlankLines', () => {
  it('keeps empty lines inside a quoted cell', () => {
    expect(dropBlankLines('name,note\n\n"A","line one\n\nline two"\n')).toBe('name,note\n"A","line one\n\nline two"');
  });
});

describe('readCsvBuffer', () => {
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    warnSpy.mockRestore();
  });

  it('warns when a non-empty file has no header', () => {
    const table = readCsvBuffer('page.csv', Buffer.from('<b>name</b>,amount\nPAIN,1.20\n'));

    expect(table).toEqual({ source: 'page.csv', header: [], rows: [] });
    expect(warnSpy).toHaveBeenCalledWith('[csv] page.csv: no CSV header found');
  });

  it('stays quiet for an empty file', () => {
    expect(readCsvBuffer('empty.csv', Buffer.from('')).header).toEqual([]);
    expect(warnSpy).not.toHaveBeenCalled();
  });
});

describe('toTable', () => {
  it('keys rows by header and fills missing cells', () => {
    expect(toTable('a.csv', [['name', 'amount'], ['POMMES']])).toEqual({
      source: 'a.csv',
      header: ['name', 'amount'],
      rows: [{ name: 'POMMES', amount: '' }],
    });
  });

  it('has an empty header when there are no rows', () => {
    expect(toTable('empty.csv', [])).toEqual({ source: 'empty.csv', header: [], rows: [] });
  });
});

describe('writeCsvFile / readCsvFile', () => {
  it('reads back what it wrote', () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'csv-table-'));
    try {
      const file = path.join(tmpDir, 'nested', 'table.csv');
      writeCsvFile(file, [
        ['name', 'amount'],
        ['POMMES, BIO', '4.70'],
        ['PAIN', '-1.20'],
      ]);

      expect(readCsvFile(file)).toEqual({
        source: 'table.csv',
        header: ['name', 'amount'],
        rows: [
          { name: 'POMMES, BIO', amount: '4.70' },
          { name: 'PAIN', amount: '-1.20' },
        ],
      });
    } finally {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    }
  });
});
