import fs from 'fs';
import path from 'path';
import { createLogger } from '../utils/logger';
import { CsvTable, readCsvFile, writeCsvFile } from './csvTable';
import { InputNotFoundError, MissingColumnError, SchemaMismatchError } from './errors';

const log = createLogger('merge');

export interface MergeOptions {
  /** Drop rows identical to an earlier row. */
  dedupe?: boolean;
  /** Column to sort the merged rows by (stable, plain string order). */
  sortBy?: string | null;
}

export interface MergedTable {
  header: string[];
  rows: string[][];
  /** Tables that contributed rows (tables without a header are skipped). */
  files: number;
  /** Data rows read, before deduplication. */
  inputRows: number;
}

export interface MergeFolderResult extends MergedTable {
  outputPath: string;
}

function sameColumnSet(a: string[], b: string[]): boolean {
  const setA = new Set(a);
  const setB = new Set(b);
  return setA.size === setB.size && [...setA].every(column => setB.has(column));
}

function dedupeRows(rows: string[][]): string[][] {
  const seen = new Set<string>();
  return rows.filter(row => {
    const key = JSON.stringify(row);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

/**
 * Merge tables that share the same set of columns. Column order comes from
 * the first table with a header. Throws before producing anything when a
 * table's columns differ or the sort column does not exist.
 */
export function mergeTables(tables: CsvTable[], options: MergeOptions = {}): MergedTable {
  let header: string[] = [];
  let rows: string[][] = [];
  let files = 0;
  let inputRows = 0;

  for (const table of tables) {
    if (table.header.length === 0) {
      log.debug(`skipping ${table.source}: no header`);
      continue;
    }

    if (header.length === 0) {
      header = [...table.header];
    } else if (!sameColumnSet(table.header, header)) {
      throw new SchemaMismatchError(table.source, table.header, header);
    }

    for (const record of table.rows) {
      rows.push(header.map(column => record[column] ?? ''));
    }
    files++;
    inputRows += table.rows.length;
  }

  if (options.dedupe) {
    rows = dedupeRows(rows);
  }

  if (options.sortBy) {
    const idx = header.indexOf(options.sortBy);
    if (idx === -1) {
      throw new MissingColumnError(options.sortBy, header);
    }
    rows.sort((a, b) => (a[idx] < b[idx] ? -1 : a[idx] > b[idx] ? 1 : 0));
  }

  return { header, rows, files, inputRows };
}

/** Convert a shell-style wildcard (`*`, `?`) into an anchored RegExp. */
export function wildcardToRegExp(pattern: string): RegExp {
  const source = pattern
    .split('')
    .map(ch => {
      if (ch === '*') return '.*';
      if (ch === '?') return '.';
      return ch.replace(/[.+^${}()|[\]\\]/g, '\\$&');
    })
    .join('');
  return new RegExp(`^${source}$`);
}

export function listMatchingFiles(folderPath: string, pattern = '*.csv'): string[] {
  const stat = fs.statSync(folderPath, { throwIfNoEntry: false });
  if (!stat?.isDirectory()) {
    throw new InputNotFoundError(`Folder not found: ${folderPath}`);
  }

  const matcher = wildcardToRegExp(pattern);
  const paths = fs.readdirSync(folderPath, { withFileTypes: true })
    .filter(entry => entry.isFile() && matcher.test(entry.name))
    .map(entry => path.join(folderPath, entry.name))
    .sort();

  if (paths.length === 0) {
    throw new InputNotFoundError(`No file matches '${pattern}' in ${folderPath}`);
  }
  return paths;
}

/**
 * Merge every CSV in a folder into one file. Nothing is written when the
 * merge fails.
 */
export function mergeCsvFolder(
  folderPath: string,
  outputPath = 'merged.csv',
  options: MergeOptions & { pattern?: string } = {}
): MergeFolderResult {
  const paths = listMatchingFiles(folderPath, options.pattern);
  const tables = paths.map(readCsvFile);
  const merged = mergeTables(tables, options);

  const written = writeCsvFile(outputPath, [merged.header, ...merged.rows]);
  log.debug(`merged ${merged.files} files (${merged.rows.length} rows) -> ${written}`);

  return { ...merged, outputPath: written };
}
