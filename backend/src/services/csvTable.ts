import fs from 'fs';
import path from 'path';
import * as XLSX from 'xlsx';
import { createLogger } from '../utils/logger';

const log = createLogger('csv');

export interface CsvTable {
  source: string;
  header: string[];
  rows: Record<string, string>[];
}

/** Decode file bytes as UTF-8, falling back to Latin-1 when they are not valid UTF-8. */
export function decodeText(buffer: Buffer): string {
  try {
    const text = new TextDecoder('utf-8', { fatal: true }).decode(buffer);
    return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  } catch {
    return buffer.toString('latin1');
  }
}

export function toCsv(rows: string[][]): string {
  const sheet = XLSX.utils.aoa_to_sheet(rows);
  const csv = XLSX.utils.sheet_to_csv(sheet, { FS: ',', RS: '\n', blankrows: true });
  return csv ? `${csv}\n` : '';
}

/**
 * Remove zero-length lines outside quoted cells. A `,,` line is a row of
 * empty cells and stays; an empty line is no row at all.
 */
export function dropBlankLines(text: string): string {
  const kept: string[] = [];
  let inQuotes = false;

  for (const line of text.split('\n')) {
    if (!inQuotes && (line === '' || line === '\r')) continue;
    kept.push(line);
    if ((line.split('"').length - 1) % 2 === 1) inQuotes = !inQuotes;
  }

  return kept.join('\n');
}

export function parseCsv(text: string): string[][] {
  const content = dropBlankLines(text);
  if (!content.trim()) return [];

  // raw: keep every cell as text, no number/date guessing
  const workbook = XLSX.read(content, { type: 'string', raw: true });
  const sheetName = workbook.SheetNames[0];
  if (!sheetName) return [];

  const rows = XLSX.utils.sheet_to_json<unknown[]>(workbook.Sheets[sheetName], {
    header: 1,
    defval: '',
    blankrows: true,
    raw: false,
  })
    .map(row => row.map(cell => (cell === null || cell === undefined ? '' : String(cell))));

  // Input that is not read as CSV (e.g. starting with '<') comes back with no text at all
  return rows.some(row => row.some(cell => cell !== '')) ? rows : [];
}

/** Turn parsed CSV rows into a header plus one record per data row, keyed by column name. */
export function toTable(source: string, cells: string[][]): CsvTable {
  const [headerRow, ...dataRows] = cells;
  const header = headerRow ?? [];
  const rows = dataRows.map(row => {
    const record: Record<string, string> = {};
    header.forEach((column, i) => {
      record[column] = row[i] ?? '';
    });
    return record;
  });
  return { source, header, rows };
}

export function readCsvBuffer(source: string, buffer: Buffer): CsvTable {
  const text = decodeText(buffer);
  const table = toTable(source, parseCsv(text));
  if (table.header.length === 0 && text.trim()) {
    log.warn(`${source}: no CSV header found`);
  }
  return table;
}

export function readCsvFile(filePath: string): CsvTable {
  return readCsvBuffer(path.basename(filePath), fs.readFileSync(filePath));
}

/** Write rows as CSV, creating the parent directory. Returns the absolute path written. */
export function writeCsvFile(outputPath: string, rows: string[][]): string {
  const absolute = path.resolve(outputPath);
  fs.mkdirSync(path.dirname(absolute), { recursive: true });
  fs.writeFileSync(absolute, toCsv(rows), 'utf-8');
  return absolute;
}
