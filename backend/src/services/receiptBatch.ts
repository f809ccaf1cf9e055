import fs from 'fs';
import path from 'path';
import { ReceiptDocument, ProductRecord, RECEIPT_COLUMNS } from '../types/receipt';
import { createLogger } from '../utils/logger';
import { errorMessage, InputNotFoundError } from './errors';
import type { TextExtractor } from './pdfText';
import { parseReceiptText } from './receiptParser';
import { writeCsvFile } from './csvTable';

const log = createLogger('receipts');

function isPdf(fileName: string): boolean {
  return fileName.toLowerCase().endsWith('.pdf');
}

function walkPdfs(dir: string, out: string[]): void {
  for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      walkPdfs(fullPath, out);
    } else if (entry.isFile() && isPdf(entry.name)) {
      out.push(fullPath);
    }
  }
}

/**
 * Resolve the input to a sorted list of PDF paths: a directory is walked
 * recursively, a single .pdf file is taken as is.
 */
export function collectPdfPaths(input: string): string[] {
  const stat = fs.statSync(input, { throwIfNoEntry: false });

  if (stat?.isDirectory()) {
    const paths: string[] = [];
    walkPdfs(input, paths);
    return paths.sort();
  }
  if (stat?.isFile() && isPdf(input)) {
    return [input];
  }
  throw new InputNotFoundError(`Provide a PDF file or a directory containing PDFs: ${input}`);
}

/**
 * Parse every document independently. A document that cannot be read is
 * logged and kept with zero records; it never stops the batch.
 */
export async function extractReceipts(paths: string[], extractText: TextExtractor): Promise<ReceiptDocument[]> {
  const documents: ReceiptDocument[] = [];

  for (const filePath of paths) {
    try {
      const text = await extractText(filePath);
      const document = parseReceiptText(text, filePath);
      if (document.dateError) {
        log.warn(`${filePath}: ${document.dateError}`);
      }
      log.debug(`parsed ${filePath}: ${document.records.length} rows`);
      documents.push(document);
    } catch (error) {
      const message = errorMessage(error);
      log.warn(`failed to parse ${filePath}: ${message}`);
      documents.push({ source: filePath, date: null, dateError: null, error: message, records: [] });
    }
  }

  return documents;
}

export function recordToRow(record: ProductRecord): string[] {
  return [record.name, record.type, record.priceKg, record.qtyTimesUnit, record.amount, record.date];
}

export function receiptTable(documents: ReceiptDocument[]): string[][] {
  const rows: string[][] = [[...RECEIPT_COLUMNS]];
  for (const document of documents) {
    for (const record of document.records) {
      rows.push(recordToRow(record));
    }
  }
  return rows;
}

export function writeReceiptCsv(documents: ReceiptDocument[], outputPath: string): string {
  return writeCsvFile(outputPath, receiptTable(documents));
}
