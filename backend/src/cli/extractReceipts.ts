#!/usr/bin/env node
import { parseArgs } from 'util';
import { errorMessage } from '../services/errors';
import { extractPdfText, TextExtractor } from '../services/pdfText';
import { collectPdfPaths, extractReceipts, writeReceiptCsv } from '../services/receiptBatch';

const USAGE = `Usage: extract-receipts <input> [-o|--output invoices.csv]

Extract receipt lines from a PDF file, or from every PDF below a directory, into one CSV.`;

export interface ExtractArgs {
  input: string;
  output: string;
}

export function parseExtractArgs(argv: string[]): ExtractArgs {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      output: { type: 'string', short: 'o', default: 'invoices.csv' },
    },
  });

  const [input] = positionals;
  if (!input || positionals.length > 1) {
    throw new Error(USAGE);
  }
  return { input, output: values.output ?? 'invoices.csv' };
}

export async function runExtract(argv: string[], extractText: TextExtractor = extractPdfText): Promise<number> {
  try {
    const args = parseExtractArgs(argv);
    const paths = collectPdfPaths(args.input);
    const documents = await extractReceipts(paths, extractText);
    const written = writeReceiptCsv(documents, args.output);

    const rows = documents.reduce((acc, doc) => acc + doc.records.length, 0);
    const failed = documents.filter(doc => doc.error !== null).length;
    console.log(`Extracted ${rows} rows from ${documents.length - failed}/${documents.length} PDFs -> ${written}`);
    return 0;
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
    return 1;
  }
}

if (require.main === module) {
  runExtract(process.argv.slice(2)).then(
    code => process.exit(code),
    error => {
      console.error(error);
      process.exit(1);
    }
  );
}
