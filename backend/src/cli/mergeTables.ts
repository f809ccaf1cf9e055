#!/usr/bin/env node
import { parseArgs } from 'util';
import { errorMessage } from '../services/errors';
import { mergeCsvFolder } from '../services/tableMerger';

const USAGE = `Usage: merge-tables <folder> <output> [--pattern *.csv] [--dedupe] [--sort-by <column>]

Merge every CSV of a folder (same columns) into a single CSV.`;

export interface MergeArgs {
  folder: string;
  output: string;
  pattern: string;
  dedupe: boolean;
  sortBy: string | null;
}

export function parseMergeArgs(argv: string[]): MergeArgs {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      pattern: { type: 'string', default: '*.csv' },
      dedupe: { type: 'boolean', default: false },
      'sort-by': { type: 'string' },
    },
  });

  const [folder, output] = positionals;
  if (!folder || !output || positionals.length > 2) {
    throw new Error(USAGE);
  }
  return {
    folder,
    output,
    pattern: values.pattern ?? '*.csv',
    dedupe: values.dedupe ?? false,
    sortBy: values['sort-by'] ?? null,
  };
}

export function runMerge(argv: string[]): number {
  try {
    const args = parseMergeArgs(argv);
    const result = mergeCsvFolder(args.folder, args.output, {
      pattern: args.pattern,
      dedupe: args.dedupe,
      sortBy: args.sortBy,
    });
    console.log(`Merged ${result.files} files (${result.rows.length} rows) -> ${result.outputPath}`);
    return 0;
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
    return 1;
  }
}

if (require.main === module) {
  process.exit(runMerge(process.argv.slice(2)));
}
