import { AssociatedEntry, PendingWeightPrice, ProductRecord, ReceiptDocument } from '../types/receipt';
import { resolveReceiptDate } from './dateExtractor';
import { classifyLine, formatWeightPrice } from './lineClassifier';

/**
 * Pair product lines with the weight-price lines seen before them.
 *
 * Weight-price values queue up in order and each matched product line takes
 * the oldest one, even a discount line that is dropped afterwards. Values left
 * in the queue at the end of the document are discarded. The queue belongs to
 * this call, so documents never share state.
 */
export function associateEntries(lines: Iterable<string>): AssociatedEntry[] {
  const pending: PendingWeightPrice[] = [];
  const entries: AssociatedEntry[] = [];

  for (const raw of lines) {
    const classified = classifyLine(raw);

    switch (classified.kind) {
      case 'weight-price':
        pending.push(classified.weightPrice);
        break;
      case 'product': {
        const next = pending.shift();
        if (classified.entry.discount) break;
        entries.push({
          entry: classified.entry,
          priceKg: next ? formatWeightPrice(next) : '',
        });
        break;
      }
      case 'blank':
      case 'noise':
      case 'unrecognized':
        break;
    }
  }

  return entries;
}

/** Stamp the document date on every entry, keeping document order. */
export function assembleRecords(entries: AssociatedEntry[], date: string | null): ProductRecord[] {
  return entries.map(({ entry, priceKg }) => ({
    name: entry.name,
    type: '',
    priceKg,
    qtyTimesUnit: entry.qtyTimesUnit,
    amount: entry.amount,
    date: date ?? '',
  }));
}

export function parseReceiptLines(lines: Iterable<string>, invoiceDate: string | null): ProductRecord[] {
  return assembleRecords(associateEntries(lines), invoiceDate);
}

/**
 * Parse the full text of one receipt. The date is resolved once from the
 * whole text; an invalid date is reported in `dateError` and the records
 * are still produced, with an empty date.
 */
export function parseReceiptText(text: string, source = ''): ReceiptDocument {
  const { date, error } = resolveReceiptDate(text);
  return {
    source,
    date,
    dateError: error,
    error: null,
    records: parseReceiptLines(text.split('\n'), date),
  };
}
