/** Output column headers, in order. */
export const RECEIPT_COLUMNS = ['name', 'type', 'price-kg', 'QTE x P.U', 'amount', 'date'] as const;

export interface PendingWeightPrice {
  weight: string;
  unitPrice: string;
}

export interface ProductRecord {
  readonly name: string;
  /** Product category; not extracted yet, always empty. */
  readonly type: string;
  readonly priceKg: string;
  readonly qtyTimesUnit: string;
  readonly amount: string;
  /** dd/mm/yyyy, or empty when the receipt carries no date. */
  readonly date: string;
}

export interface ProductEntry {
  name: string;
  qtyTimesUnit: string;
  amount: string;
  /** Discount/adjustment rows consume pending weight context but never become records. */
  discount: boolean;
}

export type LineClassification =
  | { kind: 'blank' }
  | { kind: 'weight-price'; weightPrice: PendingWeightPrice }
  | { kind: 'noise'; prefix: string }
  | { kind: 'product'; entry: ProductEntry }
  | { kind: 'unrecognized'; line: string };

/** A product entry paired with the weight-price context it consumed ('' when none). */
export interface AssociatedEntry {
  entry: ProductEntry;
  priceKg: string;
}

export interface ReceiptDocument {
  source: string;
  date: string | null;
  /** Set when a date matched but was not a valid calendar date. */
  dateError: string | null;
  /** Set when the document could not be read at all. */
  error: string | null;
  records: ProductRecord[];
}
