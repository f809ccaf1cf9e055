/**
 * Decimal and whitespace normalization for receipt text.
 * Receipts mix `12,50` and `12.50`; everything downstream uses `.`.
 */

export function normalizeDecimal(token: string): string {
  return token.replace(/,/g, '.');
}

/**
 * Weights are printed with gram precision (`0,350`); trailing zeros of the
 * fraction are dropped so `0.350` renders as `0.35` and `1.000` as `1`.
 */
export function normalizeWeight(token: string): string {
  const normalized = normalizeDecimal(token);
  if (!normalized.includes('.')) return normalized;
  return normalized.replace(/0+$/, '').replace(/\.$/, '');
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s{2,}/g, ' ');
}
