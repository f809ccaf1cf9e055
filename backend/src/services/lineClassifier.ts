import { LineClassification, PendingWeightPrice } from '../types/receipt';
import { collapseWhitespace, normalizeDecimal, normalizeWeight } from './textNormalizer';

// "0.350 kg x 12,50 €/kg"
export const WEIGHT_PRICE_RE =
  /^\s*(?<weight>\d+(?:[.,]\d+)?)\s*kg\s*x\s*(?<price>\d+(?:[.,]\d+)?)\s*€\s*\/\s*kg\s*$/i;

// "5.5% CHISTORRA REFLETS 1 x 4.70 4.70"
export const PRODUCT_RE =
  /^\s*(?:(?:\d{1,2}(?:[.,]\d)?|\d{1,2})\s*%|\d{1,2}\.\d{1,2}\s*%)?\s*(?<name>.+?)\s+(?<qty>\d+)\s*x\s*(?<unit>\d+(?:[.,]\d{1,2})?)\s+(?<amount>-?\d+(?:[.,]\d{1,2})?)\s*$/i;

const LEADING_PERCENT_RE = /^\s*\d{1,2}(?:[.,]\d{1,2})?\s*%\s*/;

/** Lines starting with one of these (lowercased) carry no item data. */
export const NOISE_PREFIXES: readonly string[] = [
  'remise immédiate',
  'total',
  'taux tva',
  'détails de vos avantages',
  'avantages -10%',
  'ma carte',
  '€ crédités',
  'vignettes',
  'payé par',
  'tva produit',
  'carte bancaire',
];

export const DISCOUNT_NAME_PREFIXES: readonly string[] = ['remise', 'discount'];

export function formatWeightPrice(value: PendingWeightPrice): string {
  return `${value.weight}kg x ${value.unitPrice}€/kg`;
}

function cleanProductName(raw: string): string {
  const withoutPercent = raw.trim().replace(LEADING_PERCENT_RE, '').trim();
  return collapseWhitespace(withoutPercent);
}

/**
 * Classify one receipt line. Checks run in a fixed order:
 * blank, weight-price, noise, product, then unrecognized.
 */
export function classifyLine(raw: string): LineClassification {
  const line = raw.trim();
  if (!line) {
    return { kind: 'blank' };
  }

  const weightMatch = line.match(WEIGHT_PRICE_RE);
  if (weightMatch?.groups) {
    return {
      kind: 'weight-price',
      weightPrice: {
        weight: normalizeWeight(weightMatch.groups.weight),
        unitPrice: normalizeDecimal(weightMatch.groups.price),
      },
    };
  }

  const lower = line.toLowerCase();
  const noisePrefix = NOISE_PREFIXES.find(prefix => lower.startsWith(prefix));
  if (noisePrefix !== undefined) {
    return { kind: 'noise', prefix: noisePrefix };
  }

  const productMatch = line.match(PRODUCT_RE);
  if (productMatch?.groups) {
    const { name: rawName, qty, unit, amount } = productMatch.groups;
    const name = cleanProductName(rawName);
    const nameLower = name.toLowerCase();
    return {
      kind: 'product',
      entry: {
        name,
        qtyTimesUnit: `${qty} x ${normalizeDecimal(unit)}`,
        amount: normalizeDecimal(amount),
        discount: DISCOUNT_NAME_PREFIXES.some(prefix => nameLower.startsWith(prefix)),
      },
    };
  }

  return { kind: 'unrecognized', line };
}
