import { InvalidDateError } from './errors';

/**
 * Receipt timestamp patterns in priority order. The first pattern that matches
 * anywhere in the text wins, even if another pattern matches earlier in the text.
 */
export const DATE_PATTERNS: readonly RegExp[] = [
  // 12/05/2024 à 14h32, 12/05/2024 14:32
  /(?<d>\d{2})\/(?<m>\d{2})\/(?<y>\d{4})\s*(?:à\s*)?(?<h>\d{1,2})[h:](?<min>\d{2})/,
  // 12.05.24 14:32, 12.05.2024 14:32
  /(?<d>\d{2})\.(?<m>\d{2})\.(?<y>\d{2,4})\s+(?<h>\d{1,2}):(?<min>\d{2})/,
];

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

function toCalendarDate(match: RegExpMatchArray): string {
  const groups = match.groups ?? {};
  const day = parseInt(groups.d ?? '', 10);
  const month = parseInt(groups.m ?? '', 10);
  let year = parseInt(groups.y ?? '', 10);
  const hour = parseInt(groups.h ?? '', 10);
  const minute = parseInt(groups.min ?? '', 10);

  if (year < 100) year += 2000;

  if (month < 1 || month > 12) throw new InvalidDateError(match[0], `month ${month} is out of range`);
  if (day < 1 || day > daysInMonth(year, month)) {
    throw new InvalidDateError(match[0], `day ${day} is out of range for month ${month}`);
  }
  if (hour > 23) throw new InvalidDateError(match[0], `hour ${hour} is out of range`);
  if (minute > 59) throw new InvalidDateError(match[0], `minute ${minute} is out of range`);

  return `${pad2(day)}/${pad2(month)}/${String(year).padStart(4, '0')}`;
}

/**
 * Find the receipt date as `dd/mm/yyyy`, or null when no pattern matches.
 * Throws InvalidDateError when the winning match is not a real date/time.
 */
export function findReceiptDate(text: string): string | null {
  for (const pattern of DATE_PATTERNS) {
    const match = text.match(pattern);
    if (match) {
      return toCalendarDate(match);
    }
  }
  return null;
}

export interface ResolvedDate {
  date: string | null;
  error: string | null;
}

/**
 * Like findReceiptDate, but an invalid date becomes `{ date: null, error }`
 * so the rest of the document can still be parsed.
 */
export function resolveReceiptDate(text: string): ResolvedDate {
  try {
    return { date: findReceiptDate(text), error: null };
  } catch (error) {
    if (error instanceof InvalidDateError) {
      return { date: null, error: error.message };
    }
    throw error;
  }
}
