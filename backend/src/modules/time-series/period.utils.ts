/**
 * Period helpers
 *
 * Dates are parsed and formatted in local time throughout, so a day parsed
 * from text never drifts into a neighbouring month. A timestamp's zone
 * suffix (Z, +02:00) is dropped: the calendar day is the one written.
 */

import { addMonths, format, isValid, parse, parseISO, startOfMonth } from 'date-fns';
import type { CellValue } from '../artifacts/dataset.js';

const ISO_LIKE_RE = /^\d{4}-\d{2}(?:-\d{2})?(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;

// Time part followed by a zone designator
const ZONE_SUFFIX_RE = /([T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)(?:Z|[+-]\d{2}:?\d{2})$/;

// Two-digit years first: 'yyyy' would happily read "24" as year 24
const PATTERNS = [
  'M/d/yy',
  'M/d/yyyy',
  'yyyy/M/d',
  'd.M.yyyy',
  'MMM yyyy',
  'MMMM yyyy',
  'MMM d, yyyy',
];

const MIN_YEAR = 1000;
const MAX_YEAR = 9999;

function plausible(date: Date): boolean {
  if (!isValid(date)) return false;
  const year = date.getFullYear();
  return year >= MIN_YEAR && year <= MAX_YEAR;
}

/** Tolerant date parse. Anything that is not recognisably a date → null. */
export function parseDateValue(value: CellValue | undefined): Date | null {
  if (typeof value !== 'string') return null;
  const text = value.trim();
  if (!text) return null;

  if (ISO_LIKE_RE.test(text)) {
    const iso = parseISO(text.replace(ZONE_SUFFIX_RE, '$1'));
    return plausible(iso) ? iso : null;
  }

  const reference = new Date();
  for (const pattern of PATTERNS) {
    const parsed = parse(text, pattern, reference);
    if (plausible(parsed)) return parsed;
  }
  return null;
}

export function formatDay(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}

/** First day of the date's month, as YYYY-MM-01. */
export function floorToMonth(date: Date): string {
  return formatDay(startOfMonth(date));
}

/** Month start following `period` (any YYYY-MM-DD). */
export function nextPeriod(period: string): string {
  return floorToMonth(addMonths(startOfMonth(parseISO(period)), 1));
}

/** `count` consecutive month starts beginning at `start`. */
export function monthRange(start: string, count: number): string[] {
  const first = startOfMonth(parseISO(start));
  return Array.from({ length: count }, (_, i) => floorToMonth(addMonths(first, i)));
}

/** Normalise a free-form date to YYYY-MM-DD, or null. */
export function normalizeDay(value: string | undefined): string | null {
  if (value === undefined) return null;
  const date = parseDateValue(value);
  return date ? formatDay(date) : null;
}
