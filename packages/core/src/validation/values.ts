/**
 * Value Parsing
 *
 * Numeric and date parsing shared by field-level and cross-field validators.
 * Date formats are written with tokens:
 *   YYYY  four-digit year
 *   MM    two-digit month      M  one or two digit month
 *   DD    two-digit day        D  one or two digit day
 *   MMMM  full month name      MMM  three-letter month name
 * Any other character is matched literally; a space matches any run of
 * whitespace.
 */

import { escapeRegExp } from '../text';

export const DEFAULT_DATE_FORMATS: readonly string[] = [
  'YYYY-MM-DD',
  'M/D/YYYY',
  'MMMM D, YYYY',
  'MMM D, YYYY',
  'D MMMM YYYY',
];

const MONTH_NAMES = [
  'january',
  'february',
  'march',
  'april',
  'may',
  'june',
  'july',
  'august',
  'september',
  'october',
  'november',
  'december',
];

type DatePart = 'year' | 'month' | 'day' | 'monthName' | 'monthShort';

interface CompiledDateFormat {
  regex: RegExp;
  parts: DatePart[];
}

const TOKENS: Array<{ token: string; part: DatePart; source: string }> = [
  { token: 'YYYY', part: 'year', source: '(\\d{4})' },
  { token: 'MMMM', part: 'monthName', source: `(${MONTH_NAMES.join('|')})` },
  { token: 'MMM', part: 'monthShort', source: `(${MONTH_NAMES.map((m) => m.slice(0, 3)).join('|')})\\.?` },
  { token: 'MM', part: 'month', source: '(\\d{2})' },
  { token: 'M', part: 'month', source: '(\\d{1,2})' },
  { token: 'DD', part: 'day', source: '(\\d{2})' },
  { token: 'D', part: 'day', source: '(\\d{1,2})' },
];

const formatCache = new Map<string, CompiledDateFormat>();

function compileDateFormat(format: string): CompiledDateFormat {
  const cached = formatCache.get(format);
  if (cached) return cached;

  const parts: DatePart[] = [];
  let source = '';
  let i = 0;

  while (i < format.length) {
    const token = TOKENS.find((t) => format.startsWith(t.token, i));
    if (token) {
      parts.push(token.part);
      source += token.source;
      i += token.token.length;
    } else if (/\s/.test(format[i])) {
      source += '\\s+';
      while (i < format.length && /\s/.test(format[i])) i++;
    } else {
      source += escapeRegExp(format[i]);
      i++;
    }
  }

  const compiled = { regex: new RegExp(`^${source}$`, 'i'), parts };
  formatCache.set(format, compiled);
  return compiled;
}

/**
 * Check that a format names a year, a month and a day exactly once
 */
export function isValidDateFormat(format: string): boolean {
  const { parts } = compileDateFormat(format);
  const count = (predicate: (p: DatePart) => boolean) => parts.filter(predicate).length;

  return (
    count((p) => p === 'year') === 1 &&
    count((p) => p === 'month' || p === 'monthName' || p === 'monthShort') === 1 &&
    count((p) => p === 'day') === 1
  );
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/**
 * Parse a date against one format. Returns a UTC midnight Date, or null when
 * the text does not fit the format or names an impossible calendar day.
 */
export function parseDateWithFormat(value: string, format: string): Date | null {
  const { regex, parts } = compileDateFormat(format);
  const match = value.trim().match(regex);
  if (!match) return null;

  let year = 0;
  let month = 0;
  let day = 0;

  parts.forEach((part, i) => {
    const raw = match[i + 1].toLowerCase();
    switch (part) {
      case 'year':
        year = parseInt(raw, 10);
        break;
      case 'month':
        month = parseInt(raw, 10);
        break;
      case 'monthName':
        month = MONTH_NAMES.indexOf(raw) + 1;
        break;
      case 'monthShort':
        month = MONTH_NAMES.findIndex((m) => m.startsWith(raw.replace('.', ''))) + 1;
        break;
      case 'day':
        day = parseInt(raw, 10);
        break;
    }
  });

  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;

  return new Date(Date.UTC(year, month - 1, day));
}

/**
 * Parse a date against the first matching format
 */
export function parseDate(value: string, formats: readonly string[] = DEFAULT_DATE_FORMATS): Date | null {
  for (const format of formats) {
    const parsed = parseDateWithFormat(value, format);
    if (parsed) return parsed;
  }
  return null;
}

const NUMERIC_PATTERN = /^[-+]?\d+(?:\.\d+)?$/;

/**
 * Parse a numeric field value. Currency symbols, thousands separators and
 * whitespace are ignored: "$250,000" is 250000 and "-$5" is -5. Anything
 * else that is not a plain decimal number yields null.
 */
export function parseNumericValue(value: string): number | null {
  const cleaned = value.replace(/[$€£¥,\s]/g, '');
  if (!NUMERIC_PATTERN.test(cleaned)) return null;
  return parseFloat(cleaned);
}

/**
 * Whether a form value counts as present
 */
export function isPresent(value: string | null | undefined): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}
