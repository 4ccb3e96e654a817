import { MIN_VALID_YEAR, MAX_VALID_YEAR } from './constants.js';

export interface DateContext {
  /** Month-first dates when true, day-first otherwise. */
  isDomestic?: boolean;
  inferredYear?: number | undefined;
  now?: Date;
}

type DateField = 'year' | 'shortYear' | 'month' | 'monthName' | 'day';

interface CompiledDateFormat {
  format: string;
  pattern: RegExp;
  fields: DateField[];
}

const ISO_FORMATS = ['yyyy-MM-dd', 'yyyy/MM/dd'] as const;

const DOMESTIC_FORMATS = [
  ...ISO_FORMATS,
  'MM/dd/yyyy',
  'MM-dd-yyyy',
  'MM/dd/yy',
  'MM-dd-yy',
  'dd.MM.yyyy',
  'dd/MM/yyyy',
  'dd-MM-yyyy',
  'MMM dd, yyyy',
  'dd-MMM-yyyy',
  'dd MMM yyyy',
  'dd-MMM-yy',
  'dd/MM/yy',
] as const;

const NON_DOMESTIC_FORMATS = [
  ...ISO_FORMATS,
  'dd.MM.yyyy',
  'dd/MM/yyyy',
  'dd-MM-yyyy',
  'MMM dd, yyyy',
  'dd-MMM-yyyy',
  'dd MMM yyyy',
  'dd-MMM-yy',
  'dd/MM/yy',
] as const;

const FORMAT_TOKENS: Record<string, { source: string; field: DateField }> = {
  yyyy: { source: '(\\d{4})', field: 'year' },
  yy: { source: '(\\d{2})', field: 'shortYear' },
  MMM: { source: '([A-Za-z]{3,9})\\.?', field: 'monthName' },
  MM: { source: '(\\d{1,2})', field: 'month' },
  dd: { source: '(\\d{1,2})', field: 'day' },
};

function compileFormat(format: string): CompiledDateFormat {
  const fields: DateField[] = [];
  let source = '';
  for (const token of format.match(/yyyy|yy|MMM|MM|dd|./g) ?? []) {
    const known = FORMAT_TOKENS[token];
    if (known !== undefined) {
      fields.push(known.field);
      source += known.source;
    } else if (token === ' ') {
      source += '\\s+';
    } else {
      source += token.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
    }
  }
  return { format, pattern: new RegExp(`^${source}$`, 'i'), fields };
}

const COMPILED_DOMESTIC = Object.freeze(DOMESTIC_FORMATS.map(compileFormat));
const COMPILED_NON_DOMESTIC = Object.freeze(NON_DOMESTIC_FORMATS.map(compileFormat));

const BARE_DATE = /^(\d{1,2})[/-](\d{1,2})(?:[/-](\d{2,4}))?$/;
const MONTH_DAY = /^([A-Za-z]{3,9})\.?\s+(\d{1,2})$/;

export function monthNameToNumber(monthName: string): number {
  const months: Record<string, number> = {
    jan: 1,
    feb: 2,
    mar: 3,
    apr: 4,
    may: 5,
    jun: 6,
    jul: 7,
    aug: 8,
    sep: 9,
    oct: 10,
    nov: 11,
    dec: 12,
  };
  const num = months[monthName.slice(0, 3).toLowerCase()];
  if (num === undefined) {
    throw new Error(`Unknown month name: ${monthName}`);
  }
  return num;
}

export function isValidYear(year: number): boolean {
  return Number.isInteger(year) && year >= MIN_VALID_YEAR && year <= MAX_VALID_YEAR;
}

export function expandTwoDigitYear(year: number): number {
  return year < 100 ? 2000 + year : year;
}

export function isValidCalendarDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1 || day > 31) return false;
  const date = new Date(Date.UTC(year, month - 1, day));
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

function toISODate(year: number, month: number, day: number): string {
  return `${year}-${month.toString().padStart(2, '0')}-${day.toString().padStart(2, '0')}`;
}

function applyFormat(compiled: CompiledDateFormat, text: string): string | undefined {
  const match = text.match(compiled.pattern);
  if (match === null) return undefined;

  let year: number | undefined;
  let month: number | undefined;
  let day: number | undefined;

  for (let i = 0; i < compiled.fields.length; i++) {
    const value = match[i + 1];
    if (value === undefined) return undefined;
    switch (compiled.fields[i]) {
      case 'year':
        year = parseInt(value, 10);
        break;
      case 'shortYear':
        year = 2000 + parseInt(value, 10);
        break;
      case 'month':
        month = parseInt(value, 10);
        break;
      case 'monthName':
        try {
          month = monthNameToNumber(value);
        } catch {
          return undefined;
        }
        break;
      case 'day':
        day = parseInt(value, 10);
        break;
    }
  }

  if (year === undefined || month === undefined || day === undefined) return undefined;
  if (!isValidCalendarDate(year, month, day)) return undefined;
  return toISODate(year, month, day);
}

/**
 * Year for a date printed without one. Uses the inferred statement year when
 * it is plausible, otherwise the current year, stepping back one year when the
 * month is more than a month ahead of `now` (December activity on a January
 * statement).
 */
function resolveMissingYear(month: number, context: DateContext): number {
  if (context.inferredYear !== undefined && isValidYear(context.inferredYear)) {
    return context.inferredYear;
  }
  const now = context.now ?? new Date();
  const currentYear = now.getFullYear();
  const currentMonth = now.getMonth() + 1;
  return month > currentMonth + 1 ? currentYear - 1 : currentYear;
}

function parseBareDate(text: string, context: DateContext): string | undefined {
  const match = text.match(BARE_DATE);
  if (match === null) return undefined;
  const [, firstText, secondText, yearText] = match;
  if (firstText === undefined || secondText === undefined) return undefined;

  const first = parseInt(firstText, 10);
  const second = parseInt(secondText, 10);

  // Truncated ISO: 24-10-12
  if (yearText !== undefined && text.includes('-') && first >= 20 && second >= 1 && second <= 12) {
    const day = parseInt(yearText, 10);
    const year = 2000 + first;
    if (yearText.length <= 2 && isValidCalendarDate(year, second, day)) {
      return toISODate(year, second, day);
    }
  }

  const isDomestic = context.isDomestic ?? true;
  const month = isDomestic ? first : second;
  const day = isDomestic ? second : first;

  let year: number;
  if (yearText !== undefined) {
    const parsed = parseInt(yearText, 10);
    if (parsed < 100) {
      year = 2000 + parsed;
    } else if (isValidYear(parsed)) {
      year = parsed;
    } else {
      year = resolveMissingYear(month, context);
    }
  } else {
    year = resolveMissingYear(month, context);
  }

  if (!isValidCalendarDate(year, month, day)) return undefined;
  return toISODate(year, month, day);
}

function parseMonthDay(text: string, context: DateContext): string | undefined {
  const match = text.match(MONTH_DAY);
  if (match === null) return undefined;
  const [, monthName, dayText] = match;
  if (monthName === undefined || dayText === undefined) return undefined;

  let month: number;
  try {
    month = monthNameToNumber(monthName);
  } catch {
    return undefined;
  }
  const day = parseInt(dayText, 10);
  const year = resolveMissingYear(month, context);
  if (!isValidCalendarDate(year, month, day)) return undefined;
  return toISODate(year, month, day);
}

/**
 * Normalize a statement date to `YYYY-MM-DD`.
 *
 * Explicit formats are tried first in locale order, then a bare
 * `month/day[/year]` form and a `Mon dd` form whose missing year comes from
 * the context.
 */
export function normalizeDate(dateText: string, context: DateContext = {}): string {
  const trimmed = dateText.trim().replace(/\s+/g, ' ');
  const formats = (context.isDomestic ?? true) ? COMPILED_DOMESTIC : COMPILED_NON_DOMESTIC;

  for (const compiled of formats) {
    const result = applyFormat(compiled, trimmed);
    if (result !== undefined) return result;
  }

  const bare = parseBareDate(trimmed, context) ?? parseMonthDay(trimmed, context);
  if (bare !== undefined) return bare;

  throw new Error(`Unable to parse date: ${dateText}`);
}

export function isValidISODate(dateStr: string): boolean {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(dateStr)) return false;
  const [year, month, day] = dateStr.split('-').map((part) => parseInt(part, 10));
  return year !== undefined && month !== undefined && day !== undefined && isValidCalendarDate(year, month, day);
}

/** Whole days between two ISO dates, ignoring direction. */
export function daysBetween(a: string, b: string): number {
  const ms = Math.abs(Date.parse(`${a}T00:00:00Z`) - Date.parse(`${b}T00:00:00Z`));
  return Math.round(ms / 86_400_000);
}

export function toISODateString(date: Date): string {
  return toISODate(date.getFullYear(), date.getMonth() + 1, date.getDate());
}
