import type { YearSource } from '@stmtscan/types';
import { expandTwoDigitYear, isValidYear, monthNameToNumber } from '@stmtscan/types';

export interface YearInference {
  year: number;
  source: YearSource;
}

const MONTH = '(?:jan|feb|mar|apr|may|jun|jul|aug|sep|oct|nov|dec)[a-z]*';
const MD = '(?:\\d{1,2}[/-]){2}';
const YEAR4 = '(\\d{4})(?!\\d)';
const YEAR2 = '(\\d{2})(?!\\d)';
const RANGE_DASH = '\\s*(?:[-–—]|to)+\\s*';
const RANGE_LABEL = '(?:period|billing\\s+period|statement\\s+period|from|opening|closing)[:\\s]+';

function patterns(...sources: string[]): readonly RegExp[] {
  return Object.freeze(sources.map((source) => new RegExp(source, 'i')));
}

const CLOSING_DATE_PATTERNS = patterns(
  `(?:closing|statement)\\s+date[:\\s]+${MD}${YEAR4}`,
  `(?:closing|statement)\\s+date[:\\s]+${MD}${YEAR2}`,
  `(?:closing|statement)\\s+date[:\\s]+${MONTH}\\s+\\d{1,2},?\\s+${YEAR4}`,
  `(?:closing|statement)\\s+date[:\\s]+(\\d{4})[/-]\\d{1,2}[/-]\\d{1,2}`,
  `closing[:\\s]+${MD}${YEAR4}`,
  `closing[:\\s]+${MD}${YEAR2}`,
  `statement[:\\s]+${MD}${YEAR4}`,
  `statement[:\\s]+${MD}${YEAR2}`,
  `as\\s+of(?:\\s+date)?[:\\s]+${MD}${YEAR4}`,
  `report\\s+date[:\\s]+${MD}${YEAR4}`
);

// The last capture group is the closing year.
const DATE_RANGE_PATTERNS = patterns(
  `${RANGE_LABEL}${MD}\\d{4}${RANGE_DASH}${MD}${YEAR4}`,
  `(?:opening[/\\\\]?closing|closing[/\\\\]?opening)\\s+date\\s+${MD}${YEAR2}${RANGE_DASH}${MD}${YEAR2}`,
  `(?:period\\s+start|opening\\s+date)[:\\s]+${MD}${YEAR2}\\s+(?:period\\s+end|closing\\s+date)[:\\s]+${MD}${YEAR2}`,
  `${RANGE_LABEL}${MD}${YEAR2}${RANGE_DASH}${MD}${YEAR2}`,
  `${RANGE_LABEL}\\d{4}[/-]\\d{1,2}[/-]\\d{1,2}${RANGE_DASH}(\\d{4})[/-]\\d{1,2}[/-]\\d{1,2}`,
  `${RANGE_LABEL}${MONTH}\\s+\\d{1,2},?\\s+\\d{4}${RANGE_DASH}${MONTH}\\s+\\d{1,2},?\\s+${YEAR4}`,
  `\\d{4}[/-]\\d{1,2}[/-]\\d{1,2}\\s*[-–—]\\s*(\\d{4})[/-]\\d{1,2}[/-]\\d{1,2}`
);

// Capture groups: month number, year (numeric forms) or month name, year.
const DUE_DATE_PATTERNS = patterns(
  `(?:payment\\s+)?due\\s+date[:\\s]+(\\d{1,2})[/-]\\d{1,2}[/-]${YEAR4}`,
  `(?:payment\\s+)?due\\s+date[:\\s]+(\\d{1,2})[/-]\\d{1,2}[/-]${YEAR2}`,
  `(?:payment\\s+)?due\\s+date[:\\s]+(${MONTH})\\s+\\d{1,2},?\\s+${YEAR4}`,
  `(?:payment\\s+)?due[:\\s]+(\\d{1,2})[/-]\\d{1,2}[/-]${YEAR4}`,
  `(?:payment\\s+)?due[:\\s]+(\\d{1,2})[/-]\\d{1,2}[/-]${YEAR2}`,
  `amount\\s+due\\s+date[:\\s]+(\\d{1,2})[/-]\\d{1,2}[/-]${YEAR4}`,
  `amount\\s+due\\s+date[:\\s]+(\\d{1,2})[/-]\\d{1,2}[/-]${YEAR2}`
);

const STATEMENT_PERIOD_PATTERNS = patterns(
  `(?:statement|billing)\\s+period[:\\s]+${MD}${YEAR4}`,
  `(?:statement|billing)\\s+period[:\\s]+${MD}${YEAR2}`,
  `(?:statement|billing)\\s+period[:\\s]+${MONTH}\\s+${YEAR4}`,
  `(?:statement|billing)[:\\s]+${YEAR4}`,
  `(?:for\\s+the\\s+)?period\\s+ending[:\\s]+${MD}${YEAR4}`
);

const FILENAME_YEAR = /\b(20\d{2})\b/;
const DECEMBER_MENTION = /\b(?:december|dec)\b/i;

function toYear(text: string | undefined): number | undefined {
  if (text === undefined) return undefined;
  const value = Number.parseInt(text, 10);
  if (Number.isNaN(value)) return undefined;
  const year = text.length === 2 ? expandTwoDigitYear(value) : value;
  return isValidYear(year) ? year : undefined;
}

function firstYear(text: string, candidates: readonly RegExp[]): number | undefined {
  for (const pattern of candidates) {
    const match = pattern.exec(text);
    if (match === null) continue;
    const year = toYear(match[match.length - 1]);
    if (year !== undefined) return year;
  }
  return undefined;
}

function toMonth(text: string): number | undefined {
  if (/^\d+$/.test(text)) return Number.parseInt(text, 10);
  return monthNameToNumber(text);
}

/**
 * A January due date on a statement that mentions December belongs to the
 * December cycle, so the transactions sit in the previous year.
 */
function yearFromDueDate(text: string): number | undefined {
  for (const pattern of DUE_DATE_PATTERNS) {
    const match = pattern.exec(text);
    if (match === null) continue;
    const year = toYear(match[2]);
    if (year === undefined) continue;
    const month = match[1] === undefined ? undefined : toMonth(match[1]);
    return month === 1 && DECEMBER_MENTION.test(text) ? year - 1 : year;
  }
  return undefined;
}

export function yearFromFilename(filename: string | undefined): number | undefined {
  if (filename === undefined) return undefined;
  return toYear(FILENAME_YEAR.exec(filename)?.[1]);
}

/**
 * Year for dates printed without one. Sources are tried strictly in order:
 * closing date, date range, due date, statement period, filename, then the
 * year of `now`.
 */
export function inferYear(text: string, filename?: string, now: Date = new Date()): YearInference {
  const chain: Array<[YearSource, () => number | undefined]> = [
    ['closing-date', () => firstYear(text, CLOSING_DATE_PATTERNS)],
    ['date-range', () => firstYear(text, DATE_RANGE_PATTERNS)],
    ['due-date', () => yearFromDueDate(text)],
    ['statement-period', () => firstYear(text, STATEMENT_PERIOD_PATTERNS)],
    ['filename', () => yearFromFilename(filename)],
  ];

  for (const [source, extract] of chain) {
    const year = extract();
    if (year !== undefined) return { year, source };
  }
  return { year: now.getFullYear(), source: 'current-year' };
}
