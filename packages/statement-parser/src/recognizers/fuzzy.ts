import { FUZZY_TRAILING_WINDOW } from '@stmtscan/types';
import { AMOUNT_COMPONENT } from './patterns.js';
import { isValidDescription, stripLeadingDates } from './description.js';
import type { CandidateMatch, LineRecognizer, RecognizerInput, TextSpan } from './types.js';

interface Token extends TextSpan {
  text: string;
}

const FUZZY_CONFIDENCE = 0.9;

// Tried in order; the first family with any hit supplies the date candidates.
const DATE_TOKEN_PATTERNS: readonly RegExp[] = Object.freeze([
  /(?<![\d/-])\d{4}[/-]\d{1,2}[/-]\d{1,2}(?![\d/-])/g,
  /(?<![\d/-])\d{1,2}[/-]\d{1,2}(?:[/-]\d{2,4})?(?![\d/-])/g,
  /(?<![\d.])\d{1,2}\.\d{1,2}(?:\.\d{2,4})?(?![\d.])/g,
  /(?<!\d)\d{1,2}\s+(?:jan|feb|mar|apr|may|jun|jul|aug|sep|oct|nov|dec)[a-z]*\.?\s+\d{4}(?!\d)/gi,
]);

const AMOUNT_TOKEN = new RegExp(AMOUNT_COMPONENT, 'gi');

const BENIGN_PREFIX = /\b[1-5]%|cash\s?back|reward|bonus/i;

function findTokens(pattern: RegExp, line: string): Token[] {
  const tokens: Token[] = [];
  for (const match of line.matchAll(pattern)) {
    const text = match[1] ?? match[0];
    const start = (match.index ?? 0) + match[0].indexOf(text);
    tokens.push({ text, start, end: start + text.length });
  }
  return tokens;
}

function overlaps(a: TextSpan, b: TextSpan): boolean {
  return a.start < b.end && b.start < a.end;
}

export function findDateTokens(line: string): Token[] {
  for (const pattern of DATE_TOKEN_PATTERNS) {
    const tokens = findTokens(pattern, line);
    if (tokens.length > 0) return tokens;
  }
  return [];
}

/** Amount tokens that do not share any character with a date token. */
export function findAmountTokens(line: string, dates: readonly TextSpan[]): Token[] {
  return findTokens(AMOUNT_TOKEN, line).filter((amount) => !dates.some((date) => overlaps(amount, date)));
}

function cleanDescription(text: string): string {
  const collapsed = text.replace(/\s+/g, ' ').trim();
  return stripLeadingDates(collapsed.replace(/^\d{1,2}\s+/, '').replace(/\s+\d{1,2}$/, '')).trim();
}

/**
 * Last-resort extraction: date and amount located independently. The amount
 * must follow the date and end near the end of the line; a date that is not at
 * the start needs a promotional prefix such as `3% cash back`.
 */
export const fuzzyRecognizer: LineRecognizer = {
  id: 'fuzzy',
  recognize(input: RecognizerInput): CandidateMatch | undefined {
    const line = input.lines[input.index];
    if (line === undefined || line === '') return undefined;

    const dates = findDateTokens(line);
    const date = dates[0];
    if (date === undefined) return undefined;

    if (date.start > 0 && !BENIGN_PREFIX.test(line.slice(0, date.start))) return undefined;

    const amounts = findAmountTokens(line, dates).filter((amount) => amount.start >= date.end);
    const amount = amounts[amounts.length - 1];
    if (amount === undefined) return undefined;
    if (amount.end < line.length - FUZZY_TRAILING_WINDOW) return undefined;

    const description = cleanDescription(line.slice(date.end, amount.start));
    if (!isValidDescription(description)) return undefined;

    return {
      recognizerId: 'fuzzy',
      fields: { date: date.text, description, amount: amount.text.trim() },
      confidence: FUZZY_CONFIDENCE,
      consumedLines: 1,
      dateSpan: { start: date.start, end: date.end },
      amountSpan: { start: amount.start, end: amount.end },
    };
  },
};
