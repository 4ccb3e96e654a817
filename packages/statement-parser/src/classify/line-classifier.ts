import { detectHeader } from '../sections/header-detector.js';
import { findDateTokens } from '../recognizers/fuzzy.js';
import { LEADING_DATE, PHONE_SHAPE } from '../recognizers/patterns.js';

export type BoilerplateReason = 'empty' | 'no-date' | 'informational';

export type LineClass =
  | { kind: 'transaction-like' }
  | { kind: 'boilerplate'; reason: BoilerplateReason }
  | { kind: 'address' }
  | { kind: 'phone-number' }
  | { kind: 'header'; columns: string[] };

export type LineKind = LineClass['kind'];

// Matched against the lower-cased line.
const INFORMATIONAL_PATTERNS: readonly RegExp[] = Object.freeze([
  /statement period|account number/,
  /\bp\.?\s*\d+\s*\/\s*\d+\b/,
  /\bpage\s+\d+\s+of\s+\d+/,
  /^(?:sub)?total\b/,
  /\btotal\s+(?:fees|interest|charges|credits|payments|purchases|for|this)\b/,
  /\b(?:beginning|ending|previous|new)\s+balance\b/,
  /\bsummary\b/,
  /payments, credits|standard purchases|purchases prior/,
  /pay over time|cash advances|interest rate|annual percentage rate/,
  /this date may not be|your bank will debit|should be made before|you may have to pay|for at least the difference/,
  /\bopen\b.*\bto\b.*\bclose\b.*\bdate\b/,
  /customer service|relay calls?|operator relay|we accept/,
  /\d{1,2}\s*-\s*\d{1,2}\s+days?\b|\d{1,2}\s+to\s+\d{1,2}\s+days?\b/,
  // Credit score banners: "776 10/10/2025 Agarwal"
  /^\d{3,}\s+\d{1,2}\/\d{1,2}\/\d{2,4}\s*[a-z]+$/,
]);

// Long lines that only restate a statement date.
const DATED_NOTICES: readonly RegExp[] = Object.freeze([/payment due date/, /closing date/, /statement date/, /available and pending as of/]);
const NOTICE_MIN_LENGTH = 50;

const DATE_RANGE = /\d{1,2}\/\d{1,2}\/\d{2,4}\s+(?:through|to|-)\s+\d{1,2}\/\d{1,2}\/\d{2,4}/;
const ZIP_PLUS_FOUR = /\b\d{5}-\d{4}\b/;
const ADDRESS_CONTEXT = /carol stream|street|address|city|state|zip/;
const FIVE_DIGITS = /\d{5}/;
const PHONE_CONTEXT = /\bcall\b|\bphone\b/;
const PHONE_FRAGMENT = /\(?\s*\d{1,3}-\d{3}-/;

function isDatedNotice(lower: string): boolean {
  if (lower.length <= NOTICE_MIN_LENGTH) return false;
  if (!DATED_NOTICES.some((pattern) => pattern.test(lower))) return false;
  return !/received|credit|transaction/.test(lower);
}

export function isInformationalLine(line: string): boolean {
  const lower = line.toLowerCase();
  if (INFORMATIONAL_PATTERNS.some((pattern) => pattern.test(lower))) return true;
  if (isDatedNotice(lower)) return true;
  return DATE_RANGE.test(lower) && !lower.includes('$');
}

function hasDate(line: string): boolean {
  return LEADING_DATE.test(line) || findDateTokens(line).length > 0;
}

/**
 * One pass over a line before any recognizer sees it. Lines that open with a
 * date are never demoted to address or phone lines, since merchant names
 * routinely carry both.
 */
export function classifyLine(rawLine: string): LineClass {
  const line = rawLine.trim();
  if (line === '') return { kind: 'boilerplate', reason: 'empty' };

  const columns = detectHeader(line);
  if (columns !== undefined) return { kind: 'header', columns };

  if (isInformationalLine(line)) return { kind: 'boilerplate', reason: 'informational' };

  const lower = line.toLowerCase();
  if (!LEADING_DATE.test(line)) {
    if (PHONE_SHAPE.test(line) || (PHONE_CONTEXT.test(lower) && PHONE_FRAGMENT.test(lower))) {
      return { kind: 'phone-number' };
    }
    if (ZIP_PLUS_FOUR.test(lower) || (ADDRESS_CONTEXT.test(lower) && FIVE_DIGITS.test(lower))) {
      return { kind: 'address' };
    }
  }

  if (!hasDate(line)) return { kind: 'boilerplate', reason: 'no-date' };
  return { kind: 'transaction-like' };
}

export function classifyLines(lines: readonly string[]): LineClass[] {
  return lines.map(classifyLine);
}
