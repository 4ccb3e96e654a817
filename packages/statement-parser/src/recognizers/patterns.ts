/**
 * Shared, precompiled pattern tables. Built once at module load and frozen;
 * every recognizer and extractor reads them by reference.
 */

const CURRENCY = '[$€£¥₹]';
const SIGN_MARKER = '(?:CR|DR|BF|CREDIT|DEBIT)';
const GROUPED_DIGITS = '\\d{1,9}(?:[,\\s]\\d{3})*';

/** A transaction date: ISO `2024-10-12`, or `10/12`, `10-12-24`, `10/12/2024`. */
export const DATE_COMPONENT = '(\\d{4}-\\d{1,2}-\\d{1,2}|\\d{1,2}[/-]\\d{1,2}(?:[/-]\\d{2,4})?)';

/**
 * A monetary amount as it appears in transaction rows. Capturing group.
 * Bare numbers need decimals; signed numbers do not.
 */
export const AMOUNT_COMPONENT =
  '(?<!\\w)(' +
  [
    `\\(\\s*${CURRENCY}?\\s*${GROUPED_DIGITS}\\.\\d{1,2}\\s*${SIGN_MARKER}?\\s*\\)`,
    `[-+]\\s*${CURRENCY}\\s*${GROUPED_DIGITS}\\.\\d{1,2}(?:\\s*${SIGN_MARKER})?`,
    `${CURRENCY}\\s*[-+]?\\s*${GROUPED_DIGITS}\\.\\d{1,2}(?:\\s*${SIGN_MARKER})?`,
    `[-+]\\s*(?:${GROUPED_DIGITS}|\\d+)(?:\\.\\d{1,2})?`,
    `(?:${GROUPED_DIGITS}|\\d+)\\.\\d{1,2}(?:\\s*${SIGN_MARKER})?`,
  ].join('|') +
  ')(?!\\w)';

/** Dollar amounts in multi-line groups and metadata values. Always a single capture. */
export const US_AMOUNT_COMPONENT =
  '(' +
  [
    '\\(\\s*\\$?\\s*\\d{1,9}(?:,\\d{3})*(?:\\.\\d{1,2})?\\s*(?:CR|DR|BF)?\\s*\\)',
    '[-+]\\$\\d{1,9}(?:,\\d{3})*(?:\\.\\d{1,2})?(?:\\s*(?:CR|DR|BF))?',
    '\\$\\d{1,9}(?:,\\d{3})*(?:\\.\\d{1,2})?(?:\\s*(?:CR|DR|BF))?',
  ].join('|') +
  ')';

export const LAYOUT_PATTERNS = Object.freeze({
  // 10/12 DESCRIPTION $10.50
  DATE_DESCRIPTION_AMOUNT: new RegExp(`^${DATE_COMPONENT}\\s+(.+?)\\s+${AMOUNT_COMPONENT}$`, 'i'),
  // Promo text 10/12 DESCRIPTION 10.50
  PREFIXED_DATE_DESCRIPTION_AMOUNT: new RegExp(
    `^.*?(?<![\\d/-])${DATE_COMPONENT}\\s+(.+?)\\s+${AMOUNT_COMPONENT}$`,
    'i'
  ),
  // 10/12 10/13 DESCRIPTION 10.50
  DATE_POSTING_DESCRIPTION_AMOUNT: new RegExp(
    `^${DATE_COMPONENT}\\s+${DATE_COMPONENT}\\s+(.+?)\\s+${AMOUNT_COMPONENT}$`,
    'i'
  ),
  // 1234 10/12 10/13 REF123 DESCRIPTION SEATTLE WA 10.50
  CARD_SUFFIX_TRANSACTION_ID: new RegExp(
    `^(\\d{4})\\s+${DATE_COMPONENT}\\s+${DATE_COMPONENT}\\s+([A-Z0-9]+)\\s+(.+?)\\s+([A-Z][A-Z\\s]{1,20})\\s+${AMOUNT_COMPONENT}$`
  ),
  // 10/12 10/13 MERCHANT SEATTLE WA 10.50
  DATE_POSTING_MERCHANT_LOCATION: new RegExp(
    `^${DATE_COMPONENT}\\s+${DATE_COMPONENT}\\s+(.+?)\\s+([A-Z][A-Z\\s]{1,20})\\s+${AMOUNT_COMPONENT}$`
  ),
});

export const MULTI_LINE_PATTERNS = Object.freeze({
  FIRST_LINE: /^(\d{1,2}\/\d{1,2}\/\d{2,4})\*?\s+(.+)$/,
  NEXT_TRANSACTION: /^(?:\d{4}-\d{1,2}-\d{1,2}|\d{1,2}[/-]\d{1,2}(?:[/-]\d{2,4})?)\*?\s+/,
  AMOUNT_ONLY: new RegExp(`^(?<!\\w)${US_AMOUNT_COMPONENT}(?!\\w)\\s*$`, 'i'),
  ENDS_WITH_AMOUNT: new RegExp(`^(.*?)${US_AMOUNT_COMPONENT}\\s*$`, 'i'),
  SUMMARY_WORD_BEFORE_AMOUNT:
    /\b(?:total|amount|balance|fee|charge|payment|credit|debit|sum|subtotal|tax|tip)\s*:?\s*$/i,
  SEPARATOR_BEFORE_AMOUNT: /[|\-\s]+$/,
  NO_ALPHANUMERIC: /^[^a-zA-Z0-9]*$/,
  SUMMARY_DESCRIPTION_LINE: /^(?:credits|charges|amount|purchases|balance transfers)$/i,
  TRAILING_MARKER: /⧫/g,
});

export const LEADING_DATE = /^\s*(?:\d{4}-\d{1,2}-\d{1,2}|\d{1,2}[/-]\d{1,2}(?:[/-]\d{2,4})?)\s+/;

/** Amount text carries an explicit currency, sign or CR/DR/BF marker. */
export const EXPLICIT_AMOUNT_MARKER = /[$€£¥₹]|^\s*[-+(]|(?:CR|DR|BF)\s*\)?\s*$/i;

export const PHONE_ONLY_PATTERNS: readonly RegExp[] = Object.freeze([
  /^\(?\d{3}\)?[\s.-]?\d{3}[\s.-]?\d{4}$/,
  /^1[\s.-]?\(?\d{3}\)?[\s.-]?\d{3}[\s.-]?\d{4}$/,
  /^\+1[\s.-]?\(?\d{3}\)?[\s.-]?\d{3}[\s.-]?\d{4}$/,
]);

export const PHONE_SHAPE = /(?:\+?1[\s.-]?)?\(?\d{3}\)?[\s.-]\d{3}[\s.-]\d{4}\b/;

/** Collapse runs of whitespace, including no-break and zero-width spaces. */
export function normalizeLine(line: string): string {
  return line.replace(/[\u00A0\u2000-\u200B]/g, ' ').replace(/\s+/g, ' ').trim();
}

export function isPhoneOnly(text: string): boolean {
  const trimmed = text.trim();
  return PHONE_ONLY_PATTERNS.some((pattern) => pattern.test(trimmed));
}
