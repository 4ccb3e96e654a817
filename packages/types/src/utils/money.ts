import { MAX_TRANSACTION_AMOUNT } from './constants.js';

const CURRENCY_MARKERS = /[$€£¥₹]|USD|EUR|GBP|JPY|INR/g;
const SIGN_MARKERS = /CREDIT|DEBIT|CR|DR|BF/g;
const DEBIT_SUFFIX = /(?:^|[^A-Z])(?:DR|DEBIT)\s*\)?\s*$/;
const CREDIT_SUFFIX = /(?:^|[^A-Z])(?:CR|CREDIT)\s*\)?\s*$/;
const INDIAN_GROUPING = /^\d{1,2}(?:,\d{2})+,\d{3}(?:\.\d{1,2})?$/;

/**
 * Resolve thousands and decimal separators to a plain `1234.56` string.
 *
 * A separator within the last three characters is the decimal point; when both
 * separators occur the later one is. Indian grouping (`12,34,567.89`) only
 * carries thousands commas.
 */
export function normalizeNumberFormat(value: string): string {
  const compact = value.replace(/\s+/g, '');

  if (INDIAN_GROUPING.test(compact)) {
    return compact.replace(/,/g, '');
  }

  const lastComma = compact.lastIndexOf(',');
  const lastPeriod = compact.lastIndexOf('.');

  if (lastComma >= 0 && lastPeriod >= 0) {
    if (lastComma > lastPeriod) {
      return compact.replace(/\./g, '').replace(',', '.');
    }
    return compact.replace(/,/g, '');
  }

  if (lastComma >= 0) {
    return resolveSingleSeparator(compact, ',', lastComma);
  }
  if (lastPeriod >= 0) {
    return resolveSingleSeparator(compact, '.', lastPeriod);
  }
  return compact;
}

function resolveSingleSeparator(value: string, separator: ',' | '.', lastIndex: number): string {
  const digitsAfter = value.length - lastIndex - 1;
  const all = separator === ',' ? /,/g : /\./g;

  if (digitsAfter >= 1 && digitsAfter <= 2) {
    const whole = value.slice(0, lastIndex).replace(all, '');
    return `${whole}.${value.slice(lastIndex + 1)}`;
  }
  return value.replace(all, '');
}

/**
 * Parse a statement amount into a signed two-decimal number.
 *
 * Sign precedence: a DR suffix, then parentheses (even around CR), then a CR
 * suffix, then an explicit leading or trailing sign.
 */
export function normalizeAmount(amountText: string): number {
  const upper = amountText.trim().toUpperCase();
  if (upper === '') {
    throw new Error(`Unable to parse amount: ${amountText}`);
  }

  const isDebit = DEBIT_SUFFIX.test(upper);
  const isCredit = CREDIT_SUFFIX.test(upper);
  const hasParentheses = upper.includes('(') && upper.includes(')');

  let body = upper
    .replace(CURRENCY_MARKERS, '')
    .replace(SIGN_MARKERS, '')
    .replace(/[()\s]/g, '');

  let explicitNegative = false;
  if (body.startsWith('-') || body.startsWith('+')) {
    explicitNegative = body.startsWith('-');
    body = body.slice(1);
  } else if (body.endsWith('-')) {
    explicitNegative = true;
    body = body.slice(0, -1);
  }

  if (!/^[\d.,]+$/.test(body) || !/\d/.test(body)) {
    throw new Error(`Unable to parse amount: ${amountText}`);
  }

  const magnitude = Math.abs(parseFloat(normalizeNumberFormat(body)));
  if (isNaN(magnitude)) {
    throw new Error(`Unable to parse amount: ${amountText}`);
  }
  if (magnitude > MAX_TRANSACTION_AMOUNT) {
    throw new Error(`Amount out of range: ${amountText}`);
  }

  let negative: boolean;
  if (isDebit || hasParentheses) {
    negative = true;
  } else if (isCredit) {
    negative = false;
  } else {
    negative = explicitNegative;
  }

  const rounded = roundToTwoDecimals(magnitude);
  if (rounded === 0) return 0;
  return negative ? -rounded : rounded;
}

export function roundToTwoDecimals(num: number): number {
  return Math.round(num * 100) / 100;
}

export function formatCurrency(amount: number, currency = 'USD'): string {
  const absAmount = Math.abs(amount);
  const formatted = absAmount.toLocaleString('en-US', {
    style: 'currency',
    currency,
  });
  return amount < 0 ? `-${formatted}` : formatted;
}

export function sumAmounts(amounts: number[]): number {
  return roundToTwoDecimals(amounts.reduce((sum, amt) => sum + amt, 0));
}
