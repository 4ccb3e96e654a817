import { normalizeNumberFormat, roundToTwoDecimals } from '@stmtscan/types';

const CURRENCY = /[$€£¥₹]|USD|EUR|GBP|JPY|INR/gi;

/**
 * Metadata values come from summary boxes in any locale, so grouping is
 * resolved before parsing. Parentheses and a leading minus make the value
 * negative.
 */
export function parseMetadataAmount(text: string): number | undefined {
  let cleaned = text.trim();
  let negative = false;
  if (cleaned.startsWith('(') && cleaned.endsWith(')')) {
    negative = true;
    cleaned = cleaned.slice(1, -1);
  }
  cleaned = cleaned.replace(CURRENCY, '').replace(/\s+/g, '');
  if (cleaned.startsWith('-')) {
    negative = true;
    cleaned = cleaned.slice(1);
  } else if (cleaned.startsWith('+')) {
    cleaned = cleaned.slice(1);
  }
  if (!/^\d[\d.,]*$/.test(cleaned)) return undefined;

  const value = Number.parseFloat(normalizeNumberFormat(cleaned));
  if (Number.isNaN(value)) return undefined;
  const rounded = roundToTwoDecimals(value);
  if (rounded === 0) return 0;
  return negative ? -rounded : rounded;
}
