import { LEADING_DATE, isPhoneOnly } from './patterns.js';

const PAGE_MARKER = /^page\s+\d+\s+of\s+\d+$/i;
const OPEN_CLOSE_DATE = /\bopen\b.*\bto\b.*\bclose\b.*\bdate\b/i;
const AGREEMENT_PHRASE = /agreement for details|cardmember agreement|cardholder agreement/i;

/**
 * Minimal description filter. A phone number inside a merchant description is
 * fine; a description that is only a phone number is not.
 */
export function isValidDescription(description: string): boolean {
  const trimmed = description.trim();
  if (trimmed === '') return false;
  if (isPhoneOnly(trimmed)) return false;
  if (PAGE_MARKER.test(trimmed)) return false;
  if (OPEN_CLOSE_DATE.test(trimmed)) return false;
  if (AGREEMENT_PHRASE.test(trimmed)) return false;
  return true;
}

export function stripLeadingDates(description: string): string {
  let result = description.trim();
  while (LEADING_DATE.test(result)) {
    result = result.replace(LEADING_DATE, '').trim();
  }
  return result;
}

/** Drop a cardholder name printed at the start of a description, with a trailing comma. */
export function removeLeadingUserName(description: string, userName: string | undefined): string {
  if (userName === undefined || userName.trim() === '') return description;

  const name = userName.trim();
  if (description.length <= name.length) return description;

  const prefix = description.slice(0, name.length);
  const next = description.charAt(name.length);
  if (prefix.toLowerCase() !== name.toLowerCase() || !/[\s,\t]/.test(next)) {
    return description;
  }
  return description.slice(name.length).replace(/^[\s,]+/, '').trim();
}
