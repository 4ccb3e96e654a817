import type { DateContext } from '@stmtscan/types';
import { tryNormalizeDate } from '../recognizers/field-parsing.js';

const DATE_VALUE = '(\\d{1,2}[/-]\\d{1,2}(?:[/-]\\d{2,4})?)';

const DUE_DATE_PATTERNS: readonly RegExp[] = Object.freeze([
  new RegExp(`payment\\s+due\\s+date[\\s:]*${DATE_VALUE}`, 'i'),
  new RegExp(`due\\s+date[\\s:]*${DATE_VALUE}`, 'i'),
  new RegExp(`payment\\s+due[\\s:]*${DATE_VALUE}`, 'i'),
  new RegExp(`due[\\s:]+${DATE_VALUE}`, 'i'),
  new RegExp(`payment\\s+due\\s+on[\\s:]*${DATE_VALUE}`, 'i'),
  new RegExp(`due\\s+on[\\s:]*${DATE_VALUE}`, 'i'),
]);

/** First labelled due date in the document, read with the statement's year and locale. */
export function extractDueDate(lines: readonly string[], context: DateContext): string | undefined {
  for (const line of lines) {
    const trimmed = line.trim();
    if (trimmed === '') continue;

    for (const pattern of DUE_DATE_PATTERNS) {
      const dateText = pattern.exec(trimmed)?.[1];
      if (dateText === undefined) continue;
      const date = tryNormalizeDate(dateText, context);
      if (date !== undefined) return date;
    }
  }
  return undefined;
}
