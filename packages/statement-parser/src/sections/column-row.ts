import { calculateConfidence } from '../recognizers/confidence.js';
import { isValidDescription } from '../recognizers/description.js';
import { tryNormalizeAmount, tryNormalizeDate } from '../recognizers/field-parsing.js';
import { normalizeLine } from '../recognizers/patterns.js';
import type { CandidateMatch, RecognizerContext } from '../recognizers/types.js';
import { splitRowCells } from './header-detector.js';
import { isValidNameFormat } from './name-filter.js';

/** Cell positions of a header that names a per-row cardholder. */
export interface ColumnLayout {
  date: number;
  user: number;
  description: number;
  amount: number;
  width: number;
}

export interface ColumnRow {
  match: CandidateMatch;
  userName: string;
}

const USER_COLUMN = /\buser\b/;
const DESCRIPTION_COLUMN = /description|details|memo|payee|transaction/;

/**
 * Column positions for headers such as `Date  User  Description  Amount`.
 * Undefined when the header has no user column or lacks one of the others.
 */
export function resolveColumnLayout(columns: readonly string[]): ColumnLayout | undefined {
  const names = columns.map((column) => column.toLowerCase());
  const user = names.findIndex((name) => USER_COLUMN.test(name));
  if (user === -1) return undefined;

  const date = names.findIndex((name, i) => i !== user && name.includes('date'));
  const amount = names.findIndex((name, i) => i !== user && name.includes('amount'));
  const description = names.findIndex(
    (name, i) => i !== user && i !== date && i !== amount && DESCRIPTION_COLUMN.test(name)
  );
  if (date === -1 || amount === -1 || description === -1) return undefined;

  return { date, user, description, amount, width: columns.length };
}

/**
 * Reads a row cell by cell under its header. Returns undefined when the cells
 * do not line up with the header, so the caller can fall back to the layout
 * recognizers.
 */
export function readColumnRow(
  rawLine: string,
  layout: ColumnLayout,
  context: RecognizerContext
): ColumnRow | undefined {
  const cells = splitRowCells(rawLine).map(normalizeLine);
  if (cells.length !== layout.width) return undefined;

  const date = cells[layout.date];
  const userName = cells[layout.user];
  const description = cells[layout.description];
  const amount = cells[layout.amount];
  if (date === undefined || userName === undefined || description === undefined || amount === undefined) {
    return undefined;
  }

  if (tryNormalizeDate(date, context) === undefined || tryNormalizeAmount(amount) === undefined) return undefined;
  if (!isValidDescription(description) || !isValidNameFormat(userName)) return undefined;

  return {
    match: {
      recognizerId: 'header-columns',
      fields: { date, description, amount },
      confidence: calculateConfidence(date, amount, description, context),
      consumedLines: 1,
    },
    userName,
  };
}
