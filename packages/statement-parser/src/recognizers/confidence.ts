import { daysBetween, toISODateString } from '@stmtscan/types';
import { tryNormalizeAmount, tryNormalizeDate } from './field-parsing.js';
import type { RecognizerContext } from './types.js';

const FIVE_YEARS_IN_DAYS = 5 * 365;

/**
 * Score a field set in [0, 1]. Unparseable dates or amounts keep the base
 * score; the driver rejects them later with a row error.
 */
export function calculateConfidence(
  dateText: string,
  amountText: string,
  description: string,
  context: RecognizerContext
): number {
  let confidence = 1.0;

  const date = tryNormalizeDate(dateText, context);
  if (date !== undefined && daysBetween(date, toISODateString(context.now)) > FIVE_YEARS_IN_DAYS) {
    confidence *= 0.8;
  }

  const amount = tryNormalizeAmount(amountText);
  if (amount !== undefined && Math.abs(amount) < 0.01) {
    confidence *= 0.5;
  }

  if (description.length < 3) {
    confidence *= 0.7;
  } else if (description.length > 200) {
    confidence *= 0.8;
  }

  return Math.min(confidence, 1.0);
}
