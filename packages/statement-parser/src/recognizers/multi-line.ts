import { MULTI_LINE_PATTERNS } from './patterns.js';
import { isValidDescription, removeLeadingUserName } from './description.js';
import { calculateConfidence } from './confidence.js';
import { tryNormalizeAmount } from './field-parsing.js';
import type { CandidateMatch, LineRecognizer, RecognizerContext, RecognizerInput } from './types.js';

const HEADER_LINE = /closing date|statement date|\b(?:closing|statement|account ending)\b.*\b(?:fees|amount|total)\b/i;

interface AmountLine {
  index: number;
  amountText: string;
}

/**
 * Amount carried by a continuation line: either the whole line, or a trailing
 * amount after a separator or a short tag (`project-x | $14.27`).
 */
export function extractTrailingAmount(line: string, maxTextBeforeAmount: number): string | undefined {
  const cleaned = line.replace(MULTI_LINE_PATTERNS.TRAILING_MARKER, '').trim();
  if (cleaned === '') return undefined;

  const only = cleaned.match(MULTI_LINE_PATTERNS.AMOUNT_ONLY);
  if (only?.[1] !== undefined) return only[1];

  const trailing = cleaned.match(MULTI_LINE_PATTERNS.ENDS_WITH_AMOUNT);
  if (trailing?.[2] === undefined) return undefined;

  const before = (trailing[1] ?? '').trim();
  if (MULTI_LINE_PATTERNS.SUMMARY_WORD_BEFORE_AMOUNT.test(before)) return undefined;
  if (before.length > maxTextBeforeAmount) return undefined;
  if (
    before.length > 0 &&
    !MULTI_LINE_PATTERNS.SEPARATOR_BEFORE_AMOUNT.test(before) &&
    !MULTI_LINE_PATTERNS.NO_ALPHANUMERIC.test(before) &&
    before.length > 5
  ) {
    return undefined;
  }
  return trailing[2];
}

function findAmountLine(lines: readonly string[], start: number, context: RecognizerContext): AmountLine | undefined {
  const last = Math.min(start + context.multiLineLookahead, lines.length - 1);

  for (let i = start + 1; i <= last; i++) {
    const line = lines[i] ?? '';
    if (line === '') continue;
    if (MULTI_LINE_PATTERNS.NEXT_TRANSACTION.test(line)) return undefined;

    const amountText = extractTrailingAmount(line, context.maxTextBeforeAmount);
    if (amountText !== undefined) return { index: i, amountText: amountText.trim() };
  }
  return undefined;
}

/**
 * A record spread over several lines: a dated first line, continuation lines,
 * and the first following line that carries the amount.
 *
 *   11/27/25 MERCHANT NAME
 *   CITY STATE
 *   -$9.99
 */
export const multiLineRecognizer: LineRecognizer = {
  id: 'multi-line',
  recognize(input: RecognizerInput, context: RecognizerContext): CandidateMatch | undefined {
    const { lines, index } = input;
    const first = lines[index];
    if (first === undefined || first === '' || HEADER_LINE.test(first)) return undefined;

    const firstMatch = first.match(MULTI_LINE_PATTERNS.FIRST_LINE);
    const dateText = firstMatch?.[1];
    const firstDescription = firstMatch?.[2];
    if (dateText === undefined || firstDescription === undefined) return undefined;

    const amountLine = findAmountLine(lines, index, context);
    if (amountLine === undefined) return undefined;

    const amount = tryNormalizeAmount(amountLine.amountText);
    if (amount === undefined || amount === 0) return undefined;

    const parts = [removeLeadingUserName(firstDescription.trim(), context.userName)];
    for (let i = index + 1; i < amountLine.index; i++) {
      const line = lines[i] ?? '';
      if (line === '' || MULTI_LINE_PATTERNS.SUMMARY_DESCRIPTION_LINE.test(line)) continue;
      const cleaned = removeLeadingUserName(line, context.userName);
      if (cleaned !== '') parts.push(cleaned);
    }

    const description = parts.join(' ').trim();
    if (!isValidDescription(description)) return undefined;

    return {
      recognizerId: 'multi-line',
      fields: { date: dateText, description, amount: amountLine.amountText },
      confidence: calculateConfidence(dateText, amountLine.amountText, description, context),
      consumedLines: amountLine.index - index + 1,
    };
  },
};
