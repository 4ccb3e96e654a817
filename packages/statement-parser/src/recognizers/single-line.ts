import type { RecognizerId } from '@stmtscan/types';
import { LAYOUT_PATTERNS, EXPLICIT_AMOUNT_MARKER } from './patterns.js';
import { isValidDescription, stripLeadingDates } from './description.js';
import { calculateConfidence } from './confidence.js';
import type { CandidateFields, CandidateMatch, LineRecognizer, RecognizerContext, RecognizerInput } from './types.js';

interface LayoutFields {
  date: string | undefined;
  description: string | undefined;
  amount: string | undefined;
  merchant?: string | undefined;
  location?: string | undefined;
}

interface LayoutDefinition {
  id: RecognizerId;
  pattern: RegExp;
  /** Multiplier on the base confidence. */
  weight: number;
  fields: (match: RegExpMatchArray) => LayoutFields;
  accepts?: (line: string, fields: CandidateFields) => boolean;
}

function buildCandidate(
  definition: LayoutDefinition,
  line: string,
  context: RecognizerContext
): CandidateMatch | undefined {
  const match = line.match(definition.pattern);
  if (match === null) return undefined;

  const raw = definition.fields(match);
  if (raw.date === undefined || raw.description === undefined || raw.amount === undefined) {
    return undefined;
  }

  const description = stripLeadingDates(raw.description);
  if (!isValidDescription(description)) return undefined;

  const fields: CandidateFields = { date: raw.date, description, amount: raw.amount.trim() };
  if (raw.merchant !== undefined) fields.merchant = raw.merchant.trim();
  if (raw.location !== undefined) fields.location = raw.location.trim();

  if (definition.accepts !== undefined && !definition.accepts(line, fields)) return undefined;

  const confidence = calculateConfidence(fields.date, fields.amount, description, context) * definition.weight;
  return { recognizerId: definition.id, fields, confidence, consumedLines: 1 };
}

function createLayoutRecognizer(definition: LayoutDefinition): LineRecognizer {
  return {
    id: definition.id,
    recognize(input: RecognizerInput, context: RecognizerContext): CandidateMatch | undefined {
      const line = input.lines[input.index];
      if (line === undefined || line === '') return undefined;
      return buildCandidate(definition, line, context);
    },
  };
}

function joinMerchantLocation(merchant: string | undefined, location: string | undefined): string | undefined {
  if (merchant === undefined || location === undefined) return undefined;
  return `${stripLeadingDates(merchant)} ${location.trim()}`;
}

export const dateDescriptionAmountRecognizer = createLayoutRecognizer({
  id: 'date-description-amount',
  pattern: LAYOUT_PATTERNS.DATE_DESCRIPTION_AMOUNT,
  weight: 1.0,
  fields: (m) => ({ date: m[1], description: m[2], amount: m[3] }),
  // Unmarked trailing numbers are left to the looser layouts
  accepts: (_line, fields) => EXPLICIT_AMOUNT_MARKER.test(fields.amount),
});

export const prefixedDateDescriptionAmountRecognizer = createLayoutRecognizer({
  id: 'prefixed-date-description-amount',
  pattern: LAYOUT_PATTERNS.PREFIXED_DATE_DESCRIPTION_AMOUNT,
  weight: 0.9,
  fields: (m) => ({ date: m[1], description: m[2], amount: m[3] }),
  accepts: (line) => !line.includes('%'),
});

export const datePostingDescriptionAmountRecognizer = createLayoutRecognizer({
  id: 'date-posting-description-amount',
  pattern: LAYOUT_PATTERNS.DATE_POSTING_DESCRIPTION_AMOUNT,
  weight: 0.95,
  fields: (m) => ({ date: m[2], description: m[3], amount: m[4] }),
});

export const cardSuffixTransactionIdRecognizer = createLayoutRecognizer({
  id: 'card-suffix-transaction-id',
  pattern: LAYOUT_PATTERNS.CARD_SUFFIX_TRANSACTION_ID,
  weight: 0.9,
  fields: (m) => ({
    date: m[3],
    description: joinMerchantLocation(m[5], m[6]),
    amount: m[7],
    merchant: m[5],
    location: m[6],
  }),
});

export const datePostingMerchantLocationRecognizer = createLayoutRecognizer({
  id: 'date-posting-merchant-location',
  pattern: LAYOUT_PATTERNS.DATE_POSTING_MERCHANT_LOCATION,
  weight: 0.9,
  fields: (m) => ({
    date: m[2],
    description: joinMerchantLocation(m[3], m[4]),
    amount: m[5],
    merchant: m[3],
    location: m[4],
  }),
});

export const SINGLE_LINE_RECOGNIZERS: readonly LineRecognizer[] = Object.freeze([
  dateDescriptionAmountRecognizer,
  prefixedDateDescriptionAmountRecognizer,
  datePostingDescriptionAmountRecognizer,
  cardSuffixTransactionIdRecognizer,
  datePostingMerchantLocationRecognizer,
]);
