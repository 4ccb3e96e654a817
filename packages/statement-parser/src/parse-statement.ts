import {
  CONFIDENCE_THRESHOLDS,
  ParseOptionsSchema,
  StatementParseError,
  detectCurrency,
  sumAmounts,
  type DateContext,
  type ParseDebug,
  type ParseOptions,
  type ParseOptionsInput,
  type ParseStats,
  type SectionDebug,
  type StatementParseResult,
  type Transaction,
} from '@stmtscan/types';
import { classifyLine, type LineClass } from './classify/line-classifier.js';
import { inferLocale } from './locale/locale-detector.js';
import { inferYear } from './locale/year-inference.js';
import { extractStatementMetadata } from './metadata/index.js';
import { tryRecognizers } from './recognizers/chain.js';
import { isValidDescription, removeLeadingUserName } from './recognizers/description.js';
import { tryNormalizeAmount, tryNormalizeDate } from './recognizers/field-parsing.js';
import { LEADING_DATE, normalizeLine } from './recognizers/patterns.js';
import type { CandidateMatch, RecognizerContext } from './recognizers/types.js';
import { readColumnRow, resolveColumnLayout, type ColumnLayout } from './sections/column-row.js';
import { segmentSections } from './sections/header-detector.js';
import { isValidNameFormat } from './sections/name-filter.js';
import { attributeUser } from './sections/user-attribution.js';

interface LineRange {
  start: number;
  end: number;
  headerIndex?: number;
  columns?: string[];
  layout?: ColumnLayout | undefined;
}

type RowOutcome = { ok: true; transaction: Transaction } | { ok: false; error: string };

const DECIMAL_AMOUNT = /\d\.\d{2}(?!\d)/;
const EXPLICIT_SIGN_MARKER = /\b(?:CR|DR|CREDIT|DEBIT)\b|(?:CR|DR)\s*\)?\s*$/;
const THANK_YOU_PAYMENT =
  /[A-Z0-9]{16,}\s+(?:AUTOMATIC|CHECK|CASH|TRANSFER|PHONE|CALL|RECEIVED)\s+PAYMENT\s*-\s*THANK\s+YOU/;

function parseOptions(options: ParseOptionsInput): ParseOptions {
  const parsed = ParseOptionsSchema.safeParse(options);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'options'}: ${issue.message}`);
    throw new StatementParseError(`Invalid parse options: ${details.join('; ')}`, 'INVALID_OPTIONS', details);
  }
  return parsed.data;
}

function isCreditAccount(accountType: string | undefined): boolean {
  return accountType !== undefined && accountType.toLowerCase().includes('credit');
}

/** Reference-numbered autopay credits print positive and stay positive. */
export function isReferencedThankYouPayment(description: string): boolean {
  const trimmed = description.trim();
  return trimmed === trimmed.toUpperCase() && THANK_YOU_PAYMENT.test(trimmed);
}

/**
 * Credit-card statements print charges positive and payments negative. Amounts
 * without an explicit CR/DR marker are flipped so charges come out negative.
 */
export function applyCreditCardSign(amount: number, amountText: string, description: string): number {
  if (EXPLICIT_SIGN_MARKER.test(amountText.toUpperCase())) return amount;
  if (isReferencedThankYouPayment(description)) return Math.abs(amount);
  return amount === 0 ? 0 : -amount;
}

function countKey(lineClass: LineClass): string {
  return lineClass.kind === 'boilerplate' ? `boilerplate:${lineClass.reason}` : lineClass.kind;
}

function increment(counts: Record<string, number>, key: string): void {
  counts[key] = (counts[key] ?? 0) + 1;
}

/**
 * Parse extracted statement text into transactions and statement metadata.
 * Throws a StatementParseError for empty text or invalid options; everything
 * else is reported through `errors` and `warnings`.
 */
export function parseStatementText(text: string, options: ParseOptionsInput = {}): StatementParseResult {
  const opts = parseOptions(options);
  if (text.trim() === '') {
    throw new StatementParseError('Statement text is empty', 'INVALID_INPUT');
  }

  const now = opts.now ?? new Date();
  const rawLines = text.split(/\r?\n/);
  const lines = rawLines.map(normalizeLine);
  const locale = inferLocale(text);
  const { year: inferredYear, source: yearSource } = inferYear(text, opts.filename, now);
  const dateContext: DateContext = { isDomestic: locale.isDomestic, inferredYear, now };

  const accountType = opts.account?.accountType;
  const holderName = opts.account?.accountHolderName;
  const fallbackUser = holderName !== undefined && isValidNameFormat(holderName) ? holderName : undefined;
  const creditAccount = isCreditAccount(accountType);

  const sections = segmentSections(rawLines);
  const ranges: LineRange[] =
    sections.length > 0
      ? sections.map((section) => ({
          start: section.headerIndex + 1,
          end: section.endIndex,
          headerIndex: section.headerIndex,
          columns: section.columns,
          layout: resolveColumnLayout(section.columns),
        }))
      : [{ start: 0, end: lines.length }];

  const transactions: Transaction[] = [];
  const errors: string[] = [];
  const warnings: string[] = [];
  const recognizerHits: Record<string, number> = {};
  const skippedByKind: Record<string, number> = {};
  const sectionDebug: SectionDebug[] = [];
  const consumed = new Set<number>();
  let rowsSkipped = 0;
  let currentUser: string | undefined;
  // First line not yet claimed by a recognized row; name look-back stops here.
  let attributionFloor = 0;
  let truncated = false;

  const buildRow = (match: CandidateMatch, lineIndex: number, userName: string | undefined): RowOutcome => {
    const rowError = (reason: string): RowOutcome => ({ ok: false, error: `Row ${lineIndex + 1}: ${reason}` });
    const { fields } = match;

    const date = tryNormalizeDate(fields.date, dateContext);
    const parsedAmount = tryNormalizeAmount(fields.amount);
    if (date === undefined || parsedAmount === undefined) {
      return rowError('Could not parse transaction (missing date or amount)');
    }
    if (parsedAmount === 0) return rowError('Skipped zero amount (informational line)');

    const description = removeLeadingUserName(fields.description, userName).trim();
    if (!isValidDescription(description)) return rowError('Invalid description');

    const amount = creditAccount ? applyCreditCardSign(parsedAmount, fields.amount, description) : parsedAmount;
    const transaction: Transaction = {
      date,
      amount,
      description,
      merchantName: fields.merchant ?? description,
      currencyCode: detectCurrency(fields.amount, opts.filename),
      lineNumber: lineIndex + 1,
      recognizerId: match.recognizerId,
      confidence: Math.round(match.confidence * 1000) / 1000,
    };
    if (userName !== undefined) transaction.userName = userName;
    return { ok: true, transaction };
  };

  for (const range of ranges) {
    if (truncated) break;

    if (range.headerIndex !== undefined) {
      currentUser = attributeUser(lines, range.headerIndex, holderName, attributionFloor) ?? fallbackUser ?? currentUser;
      const entry: SectionDebug = { headerLine: range.headerIndex + 1, endLine: range.end, columns: range.columns ?? [] };
      if (currentUser !== undefined) entry.userName = currentUser;
      sectionDebug.push(entry);
    } else {
      currentUser = fallbackUser;
    }

    for (let i = range.start; i < range.end; i++) {
      if (consumed.has(i)) continue;

      const lineClass = classifyLine(rawLines[i] ?? '');
      if (lineClass.kind !== 'transaction-like') {
        increment(skippedByKind, countKey(lineClass));
        continue;
      }

      currentUser = attributeUser(lines, i, holderName, Math.max(range.start, attributionFloor)) ?? currentUser;
      const context: RecognizerContext = {
        isDomestic: locale.isDomestic,
        inferredYear,
        now,
        userName: currentUser,
        multiLineLookahead: opts.multiLineLookahead,
        maxTextBeforeAmount: opts.maxTextBeforeAmount,
      };

      const columnRow = range.layout !== undefined ? readColumnRow(rawLines[i] ?? '', range.layout, context) : undefined;
      if (columnRow !== undefined) currentUser = columnRow.userName;

      const match = columnRow?.match ?? tryRecognizers({ lines, index: i }, context);
      if (match === undefined) {
        const line = lines[i] ?? '';
        if (LEADING_DATE.test(line) && DECIMAL_AMOUNT.test(line)) {
          errors.push(`Row ${i + 1}: Could not parse transaction (missing date or amount)`);
          rowsSkipped++;
        } else {
          increment(skippedByKind, 'unmatched');
        }
        continue;
      }

      if (transactions.length >= opts.maxTransactions) {
        errors.push(
          `Transaction limit exceeded. Maximum ${opts.maxTransactions} transactions per file. Stopping at row ${i + 1}.`
        );
        truncated = true;
        break;
      }

      for (let j = i; j < i + match.consumedLines; j++) consumed.add(j);
      attributionFloor = i + match.consumedLines;
      increment(recognizerHits, match.recognizerId);

      const outcome = buildRow(match, i, currentUser);
      if (outcome.ok) {
        transactions.push(outcome.transaction);
      } else {
        errors.push(outcome.error);
        rowsSkipped++;
      }
    }
  }

  if (transactions.length === 0) {
    warnings.push('No transactions found in statement text');
  }
  const lowConfidence = transactions.filter((t) => t.confidence < CONFIDENCE_THRESHOLDS.LOW).length;
  if (lowConfidence > 0) {
    warnings.push(`${lowConfidence} transaction(s) recognized with confidence below ${CONFIDENCE_THRESHOLDS.LOW}`);
  }
  if (yearSource === 'current-year') {
    warnings.push(`No statement year found; dates without a year use ${inferredYear}`);
  }

  const amounts = transactions.map((t) => t.amount);
  const stats: ParseStats = {
    linesScanned: lines.length,
    sectionsFound: sections.length,
    transactionsFound: transactions.length,
    rowsSkipped,
    totalDebits: sumAmounts(amounts.filter((amount) => amount < 0)),
    totalCredits: sumAmounts(amounts.filter((amount) => amount > 0)),
  };

  const result: StatementParseResult = {
    transactions,
    errors,
    warnings,
    metadata: extractStatementMetadata(text, { ...dateContext, accountType }),
    locale: { isDomestic: locale.isDomestic },
    inferredYear,
    yearSource,
    stats,
  };

  if (opts.debug) {
    const debug: ParseDebug = {
      headersFound: sections.length > 0,
      sections: sectionDebug,
      recognizerHits,
      skippedByKind,
    };
    result.debug = debug;
  }
  return result;
}
