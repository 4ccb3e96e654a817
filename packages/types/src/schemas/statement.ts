import { z } from 'zod';
import {
  MAX_TRANSACTIONS_PER_DOCUMENT,
  MULTI_LINE_LOOKAHEAD,
  MAX_TEXT_BEFORE_AMOUNT,
} from '../utils/constants.js';

const ISODateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Date must be in YYYY-MM-DD format');

export const CurrencyCodeSchema = z.enum(['USD', 'EUR', 'GBP', 'INR', 'JPY', 'CNY']);

export const RecognizerIdSchema = z.enum([
  'header-columns',
  'date-description-amount',
  'prefixed-date-description-amount',
  'date-posting-description-amount',
  'card-suffix-transaction-id',
  'date-posting-merchant-location',
  'multi-line',
  'fuzzy',
]);
export type RecognizerId = z.infer<typeof RecognizerIdSchema>;

export const YearSourceSchema = z.enum([
  'closing-date',
  'date-range',
  'due-date',
  'statement-period',
  'filename',
  'current-year',
]);
export type YearSource = z.infer<typeof YearSourceSchema>;

export const AccountContextSchema = z.object({
  accountType: z.string().optional(),
  accountSubtype: z.string().optional(),
  accountHolderName: z.string().optional(),
});
export type AccountContext = z.infer<typeof AccountContextSchema>;

export const ParseOptionsSchema = z.object({
  filename: z.string().optional(),
  account: AccountContextSchema.optional(),
  now: z.date().optional(),
  debug: z.boolean().default(false),
  maxTransactions: z.number().int().positive().default(MAX_TRANSACTIONS_PER_DOCUMENT),
  multiLineLookahead: z.number().int().min(1).max(20).default(MULTI_LINE_LOOKAHEAD),
  maxTextBeforeAmount: z.number().int().min(0).max(500).default(MAX_TEXT_BEFORE_AMOUNT),
});
export type ParseOptionsInput = z.input<typeof ParseOptionsSchema>;
export type ParseOptions = z.output<typeof ParseOptionsSchema>;

export const TransactionSchema = z.object({
  date: ISODateSchema,
  amount: z.number(),
  description: z.string().min(1),
  userName: z.string().optional(),
  merchantName: z.string().optional(),
  currencyCode: CurrencyCodeSchema,
  lineNumber: z.number().int().positive(),
  recognizerId: RecognizerIdSchema,
  confidence: z.number().min(0).max(1),
});
export type Transaction = z.infer<typeof TransactionSchema>;

export const StatementMetadataSchema = z.object({
  paymentDueDate: ISODateSchema.optional(),
  minimumPaymentDue: z.number().optional(),
  rewardPoints: z.number().int().nonnegative().optional(),
  cashBack: z.number().optional(),
  balance: z.number().optional(),
});
export type StatementMetadata = z.infer<typeof StatementMetadataSchema>;

export const ParseStatsSchema = z.object({
  linesScanned: z.number().int().nonnegative(),
  sectionsFound: z.number().int().nonnegative(),
  transactionsFound: z.number().int().nonnegative(),
  rowsSkipped: z.number().int().nonnegative(),
  totalDebits: z.number(),
  totalCredits: z.number(),
});
export type ParseStats = z.infer<typeof ParseStatsSchema>;

export const SectionDebugSchema = z.object({
  headerLine: z.number().int().nonnegative(),
  endLine: z.number().int().nonnegative(),
  columns: z.array(z.string()),
  userName: z.string().optional(),
});
export type SectionDebug = z.infer<typeof SectionDebugSchema>;

export const ParseDebugSchema = z.object({
  headersFound: z.boolean(),
  sections: z.array(SectionDebugSchema),
  recognizerHits: z.record(z.string(), z.number().int().nonnegative()),
  skippedByKind: z.record(z.string(), z.number().int().nonnegative()),
});
export type ParseDebug = z.infer<typeof ParseDebugSchema>;

export const StatementParseResultSchema = z.object({
  transactions: z.array(TransactionSchema),
  errors: z.array(z.string()),
  warnings: z.array(z.string()),
  metadata: StatementMetadataSchema,
  locale: z.object({ isDomestic: z.boolean() }),
  inferredYear: z.number().int(),
  yearSource: YearSourceSchema,
  stats: ParseStatsSchema,
  debug: ParseDebugSchema.optional(),
});
export type StatementParseResult = z.infer<typeof StatementParseResultSchema>;
