import type { DateContext, StatementMetadata } from '@stmtscan/types';
import { extractDueDate } from './due-date.js';
import { extractMinimumPayment } from './minimum-payment.js';
import { extractRewardPoints, extractCashBack } from './reward-points.js';
import { extractBalance } from './balance.js';

export interface MetadataContext extends DateContext {
  accountType?: string | undefined;
}

/** Each field is extracted independently; a field that is not found stays absent. */
export function extractStatementMetadata(text: string, context: MetadataContext): StatementMetadata {
  const lines = text.split(/\r?\n/);
  const metadata: StatementMetadata = {};

  const paymentDueDate = extractDueDate(lines, context);
  if (paymentDueDate !== undefined) metadata.paymentDueDate = paymentDueDate;

  const minimumPaymentDue = extractMinimumPayment(lines);
  if (minimumPaymentDue !== undefined) metadata.minimumPaymentDue = minimumPaymentDue;

  const rewardPoints = extractRewardPoints(lines);
  if (rewardPoints !== undefined) metadata.rewardPoints = rewardPoints;

  const cashBack = extractCashBack(text);
  if (cashBack !== undefined) metadata.cashBack = cashBack;

  const balance = extractBalance(text, context.accountType);
  if (balance !== undefined) metadata.balance = balance;

  return metadata;
}

export { extractDueDate } from './due-date.js';
export { extractMinimumPayment } from './minimum-payment.js';
export { extractRewardPoints, extractCashBack } from './reward-points.js';
export {
  extractBalance,
  extractCreditCardBalance,
  extractDepositoryBalance,
  findBalanceMatches,
  selectBestMatch,
  classifyAccountType,
  type BalanceMatch,
  type BalanceAccountKind,
} from './balance.js';
export { parseMetadataAmount } from './amount.js';
