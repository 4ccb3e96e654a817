import { US_AMOUNT_COMPONENT } from '../recognizers/patterns.js';
import { parseMetadataAmount } from './amount.js';

const MINIMUM_PAYMENT_PATTERNS: readonly RegExp[] = Object.freeze(
  [
    'minimum\\s+payment\\s+due',
    'min(?:imum)?\\s+payment\\s+due',
    'minimum\\s+payment',
    'min(?:imum)?\\s+payment',
    'payment\\s+due',
  ].map((label) => new RegExp(`${label}[\\s:]*${US_AMOUNT_COMPONENT}`, 'i'))
);

export function extractMinimumPayment(lines: readonly string[]): number | undefined {
  for (const line of lines) {
    const trimmed = line.trim();
    if (trimmed === '') continue;

    for (const pattern of MINIMUM_PAYMENT_PATTERNS) {
      const amountText = pattern.exec(trimmed)?.[1];
      if (amountText === undefined) continue;
      const amount = parseMetadataAmount(amountText.replace(/[()]|\b(?:CR|DR|BF)\b/gi, ''));
      if (amount !== undefined && amount > 0) return amount;
    }
  }
  return undefined;
}
