import { DEPOSITORY_BALANCE_SCAN_LENGTH, MAX_BALANCE_AMOUNT } from '@stmtscan/types';
import { getBalanceLabelData } from '../data/loader.js';
import { parseMetadataAmount } from './amount.js';

export interface BalanceMatch {
  value: number;
  label: string;
  /** Character offset of the label in the scanned text. */
  position: number;
}

export type BalanceAccountKind = 'credit' | 'depository' | 'unknown';

const AMOUNT_TOKEN = '(\\(?\\s*[-+]?[$€£¥₹]?\\s*\\d[\\d,.]*\\s*\\)?)';

// "New Balance:" with an explicit colon is followed by repeated summary values.
const RUNNING_TOTAL = /new\s+balance\s*[:：]\s*(\(?[$€£¥₹]?\s*\d[\d,]*(?:\.\d{1,2})?\s*[$€£¥₹]?\)?)(?=[,;]|\s|$)/i;

const CANONICAL_LABEL = /^(?:new )?balance$/i;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

const labelPatterns = new Map<string, RegExp>();

function labelPattern(label: string): RegExp {
  let pattern = labelPatterns.get(label);
  if (pattern === undefined) {
    pattern = new RegExp(`(?<!\\p{L})${escapeRegExp(label)}[:：\\s]+[$€£¥₹]?\\s*${AMOUNT_TOKEN}`, 'giu');
    labelPatterns.set(label, pattern);
  }
  return pattern;
}

function isWithinBounds(value: number): boolean {
  return Math.abs(value) <= MAX_BALANCE_AMOUNT;
}

function parseBalanceValue(text: string): number | undefined {
  const value = parseMetadataAmount(text.trim().replace(/[.,]$/, ''));
  return value !== undefined && isWithinBounds(value) ? value : undefined;
}

export function classifyAccountType(accountType: string | undefined): BalanceAccountKind {
  if (accountType === undefined) return 'unknown';
  const lower = accountType.toLowerCase();
  if (lower.includes('credit') || lower.includes('card')) return 'credit';
  if (/checking|savings|money[\s_]?market|depository|bank/.test(lower)) return 'depository';
  return 'unknown';
}

/** First parseable value after `label`, at most one per label. */
export function findBalanceMatches(text: string, label: string): BalanceMatch[] {
  const pattern = labelPattern(label);
  for (const match of text.matchAll(pattern)) {
    const value = match[1] === undefined ? undefined : parseBalanceValue(match[1]);
    if (value !== undefined) return [{ value, label, position: match.index ?? 0 }];
  }
  return [];
}

/** Earliest position wins; on a tie the plain English label wins. */
export function selectBestMatch(matches: readonly BalanceMatch[]): BalanceMatch | undefined {
  return [...matches].sort((a, b) => {
    if (a.position !== b.position) return a.position - b.position;
    const aCanonical = CANONICAL_LABEL.test(a.label);
    const bCanonical = CANONICAL_LABEL.test(b.label);
    if (aCanonical === bCanonical) return 0;
    return aCanonical ? -1 : 1;
  })[0];
}

function extractRunningTotal(text: string): number | undefined {
  const valueText = RUNNING_TOTAL.exec(text)?.[1];
  return valueText === undefined ? undefined : parseBalanceValue(valueText);
}

function bestForLabels(text: string, labels: readonly string[]): number | undefined {
  return selectBestMatch(labels.flatMap((label) => findBalanceMatches(text, label)))?.value;
}

export function extractCreditCardBalance(text: string): number | undefined {
  return extractRunningTotal(text) ?? bestForLabels(text, getBalanceLabelData().creditCard);
}

export function extractDepositoryBalance(text: string): number | undefined {
  return bestForLabels(text.slice(0, DEPOSITORY_BALANCE_SCAN_LENGTH), getBalanceLabelData().depository);
}

export function extractBalance(text: string, accountType?: string): number | undefined {
  switch (classifyAccountType(accountType)) {
    case 'credit':
      return extractCreditCardBalance(text);
    case 'depository':
      return extractDepositoryBalance(text);
    case 'unknown':
      return extractCreditCardBalance(text) ?? extractDepositoryBalance(text);
  }
}
