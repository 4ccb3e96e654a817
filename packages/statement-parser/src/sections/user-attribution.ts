import { USER_ATTRIBUTION_WINDOW } from '@stmtscan/types';
import { getNameFilterData } from '../data/loader.js';
import { isAllCapsName, isValidNameFormat, matchesAccountHolderName } from './name-filter.js';

const ZIP_CODE = /\b\d{5}(?:-\d{4})?\b|\b\d{5}\s+\d{4}\b/;
const ADDRESS_KEYWORD =
  /\b(?:address|street|avenue|road|boulevard|drive|lane|city|state|zip|po\s+box|p\.o\.\s+box|apt\.?|apartment)\b/;
const STREET_NUMBER = /^\d+\s+/;
const STREET_WORD = /\b(?:street|avenue|road|boulevard|drive|lane)\b/;

const ACCOUNT_PATTERNS: readonly RegExp[] = Object.freeze([
  /\baccount\s+(?:ending|number|#)/,
  /\baccount\s+\*{0,4}\d{4,}/,
  /\bcard\s+(?:ending|number|#)/,
  /\bcard\s+\*{0,4}\d{4,}/,
  /\b\d{4}\s+\d{4}\s+\d{4}\s+\d{4}/,
]);

const CARD_MEMBER_LABEL = /^card\s*member\b\s*:?\s*(.+)$/i;
const NAME_LABEL =
  /^(?:name|user|cardholder|holder|primary\s+account\s+holder|account\s+owner|beneficiary|borrower)\b\s*:?\s*(.+)$/i;
const TABLE_HEADING = /\bdate\s+description\s+amount|\btransaction\s+date/;
const MAX_NAME_LENGTH = 100;

export function isAddressLine(line: string): boolean {
  const lower = line.trim().toLowerCase();
  if (lower === '') return false;
  return ZIP_CODE.test(lower) || ADDRESS_KEYWORD.test(lower) || STREET_NUMBER.test(lower);
}

export function hasAccountOrCardPattern(line: string): boolean {
  const lower = line.trim().toLowerCase();
  return lower !== '' && ACCOUNT_PATTERNS.some((pattern) => pattern.test(lower));
}

let nonNamePhrases: readonly string[] | undefined;

function isNonNameLine(lower: string): boolean {
  nonNamePhrases ??= getNameFilterData().nonNameLinePhrases;
  return nonNamePhrases.some((phrase) => lower.includes(phrase)) || TABLE_HEADING.test(lower);
}

/** `John & Mary Doe` names the first holder: `John Doe`. */
function firstJointName(name: string): string {
  const [first = '', second = ''] = name.split('&').map((part) => part.trim());
  const secondWords = second.split(/\s+/);
  return secondWords.length > 1 ? `${first} ${secondWords[secondWords.length - 1] ?? ''}`.trim() : first;
}

function labelledName(line: string): string | undefined {
  const cardMember = CARD_MEMBER_LABEL.exec(line)?.[1]?.trim();
  if (cardMember !== undefined && cardMember.length <= MAX_NAME_LENGTH && isValidNameFormat(cardMember)) {
    return cardMember;
  }

  const labelled = NAME_LABEL.exec(line)?.[1]?.trim();
  if (labelled === undefined) return undefined;
  const name = labelled.includes('&') ? firstJointName(labelled) : labelled;
  return name.length <= MAX_NAME_LENGTH && isValidNameFormat(name) ? name : undefined;
}

/** An all-caps name is confirmed by an address or card/account line right after it. */
function isConfirmedByContext(lines: readonly string[], index: number, targetIndex: number): boolean {
  const next = index + 1 < targetIndex ? (lines[index + 1] ?? '').trim() : '';
  if (next !== '' && (isAddressLine(next) || hasAccountOrCardPattern(next))) return true;

  const afterNext = index + 2 < targetIndex ? (lines[index + 2] ?? '').trim() : '';
  return (
    next !== '' &&
    ZIP_CODE.test(afterNext) &&
    (STREET_NUMBER.test(next) || STREET_WORD.test(next.toLowerCase()))
  );
}

/**
 * Name candidates from the lines above `targetIndex`, nearest first, never
 * reaching above `floor`. All-caps names backed by an address or account line
 * come before the rest.
 */
export function findUsernameCandidates(
  lines: readonly string[],
  targetIndex: number,
  window: number = USER_ATTRIBUTION_WINDOW,
  floor = 0
): string[] {
  const confirmed: string[] = [];
  const others: string[] = [];
  const start = Math.max(0, floor, targetIndex - window);

  for (let i = Math.min(targetIndex, lines.length) - 1; i >= start; i--) {
    const line = (lines[i] ?? '').trim().replace(/,\s*$/, '').trim();
    if (line === '' || line.length > 500) continue;
    if (isNonNameLine(line.toLowerCase())) continue;

    const labelled = labelledName(line);
    if (labelled !== undefined) {
      others.push(labelled);
      continue;
    }

    if (!isValidNameFormat(line)) continue;
    if (isAllCapsName(line) && isConfirmedByContext(lines, i, targetIndex)) {
      confirmed.push(line);
    } else {
      others.push(line);
    }
  }
  return [...confirmed, ...others];
}

/**
 * Picks the cardholder printed above a header or transaction line. With a
 * known holder only names matching it count; all-caps names win either way.
 * Lines below `floor` belong to earlier rows and are not searched.
 */
export function attributeUser(
  lines: readonly string[],
  targetIndex: number,
  holderName?: string,
  floor = 0
): string | undefined {
  const candidates = findUsernameCandidates(lines, targetIndex, USER_ATTRIBUTION_WINDOW, floor);
  const pool =
    holderName === undefined || holderName.trim() === ''
      ? candidates
      : candidates.filter((candidate) => matchesAccountHolderName(candidate, holderName));

  return pool.find(isAllCapsName) ?? pool[0];
}
