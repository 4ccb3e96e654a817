import { MAX_REWARD_POINTS } from '@stmtscan/types';
import { parseMetadataAmount } from './amount.js';

type RewardKind = 'points' | 'cash-back';

interface RewardPattern {
  name: string;
  kind: RewardKind;
  /** Higher runs first. */
  priority: number;
  pattern: RegExp;
}

interface RewardMatch {
  kind: RewardKind;
  value: number;
}

const MAX_CASH_BACK = 999_999.99;

const POINTS_VALUE = '(\\d{1,7}(?:,\\d{3})*)';
const NOT_A_DATE = '(?![\\d/]{1,2}/[\\d/]{1,2}/\\d{2,4})';
const POINTS_LABEL =
  '(?:membership\\s+rewards\\s+points|citi\\s+thank\\s+you\\s+points|thank\\s+you\\s+points|rewards\\s+points|points|pts)';
const CASH_VALUE = '(\\(?\\s*[$€£¥₹]?\\s*-?\\d[\\d,]*(?:\\.\\d{1,2})?\\s*\\)?)';

function reward(name: string, kind: RewardKind, priority: number, source: string): RewardPattern {
  return { name, kind, priority, pattern: new RegExp(source, 'i') };
}

const REWARD_PATTERNS: readonly RewardPattern[] = Object.freeze(
  [
    reward('points-as-of-date', 'points', 100, `${POINTS_LABEL}\\s+as\\s+of\\s+\\d{1,2}/\\d{1,2}/\\d{2,4}[\\s:]+${POINTS_VALUE}`),
    reward('points-transferred-to', 'points', 95, `total\\s+points\\s+transferred\\s+to\\s+[a-z\\s]+?\\s+${POINTS_VALUE}`),
    reward(
      'points-available-for-redemption',
      'points',
      90,
      `total\\s+points\\s+available\\s+for\\s+(?:redemption|redeeming|use)\\s+${POINTS_VALUE}`
    ),
    reward('cash-back-rewards-balance', 'cash-back', 90, `cash\\s*back\\s+rewards?\\s+balance[:\\s]*${CASH_VALUE}`),
    reward('points-available', 'points', 85, `(?:points|pts|rewards\\s+points)\\s+available[:\\s]+${NOT_A_DATE}${POINTS_VALUE}`),
    reward('cash-back-balance', 'cash-back', 85, `cash\\s*back\\s+balance[:\\s]*${CASH_VALUE}`),
    reward('available-points', 'points', 80, `available\\s+(?:points|pts|rewards\\s+points)[:\\s]+${NOT_A_DATE}${POINTS_VALUE}`),
    reward('rewards-balance', 'cash-back', 80, `rewards?\\s+balance[:\\s]*${CASH_VALUE}`),
    reward('cash-back-earned', 'cash-back', 78, `cash\\s*back(?:\\s+rewards?)?(?:\\s+earned)?[:\\s]+(\\(?\\s*[$€£¥₹]\\s*\\d[\\d,]*(?:\\.\\d{1,2})?\\s*\\)?)`),
    reward('miles', 'points', 75, `(?:available\\s+)?miles?[:\\s]+${NOT_A_DATE}${POINTS_VALUE}`),
    reward('points-standard', 'points', 70, `${POINTS_LABEL}[\\s:]+${NOT_A_DATE}${POINTS_VALUE}`),
    reward('points-balance', 'points', 65, `(?:points|pts|rewards\\s+points)\\s+balance[:\\s]+${POINTS_VALUE}`),
    reward('points-simple', 'points', 60, `(?:points|pts)[\\s:]+${NOT_A_DATE}${POINTS_VALUE}`),
  ].sort((a, b) => b.priority - a.priority)
);

function parsePoints(text: string): number | undefined {
  const points = Number.parseInt(text.replace(/,/g, ''), 10);
  return Number.isNaN(points) || points < 0 || points > MAX_REWARD_POINTS ? undefined : points;
}

/**
 * The highest-priority reward on a line. A cash-back label wins over a points
 * label on the same line, so dollar rewards never turn into points.
 */
function matchReward(line: string): RewardMatch | undefined {
  for (const { kind, pattern } of REWARD_PATTERNS) {
    const valueText = pattern.exec(line)?.[1];
    if (valueText === undefined || valueText.trim() === '') continue;

    if (kind === 'points') {
      const points = parsePoints(valueText);
      if (points !== undefined) return { kind, value: points };
    } else {
      const cashBack = parseMetadataAmount(valueText);
      if (cashBack !== undefined && Math.abs(cashBack) <= MAX_CASH_BACK) return { kind, value: cashBack };
    }
  }
  return undefined;
}

const SPLIT_LABEL = /points|pts|rewards|miles|available|total/i;
const GROUPED_NUMBER = /(\d{1,7}(?:,\d{3})+)/;
const SLASH_DATE = /\d{1,2}\/\d{1,2}\/\d{2,4}/;
const ACCOUNT_SUFFIX = /\d{4}\s*$/;
const ACCOUNT_OR_AS_OF = /account|as\s+of/i;

/** A value line below a points label: grouped digits, no date, no account suffix. */
function splitLineValue(line: string): number | undefined {
  if (SLASH_DATE.test(line) || ACCOUNT_SUFFIX.test(line)) return undefined;
  const grouped = GROUPED_NUMBER.exec(line)?.[1];
  return grouped === undefined ? undefined : parsePoints(grouped);
}

export function extractRewardPoints(lines: readonly string[]): number | undefined {
  const trimmed = lines.map((line) => line.trim());

  for (const line of trimmed) {
    if (line === '') continue;
    const match = matchReward(line);
    if (match?.kind === 'points') return match.value;
  }

  for (let i = 0; i < trimmed.length - 1; i++) {
    if (!SPLIT_LABEL.test(trimmed[i] ?? '')) continue;
    const next = trimmed[i + 1] ?? '';

    const value = splitLineValue(next);
    if (value !== undefined) return value;

    if (ACCOUNT_OR_AS_OF.test(next)) {
      const afterNext = splitLineValue(trimmed[i + 2] ?? '');
      if (afterNext !== undefined) return afterNext;
    }
  }
  return undefined;
}

function cashBackOf(text: string): number | undefined {
  const match = matchReward(text);
  return match?.kind === 'cash-back' ? match.value : undefined;
}

/**
 * Dollar-denominated rewards. Tried on the whole text with line breaks
 * folded, then per line, then on each line joined with the next.
 */
export function extractCashBack(text: string): number | undefined {
  const folded = text.replace(/\r?\n/g, ' ').replace(/\s+/g, ' ').trim();
  const whole = cashBackOf(folded);
  if (whole !== undefined) return whole;

  const lines = text.split(/\r?\n/).map((line) => line.trim());
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i] ?? '';
    if (line === '') continue;

    const single = cashBackOf(line);
    if (single !== undefined) return single;

    if (i + 1 < lines.length) {
      const joined = cashBackOf(`${line} ${lines[i + 1] ?? ''}`);
      if (joined !== undefined) return joined;
    }
  }
  return undefined;
}
