import { normalizeAmount, normalizeDate, type DateContext } from '@stmtscan/types';

export function tryNormalizeDate(dateText: string, context: DateContext): string | undefined {
  try {
    return normalizeDate(dateText, context);
  } catch {
    return undefined;
  }
}

export function tryNormalizeAmount(amountText: string): number | undefined {
  try {
    return normalizeAmount(amountText);
  } catch {
    return undefined;
  }
}
