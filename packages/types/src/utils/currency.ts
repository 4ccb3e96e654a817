export type CurrencyCode = 'USD' | 'EUR' | 'GBP' | 'INR' | 'JPY' | 'CNY';

const CHINESE_FILENAME_HINTS = /CITIC|CHINA|CHINESE|UNIONPAY|CNY|YUAN/;

/**
 * Currency of a single amount. The amount text wins; yen/yuan symbols are
 * disambiguated by the amount text first and the filename second.
 */
export function detectCurrency(amountText: string, filename?: string): CurrencyCode {
  const text = amountText.toUpperCase();
  const file = (filename ?? '').toUpperCase();

  if (text.includes('₹') || /\bRS\.?\b/.test(text) || text.includes('INR')) return 'INR';
  if (text.includes('$') || text.includes('USD')) return 'USD';
  if (text.includes('€') || text.includes('EUR')) return 'EUR';
  if (text.includes('£') || text.includes('GBP')) return 'GBP';

  if (text.includes('¥') || /CNY|JPY|YUAN|YEN/.test(text)) {
    if (/CNY|YUAN/.test(text) || CHINESE_FILENAME_HINTS.test(file)) return 'CNY';
    return 'JPY';
  }

  return 'USD';
}
