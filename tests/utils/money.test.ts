import { describe, it, expect } from 'vitest';
import { normalizeAmount, normalizeNumberFormat, roundToTwoDecimals, sumAmounts, formatCurrency } from '@stmtscan/types';

describe('normalizeAmount', () => {
  it('should treat parentheses as negative even around CR', () => {
    expect(normalizeAmount('($123.45 CR)')).toBe(-123.45);
  });

  it('should treat a DR suffix as negative', () => {
    expect(normalizeAmount('$123.45 DR')).toBe(-123.45);
  });

  it('should treat a CR suffix as positive', () => {
    expect(normalizeAmount('$123.45 CR')).toBe(123.45);
  });

  it('should honor a leading minus before the currency symbol', () => {
    expect(normalizeAmount('-$123.45')).toBe(-123.45);
  });

  it('should honor a trailing minus', () => {
    expect(normalizeAmount('100.00-')).toBe(-100);
  });

  it('should parse plain and grouped amounts', () => {
    expect(normalizeAmount('10.50')).toBe(10.5);
    expect(normalizeAmount('$1,234.56')).toBe(1234.56);
  });

  it('should parse European and Indian grouping', () => {
    expect(normalizeAmount('€1.234,56')).toBe(1234.56);
    expect(normalizeAmount('₹12,34,567.89')).toBe(1234567.89);
  });

  it('should return zero without a sign', () => {
    expect(Object.is(normalizeAmount('-0.00'), 0)).toBe(true);
  });

  it('should be idempotent on its own output', () => {
    const first = normalizeAmount('($1,050.75)');
    expect(normalizeAmount(String(first))).toBe(first);
  });

  it('should throw on text without digits', () => {
    expect(() => normalizeAmount('abc')).toThrow('Unable to parse amount: abc');
    expect(() => normalizeAmount('   ')).toThrow('Unable to parse amount');
  });

  it('should reject amounts beyond the transaction bound', () => {
    expect(() => normalizeAmount('1,000,000,000.00')).toThrow('Amount out of range: 1,000,000,000.00');
  });
});

describe('normalizeNumberFormat', () => {
  it('should use the later separator as the decimal point', () => {
    expect(normalizeNumberFormat('1.234,56')).toBe('1234.56');
    expect(normalizeNumberFormat('1,234.56')).toBe('1234.56');
  });

  it('should read a lone separator followed by three digits as grouping', () => {
    expect(normalizeNumberFormat('1,234')).toBe('1234');
    expect(normalizeNumberFormat('1.234')).toBe('1234');
  });

  it('should read a lone separator followed by one or two digits as decimal', () => {
    expect(normalizeNumberFormat('12,5')).toBe('12.5');
    expect(normalizeNumberFormat('12.50')).toBe('12.50');
  });
});

describe('roundToTwoDecimals', () => {
  it('should round to cents', () => {
    expect(roundToTwoDecimals(10.456)).toBe(10.46);
    expect(roundToTwoDecimals(10.454)).toBe(10.45);
  });
});

describe('sumAmounts', () => {
  it('should sum without floating point drift', () => {
    expect(sumAmounts([0.1, 0.2])).toBe(0.3);
    expect(sumAmounts([])).toBe(0);
  });
});

describe('formatCurrency', () => {
  it('should format negatives with a leading minus', () => {
    expect(formatCurrency(-1234.5)).toBe('-$1,234.50');
    expect(formatCurrency(35)).toBe('$35.00');
  });
});
