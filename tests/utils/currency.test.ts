import { describe, it, expect } from 'vitest';
import { detectCurrency } from '@stmtscan/types';

describe('detectCurrency', () => {
  it('should default to USD', () => {
    expect(detectCurrency('12.00')).toBe('USD');
  });

  it('should detect currency symbols and codes', () => {
    expect(detectCurrency('$12.00')).toBe('USD');
    expect(detectCurrency('€5,00')).toBe('EUR');
    expect(detectCurrency('£7.25')).toBe('GBP');
    expect(detectCurrency('₹1,200.00')).toBe('INR');
    expect(detectCurrency('Rs. 450.00')).toBe('INR');
  });

  it('should read a bare yen sign as JPY', () => {
    expect(detectCurrency('¥500')).toBe('JPY');
  });

  it('should read the yen sign as CNY with a Chinese filename hint', () => {
    expect(detectCurrency('¥500', 'citic-card-2024.txt')).toBe('CNY');
    expect(detectCurrency('500 YUAN')).toBe('CNY');
  });
});
