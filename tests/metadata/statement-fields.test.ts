import { describe, it, expect } from 'vitest';
import {
  extractDueDate,
  extractMinimumPayment,
  extractStatementMetadata,
  parseMetadataAmount,
} from '@stmtscan/statement-parser';

describe('extractDueDate', () => {
  it('should read a labelled due date with its year', () => {
    expect(extractDueDate(['Payment Due Date: 01/15/2025'], { isDomestic: true })).toBe('2025-01-15');
  });

  it('should use the inferred year for a short date', () => {
    expect(extractDueDate(['Payment Due Date 02/10'], { isDomestic: true, inferredYear: 2024 })).toBe('2024-02-10');
  });

  it('should return undefined without a label', () => {
    expect(extractDueDate(['Closing Date 12/14/2024'], { isDomestic: true })).toBeUndefined();
  });
});

describe('extractMinimumPayment', () => {
  it('should read the labelled minimum payment', () => {
    expect(extractMinimumPayment(['Minimum Payment Due: $35.00'])).toBe(35);
  });

  it('should skip zero values and keep looking', () => {
    expect(extractMinimumPayment(['Minimum Payment Due: $0.00', 'Min Payment: $25.00'])).toBe(25);
  });

  it('should ignore parentheses around the value', () => {
    expect(extractMinimumPayment(['Minimum Payment Due ($40.00)'])).toBe(40);
  });
});

describe('parseMetadataAmount', () => {
  it('should read signs and grouping', () => {
    expect(parseMetadataAmount('(1,234.56)')).toBe(-1234.56);
    expect(parseMetadataAmount('€1.234,56')).toBe(1234.56);
    expect(parseMetadataAmount('-$5.00')).toBe(-5);
  });

  it('should reject non-numeric text', () => {
    expect(parseMetadataAmount('abc')).toBeUndefined();
  });
});

describe('extractStatementMetadata', () => {
  it('should leave fields absent when nothing is found', () => {
    expect(extractStatementMetadata('Nothing to see', { isDomestic: true, inferredYear: 2024 })).toEqual({});
  });

  it('should collect every field that is present', () => {
    const text = [
      'Payment Due Date: 01/08/2025',
      'New Balance: $1,234.56',
      'Minimum Payment Due: $35.00',
      'Rewards Points Available: 8,250',
    ].join('\n');
    expect(extractStatementMetadata(text, { isDomestic: true, inferredYear: 2024, accountType: 'Credit Card' })).toEqual({
      paymentDueDate: '2025-01-08',
      minimumPaymentDue: 35,
      rewardPoints: 8250,
      balance: 1234.56,
    });
  });
});
