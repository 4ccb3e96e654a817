import { describe, it, expect } from 'vitest';
import { inferYear, yearFromFilename } from '@stmtscan/statement-parser';

describe('inferYear', () => {
  it('should prefer the closing date over the filename', () => {
    expect(inferYear('Closing Date 11/30/2024\nOther text', 'statement-2022.txt')).toEqual({
      year: 2024,
      source: 'closing-date',
    });
  });

  it('should read the closing year of a date range', () => {
    expect(inferYear('Billing Period: 12/15/2023 to 01/14/2024')).toEqual({ year: 2024, source: 'date-range' });
  });

  it('should move a January due date back a year when December is mentioned', () => {
    const text = 'Payment Due Date: 01/15/2025\nDecember purchases';
    expect(inferYear(text)).toEqual({ year: 2024, source: 'due-date' });
  });

  it('should keep the due date year otherwise', () => {
    expect(inferYear('Payment Due Date: 01/15/2025')).toEqual({ year: 2025, source: 'due-date' });
  });

  it('should read a statement period', () => {
    expect(inferYear('Statement Period: 03/01/23')).toEqual({ year: 2023, source: 'statement-period' });
  });

  it('should fall back to the filename', () => {
    expect(inferYear('no dates here', 'acct-2023-03.txt')).toEqual({ year: 2023, source: 'filename' });
  });

  it('should fall back to the current year', () => {
    expect(inferYear('no dates here', undefined, new Date(2024, 5, 1))).toEqual({
      year: 2024,
      source: 'current-year',
    });
  });
});

describe('yearFromFilename', () => {
  it('should ignore filenames without a year', () => {
    expect(yearFromFilename('statement.txt')).toBeUndefined();
    expect(yearFromFilename(undefined)).toBeUndefined();
  });
});
