import { describe, it, expect } from 'vitest';
import { fuzzyRecognizer, findDateTokens, findAmountTokens } from '@stmtscan/statement-parser';

describe('fuzzyRecognizer', () => {
  it('should keep the amount span clear of the date span', () => {
    const line = '10/12.50 COFFEE 4.25';
    const match = fuzzyRecognizer.recognize({ lines: [line], index: 0 }, {
      isDomestic: true,
      inferredYear: 2024,
      now: new Date(2024, 11, 1),
      multiLineLookahead: 7,
      maxTextBeforeAmount: 50,
    });

    expect(match?.fields).toEqual({ date: '10/12', description: '.50 COFFEE', amount: '4.25' });
    expect(match?.dateSpan).toEqual({ start: 0, end: 5 });
    expect(match?.amountSpan).toEqual({ start: 16, end: 20 });
    expect(match?.confidence).toBe(0.9);
  });

  it('should require a promotional prefix before a mid-line date', () => {
    const context = {
      isDomestic: true,
      inferredYear: 2024,
      now: new Date(2024, 11, 1),
      multiLineLookahead: 7,
      maxTextBeforeAmount: 50,
    };
    expect(fuzzyRecognizer.recognize({ lines: ['Ref 10/12 COFFEE 4.25'], index: 0 }, context)).toBeUndefined();
    expect(fuzzyRecognizer.recognize({ lines: ['5% cash back 10/12 COFFEE 4.25'], index: 0 }, context)?.fields.date).toBe(
      '10/12'
    );
    expect(fuzzyRecognizer.recognize({ lines: ['5% cash back 10-12 COFFEE 4.25'], index: 0 }, context)?.fields).toEqual({
      date: '10-12',
      description: 'COFFEE',
      amount: '4.25',
    });
  });
});

describe('findDateTokens', () => {
  it('should fall through to dotted dates when no slash date exists', () => {
    expect(findDateTokens('12.10.2024 RENT 900.00').map((token) => token.text)).toEqual(['12.10.2024']);
  });

  it('should read dashed dates like slashed ones', () => {
    expect(findDateTokens('Ref 10-12 COFFEE 4.25').map((token) => token.text)).toEqual(['10-12']);
  });

  it('should read an ISO date as one token', () => {
    expect(findDateTokens('2023-12-28 RENT 900.00').map((token) => token.text)).toEqual(['2023-12-28']);
  });
});

describe('findAmountTokens', () => {
  it('should drop amounts overlapping a date', () => {
    const line = '10/12.50 COFFEE 4.25';
    const amounts = findAmountTokens(line, findDateTokens(line));
    expect(amounts.map((token) => token.text)).toEqual(['4.25']);
  });
});
