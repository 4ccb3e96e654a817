import { describe, it, expect } from 'vitest';
import { readColumnRow, resolveColumnLayout, type RecognizerContext } from '@stmtscan/statement-parser';

const context: RecognizerContext = {
  isDomestic: true,
  inferredYear: 2024,
  now: new Date(2024, 11, 1),
  multiLineLookahead: 7,
  maxTextBeforeAmount: 50,
};

const layout = { date: 0, user: 1, description: 2, amount: 3, width: 4 };

describe('resolveColumnLayout', () => {
  it('should locate each column of a user header', () => {
    expect(resolveColumnLayout(['Date', 'User', 'Description', 'Amount'])).toEqual(layout);
  });

  it('should not take the date column as the description', () => {
    expect(resolveColumnLayout(['Transaction Date', 'User', 'Details', 'Amount'])).toEqual(layout);
  });

  it('should return undefined without a user column', () => {
    expect(resolveColumnLayout(['Date', 'Description', 'Amount'])).toBeUndefined();
  });
});

describe('readColumnRow', () => {
  it('should map cells to fields by column', () => {
    const row = readColumnRow('10/05\tJANE DOE\tGROCERY OUTLET\t$45.20', layout, context);
    expect(row?.userName).toBe('JANE DOE');
    expect(row?.match).toEqual({
      recognizerId: 'header-columns',
      fields: { date: '10/05', description: 'GROCERY OUTLET', amount: '$45.20' },
      confidence: 1,
      consumedLines: 1,
    });
  });

  it('should return undefined when the cells do not line up with the header', () => {
    expect(readColumnRow('10/05 JANE DOE GROCERY OUTLET $45.20', layout, context)).toBeUndefined();
  });

  it('should reject a user cell that is not a name', () => {
    expect(readColumnRow('10/05  Bank Of America  GROCERY OUTLET  $45.20', layout, context)).toBeUndefined();
  });

  it('should reject a date cell that does not parse', () => {
    expect(readColumnRow('pending  JANE DOE  GROCERY OUTLET  $45.20', layout, context)).toBeUndefined();
  });
});
