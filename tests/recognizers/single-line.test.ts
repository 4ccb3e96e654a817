import { describe, it, expect } from 'vitest';
import {
  tryRecognizers,
  cardSuffixTransactionIdRecognizer,
  datePostingMerchantLocationRecognizer,
  dateDescriptionAmountRecognizer,
  normalizeLine,
  type RecognizerContext,
} from '@stmtscan/statement-parser';

const context: RecognizerContext = {
  isDomestic: true,
  inferredYear: 2024,
  now: new Date(2024, 11, 1),
  multiLineLookahead: 7,
  maxTextBeforeAmount: 50,
};

function recognize(line: string) {
  return tryRecognizers({ lines: [normalizeLine(line)], index: 0 }, context);
}

describe('single-line recognizers', () => {
  it('should read an ISO row date whole', () => {
    const match = recognize('2023-12-28 GROCERY OUTLET $45.20');
    expect(match?.recognizerId).toBe('date-description-amount');
    expect(match?.fields).toEqual({ date: '2023-12-28', description: 'GROCERY OUTLET', amount: '$45.20' });
  });

  it('should prefer date-description-amount when the amount carries a currency symbol', () => {
    const match = recognize('10/12 STARBUCKS STORE 123 $5.75');
    expect(match?.recognizerId).toBe('date-description-amount');
    expect(match?.fields).toEqual({ date: '10/12', description: 'STARBUCKS STORE 123', amount: '$5.75' });
    expect(match?.confidence).toBe(1);
  });

  it('should leave a bare trailing number to the prefixed layout', () => {
    const match = recognize('10/12     85C BAKERY CAFE USA BELLEVUE WA 10.50');
    expect(match?.recognizerId).toBe('prefixed-date-description-amount');
    expect(match?.fields).toEqual({ date: '10/12', description: '85C BAKERY CAFE USA BELLEVUE WA', amount: '10.50' });
    expect(match?.confidence).toBe(0.9);
  });

  it('should skip promotional text before the date', () => {
    const match = recognize('Earn double rewards 10/14 GROCERY OUTLET 23.10');
    expect(match?.recognizerId).toBe('prefixed-date-description-amount');
    expect(match?.fields.date).toBe('10/14');
    expect(match?.fields.description).toBe('GROCERY OUTLET');
  });

  it('should hand percentage lines to the fuzzy fallback', () => {
    const match = recognize('Earn 3% back 10/14 GROCERY OUTLET 23.10');
    expect(match?.recognizerId).toBe('fuzzy');
    expect(match?.fields).toEqual({ date: '10/14', description: 'GROCERY OUTLET', amount: '23.10' });
  });

  it('should read the posting date and drop it from the description', () => {
    const match = recognize('10/12 10/14 AMAZON MARKETPLACE 25.99');
    expect(match?.recognizerId).toBe('date-posting-description-amount');
    expect(match?.fields).toEqual({ date: '10/14', description: 'AMAZON MARKETPLACE', amount: '25.99' });
    expect(match?.confidence).toBe(0.95);
  });

  it('should split merchant and location after a card suffix and reference', () => {
    const line = normalizeLine('1234 10/12 10/14 REF987 BLUE BOTTLE COFFEE OAKLAND CA 6.50');
    const match = cardSuffixTransactionIdRecognizer.recognize({ lines: [line], index: 0 }, context);
    expect(match?.fields).toEqual({
      date: '10/14',
      description: 'BLUE BOTTLE COFFEE OAKLAND CA',
      amount: '6.50',
      merchant: 'BLUE BOTTLE',
      location: 'COFFEE OAKLAND CA',
    });
    expect(match?.confidence).toBe(0.9);
  });

  it('should split merchant and location after two dates', () => {
    const line = '10/12 10/14 BLUE BOTTLE COFFEE OAKLAND CA 6.50';
    const match = datePostingMerchantLocationRecognizer.recognize({ lines: [line], index: 0 }, context);
    expect(match?.recognizerId).toBe('date-posting-merchant-location');
    expect(match?.fields.merchant).toBe('BLUE BOTTLE');
    expect(match?.fields.location).toBe('COFFEE OAKLAND CA');
  });

  it('should read signed and parenthesized amounts', () => {
    expect(recognize('10/09 PAYMENT THANK YOU -100.00')?.fields.amount).toBe('-100.00');
    expect(recognize('10/09 REFUND ($12.00)')?.fields.amount).toBe('($12.00)');
  });

  it('should reject a description that is only a phone number', () => {
    const match = dateDescriptionAmountRecognizer.recognize({ lines: ['10/12 800-555-0100 $5.00'], index: 0 }, context);
    expect(match).toBeUndefined();
  });

  it('should lower confidence for dates far from now', () => {
    const match = recognize('01/05/2015 OLD CHARGE $5.00');
    expect(match?.recognizerId).toBe('date-description-amount');
    expect(match?.confidence).toBe(0.8);
  });
});
