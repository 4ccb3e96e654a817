import { describe, it, expect } from 'vitest';
import { multiLineRecognizer, extractTrailingAmount, type RecognizerContext } from '@stmtscan/statement-parser';

const context: RecognizerContext = {
  isDomestic: true,
  inferredYear: 2025,
  now: new Date(2025, 11, 1),
  multiLineLookahead: 7,
  maxTextBeforeAmount: 50,
};

describe('multiLineRecognizer', () => {
  it('should join a dated line, its continuation and the amount line', () => {
    const lines = ['11/27/25 MERCHANT NAME', 'SEATTLE WA', '-$9.99', '11/28/25 BOOK STORE $15.00'];
    const match = multiLineRecognizer.recognize({ lines, index: 0 }, context);

    expect(match?.recognizerId).toBe('multi-line');
    expect(match?.fields).toEqual({ date: '11/27/25', description: 'MERCHANT NAME SEATTLE WA', amount: '-$9.99' });
    expect(match?.consumedLines).toBe(3);
    expect(match?.confidence).toBe(1);
  });

  it('should stop at the next dated line', () => {
    const lines = ['11/27/25 MERCHANT NAME', '11/28/25 OTHER SHOP', '-$9.99'];
    expect(multiLineRecognizer.recognize({ lines, index: 0 }, context)).toBeUndefined();
  });

  it('should not look past the lookahead window', () => {
    const lines = ['11/27/25 MERCHANT NAME', 'LINE A', 'LINE B', '$9.99'];
    const narrow = { ...context, multiLineLookahead: 2 };
    expect(multiLineRecognizer.recognize({ lines, index: 0 }, narrow)).toBeUndefined();
    expect(multiLineRecognizer.recognize({ lines, index: 0 }, context)?.consumedLines).toBe(4);
  });

  it('should strip the attributed user from continuation lines', () => {
    const lines = ['11/27/25 JANE SMITH, COFFEE ROASTERS', '$12.40'];
    const match = multiLineRecognizer.recognize({ lines, index: 0 }, { ...context, userName: 'JANE SMITH' });
    expect(match?.fields.description).toBe('COFFEE ROASTERS');
  });

  it('should skip summary heading lines inside the group', () => {
    const lines = ['11/27/25 HARDWARE DEPOT', 'Purchases', '$40.00'];
    const match = multiLineRecognizer.recognize({ lines, index: 0 }, context);
    expect(match?.fields.description).toBe('HARDWARE DEPOT');
  });

  it('should ignore statement date banners', () => {
    const lines = ['11/27/25 Closing Date', '$40.00'];
    expect(multiLineRecognizer.recognize({ lines, index: 0 }, context)).toBeUndefined();
  });
});

describe('extractTrailingAmount', () => {
  it('should accept an amount-only line', () => {
    expect(extractTrailingAmount('$1,024.00', 50)).toBe('$1,024.00');
  });

  it('should accept an amount after a separator', () => {
    expect(extractTrailingAmount('project-x | $14.27', 50)).toBe('$14.27');
  });

  it('should reject totals and long text before the amount', () => {
    expect(extractTrailingAmount('Total: $50.00', 50)).toBeUndefined();
    expect(extractTrailingAmount('SOME MERCHANT NAME $9.99', 50)).toBeUndefined();
  });
});
