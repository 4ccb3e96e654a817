import { describe, it, expect } from 'vitest';
import { classifyLine, classifyLines, isInformationalLine } from '@stmtscan/statement-parser';

describe('classifyLine', () => {
  it('should mark blank lines as empty boilerplate', () => {
    expect(classifyLine('   ')).toEqual({ kind: 'boilerplate', reason: 'empty' });
  });

  it('should report header columns', () => {
    expect(classifyLine('Date        Description        Amount')).toEqual({
      kind: 'header',
      columns: ['Date', 'Description', 'Amount'],
    });
  });

  it('should mark page markers and totals as informational', () => {
    expect(classifyLine('Page 2 of 5')).toEqual({ kind: 'boilerplate', reason: 'informational' });
    expect(classifyLine('Total fees charged this period $0.00')).toEqual({
      kind: 'boilerplate',
      reason: 'informational',
    });
  });

  it('should detect phone and address lines without a leading date', () => {
    expect(classifyLine('Call us at 1-800-555-0100')).toEqual({ kind: 'phone-number' });
    expect(classifyLine('PO BOX 6294 CAROL STREAM IL 60197-6294')).toEqual({ kind: 'address' });
  });

  it('should keep dated lines that contain a phone number', () => {
    expect(classifyLine('10/12 AIRLINE 800-555-0100 TX 320.00')).toEqual({ kind: 'transaction-like' });
  });

  it('should mark undated text as boilerplate', () => {
    expect(classifyLine('Thank you for your business')).toEqual({ kind: 'boilerplate', reason: 'no-date' });
  });

  it('should classify a dated row as transaction-like', () => {
    expect(classifyLine('10/12 COFFEE SHOP 4.50')).toEqual({ kind: 'transaction-like' });
  });

  it('should classify every line', () => {
    expect(classifyLines(['', '10/12 COFFEE SHOP 4.50']).map((line) => line.kind)).toEqual([
      'boilerplate',
      'transaction-like',
    ]);
  });
});

describe('isInformationalLine', () => {
  it('should flag date ranges without amounts', () => {
    expect(isInformationalLine('10/01/2024 through 10/31/2024')).toBe(true);
    expect(isInformationalLine('10/01/2024 through 10/31/2024 $5.00')).toBe(false);
  });

  it('should flag long dated notices', () => {
    expect(
      isInformationalLine('Your payment due date is 11/25/2024 and late payments may incur a fee')
    ).toBe(true);
  });
});
