import { describe, it, expect } from 'vitest';
import { extractRewardPoints, extractCashBack } from '@stmtscan/statement-parser';

describe('extractRewardPoints', () => {
  it('should read points as of a date', () => {
    expect(extractRewardPoints(['Membership Rewards Points as of 11/30/2024: 12,345'])).toBe(12345);
  });

  it('should read points available for redemption', () => {
    expect(extractRewardPoints(['Total points available for redemption 54,321'])).toBe(54321);
  });

  it('should read a value printed on the line below its label', () => {
    expect(extractRewardPoints(['Rewards Points Available', '8,250'])).toBe(8250);
  });

  it('should skip an account line between label and value', () => {
    expect(extractRewardPoints(['Rewards Points Available', 'Account ending 1234', '8,250'])).toBe(8250);
  });

  it('should not count cash back as points', () => {
    expect(extractRewardPoints(['Cash Back Rewards Balance: $45.67'])).toBeUndefined();
  });

  it('should not take a date as a points value', () => {
    expect(extractRewardPoints(['Points: 11/30/2024'])).toBeUndefined();
  });
});

describe('extractCashBack', () => {
  it('should read a cash back rewards balance', () => {
    expect(extractCashBack('Cash Back Rewards Balance: $45.67')).toBe(45.67);
  });

  it('should read a balance split across lines', () => {
    expect(extractCashBack('Summary\nCash Back Balance:\n$12.30\nEnd')).toBe(12.3);
  });

  it('should return undefined without a cash back label', () => {
    expect(extractCashBack('New Balance: $10.00')).toBeUndefined();
  });
});
