import { describe, it, expect } from 'vitest';
import { isValidNameFormat, isAllCapsName, matchesAccountHolderName } from '@stmtscan/statement-parser';

describe('isValidNameFormat', () => {
  it('should accept all-caps and title-case names', () => {
    expect(isValidNameFormat('JOHN DOE')).toBe(true);
    expect(isValidNameFormat('Jane Smith')).toBe(true);
    expect(isValidNameFormat("Mary-Anne O'Neil")).toBe(true);
  });

  it('should never accept statement headings or institution names', () => {
    expect(isValidNameFormat('Summary')).toBe(false);
    expect(isValidNameFormat('Bank Of America')).toBe(false);
    expect(isValidNameFormat('Platinum Card')).toBe(false);
  });

  it('should reject mixed casing, digits and symbols', () => {
    expect(isValidNameFormat('JANE Smith')).toBe(false);
    expect(isValidNameFormat('John Smith 123')).toBe(false);
    expect(isValidNameFormat('Total: Due')).toBe(false);
  });

  it('should reject city and state lines', () => {
    expect(isValidNameFormat('SEATTLE WA')).toBe(false);
  });

  it('should reject more than five words', () => {
    expect(isValidNameFormat('ONE TWO THREE FOUR FIVE SIX')).toBe(false);
  });
});

describe('isAllCapsName', () => {
  it('should detect all-caps text', () => {
    expect(isAllCapsName('JOHN DOE')).toBe(true);
    expect(isAllCapsName('John Doe')).toBe(false);
  });
});

describe('matchesAccountHolderName', () => {
  it('should match initials against full first names', () => {
    expect(matchesAccountHolderName('J DOE', 'John Doe')).toBe(true);
  });

  it('should match a shared family name', () => {
    expect(matchesAccountHolderName('JANE DOE', 'John Doe')).toBe(true);
  });

  it('should not match an unrelated name', () => {
    expect(matchesAccountHolderName('MARY SMITH', 'John Doe')).toBe(false);
  });
});
