export const PARSER_VERSION = '1.0.0';

export const CONFIDENCE_THRESHOLDS = {
  HIGH: 0.9,
  MEDIUM: 0.7,
  LOW: 0.5,
} as const;

export const MAX_TRANSACTIONS_PER_DOCUMENT = 10_000;

// Both tuned against real statements; exposed as parse options.
export const MULTI_LINE_LOOKAHEAD = 7;
export const MAX_TEXT_BEFORE_AMOUNT = 50;

export const FUZZY_TRAILING_WINDOW = 50;
export const USER_ATTRIBUTION_WINDOW = 6;
export const LOCALE_SCAN_LENGTH = 5_000;
export const DEPOSITORY_BALANCE_SCAN_LENGTH = 2_000;

export const MIN_VALID_YEAR = 2000;
export const MAX_VALID_YEAR = 2100;

export const MAX_TRANSACTION_AMOUNT = 999_999_999.99;
export const MAX_BALANCE_AMOUNT = 999_999_999_999.99;
export const MAX_REWARD_POINTS = 100_000_000;
