export {
  PARSER_VERSION,
  CONFIDENCE_THRESHOLDS,
  MAX_TRANSACTIONS_PER_DOCUMENT,
  MULTI_LINE_LOOKAHEAD,
  MAX_TEXT_BEFORE_AMOUNT,
  FUZZY_TRAILING_WINDOW,
  USER_ATTRIBUTION_WINDOW,
  LOCALE_SCAN_LENGTH,
  DEPOSITORY_BALANCE_SCAN_LENGTH,
  MIN_VALID_YEAR,
  MAX_VALID_YEAR,
  MAX_TRANSACTION_AMOUNT,
  MAX_BALANCE_AMOUNT,
  MAX_REWARD_POINTS,
} from './constants.js';
export {
  normalizeDate,
  monthNameToNumber,
  isValidYear,
  expandTwoDigitYear,
  isValidCalendarDate,
  isValidISODate,
  daysBetween,
  toISODateString,
  type DateContext,
} from './date.js';
export { normalizeAmount, normalizeNumberFormat, roundToTwoDecimals, formatCurrency, sumAmounts } from './money.js';
export { detectCurrency, type CurrencyCode } from './currency.js';
