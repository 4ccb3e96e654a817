export { RecognizerChain, DEFAULT_RECOGNIZER_CHAIN, tryRecognizers } from './chain.js';
export {
  SINGLE_LINE_RECOGNIZERS,
  dateDescriptionAmountRecognizer,
  prefixedDateDescriptionAmountRecognizer,
  datePostingDescriptionAmountRecognizer,
  cardSuffixTransactionIdRecognizer,
  datePostingMerchantLocationRecognizer,
} from './single-line.js';
export { multiLineRecognizer, extractTrailingAmount } from './multi-line.js';
export { fuzzyRecognizer, findDateTokens, findAmountTokens } from './fuzzy.js';
export { isValidDescription, stripLeadingDates, removeLeadingUserName } from './description.js';
export { calculateConfidence } from './confidence.js';
export { normalizeLine, isPhoneOnly, LAYOUT_PATTERNS, MULTI_LINE_PATTERNS, US_AMOUNT_COMPONENT } from './patterns.js';
export type {
  CandidateMatch,
  CandidateFields,
  LineRecognizer,
  RecognizerContext,
  RecognizerInput,
  TextSpan,
} from './types.js';
