import type { RecognizerId } from '@stmtscan/types';

export interface TextSpan {
  start: number;
  end: number;
}

export interface CandidateFields {
  date: string;
  description: string;
  amount: string;
  location?: string;
  merchant?: string;
}

/** A complete field set proposed by one recognizer for one line or line group. */
export interface CandidateMatch {
  recognizerId: RecognizerId;
  fields: CandidateFields;
  confidence: number;
  /** Lines covered by the match, starting at the input index. */
  consumedLines: number;
  dateSpan?: TextSpan;
  amountSpan?: TextSpan;
}

export interface RecognizerContext {
  isDomestic: boolean;
  inferredYear: number;
  now: Date;
  /** Name already attributed to the surrounding rows; stripped from multi-line descriptions. */
  userName?: string | undefined;
  multiLineLookahead: number;
  maxTextBeforeAmount: number;
}

export interface RecognizerInput {
  /** Whitespace-normalized document lines. */
  lines: readonly string[];
  index: number;
}

export interface LineRecognizer {
  readonly id: RecognizerId;
  recognize(input: RecognizerInput, context: RecognizerContext): CandidateMatch | undefined;
}
