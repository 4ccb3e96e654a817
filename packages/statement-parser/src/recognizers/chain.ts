import { SINGLE_LINE_RECOGNIZERS } from './single-line.js';
import { multiLineRecognizer } from './multi-line.js';
import { fuzzyRecognizer } from './fuzzy.js';
import type { CandidateMatch, LineRecognizer, RecognizerContext, RecognizerInput } from './types.js';

/**
 * Prioritized recognizer list. Every competing recognizer runs and the
 * highest confidence wins (earliest on a tie); fallbacks are tried in order
 * only when no competitor matched.
 */
export class RecognizerChain {
  constructor(
    private readonly competing: readonly LineRecognizer[],
    private readonly fallbacks: readonly LineRecognizer[]
  ) {}

  recognize(input: RecognizerInput, context: RecognizerContext): CandidateMatch | undefined {
    let best: CandidateMatch | undefined;
    for (const recognizer of this.competing) {
      const candidate = recognizer.recognize(input, context);
      if (candidate !== undefined && (best === undefined || candidate.confidence > best.confidence)) {
        best = candidate;
      }
    }
    if (best !== undefined) return best;

    for (const recognizer of this.fallbacks) {
      const candidate = recognizer.recognize(input, context);
      if (candidate !== undefined) return candidate;
    }
    return undefined;
  }
}

export const DEFAULT_RECOGNIZER_CHAIN = new RecognizerChain(SINGLE_LINE_RECOGNIZERS, [
  multiLineRecognizer,
  fuzzyRecognizer,
]);

export function tryRecognizers(input: RecognizerInput, context: RecognizerContext): CandidateMatch | undefined {
  return DEFAULT_RECOGNIZER_CHAIN.recognize(input, context);
}
