import { getNameFilterData } from '../data/loader.js';

interface NameRules {
  rejectedFirstWords: ReadonlySet<string>;
  excludedWords: ReadonlySet<string>;
  headerPhrases: readonly RegExp[];
  institutionKeywords: readonly RegExp[];
  stateAbbreviations: ReadonlySet<string>;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function wholePhrase(phrase: string): RegExp {
  return new RegExp(`(?:^|[^a-z])${escapeRegExp(phrase)}(?:[^a-z]|$)`, 'i');
}

let rules: NameRules | undefined;

function getNameRules(): NameRules {
  if (rules === undefined) {
    const data = getNameFilterData();
    rules = {
      rejectedFirstWords: new Set(data.rejectedFirstWords),
      excludedWords: new Set(data.excludedWords),
      headerPhrases: data.headerPhrases.map(wholePhrase),
      institutionKeywords: data.institutionKeywords.map(wholePhrase),
      stateAbbreviations: new Set(data.stateAbbreviations),
    };
  }
  return rules;
}

const FORBIDDEN_CHARACTERS = /[\d$€£¥₹%*=:®©™+]/;
const CARD_TIER = /\b(?:platinum|gold|silver)\s+card\b/i;
const DESCRIPTION_LABEL = /^description\s*[=:]/i;
const BAD_HYPHEN = /-[^a-zA-Z]|^-|-$/;
const TITLE_PART = /^\p{Lu}\p{Ll}*$/u;
const UPPER_PART = /^\p{Lu}+$/u;

function wordParts(word: string): string[] {
  return word
    .replace(/\.$/, '')
    .split(/[-']+/)
    .filter((part) => part !== '');
}

function isUpperWord(word: string): boolean {
  const parts = wordParts(word);
  return parts.length > 0 && parts.every((part) => UPPER_PART.test(part));
}

function isTitleWord(word: string): boolean {
  const parts = wordParts(word);
  return parts.length > 0 && parts.every((part) => TITLE_PART.test(part));
}

function bareWord(word: string): string {
  return word.replace(/[.,;:]+$/, '');
}

export function isAllCapsName(text: string): boolean {
  return text === text.toUpperCase() && /[A-Z]/.test(text);
}

/**
 * Strict format check for a cardholder-name candidate: one to five words of
 * letters, uniformly ALL CAPS or Title Case, and none of the vocabulary that
 * shows up in statement headings, institution names or addresses.
 */
export function isValidNameFormat(candidate: string): boolean {
  const text = candidate.trim().replace(/,$/, '').trim();
  if (text === '' || !/[a-zA-Z]/.test(text)) return false;

  const words = text.split(/\s+/);
  if (words.length > 5) return false;

  const { rejectedFirstWords, excludedWords, headerPhrases, institutionKeywords, stateAbbreviations } =
    getNameRules();
  const lower = text.toLowerCase();
  const lowerWords = words.map((word) => bareWord(word).toLowerCase());

  if (rejectedFirstWords.has(lowerWords[0] ?? '')) return false;
  if (excludedWords.has(lower)) return false;
  if (lowerWords.filter((word) => excludedWords.has(word)).length >= 2) return false;
  if (headerPhrases.some((pattern) => pattern.test(lower))) return false;
  if (institutionKeywords.some((pattern) => pattern.test(lower))) return false;
  if (CARD_TIER.test(text) || DESCRIPTION_LABEL.test(text)) return false;

  if (FORBIDDEN_CHARACTERS.test(text)) return false;
  if (BAD_HYPHEN.test(text)) return false;

  const allUpper = words.every(isUpperWord);
  const allTitle = words.every(isTitleWord);
  if (!allUpper && !allTitle) return false;

  if (words.some((word) => stateAbbreviations.has(bareWord(word)))) return false;

  return true;
}

function nameTokens(name: string): string[] {
  return name
    .toLowerCase()
    .split(/[\s-]+/)
    .map((token) => token.replace(/[^a-z]/g, ''))
    .filter((token) => token !== '');
}

function tokensMatch(a: string, b: string): boolean {
  if (a === b) return true;
  if (a.length === 1) return b.startsWith(a);
  if (b.length === 1) return a.startsWith(b);
  return false;
}

/**
 * Token-level comparison against the known account holder: every token of the
 * shorter name matches (exactly or as an initial), or the names share a full
 * token such as the family name.
 */
export function matchesAccountHolderName(candidate: string, holderName: string): boolean {
  const candidateTokens = nameTokens(candidate);
  const holderTokens = nameTokens(holderName);
  if (candidateTokens.length === 0 || holderTokens.length === 0) return false;

  if (candidateTokens.join(' ') === holderTokens.join(' ')) return true;

  const [shorter, longer] =
    candidateTokens.length <= holderTokens.length ? [candidateTokens, holderTokens] : [holderTokens, candidateTokens];
  if (shorter.every((token) => longer.some((other) => tokensMatch(token, other)))) return true;

  return candidateTokens.some((token) => token.length > 1 && holderTokens.includes(token));
}
