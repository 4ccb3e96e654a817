import { readFileSync } from 'fs';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const DATA_DIR = resolve(__dirname, '../../data');

const wordList = z.array(z.string().min(1));

const NameFilterDataSchema = z.object({
  rejectedFirstWords: wordList,
  excludedWords: wordList,
  headerPhrases: wordList,
  institutionKeywords: wordList,
  stateAbbreviations: wordList,
  nonNameLinePhrases: wordList,
});
export type NameFilterData = z.infer<typeof NameFilterDataSchema>;

const HeaderPhraseDataSchema = z.object({
  columnSets: z.array(wordList.min(2)),
  rejectedHeaderPhrases: wordList,
});
export type HeaderPhraseData = z.infer<typeof HeaderPhraseDataSchema>;

const BalanceLabelDataSchema = z.object({
  creditCard: wordList,
  depository: wordList,
});
export type BalanceLabelData = z.infer<typeof BalanceLabelDataSchema>;

function loadDataFile<T>(fileName: string, schema: z.ZodType<T>): T {
  const raw: unknown = JSON.parse(readFileSync(resolve(DATA_DIR, fileName), 'utf-8'));
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid data file ${fileName}: ${parsed.error.message}`);
  }
  return parsed.data;
}

/** Read a data file on first use and reuse it for every later call. */
function cached<T>(load: () => T): () => T {
  let value: T | undefined;
  return () => {
    if (value === undefined) {
      value = load();
    }
    return value;
  };
}

export const getNameFilterData = cached(() => loadDataFile('name-filters.json', NameFilterDataSchema));
export const getHeaderPhraseData = cached(() => loadDataFile('header-phrases.json', HeaderPhraseDataSchema));
export const getBalanceLabelData = cached(() => loadDataFile('balance-labels.json', BalanceLabelDataSchema));
