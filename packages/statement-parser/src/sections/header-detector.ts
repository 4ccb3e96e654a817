import { getHeaderPhraseData } from '../data/loader.js';

export interface SectionBoundary {
  /** Index of the column-header line. */
  headerIndex: number;
  columns: string[];
  /** Exclusive: the next header's index, or the line count. */
  endIndex: number;
}

const PAGE_OF = /\bpage\b.*\bof\b/;
const MIN_COLUMNS = 3;

function splitTrimmed(line: string, separator: string | RegExp): string[] {
  return line
    .split(separator)
    .map((cell) => cell.trim())
    .filter((cell) => cell !== '');
}

function splitQuoted(line: string): string[] {
  const cells: string[] = [];
  let current = '';
  let quoted = false;
  for (let i = 0; i < line.length; i++) {
    const char = line.charAt(i);
    if (char === '"') {
      if (quoted && line.charAt(i + 1) === '"') {
        current += '"';
        i++;
      } else {
        quoted = !quoted;
      }
    } else if (char === ',' && !quoted) {
      cells.push(current.trim());
      current = '';
    } else {
      current += char;
    }
  }
  cells.push(current.trim());
  return cells.filter((cell) => cell !== '');
}

/** Column names of a header line: tab, then pipe, then runs of spaces, then comma, then any whitespace. */
export function extractColumns(line: string): string[] {
  if (line.includes('\t')) return splitTrimmed(line, '\t');
  if (line.includes('|')) return splitTrimmed(line, '|');
  if (/ {2,}/.test(line)) return splitTrimmed(line, / {2,}/);
  if (line.includes(',')) return splitQuoted(line);
  return splitTrimmed(line, /\s+/);
}

/** Cells of a table row, split the way a header's columns are: tab, pipe or runs of spaces. */
export function splitRowCells(line: string): string[] {
  const trimmed = line.trim();
  if (trimmed.includes('\t')) return splitTrimmed(trimmed, '\t');
  if (trimmed.includes('|')) return splitTrimmed(trimmed, '|');
  return splitTrimmed(trimmed, / {2,}/);
}

/**
 * Returns the columns when the line is a transaction-table header, or
 * undefined. Statement-period, account and balance banners never qualify.
 */
export function detectHeader(line: string): string[] | undefined {
  const lower = line.toLowerCase().trim();
  if (lower === '') return undefined;

  const { columnSets, rejectedHeaderPhrases } = getHeaderPhraseData();
  if (rejectedHeaderPhrases.some((phrase) => lower.includes(phrase))) return undefined;
  if (PAGE_OF.test(lower)) return undefined;

  for (const columnSet of columnSets) {
    if (!columnSet.every((phrase) => lower.includes(phrase))) continue;
    const columns = extractColumns(line.trim());
    if (columns.length >= MIN_COLUMNS) return columns;
  }
  return undefined;
}

export function segmentSections(lines: readonly string[]): SectionBoundary[] {
  const headers: Array<{ headerIndex: number; columns: string[] }> = [];
  lines.forEach((line, headerIndex) => {
    const columns = detectHeader(line);
    if (columns !== undefined) headers.push({ headerIndex, columns });
  });

  return headers.map((header, i) => ({
    ...header,
    endIndex: headers[i + 1]?.headerIndex ?? lines.length,
  }));
}
