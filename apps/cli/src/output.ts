import { PARSER_VERSION, validateOutputOrThrow } from '@stmtscan/types';
import type { SchemaVersion, StatementParseResult } from '@stmtscan/types';

export interface OutputDocument extends StatementParseResult {
  parserVersion: string;
  parsedAt: string;
  filename: string | null;
}

export function buildOutputDocument(
  result: StatementParseResult,
  filename: string | null,
  now: Date = new Date()
): OutputDocument {
  return {
    parserVersion: PARSER_VERSION,
    parsedAt: now.toISOString(),
    filename,
    ...result,
  };
}

/**
 * Validate the document against the requested schema and serialize it.
 * Throws with every schema violation listed when the document does not conform.
 */
export function renderOutput(document: OutputDocument, schemaVersion: SchemaVersion, pretty: boolean): string {
  validateOutputOrThrow(schemaVersion, document);
  return pretty ? JSON.stringify(document, null, 2) : JSON.stringify(document);
}

export function parseIntegerOption(name: string, value: string | undefined): number | undefined {
  if (value === undefined || value === '') return undefined;
  if (!/^\d+$/.test(value.trim())) {
    throw new Error(`Invalid value for ${name}: "${value}" (expected a positive integer)`);
  }
  return parseInt(value, 10);
}
