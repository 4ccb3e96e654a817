import { describe, it, expect } from 'vitest';
import { parseStatementText } from '@stmtscan/statement-parser';
import { PARSER_VERSION } from '@stmtscan/types';
import { buildOutputDocument, renderOutput, parseIntegerOption } from '../../apps/cli/src/output.js';

const parsedAt = new Date('2024-12-01T12:00:00.000Z');

function sampleResult() {
  return parseStatementText('Account Summary USD\n10/12 CORNER BAKERY 10.50', { now: parsedAt, debug: true });
}

describe('buildOutputDocument', () => {
  it('should stamp the parser version, time and filename', () => {
    const document = buildOutputDocument(sampleResult(), 'statement.txt', parsedAt);
    expect(document.parserVersion).toBe(PARSER_VERSION);
    expect(document.parsedAt).toBe('2024-12-01T12:00:00.000Z');
    expect(document.filename).toBe('statement.txt');
    expect(document.transactions).toHaveLength(1);
  });
});

describe('renderOutput', () => {
  it('should serialize a valid document compactly or pretty-printed', () => {
    const document = buildOutputDocument(sampleResult(), null, parsedAt);
    const compact = renderOutput(document, 'v1', false);
    const pretty = renderOutput(document, 'v1', true);

    expect(compact).not.toContain('\n');
    expect(pretty.split('\n')[1]).toBe('  "parserVersion": "1.0.0",');
    expect(JSON.parse(compact)).toEqual(JSON.parse(pretty));
  });

  it('should refuse a document that breaks the schema', () => {
    const document = { ...buildOutputDocument(sampleResult(), null, parsedAt), inferredYear: 1800 };
    expect(() => renderOutput(document, 'v1', false)).toThrow('Schema validation failed for version "v1"');
  });
});

describe('parseIntegerOption', () => {
  it('should parse digits and pass through empty values', () => {
    expect(parseIntegerOption('--max-transactions', '250')).toBe(250);
    expect(parseIntegerOption('--max-transactions', undefined)).toBeUndefined();
    expect(parseIntegerOption('--max-transactions', '')).toBeUndefined();
  });

  it('should reject non-numeric values', () => {
    expect(() => parseIntegerOption('--lookahead', 'ten')).toThrow(
      'Invalid value for --lookahead: "ten" (expected a positive integer)'
    );
  });
});
