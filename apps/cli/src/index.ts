#!/usr/bin/env node
/* eslint-disable no-console */

// Load environment variables from .env file
import 'dotenv/config';

import { Command } from 'commander';
import { readFile, writeFile, mkdir } from 'fs/promises';
import { resolve, dirname, basename } from 'path';
import { parseStatementText } from '@stmtscan/statement-parser';
import {
  PARSER_VERSION,
  AVAILABLE_SCHEMA_VERSIONS,
  createLogger,
  formatCurrency,
  isStatementParseError,
  resolveSchemaVersion,
} from '@stmtscan/types';
import type { AccountContext, ParseOptionsInput } from '@stmtscan/types';
import { buildOutputDocument, parseIntegerOption, renderOutput } from './output.js';

const program = new Command();

// Helper to parse boolean env vars
const envBool = (key: string, defaultVal: boolean): boolean => {
  const val = process.env[key];
  if (val === undefined || val === '') return defaultVal;
  return val === 'true' || val === '1';
};

interface CliOptions {
  out?: string;
  accountType?: string;
  holder?: string;
  maxTransactions?: string;
  lookahead?: string;
  verbose: boolean;
  debug: boolean;
  pretty: boolean;
  schemaVersion?: string;
}

program
  .name('stmtscan')
  .description('Recognize transactions and statement metadata in text extracted from a statement')
  .version(PARSER_VERSION)
  .argument('<text-file>', 'Path to the extracted statement text')
  .option('-o, --out <file>', 'Output file path (default: stdout)', process.env['STMTSCAN_OUTPUT_FILE'])
  .option('-a, --account-type <type>', 'Account type, e.g. "credit card" or "checking"', process.env['STMTSCAN_ACCOUNT_TYPE'])
  .option('--holder <name>', 'Account holder name used for user attribution', process.env['STMTSCAN_HOLDER_NAME'])
  .option('--max-transactions <number>', 'Maximum transactions per file', process.env['STMTSCAN_MAX_TRANSACTIONS'])
  .option('--lookahead <number>', 'Lines scanned for a multi-line transaction amount', process.env['STMTSCAN_LOOKAHEAD'])
  .option('-v, --verbose', 'Enable verbose output', envBool('STMTSCAN_VERBOSE', false))
  .option('--debug', 'Include the debug block in the output', envBool('STMTSCAN_DEBUG', false))
  .option('--pretty', 'Pretty-print JSON output', envBool('STMTSCAN_PRETTY', true))
  .option('--no-pretty', 'Disable pretty-printing')
  .option(
    '--schema-version <version>',
    `Output schema version (${AVAILABLE_SCHEMA_VERSIONS.join(', ')})`,
    process.env['STMTSCAN_SCHEMA_VERSION']
  )
  .action(async (textFile: string, options: CliOptions) => {
    try {
      await processFile(textFile, options);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[ERROR] ${message}`);
      if (isStatementParseError(error)) {
        for (const detail of error.details) {
          console.error(`  - ${detail}`);
        }
      }
      if (options.verbose && error instanceof Error && error.stack !== undefined) {
        console.error(error.stack);
      }
      process.exit(1);
    }
  });

function buildParseOptions(filePath: string, options: CliOptions): ParseOptionsInput {
  const account: AccountContext = {};
  if (options.accountType !== undefined && options.accountType !== '') {
    account.accountType = options.accountType;
  }
  if (options.holder !== undefined && options.holder !== '') {
    account.accountHolderName = options.holder;
  }

  const parseOptions: ParseOptionsInput = {
    filename: basename(filePath),
    account,
    debug: options.debug,
  };

  const maxTransactions = parseIntegerOption('--max-transactions', options.maxTransactions);
  if (maxTransactions !== undefined) parseOptions.maxTransactions = maxTransactions;

  const lookahead = parseIntegerOption('--lookahead', options.lookahead);
  if (lookahead !== undefined) parseOptions.multiLineLookahead = lookahead;

  return parseOptions;
}

async function processFile(textFile: string, options: CliOptions): Promise<void> {
  const logger = createLogger({ verbose: options.verbose });
  const filePath = resolve(textFile);
  const schemaVersion = resolveSchemaVersion(options.schemaVersion);

  logger.debug(`Parsing: ${filePath}`);
  logger.debug(`Parser version: ${PARSER_VERSION}`);
  logger.debug(`Schema version: ${schemaVersion}`);

  const text = await readFile(filePath, 'utf-8');
  logger.debug(`Text length: ${text.length} characters`);

  const result = parseStatementText(text, buildParseOptions(filePath, options));

  if (options.verbose) {
    logger.info(`Year ${result.inferredYear} (${result.yearSource}), ${result.locale.isDomestic ? 'domestic' : 'non-domestic'} dates`);
    logger.info(`Sections: ${result.stats.sectionsFound}, transactions: ${result.stats.transactionsFound}, rows skipped: ${result.stats.rowsSkipped}`);
    if (result.metadata.balance !== undefined) {
      logger.info(`Balance: ${formatCurrency(result.metadata.balance)}`);
    }
  }
  for (const warning of result.warnings) {
    logger.warn(warning);
  }
  for (const rowError of result.errors) {
    logger.debug(rowError);
  }
  if (result.errors.length > 0) {
    logger.warn(`${result.errors.length} row(s) could not be parsed`);
  }

  const document = buildOutputDocument(result, basename(filePath));
  const json = renderOutput(document, schemaVersion, options.pretty);

  if (options.out !== undefined && options.out !== '') {
    const outPath = resolve(options.out);
    await mkdir(dirname(outPath), { recursive: true });
    await writeFile(outPath, `${json}\n`, 'utf-8');
    logger.info(`Output written to: ${outPath}`);
  } else {
    console.log(json);
  }
}

program.parseAsync(process.argv).catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`[ERROR] ${message}`);
  process.exit(1);
});
