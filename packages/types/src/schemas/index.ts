export {
  CurrencyCodeSchema,
  RecognizerIdSchema,
  YearSourceSchema,
  AccountContextSchema,
  ParseOptionsSchema,
  TransactionSchema,
  StatementMetadataSchema,
  ParseStatsSchema,
  SectionDebugSchema,
  ParseDebugSchema,
  StatementParseResultSchema,
} from './statement.js';

export type {
  RecognizerId,
  YearSource,
  AccountContext,
  ParseOptionsInput,
  ParseOptions,
  Transaction,
  StatementMetadata,
  ParseStats,
  SectionDebug,
  ParseDebug,
  StatementParseResult,
} from './statement.js';

export {
  getSchemaPath,
  getSchema,
  isValidSchemaVersion,
  assertValidSchemaVersion,
  validateOutput,
  validateOutputOrThrow,
  resolveSchemaVersion,
  AVAILABLE_SCHEMA_VERSIONS,
  DEFAULT_SCHEMA_VERSION,
} from './schema-registry.js';

export type { SchemaVersion, ValidationResult, ValidationError } from './schema-registry.js';
