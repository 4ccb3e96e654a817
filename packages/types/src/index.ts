// Zod schemas, inferred types and the JSON schema registry
export * from './schemas/index.js';

// Pure utils (date, money, currency, constants)
export * from './utils/index.js';

export { StatementParseError, isStatementParseError, type StatementParseErrorCode } from './errors.js';
export { createLogger, type Logger, type LoggerOptions } from './logger.js';
