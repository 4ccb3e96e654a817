export { parseStatementText, applyCreditCardSign, isReferencedThankYouPayment } from './parse-statement.js';

export * from './recognizers/index.js';
export * from './sections/index.js';
export * from './classify/index.js';
export * from './locale/index.js';
export * from './metadata/index.js';
