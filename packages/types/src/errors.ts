export type StatementParseErrorCode = 'INVALID_INPUT' | 'INVALID_OPTIONS';

/** Document-level failure; row-level problems are reported in the result instead. */
export class StatementParseError extends Error {
  constructor(
    message: string,
    public readonly code: StatementParseErrorCode,
    public readonly details: string[] = []
  ) {
    super(message);
    this.name = 'StatementParseError';
  }
}

export function isStatementParseError(error: unknown): error is StatementParseError {
  return error instanceof StatementParseError;
}
