/* eslint-disable no-console */

export interface Logger {
  error: (message: string) => void;
  warn: (message: string) => void;
  info: (message: string) => void;
  debug: (message: string) => void;
}

export interface LoggerOptions {
  verbose?: boolean;
  write?: (line: string) => void;
}

/**
 * Prefixed stderr logger. stdout stays reserved for JSON output, so every
 * level writes to stderr; `debug` is dropped unless verbose.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const write = options.write ?? ((line: string) => console.error(line));
  const verbose = options.verbose ?? false;

  return {
    error: (message) => write(`[ERROR] ${message}`),
    warn: (message) => write(`[WARN] ${message}`),
    info: (message) => write(`[INFO] ${message}`),
    debug: (message) => {
      if (verbose) write(`[DEBUG] ${message}`);
    },
  };
}
