// src/core/logger.ts

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

/**
 * Progress lines go to stdout; `debug` lines only appear with `verbose`.
 * When stdout carries a JSON document (`quiet`), progress moves to stderr.
 */
export function createConsoleLogger(options: { verbose?: boolean; quiet?: boolean } = {}): Logger {
  const out = options.quiet ? console.error : console.log;

  return {
    info: (message) => out(message),
    warn: (message) => console.warn(`⚠ ${message}`),
    error: (message) => console.error(`✗ ${message}`),
    debug: (message) => {
      if (options.verbose) {
        out(message);
      }
    },
  };
}

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};
