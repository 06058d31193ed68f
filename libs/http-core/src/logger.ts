import type { Logger, LoggerMeta } from './types';

/**
 * Console logger used when no logger is configured.
 * Logs to console.debug, console.info, console.warn, and console.error.
 */
class ConsoleLogger implements Logger {
  constructor(private readonly prefix?: string) {}

  debug(message: string, meta?: LoggerMeta): void {
    console.debug(this.format(message), meta ?? '');
  }
  info(message: string, meta?: LoggerMeta): void {
    console.info(this.format(message), meta ?? '');
  }
  warn(message: string, meta?: LoggerMeta): void {
    console.warn(this.format(message), meta ?? '');
  }
  error(message: string, meta?: LoggerMeta): void {
    console.error(this.format(message), meta ?? '');
  }

  private format(message: string): string {
    return this.prefix ? `[${this.prefix}] ${message}` : message;
  }
}

export function createConsoleLogger(prefix?: string): Logger {
  return new ConsoleLogger(prefix);
}

export const noopLogger: Logger = {
  debug: () => {
    /* no-op */
  },
  info: () => {
    /* no-op */
  },
  warn: () => {
    /* no-op */
  },
  error: () => {
    /* no-op */
  },
};
