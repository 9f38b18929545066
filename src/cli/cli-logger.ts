import { formatError, formatInfo } from './formatters';
import type { Logger } from '../utils/logger';

/**
 * Logger that writes to the terminal with optional verbose detail.
 * Everything is also forwarded to `sink` (the configured log file, if any).
 */
export class CLILogger implements Logger {
  constructor(
    private runId: string,
    private verbose: boolean,
    private sink?: Logger,
  ) {}

  info(message: string, data?: Record<string, unknown>): void {
    this.sink?.info(message, data);
    if (this.verbose) {
      console.log(formatInfo(`[${this.runId.slice(0, 8)}] ${message}${suffix(data)}`));
    }
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.sink?.warn(message, data);
    console.warn(formatInfo(`WARN: ${message}${suffix(data)}`));
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.sink?.error(message, data);
    console.error(formatError(`${message}${suffix(data)}`));
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.sink?.debug(message, data);
    if (this.verbose) {
      console.log(formatInfo(`DEBUG: ${message}${suffix(data)}`));
    }
  }
}

function suffix(data?: Record<string, unknown>): string {
  return data ? ` ${JSON.stringify(data)}` : '';
}
