import fs from 'fs';
import path from 'path';
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

/** Structured logger used across the orchestrator, agents and collaborators */
export interface Logger {
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
}

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  /** Short tag printed before every line, e.g. the first 8 chars of a run id */
  prefix?: string;
  /** Append plain-text lines to this file in addition to the console */
  file?: string;
  /** Set to false to log only to the file */
  console?: boolean;
}

/** Console logger with a level threshold and an optional file sink */
export class ConsoleLogger implements Logger {
  private level: LogLevel;
  private prefix: string;
  private file?: string;
  private toConsole: boolean;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.prefix = options.prefix ? `[taskpilot:${options.prefix}]` : '[taskpilot]';
    this.file = options.file;
    this.toConsole = options.console ?? true;

    if (this.file) {
      fs.mkdirSync(path.dirname(path.resolve(this.file)), { recursive: true });
    }
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.write('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.write('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.write('error', message, data);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.write('debug', message, data);
  }

  private write(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;

    const line = formatLine(this.prefix, level, message, data);

    if (this.file) {
      fs.appendFileSync(this.file, `${new Date().toISOString()} ${line}\n`, 'utf8');
    }

    if (!this.toConsole) return;

    switch (level) {
      case 'error':
        console.error(chalk.red(line));
        break;
      case 'warn':
        console.warn(chalk.yellow(line));
        break;
      case 'debug':
        console.debug(chalk.gray(line));
        break;
      default:
        console.log(line);
    }
  }
}

/** Logger that drops everything; handy for sub-agents running inside tests */
export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined,
};

export function formatLine(prefix: string, level: LogLevel, message: string, data?: Record<string, unknown>): string {
  const base = `${prefix} ${level.toUpperCase().padEnd(5)} ${message}`;
  return data ? `${base} ${JSON.stringify(data)}` : base;
}
