import * as fs from 'fs/promises';
import * as path from 'path';
import chalk from 'chalk';
import { getLogsDir } from '../utils/file-utils.js';
import { errorMessage } from '../types/errors.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  debug: chalk.dim,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red,
};

/**
 * Human-readable log lines on stderr (stdout stays free for command output).
 * Verbose mode also appends JSON lines to ~/.modelshelf/logs/modelshelf.log
 */
export class ConsoleLogger implements Logger {
  private logFilePath: string;
  private verbose: boolean;
  private echo: boolean;
  private pendingWrite: Promise<void> = Promise.resolve();

  /**
   * @param echo - false keeps the console clean (full-screen TUI); only the file receives entries
   */
  constructor(verbose: boolean = false, logFilePath?: string, echo: boolean = true) {
    this.verbose = verbose;
    this.echo = echo;
    this.logFilePath = logFilePath || path.join(getLogsDir(), 'modelshelf.log');
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log('error', message, context);
  }

  /**
   * Resolves once every queued file write has finished
   */
  flush(): Promise<void> {
    return this.pendingWrite;
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    const entry: LogEntry = { timestamp: new Date().toISOString(), level, message, context };

    // Debug lines only reach the console in verbose mode
    if (this.echo && (level !== 'debug' || this.verbose)) {
      console.error(this.formatHumanReadable(entry));
    }

    if (this.verbose) {
      this.pendingWrite = this.pendingWrite.then(() => this.append(entry));
    }
  }

  private async append(entry: LogEntry): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.logFilePath), { recursive: true });
      await fs.appendFile(this.logFilePath, JSON.stringify(entry) + '\n', 'utf-8');
    } catch (error) {
      console.error(chalk.red('[modelshelf] Failed to write to log file:'), errorMessage(error));
    }
  }

  private formatHumanReadable(entry: LogEntry): string {
    const color = LEVEL_COLORS[entry.level];
    let line = `${color(entry.level.toUpperCase().padEnd(5))} ${entry.message}`;

    if (entry.context && Object.keys(entry.context).length > 0) {
      const details = Object.entries(entry.context)
        .map(([key, value]) => `${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`)
        .join(' ');
      line += chalk.dim(` ${details}`);
    }

    return line;
  }
}

/**
 * Logger that discards everything (tests, TUI where stderr would corrupt the screen)
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
