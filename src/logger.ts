// Levelled console logger with an optional plain-text log file

import chalk from 'chalk';
import { createWriteStream, existsSync, mkdirSync, type WriteStream } from 'fs';
import { dirname } from 'path';
import { BRAND_MARK } from './utils/brand.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface Logger {
  info(message: string, metadata?: unknown): void;
  error(message: string, metadata?: unknown): void;
  warn(message: string, metadata?: unknown): void;
  debug(message: string, metadata?: unknown): void;
  success(message: string, metadata?: unknown): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export class SimpleLogger implements Logger {
  private readonly logLevel: LogLevel;
  private logStream?: WriteStream;

  constructor(logLevel: LogLevel = 'info', logFile?: string) {
    this.logLevel = logLevel;

    if (logFile) {
      try {
        const dir = dirname(logFile);
        if (!existsSync(dir)) {
          mkdirSync(dir, { recursive: true });
        }
        this.logStream = createWriteStream(logFile, { flags: 'a' });
      } catch (error) {
        console.warn(chalk.yellow(`Log file ${logFile} unavailable, console only: ${error}`));
      }
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.logLevel);
  }

  private formatMessage(level: LogLevel, message: string): string {
    const time = new Date().toLocaleTimeString('en-US', { hour12: false });
    return `${BRAND_MARK} [${time}] ${level.toUpperCase()}: ${message}`;
  }

  private writeToFile(level: LogLevel, message: string): void {
    if (this.logStream) {
      const timestamp = new Date().toISOString();
      const levelStr = level.toUpperCase().padEnd(5);
      this.logStream.write(`${timestamp} ${levelStr}: ${message}\n`);
    }
  }

  // Closes the log file; resolves once everything written so far is on disk
  public flush(): Promise<void> {
    const stream = this.logStream;
    this.logStream = undefined;
    if (!stream) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      stream.end(() => resolve());
    });
  }

  info(message: string, metadata?: unknown): void {
    if (this.shouldLog('info')) {
      console.log(this.formatMessage('info', message));
      if (metadata !== undefined) console.log(metadata);
      this.writeToFile('info', message);
    }
  }

  error(message: string, metadata?: unknown): void {
    if (this.shouldLog('error')) {
      console.error(chalk.red(this.formatMessage('error', message)));
      if (metadata !== undefined) console.error(metadata);
      this.writeToFile('error', message);
    }
  }

  warn(message: string, metadata?: unknown): void {
    if (this.shouldLog('warn')) {
      console.warn(chalk.yellow(this.formatMessage('warn', message)));
      if (metadata !== undefined) console.warn(metadata);
      this.writeToFile('warn', message);
    }
  }

  debug(message: string, metadata?: unknown): void {
    if (this.shouldLog('debug')) {
      console.log(chalk.gray(this.formatMessage('debug', message)));
      if (metadata !== undefined) console.log(metadata);
      this.writeToFile('debug', message);
    }
  }

  success(message: string, metadata?: unknown): void {
    if (this.shouldLog('info')) {
      console.log(chalk.green(this.formatMessage('info', `✅ ${message}`)));
      if (metadata !== undefined) console.log(metadata);
      this.writeToFile('info', `✅ ${message}`);
    }
  }
}

export function createLogger(logFile?: string, logLevel?: LogLevel): SimpleLogger {
  return new SimpleLogger(logLevel ?? 'info', logFile);
}
