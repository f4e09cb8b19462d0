import chalk from 'chalk';
import * as fs from 'fs';
import * as path from 'path';
import { getStayscopePath } from './stayscope-home.js';

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

class Logger {
  private logFilePath: string | null = null;
  private logFileInitialized = false;
  private writeStream: fs.WriteStream | null = null;

  /**
   * Initialize log file path and create write stream
   * Log file format: <STAYSCOPE_HOME>/logs/debug-YYYY-MM-DD.log
   */
  private initializeLogFile(): void {
    if (this.logFileInitialized) return;

    try {
      const logsDir = getStayscopePath('logs');

      if (!fs.existsSync(logsDir)) {
        fs.mkdirSync(logsDir, { recursive: true });
      }

      const today = new Date().toISOString().split('T')[0]; // YYYY-MM-DD
      this.logFilePath = path.join(logsDir, `debug-${today}.log`);

      this.writeStream = fs.createWriteStream(this.logFilePath, { flags: 'a' });
      // A stream error must not crash an aggregation run
      this.writeStream.on('error', () => {
        this.writeStream = null;
      });

      this.logFileInitialized = true;
    } catch {
      // No writable home: file logging stays off
      this.logFilePath = null;
      this.writeStream = null;
      this.logFileInitialized = true;
    }
  }

  /**
   * Write a log entry to the debug log file
   * Format: [ISO timestamp] [LEVEL] message args...
   */
  private writeToLogFile(level: LogLevel, message: string, ...args: unknown[]): void {
    if (!this.logFileInitialized) {
      this.initializeLogFile();
    }

    if (!this.writeStream) return;

    const timestamp = new Date().toISOString();
    const argsStr = args.length > 0 ? ' ' + args.map(arg =>
      typeof arg === 'object' ? JSON.stringify(arg) : String(arg)
    ).join(' ') : '';

    this.writeStream.write(`[${timestamp}] [${level.toUpperCase()}] ${message}${argsStr}\n`);
  }

  /**
   * Flush and close the write stream
   */
  close(): void {
    if (this.writeStream) {
      this.writeStream.end();
      this.writeStream = null;
    }
  }

  /**
   * Debug mode controls console output visibility, not file logging
   * @returns true if STAYSCOPE_DEBUG is set to 'true' or '1'
   */
  isDebugMode(): boolean {
    return process.env.STAYSCOPE_DEBUG === 'true' || process.env.STAYSCOPE_DEBUG === '1';
  }

  /**
   * @returns Log file path or null if file logging is disabled
   */
  getLogFilePath(): string | null {
    if (!this.logFileInitialized) {
      this.initializeLogFile();
    }
    return this.logFilePath;
  }

  debug(message: string, ...args: unknown[]): void {
    this.writeToLogFile(LogLevel.DEBUG, message, ...args);

    if (this.isDebugMode()) {
      console.log(chalk.dim(`[DEBUG] ${message}`), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    this.writeToLogFile(LogLevel.INFO, message, ...args);
  }

  success(message: string, ...args: unknown[]): void {
    console.log(chalk.green(`✓ ${message}`), ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.writeToLogFile(LogLevel.WARN, message, ...args);
    console.warn(chalk.yellow(`⚠ ${message}`), ...args);
  }

  error(message: string, error?: Error | unknown): void {
    let errorDetails = '';
    if (error) {
      if (error instanceof Error) {
        errorDetails = error.message;
        if (error.stack) {
          errorDetails += `\n${error.stack}`;
        }
      } else {
        errorDetails = String(error);
      }
    }

    this.writeToLogFile(LogLevel.ERROR, message, errorDetails);

    console.error(chalk.red(`✗ ${message}`));
    if (error) {
      console.error(chalk.red(error instanceof Error ? error.message : String(error)));
      if (error instanceof Error && error.stack && this.isDebugMode()) {
        console.error(chalk.white(error.stack));
      }
    }
  }
}

export const logger = new Logger();
