/**
 * Simple logger with file output
 */

import { appendFileSync, existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const LOG_LEVEL_WEIGHTS: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
};

export class Logger {
  constructor(
    private level: LogLevel = 'INFO',
    private logFile?: string,
    private scope?: string
  ) {
    if (logFile) {
      const dir = dirname(logFile);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }
  }

  /**
   * Logger sharing level and file, with a "[Scope]" prefix on every line
   */
  child(scope: string): Logger {
    return new Logger(this.level, this.logFile, scope);
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_WEIGHTS[level] >= LOG_LEVEL_WEIGHTS[this.level];
  }

  private format(level: LogLevel, message: string): string {
    const timestamp = new Date().toISOString();
    const prefix = this.scope ? `[${this.scope}] ` : '';
    return `[${timestamp}] [${level}] ${prefix}${message}`;
  }

  private write(level: LogLevel, message: string): void {
    if (!this.shouldLog(level)) return;

    const formatted = this.format(level, message);
    if (level === 'ERROR') {
      console.error(formatted);
    } else {
      console.log(formatted);
    }

    if (this.logFile) {
      try {
        appendFileSync(this.logFile, formatted + '\n');
      } catch (err) {
        // Console output above still carries the line
        const reason = err instanceof Error ? err.message : String(err);
        console.error(`[Logger] Failed to write log file ${this.logFile}: ${reason}`);
      }
    }
  }

  debug(message: string): void {
    this.write('DEBUG', message);
  }

  info(message: string): void {
    this.write('INFO', message);
  }

  warn(message: string): void {
    this.write('WARN', message);
  }

  error(message: string, error?: unknown): void {
    if (error) {
      const errStr = error instanceof Error ? error.stack || error.message : String(error);
      this.write('ERROR', `${message}\n${errStr}`);
    } else {
      this.write('ERROR', message);
    }
  }
}

/**
 * Logging surface the components depend on
 */
export type AppLogger = Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>;

export function createLogger(level: LogLevel, logFile?: string): Logger {
  return new Logger(level, logFile);
}

/**
 * Scoped logger when the given one supports it, the same one otherwise
 */
export function scopedLogger(logger: AppLogger, scope: string): AppLogger {
  return logger instanceof Logger ? logger.child(scope) : logger;
}
