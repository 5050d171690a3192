/**
 * Structured logging infrastructure.
 */
import chalk from 'chalk';

export const LOG_LEVEL_NAMES = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVEL_NAMES)[number];

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/**
 * Simple leveled logger for the stampkit CLI and engine.
 */
class Logger {
  private level?: LogLevel;
  private prefix: string = '';
  private parent?: Logger;

  /**
   * Set this logger's level. A child without its own level follows its parent.
   */
  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level ?? this.parent?.getLevel() ?? 'info';
  }

  setPrefix(prefix: string): void {
    this.prefix = prefix;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.getLevel()];
  }

  private formatMessage(message: string): string {
    return this.prefix ? `[${this.prefix}] ${message}` : message;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('debug')) return;
    const formatted = this.formatMessage(message);
    console.log(chalk.gray(`[DEBUG] ${formatted}`));
    if (data) {
      console.log(chalk.gray(JSON.stringify(data, null, 2)));
    }
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('info')) return;
    const formatted = this.formatMessage(message);
    console.log(chalk.blue(`[INFO] ${formatted}`));
    if (data) {
      console.log(chalk.blue(JSON.stringify(data, null, 2)));
    }
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('warn')) return;
    const formatted = this.formatMessage(message);
    console.warn(chalk.yellow(`[WARN] ${formatted}`));
    if (data) {
      console.warn(chalk.yellow(JSON.stringify(data, null, 2)));
    }
  }

  error(message: string, error?: Error | Record<string, unknown>): void {
    if (!this.shouldLog('error')) return;
    const formatted = this.formatMessage(message);
    console.error(chalk.red(`[ERROR] ${formatted}`));
    if (error) {
      if (error instanceof Error) {
        console.error(chalk.red(error.stack || error.message));
      } else {
        console.error(chalk.red(JSON.stringify(error, null, 2)));
      }
    }
  }

  /**
   * Log a success message (always shown unless silent).
   */
  success(message: string): void {
    if (!this.shouldLog('info')) return;
    console.log(chalk.green(`✓ ${message}`));
  }

  /**
   * Log a failure message (always shown unless silent).
   */
  fail(message: string): void {
    if (!this.shouldLog('info')) return;
    console.log(chalk.red(`✗ ${message}`));
  }

  /**
   * Create a child logger with a prefix.
   * Children follow the parent's level, including later changes to it.
   */
  child(prefix: string): Logger {
    const child = new Logger();
    child.parent = this;
    child.prefix = this.prefix ? `${this.prefix}:${prefix}` : prefix;
    return child;
  }
}

// Singleton instance
export const logger = new Logger();

export { Logger };
