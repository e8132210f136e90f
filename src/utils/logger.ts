/**
 * @arch codeout.infra.logging
 *
 * Leveled diagnostic logging.
 * Diagnostics go to stderr; stdout is reserved for the success notification
 * and for command output.
 */
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

class Logger {
  private level: LogLevel = 'info';
  private prefix: string = '';

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  setPrefix(prefix: string): void {
    this.prefix = prefix;
  }

  isEnabled(level: LogLevel): boolean {
    return level !== 'silent' && LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private write(level: Exclude<LogLevel, 'silent'>, message: string, data?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) return;
    const paint = COLORS[level];
    const tag = `[${level.toUpperCase()}]`;
    const text = this.prefix ? `${tag} [${this.prefix}] ${message}` : `${tag} ${message}`;
    console.error(paint(text));
    if (data) {
      console.error(paint(JSON.stringify(data, null, 2)));
    }
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.write('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.write('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.write('warn', message, data);
  }

  error(message: string, error?: Error | Record<string, unknown>): void {
    if (!this.isEnabled('error')) return;
    if (error instanceof Error) {
      this.write('error', message);
      console.error(chalk.red(error.stack || error.message));
      return;
    }
    this.write('error', message, error);
  }

  /**
   * Print a success line to stdout (shown unless the level is above info).
   */
  success(message: string): void {
    if (!this.isEnabled('info')) return;
    console.log(chalk.green(`✓ ${message}`));
  }

  /**
   * Create a child logger sharing this logger's level at creation time.
   */
  child(prefix: string): Logger {
    const child = new Logger();
    child.level = this.level;
    child.prefix = this.prefix ? `${this.prefix}:${prefix}` : prefix;
    return child;
  }
}

const COLORS: Record<Exclude<LogLevel, 'silent'>, (text: string) => string> = {
  debug: (text) => chalk.gray(text),
  info: (text) => chalk.blue(text),
  warn: (text) => chalk.yellow(text),
  error: (text) => chalk.red(text),
};

// Singleton instance
export const logger = new Logger();

export { Logger };
