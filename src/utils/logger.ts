/**
 * Leveled console logging for the lint kit.
 */
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/**
 * Console logger with an optional prefix and a JSON data trailer.
 */
class Logger {
  private level: LogLevel | null = null;
  private prefix: string = '';
  private parent: Logger | null = null;

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /**
   * A child without its own level follows its parent's.
   */
  getLevel(): LogLevel {
    return this.level ?? this.parent?.getLevel() ?? 'info';
  }

  setPrefix(prefix: string): void {
    this.prefix = prefix;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return level !== 'silent' && LOG_LEVELS[level] >= LOG_LEVELS[this.getLevel()];
  }

  private formatMessage(tag: string, message: string): string {
    return this.prefix ? `[${tag}] [${this.prefix}] ${message}` : `[${tag}] ${message}`;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (!this.isLevelEnabled('debug')) return;
    console.log(chalk.gray(this.formatMessage('DEBUG', message)));
    if (data) {
      console.log(chalk.gray(JSON.stringify(data, null, 2)));
    }
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (!this.isLevelEnabled('info')) return;
    console.log(chalk.blue(this.formatMessage('INFO', message)));
    if (data) {
      console.log(chalk.blue(JSON.stringify(data, null, 2)));
    }
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (!this.isLevelEnabled('warn')) return;
    console.warn(chalk.yellow(this.formatMessage('WARN', message)));
    if (data) {
      console.warn(chalk.yellow(JSON.stringify(data, null, 2)));
    }
  }

  error(message: string, error?: Error | Record<string, unknown>): void {
    if (!this.isLevelEnabled('error')) return;
    console.error(chalk.red(this.formatMessage('ERROR', message)));
    if (error instanceof Error) {
      console.error(chalk.red(error.stack ?? error.message));
    } else if (error) {
      console.error(chalk.red(JSON.stringify(error, null, 2)));
    }
  }

  /**
   * Create a prefixed child logger.
   */
  child(prefix: string): Logger {
    const child = new Logger();
    child.parent = this;
    child.prefix = this.prefix ? `${this.prefix}:${prefix}` : prefix;
    return child;
  }
}

export const logger = new Logger();

export { Logger };
