/**
 * @arch lintcache.infra.logging
 *
 * Console logging with levels and prefixes.
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

type Sink = 'log' | 'warn' | 'error';

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * Logger for lintcache. Debug output is where cache decisions
 * (hits, invalidation reasons, saves) are reported.
 */
class Logger {
  private level: LogLevel | undefined;
  private prefix: string = '';
  private parent: Logger | undefined;

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /**
   * Children follow their parent's level until given their own.
   */
  getLevel(): LogLevel {
    return this.level ?? this.parent?.getLevel() ?? 'info';
  }

  setPrefix(prefix: string): void {
    this.prefix = prefix;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.getLevel()];
  }

  private write(
    sink: Sink,
    paint: (text: string) => string,
    tag: string,
    message: string,
    data?: Record<string, unknown>
  ): void {
    const formatted = this.prefix ? `[${this.prefix}] ${message}` : message;
    console[sink](paint(`[${tag}] ${formatted}`));
    if (data) {
      console[sink](paint(JSON.stringify(data, null, 2)));
    }
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('debug')) return;
    this.write('log', chalk.gray, 'DEBUG', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('info')) return;
    this.write('log', chalk.blue, 'INFO', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('warn')) return;
    this.write('warn', chalk.yellow, 'WARN', message, data);
  }

  error(message: string, error?: Error | Record<string, unknown>): void {
    if (!this.shouldLog('error')) return;
    this.write('error', chalk.red, 'ERROR', message);
    if (error instanceof Error) {
      console.error(chalk.red(error.stack || error.message));
    } else if (error) {
      console.error(chalk.red(JSON.stringify(error, null, 2)));
    }
  }

  /**
   * Log a success message (shown unless level is above info).
   */
  success(message: string): void {
    if (!this.shouldLog('info')) return;
    console.log(chalk.green(`✓ ${message}`));
  }

  /**
   * Create a child logger with a prefix.
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
