/**
 * Leveled logging for the calculator and its CLI.
 *
 * Log lines go to stderr so stdout carries only command output. Child loggers
 * read their level from the parent at log time until given one of their own.
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

const DEFAULT_LEVEL: LogLevel = 'info';

class Logger {
  private level?: LogLevel;

  constructor(
    private readonly scope: string = '',
    private readonly parent?: Logger
  ) {}

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level ?? this.parent?.getLevel() ?? DEFAULT_LEVEL;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.getLevel()];
  }

  private write(tag: string, message: string, color: (text: string) => string): void {
    const scoped = this.scope ? `[${this.scope}] ${message}` : message;
    console.error(color(`[${tag}] ${scoped}`));
  }

  debug(message: string): void {
    if (this.shouldLog('debug')) this.write('DEBUG', message, chalk.gray);
  }

  info(message: string): void {
    if (this.shouldLog('info')) this.write('INFO', message, chalk.blue);
  }

  warn(message: string): void {
    if (this.shouldLog('warn')) this.write('WARN', message, chalk.yellow);
  }

  error(message: string): void {
    if (this.shouldLog('error')) this.write('ERROR', message, chalk.red);
  }

  /**
   * Confirmation for the user. Printed to stdout, suppressed only when silent.
   */
  success(message: string): void {
    if (this.getLevel() === 'silent') return;
    console.log(chalk.green(`✓ ${message}`));
  }

  /**
   * Create a scoped logger that follows this logger's level.
   */
  child(scope: string): Logger {
    return new Logger(this.scope ? `${this.scope}:${scope}` : scope, this);
  }
}

// Singleton instance
export const logger = new Logger();

export { Logger };
