/**
 * Structured logging for the trajeval CLI and library.
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

type Emitter = (line: string) => void;

const STYLES: Record<Exclude<LogLevel, 'silent'>, { tag: string; color: (text: string) => string; emit: Emitter }> = {
  debug: { tag: 'DEBUG', color: chalk.gray, emit: (line) => console.log(line) },
  info: { tag: 'INFO', color: chalk.blue, emit: (line) => console.log(line) },
  warn: { tag: 'WARN', color: chalk.yellow, emit: (line) => console.warn(line) },
  error: { tag: 'ERROR', color: chalk.red, emit: (line) => console.error(line) },
};

class Logger {
  private level: LogLevel | null = null;
  private prefix: string = '';

  constructor(private readonly parent: Logger | null = null) {}

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /**
   * Effective level. A child without its own level follows its parent.
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

  private write(level: Exclude<LogLevel, 'silent'>, message: string, data?: unknown): void {
    if (!this.shouldLog(level)) return;
    const { tag, color, emit } = STYLES[level];
    const formatted = this.prefix ? `[${this.prefix}] ${message}` : message;
    emit(color(`[${tag}] ${formatted}`));
    if (data === undefined) return;
    if (data instanceof Error) {
      emit(color(data.stack || data.message));
    } else {
      emit(color(JSON.stringify(data, null, 2)));
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
    this.write('error', message, error);
  }

  /**
   * Log a success line (shown at info level and below).
   */
  success(message: string): void {
    if (!this.shouldLog('info')) return;
    console.log(chalk.green(`✓ ${message}`));
  }

  /**
   * Log a failure line (shown at info level and below).
   */
  fail(message: string): void {
    if (!this.shouldLog('info')) return;
    console.log(chalk.red(`✗ ${message}`));
  }

  /**
   * Create a child logger whose prefix nests under this one.
   */
  child(prefix: string): Logger {
    const child = new Logger(this);
    child.prefix = this.prefix ? `${this.prefix}:${prefix}` : prefix;
    return child;
  }
}

export const logger = new Logger();

export { Logger };
