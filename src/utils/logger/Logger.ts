import chalk from 'chalk';

import { LogLevel } from '../../types/enums';

const LEVEL_ORDER = [LogLevel.ERROR, LogLevel.WARN, LogLevel.INFO, LogLevel.DEBUG];

const LEVEL_COLORS: Record<LogLevel, chalk.Chalk> = {
  [LogLevel.ERROR]: chalk.red,
  [LogLevel.WARN]: chalk.yellow,
  [LogLevel.INFO]: chalk.cyan,
  [LogLevel.DEBUG]: chalk.gray,
};

export interface LoggerOptions {
  level?: LogLevel;
  prefix?: string;
  /** Colour level tags; off with --boring */
  colorize?: boolean;
}

/**
 * Console logger with level filtering and prefixed child loggers
 */
export class Logger {
  private level: LogLevel;
  private prefix: string;
  private readonly colorize: boolean;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? LogLevel.INFO;
    this.prefix = options.prefix ?? '';
    this.colorize = options.colorize ?? true;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isColorized(): boolean {
    return this.colorize;
  }

  error(message: string, ...args: unknown[]): void {
    this.log(LogLevel.ERROR, message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog(LogLevel.WARN)) {
      this.log(LogLevel.WARN, message, ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog(LogLevel.INFO)) {
      this.log(LogLevel.INFO, message, ...args);
    }
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog(LogLevel.DEBUG)) {
      this.log(LogLevel.DEBUG, message, ...args);
    }
  }

  /**
   * Create child logger with prefix; it inherits level and colour settings
   */
  child(prefix: string): Logger {
    const childPrefix = this.prefix ? `${this.prefix}:${prefix}` : prefix;
    return new Logger({ level: this.level, prefix: childPrefix, colorize: this.colorize });
  }

  /**
   * Render one log line without writing it
   */
  format(level: LogLevel, message: string): string {
    const tag = `[${level.toUpperCase()}]`.padEnd(8);
    const levelStr = this.colorize ? LEVEL_COLORS[level](tag) : tag;
    const prefixStr = this.prefix ? `${this.prefix}: ` : '';
    return `${levelStr} ${prefixStr}${message}`;
  }

  private log(level: LogLevel, message: string, ...args: unknown[]): void {
    const formattedMessage = this.format(level, message);

    switch (level) {
      case LogLevel.ERROR:
        console.error(formattedMessage, ...args);
        break;
      case LogLevel.WARN:
        console.warn(formattedMessage, ...args);
        break;
      default:
        // eslint-disable-next-line no-console
        console.log(formattedMessage, ...args);
    }
  }

  private shouldLog(messageLevel: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(messageLevel) <= LEVEL_ORDER.indexOf(this.level);
  }
}

/**
 * Create a logger instance
 */
export function createLogger(level: LogLevel = LogLevel.INFO, prefix = ''): Logger {
  return new Logger({ level, prefix });
}
