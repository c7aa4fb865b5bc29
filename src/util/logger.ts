import chalk from 'chalk';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export interface LoggerOptions {
  level?: LogLevel;
  prefix?: string;
  timestamps?: boolean;
}

export function parseLogLevel(level?: string): LogLevel {
  if (!level) return LogLevel.INFO;

  switch (level.trim().toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'INFO':
      return LogLevel.INFO;
    case 'WARN':
    case 'WARNING':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    case 'SILENT':
      return LogLevel.SILENT;
    default:
      return LogLevel.INFO;
  }
}

type ConsoleMethod = 'log' | 'warn' | 'error';

export class Logger {
  private level: LogLevel;
  private prefix: string;
  private timestamps: boolean;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? parseLogLevel(process.env.LOG_LEVEL);
    this.prefix = options.prefix ?? '';
    this.timestamps = options.timestamps ?? false;
  }

  private formatMessage(levelTag: string, message: string): string {
    const parts: string[] = [];

    if (this.timestamps) {
      parts.push(chalk.gray(`[${new Date().toISOString()}]`));
    }

    parts.push(`[${levelTag}]`);

    if (this.prefix) {
      parts.push(chalk.cyan(`[${this.prefix}]`));
    }

    parts.push(message);
    return parts.join(' ');
  }

  private log(
    level: LogLevel,
    levelName: string,
    color: (text: string) => string,
    method: ConsoleMethod,
    message: string,
    args: unknown[],
  ): void {
    if (this.level > level) {
      return;
    }
    console[method](this.formatMessage(color(levelName), message), ...args);
  }

  debug(message: string, ...args: unknown[]): void {
    this.log(LogLevel.DEBUG, 'DEBUG', chalk.magenta, 'log', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.log(LogLevel.INFO, 'INFO', chalk.blue, 'log', message, args);
  }

  success(message: string, ...args: unknown[]): void {
    this.log(LogLevel.INFO, 'OK', chalk.green, 'log', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.log(LogLevel.WARN, 'WARN', chalk.yellow, 'warn', message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.log(LogLevel.ERROR, 'ERROR', chalk.red, 'error', message, args);
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  child(prefix: string): Logger {
    return new Logger({
      level: this.level,
      prefix: this.prefix ? `${this.prefix}:${prefix}` : prefix,
      timestamps: this.timestamps,
    });
  }
}

export function createLogger(prefix: string, options: Omit<LoggerOptions, 'prefix'> = {}): Logger {
  return new Logger({ ...options, prefix });
}

// Default logger instance
export const logger = new Logger();
