import chalk from 'chalk';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const LEVEL_ORDER: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  error: chalk.red,
  warn: chalk.yellow,
  info: chalk.cyan,
  debug: chalk.dim,
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return (
    value !== undefined &&
    Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value)
  );
}

/**
 * Console logger. Everything goes to stderr so command output printed on
 * stdout can be piped.
 */
export class Logger {
  private level: LogLevel;

  constructor(level: LogLevel = 'info') {
    this.level = level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.write('error', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.write('warn', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.write('info', message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.write('debug', message, meta);
  }

  format(
    level: LogLevel,
    message: string,
    meta?: Record<string, unknown>
  ): string {
    const timestamp = new Date().toISOString();
    const tag = LEVEL_COLORS[level](`[${level.toUpperCase()}]`);
    const formattedMeta =
      meta && Object.keys(meta).length > 0 ? ' ' + JSON.stringify(meta) : '';
    return `[${timestamp}] ${tag} ${message}${formattedMeta}`;
  }

  private write(
    level: LogLevel,
    message: string,
    meta?: Record<string, unknown>
  ): void {
    if (LEVEL_ORDER[level] > LEVEL_ORDER[this.level]) {
      return;
    }
    console.error(this.format(level, message, meta));
  }
}

const envLevel = process.env.LOG_LEVEL?.toLowerCase();

// Global logger instance
export const logger = new Logger(isLogLevel(envLevel) ? envLevel : 'info');
