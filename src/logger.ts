/**
 * Centralized logging system with multiple output levels
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  message: string;
  context?: string;
  data?: Record<string, unknown>;
  error?: Error;
}

export interface LoggerOptions {
  level?: LogLevel;
  context?: string;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LEVELS.some(level => level === value);
}

function stringifyData(data: Record<string, unknown>): string {
  const seen = new WeakSet<object>();
  return JSON.stringify(
    data,
    (_key, value: unknown) => {
      if (value instanceof Error) {
        return { name: value.name, message: value.message };
      }
      if (typeof value === 'object' && value !== null) {
        if (seen.has(value)) return '[Circular]';
        seen.add(value);
      }
      return value;
    },
    2
  );
}

export class Logger {
  private logs: LogEntry[] = [];
  private maxLogs = 1000;
  private minLevel: LogLevel;
  private context?: string;
  private parent?: Logger;

  constructor(options: LoggerOptions = {}, parent?: Logger) {
    this.minLevel = options.level ?? 'info';
    this.context = options.context;
    this.parent = parent;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.minLevel);
  }

  private formatMessage(entry: LogEntry): string {
    const timestamp = entry.timestamp.toISOString();
    const level = entry.level.toUpperCase().padEnd(5);
    const context = entry.context ? `[${entry.context}]` : '';

    let message = `${timestamp} ${level} ${context} ${entry.message}`;

    if (entry.data && Object.keys(entry.data).length > 0) {
      message += '\n  ' + stringifyData(entry.data).split('\n').join('\n  ');
    }

    if (entry.error) {
      message += `\n  Error: ${entry.error.message}\n  Stack: ${entry.error.stack}`;
    }

    return message;
  }

  private getConsoleColor(level: LogLevel): string {
    const colors: Record<LogLevel, string> = {
      debug: '\x1b[36m',    // Cyan
      info: '\x1b[32m',     // Green
      warn: '\x1b[33m',     // Yellow
      error: '\x1b[31m'     // Red
    };
    return colors[level];
  }

  private log(entry: LogEntry): void {
    if (this.parent) {
      this.parent.log(entry);
      return;
    }
    if (!this.shouldLog(entry.level)) return;

    this.logs.push(entry);
    if (this.logs.length > this.maxLogs) {
      this.logs = this.logs.slice(-this.maxLogs);
    }

    const formatted = this.formatMessage(entry);
    const color = this.getConsoleColor(entry.level);
    const reset = '\x1b[0m';

    switch (entry.level) {
      case 'error':
        console.error(`${color}${formatted}${reset}`);
        break;
      case 'warn':
        console.warn(`${color}${formatted}${reset}`);
        break;
      default:
        console.log(`${color}${formatted}${reset}`);
    }
  }

  debug(message: string, data?: Record<string, unknown>, context?: string): void {
    this.log({ timestamp: new Date(), level: 'debug', message, data, context: context ?? this.context });
  }

  info(message: string, data?: Record<string, unknown>, context?: string): void {
    this.log({ timestamp: new Date(), level: 'info', message, data, context: context ?? this.context });
  }

  warn(message: string, data?: Record<string, unknown>, context?: string): void {
    this.log({ timestamp: new Date(), level: 'warn', message, data, context: context ?? this.context });
  }

  error(message: string, error?: Error, context?: string): void {
    this.log({
      timestamp: new Date(),
      level: 'error',
      message,
      error,
      context: context ?? this.context
    });
  }

  /**
   * Logger tagged with a narrower context. Level, buffer and output stay with this one.
   */
  child(context: string): Logger {
    const scoped = this.context ? `${this.context}:${context}` : context;
    return new Logger({ context: scoped }, this);
  }

  getLogs(level?: LogLevel): LogEntry[] {
    return level ? this.logs.filter(log => log.level === level) : this.logs;
  }

  clear(): void {
    this.logs = [];
  }

  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getMinLevel(): LogLevel {
    return this.minLevel;
  }
}

// Singleton instance
export const logger = new Logger({
  level: isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : 'warn'
});

export type ErrorCode =
  | 'NOT_FOUND'
  | 'INVALID_ENTRY_TYPE'
  | 'NOT_A_DIRECTORY'
  | 'DESTINATION_COLLISION'
  | 'NON_EMPTY_TARGET'
  | 'LOG_CORRUPT'
  | 'LOG_WRITE_FAILURE'
  | 'RENAME_FAILED'
  | 'USAGE_ERROR'
  | 'INTERNAL_ERROR';

/**
 * Custom error class for application errors
 */
export class AppError extends Error {
  constructor(
    message: string,
    public code: ErrorCode = 'INTERNAL_ERROR',
    public exitCode: number = 1,
    public context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): { name: string; message: string; code: ErrorCode; exitCode: number; context?: Record<string, unknown> } {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      exitCode: this.exitCode,
      context: this.context
    };
  }
}

/**
 * Normalize anything thrown into an AppError, logging the original.
 */
export function handleError(error: unknown, context?: string): AppError {
  if (error instanceof AppError) {
    logger.debug(error.message, { code: error.code, ...error.context }, context);
    return error;
  }

  if (error instanceof Error) {
    logger.error(error.message, error, context);
    return new AppError(error.message, 'INTERNAL_ERROR', 1);
  }

  logger.error(String(error), undefined, context);
  return new AppError(String(error), 'INTERNAL_ERROR', 1);
}

/**
 * Single-line, coloured rendering of a fatal error for the terminal.
 */
export function formatError(error: AppError, color = true): string {
  const red = color ? '\x1b[31m' : '';
  const bold = color ? '\x1b[1m' : '';
  const reset = color ? '\x1b[0m' : '';
  return `${red}${bold}error${reset}${red} [${error.code}]${reset} ${error.message}`;
}

/**
 * Extract the errno code from a Node filesystem error.
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
