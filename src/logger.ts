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
  context?: string;
  level?: LogLevel | Uppercase<LogLevel>;
  maxEntries?: number;
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return LEVELS.find(level => level === normalized) ?? fallback;
}

function safeStringify(data: Record<string, unknown>): string {
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
  private entries: LogEntry[] = [];
  private maxEntries: number;
  /** Unset means `LOG_LEVEL` is read at log time. */
  private minLevel?: LogLevel;
  private context?: string;

  constructor(options: LoggerOptions = {}) {
    this.context = options.context;
    this.minLevel = options.level ? parseLogLevel(options.level) : undefined;
    this.maxEntries = options.maxEntries ?? 1000;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.getMinLevel());
  }

  private formatMessage(entry: LogEntry): string {
    const timestamp = entry.timestamp.toISOString();
    const level = entry.level.toUpperCase().padEnd(5);
    const context = entry.context ? `[${entry.context}] ` : '';

    let message = `${timestamp} ${level} ${context}${entry.message}`;

    if (entry.data && Object.keys(entry.data).length > 0) {
      message += '\n  ' + safeStringify(entry.data).split('\n').join('\n  ');
    }

    if (entry.error) {
      message += `\n  Error: ${entry.error.message}`;
      if (entry.level === 'debug' && entry.error.stack) {
        message += `\n  Stack: ${entry.error.stack}`;
      }
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
    if (!this.shouldLog(entry.level)) return;

    this.entries.push(entry);
    if (this.entries.length > this.maxEntries) {
      this.entries = this.entries.slice(-this.maxEntries);
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

  debug(message: string, data?: Record<string, unknown>): void {
    this.log({ timestamp: new Date(), level: 'debug', message, data, context: this.context });
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log({ timestamp: new Date(), level: 'info', message, data, context: this.context });
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log({ timestamp: new Date(), level: 'warn', message, data, context: this.context });
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log({
      timestamp: new Date(),
      level: 'error',
      message,
      data,
      error: error === undefined ? undefined : toError(error),
      context: this.context
    });
  }

  /**
   * Derive a logger whose context is nested under this one, e.g. `engine:files`.
   */
  child(subContext: string): Logger {
    const context = this.context ? `${this.context}:${subContext}` : subContext;
    return new Logger({ context, level: this.minLevel, maxEntries: this.maxEntries });
  }

  getLogs(level?: LogLevel): LogEntry[] {
    return level ? this.entries.filter(entry => entry.level === level) : [...this.entries];
  }

  clear(): void {
    this.entries = [];
  }

  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getMinLevel(): LogLevel {
    return this.minLevel ?? parseLogLevel(process.env.LOG_LEVEL);
  }
}

// Process-wide instance
export const logger = new Logger();

/**
 * Custom error class for application errors
 */
export class AppError extends Error {
  constructor(
    message: string,
    public code: string = 'UNKNOWN_ERROR',
    public exitCode: number = 1,
    public context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): { name: string; message: string; code: string; exitCode: number; context?: Record<string, unknown> } {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      exitCode: this.exitCode,
      context: this.context
    };
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Normalize anything thrown into an AppError and log it
 */
export function handleError(error: unknown, log: Logger = logger): AppError {
  if (error instanceof AppError) {
    log.error(error.message, error, error.context);
    return error;
  }

  if (error instanceof Error) {
    const appError = new AppError(error.message, 'INTERNAL_ERROR', 1);
    log.error(error.message, error);
    return appError;
  }

  const appError = new AppError(String(error), 'UNKNOWN_ERROR', 1);
  log.error(String(error));
  return appError;
}

/**
 * Error code carried by node's fs errors (ENOENT, EACCES, ...)
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
