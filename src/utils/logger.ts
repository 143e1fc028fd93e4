/**
 * Logger Utility
 *
 * Structured logging for the event isolation pipeline.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: Record<string, unknown>;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

export interface LoggerLike {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): LoggerLike;
}

export class Logger implements LoggerLike {
  private minLevel: LogLevel;
  private serviceName: string;

  constructor(serviceName: string = 'event-pipeline', minLevel: LogLevel = 'info') {
    this.serviceName = serviceName;
    this.minLevel = minLevel;
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.minLevel];
  }

  private formatEntry(entry: LogEntry): string {
    return JSON.stringify({
      ...entry,
      service: this.serviceName,
    });
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>) {
    if (!this.shouldLog(level)) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      context,
    };

    const formatted = this.formatEntry(entry);

    // Every level writes to stderr; stdout carries the progress report.
    switch (level) {
      case 'debug':
      case 'info':
      case 'warn':
        console.warn(formatted);
        break;
      case 'error':
        console.error(formatted);
        break;
    }
  }

  debug(message: string, context?: Record<string, unknown>) {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>) {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>) {
    this.log('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>) {
    this.log('error', message, context);
  }

  child(context: Record<string, unknown>): LoggerLike {
    return new ChildLogger(this, context);
  }
}

class ChildLogger implements LoggerLike {
  private parent: LoggerLike;
  private baseContext: Record<string, unknown>;

  constructor(parent: LoggerLike, context: Record<string, unknown>) {
    this.parent = parent;
    this.baseContext = context;
  }

  debug(message: string, context?: Record<string, unknown>) {
    this.parent.debug(message, { ...this.baseContext, ...context });
  }

  info(message: string, context?: Record<string, unknown>) {
    this.parent.info(message, { ...this.baseContext, ...context });
  }

  warn(message: string, context?: Record<string, unknown>) {
    this.parent.warn(message, { ...this.baseContext, ...context });
  }

  error(message: string, context?: Record<string, unknown>) {
    this.parent.error(message, { ...this.baseContext, ...context });
  }

  child(context: Record<string, unknown>): LoggerLike {
    return new ChildLogger(this, context);
  }
}

const envLevel = process.env.LOG_LEVEL ?? '';

// Singleton logger instance
export const logger = new Logger(
  process.env.SERVICE_NAME || 'event-pipeline',
  isLogLevel(envLevel) ? envLevel : 'info'
);
