/**
 * Logging utility for the Weather Analytics Engine
 * Provides structured logging with different levels and context
 */

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

export interface LogContext {
  component?: string;
  locationId?: string;
  alertId?: string;
  operation?: string;
  requestId?: string;
  correlationId?: string;
  [key: string]: unknown;
}

export type LogData = Record<string, unknown>;

const LEVEL_ORDER: LogLevel[] = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

export function parseLogLevel(level: string | undefined, fallback: LogLevel = LogLevel.INFO): LogLevel {
  if (!level) return fallback;
  const upperLevel = level.toUpperCase();
  const match = LEVEL_ORDER.find(l => l === upperLevel);
  return match ?? fallback;
}

export class Logger {
  private context: LogContext;
  private logLevel: LogLevel;

  constructor(context: LogContext = {}, logLevel?: LogLevel) {
    this.context = context;
    this.logLevel = logLevel ?? parseLogLevel(process.env.LOG_LEVEL);
  }

  get level(): LogLevel {
    return this.logLevel;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.logLevel);
  }

  private formatMessage(level: LogLevel, message: string, data?: LogData): string {
    const logEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      context: this.context,
      data,
    };

    return JSON.stringify(logEntry);
  }

  debug(message: string, data?: LogData): void {
    if (this.shouldLog(LogLevel.DEBUG)) {
      console.log(this.formatMessage(LogLevel.DEBUG, message, data));
    }
  }

  info(message: string, data?: LogData): void {
    if (this.shouldLog(LogLevel.INFO)) {
      console.log(this.formatMessage(LogLevel.INFO, message, data));
    }
  }

  warn(message: string, data?: LogData): void {
    if (this.shouldLog(LogLevel.WARN)) {
      console.warn(this.formatMessage(LogLevel.WARN, message, data));
    }
  }

  error(message: string, error?: unknown, data?: LogData): void {
    if (this.shouldLog(LogLevel.ERROR)) {
      const errorData = {
        ...data,
        error: error instanceof Error ? {
          name: error.name,
          message: error.message,
          stack: error.stack,
        } : error,
      };
      console.error(this.formatMessage(LogLevel.ERROR, message, errorData));
    }
  }

  /**
   * Create a child logger with additional context
   */
  child(additionalContext: LogContext): Logger {
    return new Logger({ ...this.context, ...additionalContext }, this.logLevel);
  }

  /**
   * Log performance metrics
   */
  performance(operation: string, duration: number, data?: LogData): void {
    this.debug(`Performance: ${operation}`, {
      operation,
      duration,
      unit: 'ms',
      ...data,
    });
  }

  /**
   * Log audit events (alert state transitions, manual resolutions)
   */
  audit(action: string, resource: string, data?: LogData): void {
    this.info(`Audit: ${action}`, {
      action,
      resource,
      auditEvent: true,
      ...data,
    });
  }
}

/**
 * Create a logger for an engine component
 */
export function createLogger(component: string, level?: LogLevel): Logger {
  return new Logger({
    component,
    correlationId: process.env.CORRELATION_ID,
  }, level);
}
