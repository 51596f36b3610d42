/**
 * Structured logging utility for repo-dashboard
 * Outputs JSON-formatted logs with context
 */

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const LEVELS: readonly LogLevel[] = ['DEBUG', 'INFO', 'WARN', 'ERROR'];

interface LogContext {
  [key: string]: unknown;
}

/**
 * Parse a log level name, falling back to INFO for unknown values
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  const upper = value?.toUpperCase();
  return LEVELS.find((level) => level === upper) ?? 'INFO';
}

/**
 * Structured logger with JSON output
 */
export class Logger {
  private static level: LogLevel = parseLogLevel(process.env.LOG_LEVEL);

  /**
   * Log debug message (only in DEBUG mode)
   */
  static debug(message: string, context?: LogContext): void {
    if (this.shouldLog('DEBUG')) {
      this.log('DEBUG', message, context);
    }
  }

  /**
   * Log info message
   */
  static info(message: string, context?: LogContext): void {
    if (this.shouldLog('INFO')) {
      this.log('INFO', message, context);
    }
  }

  /**
   * Log warning message
   */
  static warn(message: string, context?: LogContext): void {
    if (this.shouldLog('WARN')) {
      this.log('WARN', message, context);
    }
  }

  /**
   * Log error message
   */
  static error(message: string, context?: LogContext): void {
    this.log('ERROR', message, context);
  }

  private static log(level: LogLevel, message: string, context?: LogContext): void {
    const logEntry: Record<string, unknown> = {
      timestamp: new Date().toISOString(),
      level,
      message,
    };

    if (context) {
      logEntry.context = this.sanitize(context);
    }

    console.log(JSON.stringify(logEntry));
  }

  /**
   * Mask values of keys that may carry credentials
   */
  private static sanitize(context: LogContext): LogContext {
    const sanitized = { ...context };
    const secretKeys = ['apiKey', 'api_key', 'token', 'password', 'secret', 'authorization'];

    secretKeys.forEach((key) => {
      if (sanitized[key]) {
        sanitized[key] = '***';
      }
    });

    return sanitized;
  }

  private static shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.level);
  }

  static setLevel(level: LogLevel): void {
    this.level = level;
  }

  static getLevel(): LogLevel {
    return this.level;
  }
}

/**
 * Message of an unknown thrown value, for log context
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
