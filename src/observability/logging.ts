/**
 * Structured logging for signing and delivery
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

export type LogContext = Record<string, unknown>;

export interface Logger {
  error(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  trace(message: string, context?: LogContext): void;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

/**
 * Console-based logger with structured output
 */
export class ConsoleLogger implements Logger {
  private minLevel: LogLevel;

  constructor(minLevel: LogLevel = 'info') {
    this.minLevel = minLevel;
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  trace(message: string, context?: LogContext): void {
    this.log('trace', message, context);
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.minLevel]) {
      return;
    }

    const timestamp = new Date().toISOString();
    const contextStr = context ? ` ${JSON.stringify(context)}` : '';

    const logMessage = `[${timestamp}] [${level.toUpperCase()}] ${message}${contextStr}`;

    switch (level) {
      case 'error':
        console.error(logMessage);
        break;
      case 'warn':
        console.warn(logMessage);
        break;
      case 'debug':
      case 'trace':
        console.debug(logMessage);
        break;
      default:
        console.log(logMessage);
    }
  }
}

/**
 * No-op logger for when logging is disabled
 */
export class NoopLogger implements Logger {
  error(_message: string, _context?: LogContext): void {
    // No-op
  }

  warn(_message: string, _context?: LogContext): void {
    // No-op
  }

  info(_message: string, _context?: LogContext): void {
    // No-op
  }

  debug(_message: string, _context?: LogContext): void {
    // No-op
  }

  trace(_message: string, _context?: LogContext): void {
    // No-op
  }
}

/**
 * Creates a logger for a configured level; 'silent' disables logging
 */
export function createLogger(level: LogLevel | 'silent'): Logger {
  return level === 'silent' ? new NoopLogger() : new ConsoleLogger(level);
}

/**
 * Logs a failed attempt that will be retried
 */
export function logRetry(
  logger: Logger,
  operation: string,
  attempt: number,
  maxAttempts: number,
  delayMs: number,
  error: Error
): void {
  logger.warn(`Attempt ${attempt}/${maxAttempts} failed, retrying in ${delayMs}ms`, {
    operation,
    errorName: error.name,
    errorMessage: error.message,
  });
}

/**
 * Logs the error an operation finally fails with
 */
export function logGiveUp(logger: Logger, operation: string, attempts: number, error: Error): void {
  logger.error(`Operation failed after ${attempts} attempt(s)`, {
    operation,
    errorName: error.name,
    errorMessage: error.message,
  });
}

/**
 * Logs that credentials were reported invalid
 */
export function logCredentialsInvalid(logger: Logger, scope: string, reason: string): void {
  logger.warn('Credentials reported invalid', { scope, reason });
}

/**
 * Logs a completed request
 */
export function logOperation(
  logger: Logger,
  operation: string,
  status: number,
  durationMs: number
): void {
  logger.debug('AWS request completed', { operation, status, durationMs });
}
