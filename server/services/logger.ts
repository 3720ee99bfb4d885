/**
 * Logger Service
 *
 * Centralized logging with consistent formatting and structured context.
 *
 * Usage:
 *   import { logger } from './services/logger';
 *   logger.info('operation', 'message', { context });
 *   logger.error('operation', 'message', { context }, error);
 */

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LogContext {
  [key: string]: unknown;
}

interface LogEntry {
  level: LogLevel;
  timestamp: string;
  operation: string;
  message: string;
  context?: LogContext;
  error?: {
    message: string;
    stack?: string;
    name?: string;
  };
}

export interface ScopedLogger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext, error?: Error): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

class LoggerService {
  private isDev = process.env.NODE_ENV !== 'production';
  private useEmoji = process.env.NODE_ENV !== 'production';
  private threshold: LogLevel = isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : 'info';

  private readonly levelEmoji: Record<LogLevel, string> = {
    debug: '🔍',
    info: '📋',
    warn: '⚠️',
    error: '❌',
  };

  /**
   * Format log entry for console output
   */
  private format(entry: LogEntry): string {
    const { level, operation, message, context, error } = entry;

    // Dev: pretty format with emoji
    if (this.isDev) {
      const emoji = this.useEmoji ? `${this.levelEmoji[level]} ` : '';
      const prefix = operation ? `[${operation}] ` : '';
      let output = `${emoji}${prefix}${message}`;

      if (context && Object.keys(context).length > 0) {
        output += ` ${JSON.stringify(context)}`;
      }

      if (error) {
        output += `\n  Error: ${error.message}`;
        if (error.stack && level === 'error') {
          output += `\n  ${error.stack.split('\n').slice(1, 4).join('\n  ')}`;
        }
      }

      return output;
    }

    // Production: JSON structured logging
    return JSON.stringify(entry);
  }

  private log(level: LogLevel, operation: string, message: string, context?: LogContext, error?: Error): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.threshold]) {
      return;
    }

    const entry: LogEntry = {
      level,
      timestamp: new Date().toISOString(),
      operation,
      message,
      context,
    };

    if (error) {
      entry.error = {
        message: error.message,
        name: error.name,
        stack: error.stack,
      };
    }

    const formatted = this.format(entry);

    switch (level) {
      case 'debug':
        console.debug(formatted);
        break;
      case 'info':
        console.log(formatted);
        break;
      case 'warn':
        console.warn(formatted);
        break;
      case 'error':
        console.error(formatted);
        break;
    }
  }

  /**
   * Override the LOG_LEVEL threshold (config applies its validated value)
   */
  setLevel(level: LogLevel): void {
    this.threshold = level;
  }

  debug(operation: string, message: string, context?: LogContext): void {
    this.log('debug', operation, message, context);
  }

  info(operation: string, message: string, context?: LogContext): void {
    this.log('info', operation, message, context);
  }

  warn(operation: string, message: string, context?: LogContext): void {
    this.log('warn', operation, message, context);
  }

  error(operation: string, message: string, context?: LogContext, error?: Error): void {
    this.log('error', operation, message, context, error);
  }

  private scoped(operation: string): ScopedLogger {
    return {
      debug: (message, context) => this.debug(operation, message, context),
      info: (message, context) => this.info(operation, message, context),
      warn: (message, context) => this.warn(operation, message, context),
      error: (message, context, error) => this.error(operation, message, context, error),
    };
  }

  /**
   * Shorthand for logging within one summary run
   */
  forRun(runId: string): ScopedLogger {
    return this.scoped(`run:${runId}`);
  }

  /**
   * Shorthand for logging while a single sheet is processed
   */
  forSheet(runId: string, sheet: string): ScopedLogger {
    return this.scoped(`run:${runId}:${sheet}`);
  }
}

// Singleton export
export const logger = new LoggerService();
