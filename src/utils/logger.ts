/**
 * Logger utility module for the flood warden bot.
 * Provides structured logging with Winston, including file rotation,
 * console output, and specialized handlers for errors and rejections.
 *
 * @module utils/logger
 */

import * as winston from 'winston';
import * as path from 'path';
import * as fs from 'fs';

/**
 * Directory path for log files.
 * Logs are stored in the 'logs' directory at the project root.
 */
const logDir = path.join(__dirname, '../../logs');

/**
 * File transports are on unless LOG_FILES=off (the test setup turns them off).
 * Read from process.env directly to avoid a circular dependency with config.
 */
const fileLoggingEnabled = process.env.LOG_FILES !== 'off';

if (fileLoggingEnabled && !fs.existsSync(logDir)) {
  fs.mkdirSync(logDir, { recursive: true });
}

/**
 * Custom format for log entries.
 * Combines timestamp, error stack traces, and metadata into a readable format.
 */
const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    let msg = `[${timestamp}] [${level.toUpperCase()}] ${message}`;
    if (Object.keys(meta).length > 0 && meta.stack) {
      msg += `\n${meta.stack}`;
    } else if (Object.keys(meta).length > 0) {
      msg += ` ${JSON.stringify(meta)}`;
    }
    return msg;
  })
);

/**
 * Gets the log level from environment variables.
 *
 * @returns The log level (error, warn, info, debug) - defaults to 'info'
 */
const getLogLevel = (): string => {
  return process.env.LOG_LEVEL || 'info';
};

const fileTransports = (): winston.transport[] => [
  // Combined log file with rotation
  new winston.transports.File({
    filename: path.join(logDir, 'combined.log'),
    maxsize: 10485760, // 10MB
    maxFiles: 5,
    tailable: true
  }),
  // Error log file with rotation
  new winston.transports.File({
    filename: path.join(logDir, 'error.log'),
    level: 'error',
    maxsize: 10485760, // 10MB
    maxFiles: 5,
    tailable: true
  })
];

/**
 * Main Winston logger instance.
 *
 * Features:
 * - Console output with color coding
 * - Combined log file (all levels) with 10MB rotation, 5 files max
 * - Error log file (errors only) with 10MB rotation, 5 files max
 * - Exception and rejection handlers writing to their own files
 *
 * @example
 * ```typescript
 * logger.info('Chat policy updated', { chatId: -100123, field: 'threshold' });
 * logger.warn('Flood check degraded', { userId: 123, error });
 * ```
 */
export const logger = winston.createLogger({
  level: getLogLevel(),
  format: logFormat,
  silent: process.env.LOG_SILENT === 'true',
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        logFormat
      )
    }),
    ...(fileLoggingEnabled ? fileTransports() : [])
  ],
  exceptionHandlers: fileLoggingEnabled
    ? [
        new winston.transports.File({
          filename: path.join(logDir, 'exceptions.log'),
          maxsize: 10485760, // 10MB
          maxFiles: 3
        })
      ]
    : [],
  rejectionHandlers: fileLoggingEnabled
    ? [
        new winston.transports.File({
          filename: path.join(logDir, 'rejections.log'),
          maxsize: 10485760, // 10MB
          maxFiles: 3
        })
      ]
    : []
});

/**
 * Updates the logger's level at runtime.
 *
 * @param level - The new log level (error, warn, info, debug)
 */
export const updateLogLevel = (level: string): void => {
  logger.level = level;
};

/**
 * Context metadata for structured logging.
 */
export interface LogContext {
  /** Telegram user ID of the moderated member */
  userId?: number;
  /** Telegram chat ID */
  chatId?: number;
  /** Content category being evaluated */
  category?: string;
  /** Operation type */
  operation?: string;
  /** Additional metadata */
  [key: string]: unknown;
}

/**
 * Helper class for structured logging with consistent context.
 */
export class StructuredLogger {
  /**
   * Logs a user or admin action with context.
   *
   * @example
   * ```typescript
   * StructuredLogger.logUserAction('Exemption granted', {
   *   userId: 12345,
   *   chatId: -100987,
   *   operation: 'grant_exemption'
   * });
   * ```
   */
  static logUserAction(action: string, context: LogContext): void {
    logger.info(action, this.sanitizeContext(context));
  }

  /**
   * Logs a security event (warnings, restrictions, pardons).
   *
   * @example
   * ```typescript
   * StructuredLogger.logSecurityEvent('Member restricted', {
   *   userId: 12345,
   *   chatId: -100987,
   *   operation: 'escalate',
   *   ordinal: 2
   * });
   * ```
   */
  static logSecurityEvent(event: string, context: LogContext): void {
    logger.warn(`[SECURITY] ${event}`, this.sanitizeContext(context));
  }

  /**
   * Logs an error with full context and stack trace.
   */
  static logError(error: unknown, context: LogContext = {}): void {
    if (error instanceof Error) {
      logger.error(error.message, { ...this.sanitizeContext(context), stack: error.stack });
    } else {
      logger.error(String(error), this.sanitizeContext(context));
    }
  }

  /**
   * Logs a debug message (only in debug log level).
   */
  static logDebug(message: string, context: LogContext = {}): void {
    logger.debug(message, this.sanitizeContext(context));
  }

  /**
   * Masks fields that must never reach the log files. Message text is
   * included because text fingerprints are derived from member content.
   */
  private static sanitizeContext(context: LogContext): LogContext {
    const sanitized = { ...context };

    const sensitiveKeys = ['token', 'botToken', 'password', 'secret', 'text'];

    for (const key of sensitiveKeys) {
      if (key in sanitized) {
        sanitized[key] = '[REDACTED]';
      }
    }

    return sanitized;
  }
}
