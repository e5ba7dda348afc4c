/**
 * Logger Utility
 *
 * Leveled logging with a `[scope]` prefix. The minimum level comes from the
 * LOG_LEVEL environment variable unless a level is passed explicitly.
 *
 * Usage:
 *   import { createLogger } from '../utils/logger.js';
 *   const logger = createLogger('task-service');
 *   logger.info('Created task 12');
 *   logger.debug('title changed');
 *
 * Environment:
 *   LOG_LEVEL=DEBUG|INFO|WARNING|ERROR (default: INFO)
 *
 * @module
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Supported log levels in ascending severity order.
 */
export type LogLevel = 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR';

/**
 * Logger interface with leveled logging methods.
 */
export interface Logger {
  /** Log at DEBUG level (per-field changes, lookups) */
  debug(message: string, ...args: unknown[]): void;
  /** Log at INFO level (operation start and success) */
  info(message: string, ...args: unknown[]): void;
  /** Log at WARNING level (unusual but accepted requests) */
  warn(message: string, ...args: unknown[]): void;
  /** Log at ERROR level (rejected operations) */
  error(message: string, ...args: unknown[]): void;
}

// ============================================================================
// Constants
// ============================================================================

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARNING: 2,
  ERROR: 3,
};

export const LOG_LEVELS: readonly LogLevel[] = ['DEBUG', 'INFO', 'WARNING', 'ERROR'];

const DEFAULT_LOG_LEVEL: LogLevel = 'INFO';

// ============================================================================
// Log Level Resolution
// ============================================================================

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Resolves the current log level from the LOG_LEVEL environment variable.
 * Falls back to INFO if the variable is not set or invalid.
 *
 * Read on each call so changes to process.env.LOG_LEVEL take effect at once.
 */
export function getLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toUpperCase();
  if (isLogLevel(envLevel)) {
    return envLevel;
  }
  return DEFAULT_LOG_LEVEL;
}

// ============================================================================
// Logger Factory
// ============================================================================

/**
 * Creates a scoped logger.
 *
 * @param scope - Prefix shown in brackets before every message
 * @param level - Fixed minimum level; when omitted LOG_LEVEL decides
 *
 * @example
 * ```ts
 * const logger = createLogger('task-service');
 * logger.info('Deleted task 4');
 * // Output: [task-service] Deleted task 4
 * ```
 */
export function createLogger(scope: string, level?: LogLevel): Logger {
  const prefix = `[${scope}]`;

  const shouldLog = (messageLevel: LogLevel): boolean =>
    LOG_LEVEL_VALUES[messageLevel] >= LOG_LEVEL_VALUES[level ?? getLogLevel()];

  const emit = (
    sink: (...data: unknown[]) => void,
    messageLevel: LogLevel,
    message: string,
    args: unknown[]
  ): void => {
    if (!shouldLog(messageLevel)) {
      return;
    }
    if (args.length > 0) {
      sink(prefix, message, ...args);
    } else {
      sink(prefix, message);
    }
  };

  return {
    debug(message: string, ...args: unknown[]): void {
      emit(console.debug, 'DEBUG', message, args);
    },

    info(message: string, ...args: unknown[]): void {
      emit(console.log, 'INFO', message, args);
    },

    warn(message: string, ...args: unknown[]): void {
      emit(console.warn, 'WARNING', message, args);
    },

    error(message: string, ...args: unknown[]): void {
      emit(console.error, 'ERROR', message, args);
    },
  };
}
