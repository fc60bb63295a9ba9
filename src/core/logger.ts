/**
 * Centralized logging utilities with structured logging support
 *
 * Uses pino for structured JSON logging.
 * Provides context-aware child loggers for tracing controller operations.
 */

import pino from 'pino';
import type { Logger as PinoLogger } from 'pino';
import { logLevel, isDevelopment } from './config.js';

/**
 * Log levels supported by the logger
 */
export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

interface LoggerConfig {
  level: LogLevel;
  pretty: boolean;
  name: string;
}

function getConfig(): LoggerConfig {
  return {
    level: logLevel,
    pretty: isDevelopment,
    name: 'paged-table-controller',
  };
}

/**
 * Create the base logger instance
 */
function createLogger(): PinoLogger {
  const config = getConfig();

  const pinoConfig: pino.LoggerOptions = {
    name: config.name,
    level: config.level,
    timestamp: pino.stdTimeFunctions.isoTime,
    messageKey: 'msg',
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
  };

  // Use pretty print in development
  if (config.pretty) {
    return pino({
      ...pinoConfig,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname',
          singleLine: false,
        },
      },
    });
  }

  return pino(pinoConfig);
}

/**
 * Global logger instance
 */
export const logger = createLogger();

/**
 * Create a child logger with additional context
 *
 * @example
 * ```typescript
 * const log = createChildLogger({ component: 'PaginationKeyStore' });
 * log.debug('Cleared'); // Includes component in output
 * ```
 */
export function createChildLogger(context: Record<string, unknown>): PinoLogger {
  return logger.child(context);
}

/**
 * Create a logger bound to one controller instance
 *
 * @param controllerId - Identifier of the owning controller
 * @param operation - Optional operation being performed
 */
export function createControllerLogger(
  controllerId: string,
  operation?: string
): PinoLogger {
  const context: Record<string, unknown> = { controllerId };
  if (operation) {
    context.operation = operation;
  }
  return createChildLogger(context);
}

/**
 * Log level utilities
 */
export const LogLevels = {
  isDebugEnabled(): boolean {
    return logger.level === 'debug' || logger.level === 'trace';
  },

  isTraceEnabled(): boolean {
    return logger.level === 'trace';
  },

  /**
   * Set the log level dynamically
   */
  setLevel(level: LogLevel): void {
    logger.level = level;
  },

  getLevel(): string {
    return logger.level;
  },
};

export type { Logger } from 'pino';

export default logger;
