/**
 * Centralized logging utilities with structured logging support
 *
 * Uses pino for structured JSON logging.
 * Provides context-aware child loggers for tracing service calls.
 */

import pino from 'pino';
import type { Logger as PinoLogger } from 'pino';
import { logLevel, isDevelopment } from './config.js';

/**
 * Log levels supported by the logger
 */
type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

/**
 * Transport protocol a service logger is bound to
 */
export type ServiceProtocol = 'odata' | 'soap';

interface LoggerConfig {
  level?: LogLevel;
  pretty?: boolean;
  name?: string;
}

function getConfig(): LoggerConfig {
  return {
    level: logLevel,
    pretty: isDevelopment,
    name: 'nav-service-client',
  };
}

/**
 * Create the base logger instance
 */
function createLogger(): PinoLogger {
  const config = getConfig();

  const pinoConfig: pino.LoggerOptions = {
    name: config.name,
    level: config.level || 'info',
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
 * @param context - Additional fields to include in all log messages
 *
 * @example
 * ```typescript
 * const log = createChildLogger({ component: 'factory' });
 * log.info('Creating service'); // Includes component in output
 * ```
 */
export function createChildLogger(context: Record<string, unknown>): PinoLogger {
  return logger.child(context);
}

/**
 * Create a logger for one service instance
 *
 * @param protocol - Transport the service speaks
 * @param service - NAV service name (page, entity set or codeunit)
 */
export function createServiceLogger(
  protocol: ServiceProtocol,
  service: string
): PinoLogger {
  return createChildLogger({ protocol, service });
}

export type { Logger } from 'pino';
