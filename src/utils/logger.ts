/**
 * Logger Utility
 * Provides structured logging with pino
 *
 * Logs go to stderr: stdout is reserved for command output such as the
 * result printed by `oauth-relay wait`.
 */

import pino from 'pino';

/**
 * Log level type
 */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

const LOG_LEVELS: ReadonlySet<string> = new Set<LogLevel>(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.has(value);
}

/**
 * Get log level from environment variable
 */
function getLogLevel(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  if (level && isLogLevel(level)) {
    return level;
  }
  return 'info';
}

/**
 * Check if running in development mode
 */
function isDevelopment(): boolean {
  return process.env.NODE_ENV === 'development';
}

function createRootLogger(): pino.Logger {
  if (isDevelopment()) {
    return pino({
      level: getLogLevel(),
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    });
  }
  return pino({ level: getLogLevel() }, pino.destination(2));
}

/**
 * Default logger instance
 * Uses pino-pretty in development, JSON in production
 */
export const logger = createRootLogger();

/**
 * Create a child logger with a specific component name
 * @param component - Component name for log context
 */
export function createLogger(component: string): pino.Logger {
  return logger.child({ component });
}

/**
 * Pre-configured loggers for common components
 */
export const relayLogger = createLogger('relay');
export const transportLogger = createLogger('transport');
export const callbackLogger = createLogger('callback');
export const cliLogger = createLogger('cli');
