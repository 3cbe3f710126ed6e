/**
 * Structured logging.
 *
 * One pino root logger per process, configured from the environment:
 *
 *   LOG_LEVEL - trace, debug, info, warn, error (default: "info")
 *   NODE_ENV  - pretty output unless "production" or "test"
 *
 * Components take a child logger through `createLogger()`, which keeps a
 * message-first call style: `log.warn('Replacing mapping', { type_key })`.
 */

import { type Logger, type LoggerOptions, pino } from 'pino';

/**
 * Structured logging fields.
 *
 * Common fields:
 * - component: Component/subsystem identifier (e.g., "custom-factory")
 * - operation: Operation being performed (e.g., "register")
 * - type_key: Key of the type involved
 */
export interface LogFields {
  [key: string]: string | number | boolean | null | undefined;
}

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

export interface ComponentLogger {
  error(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  debug(message: string, fields?: LogFields): void;
  trace(message: string, fields?: LogFields): void;
}

/**
 * Build root logger options from environment variables.
 */
export function buildLoggerOptions(env: NodeJS.ProcessEnv = process.env): LoggerOptions {
  const options: LoggerOptions = {
    name: 'handler-overrides',
    level: env.LOG_LEVEL ?? 'info',
  };

  // Add pino-pretty transport in non-production environments
  if (env.NODE_ENV !== 'production' && env.NODE_ENV !== 'test') {
    options.transport = {
      target: 'pino-pretty',
      options: { colorize: true },
    };
  }

  return options;
}

const rootLogger: Logger = pino(buildLoggerOptions());

export function getRootLogger(): Logger {
  return rootLogger;
}

/**
 * Create a logger with preset fields.
 *
 * @param defaultFields - Fields bound to every log line
 * @param parent - Logger to derive from (default: the root logger)
 *
 * @example
 * const log = createLogger({ component: 'custom-factory' });
 * log.debug('Registered direct mapping', { type_key: 'billing.Money' });
 */
export function createLogger(defaultFields: LogFields, parent: Logger = rootLogger): ComponentLogger {
  const child = parent.child(defaultFields);

  const emit =
    (level: LogLevel) =>
    (message: string, fields?: LogFields): void => {
      if (fields) {
        child[level](fields, message);
      } else {
        child[level](message);
      }
    };

  return {
    error: emit('error'),
    warn: emit('warn'),
    info: emit('info'),
    debug: emit('debug'),
    trace: emit('trace'),
  };
}
