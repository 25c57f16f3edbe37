/**
 * Pino logger factory and step timers.
 *
 * Logs always go to stderr so stdout carries only operator-facing progress.
 */

import pino, { type Logger, type LoggerOptions } from 'pino';
import { extractErrorMessage } from './error-utils';

export type { Logger } from 'pino';

const REDACT_PATHS = ['password', 'token', 'authorization', '*.password', '*.token', '*.authorization'];

/**
 * Resolve the log level: explicit option, then LOG_LEVEL, then a default that
 * depends on NODE_ENV.
 */
function resolveLevel(level: string | undefined): string {
  if (level) return level;
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  if (process.env.NODE_ENV === 'test') return 'silent';
  return process.env.NODE_ENV === 'development' ? 'debug' : 'warn';
}

function shouldPrettyPrint(): boolean {
  return process.env.NODE_ENV === 'development' && Boolean(process.stderr.isTTY);
}

/**
 * Create a pino logger.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ name: 'cli', level: 'debug' });
 * logger.info({ network: 'jenkins' }, 'Network created');
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const baseOptions: LoggerOptions = {
    ...options,
    level: resolveLevel(options.level),
    redact: { paths: REDACT_PATHS, censor: '[REDACTED]' },
  };

  if (shouldPrettyPrint()) {
    return pino({
      ...baseOptions,
      transport: {
        target: 'pino-pretty',
        options: { destination: 2, colorize: true, translateTime: 'SYS:HH:MM:ss' },
      },
    });
  }

  return pino(baseOptions, pino.destination(2));
}

export interface Timer {
  /** Log completion with the total duration */
  end: (context?: Record<string, unknown>) => void;
  /** Log failure with the elapsed duration */
  error: (error: unknown, context?: Record<string, unknown>) => void;
}

/**
 * Times an operation and logs its duration on the given logger.
 */
export function createTimer(
  logger: Logger,
  operation: string,
  initialContext: Record<string, unknown> = {},
): Timer {
  const startedAt = Date.now();

  return {
    end(context = {}) {
      logger.debug(
        { ...initialContext, ...context, operation, durationMs: Date.now() - startedAt },
        `${operation} completed`,
      );
    },

    error(error, context = {}) {
      logger.error(
        {
          ...initialContext,
          ...context,
          operation,
          durationMs: Date.now() - startedAt,
          error: extractErrorMessage(error),
        },
        `${operation} failed`,
      );
    },
  };
}
