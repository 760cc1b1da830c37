/**
 * Service Logger
 *
 * Pino root logger shared by every service. Each service gets a child logger
 * carrying its name.
 *
 * Environment:
 * - LOG_LEVEL: pino level (default 'info', 'silent' under NODE_ENV=test)
 * - NODE_ENV=development: pretty-printed output via pino-pretty
 */

import pino from 'pino';

export type ServiceLogger = pino.Logger;

function resolveLevel(): string {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }
  return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
}

function stringifyBigints(value: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === 'bigint') {
      out[key] = entry.toString();
    } else if (Array.isArray(entry)) {
      out[key] = entry.map((item: unknown) => (typeof item === 'bigint' ? item.toString() : item));
    } else {
      out[key] = entry;
    }
  }
  return out;
}

/**
 * Root logger instance
 */
export const rootLogger: ServiceLogger = pino({
  name: 'poolbook',
  level: resolveLevel(),
  serializers: {
    err: pino.stdSerializers.err,
  },
  formatters: {
    // bigints are not JSON-serializable; log them as decimal strings
    log: stringifyBigints,
  },
  transport:
    process.env.NODE_ENV === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
});

/**
 * Create a logger for a named service
 *
 * @example
 * ```typescript
 * const logger = createServiceLogger('PoolRegistryService');
 * logger.info({ poolAddress }, 'Pool added');
 * ```
 */
export function createServiceLogger(service: string): ServiceLogger {
  return rootLogger.child({ service });
}
