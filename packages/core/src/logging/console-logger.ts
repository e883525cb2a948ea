/**
 * Console Logger
 *
 * Minimal Logger implementation for development. Production callers
 * usually pass their own logger (pino, winston, ...) through the
 * builder options instead.
 *
 * @example
 * ```typescript
 * const cb = new CriteriaBuilder({ logger: createConsoleLogger() });
 * ```
 */

import { LOGGING_DEFAULTS } from '../constants';

import type { Logger } from '../types';

/* eslint-disable no-console */
export function createConsoleLogger(prefix: string = LOGGING_DEFAULTS.PREFIX): Logger {
  return {
    debug: (msg, ...args) => console.debug(`${prefix} ${msg}`, ...args),
    info: (msg, ...args) => console.info(`${prefix} ${msg}`, ...args),
    warn: (msg, ...args) => console.warn(`${prefix} ${msg}`, ...args),
    error: (msg, ...args) => console.error(`${prefix} ${msg}`, ...args),
  };
}
/* eslint-enable no-console */

/**
 * Truncate long SQL for logging
 */
export function truncateSql(sql: string, maxLength: number = LOGGING_DEFAULTS.MAX_SQL_LENGTH): string {
  if (sql.length <= maxLength) {
    return sql;
  }
  return `${sql.slice(0, maxLength)}...`;
}
