/**
 * Constants
 *
 * Centralized defaults for alias assignment and logging.
 */

// ============ Alias Defaults ============

export const ALIAS_DEFAULTS = {
  /** Alias of the FROM root */
  FROM: 'm',
  /** Base of the join alias sequence (j, j1, j2, ...) */
  JOIN: 'j',
} as const;

// ============ Logging Defaults ============

export const LOGGING_DEFAULTS = {
  /** Rendered SQL longer than this is truncated in log lines */
  MAX_SQL_LENGTH: 200,
  /** Prefix of the console logger */
  PREFIX: '[criteria-sql]',
} as const;

// ============ SQL Keywords ============

export const SQL_KEYWORDS = {
  DISTINCT: 'DISTINCT',
  WILDCARD: '%',
} as const;
