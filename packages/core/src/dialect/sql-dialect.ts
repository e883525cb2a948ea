/**
 * SQL Dialect Base Class
 *
 * Holds the dialect-specific pieces of text generation: literal quoting,
 * date formatting, CONCAT argument separators, join keywords and which
 * optional clauses the database understands.
 */

import { ValidationError } from '../errors';

import type { JoinType, LiteralValue } from '../types';

export interface DialectConfig {
  /** Placed between the arguments of CONCAT(...) */
  concatSeparator: string;
  /** Date/time function builders */
  dateFunctions: {
    dateFormat: (column: string, format: string) => string;
  };
  /** Whether SELECT DISTINCT ON (...) is available */
  supportsDistinctOn: boolean;
  /** Join types the database can execute */
  joinTypes: readonly JoinType[];
}

export abstract class SQLDialect {
  abstract readonly name: string;
  abstract readonly config: DialectConfig;

  /**
   * Quote a string as a SQL text literal, escaping embedded quotes
   */
  abstract escapeString(value: string): string;

  /**
   * Text form of a date inside a literal
   */
  protected abstract formatDate(value: Date): string;

  /**
   * Unquoted text of a literal value
   */
  formatValue(value: LiteralValue): string {
    if (value instanceof Date) {
      if (Number.isNaN(value.getTime())) {
        throw new ValidationError('Invalid date literal', 'value');
      }
      return this.formatDate(value);
    }
    return String(value);
  }

  /**
   * Render a value as a quoted literal. Numbers and booleans are quoted
   * too and left to the database's implicit cast.
   */
  formatLiteral(value: LiteralValue): string {
    return this.escapeString(this.formatValue(value));
  }

  /**
   * Keyword that opens a JOIN clause
   */
  joinKeyword(type: JoinType): string {
    switch (type) {
      case 'INNER': {
        return 'JOIN';
      }
      case 'LEFT': {
        return 'LEFT OUTER JOIN';
      }
      case 'RIGHT': {
        return 'RIGHT OUTER JOIN';
      }
      case 'FULL': {
        return 'FULL OUTER JOIN';
      }
      case 'CROSS': {
        return 'CROSS JOIN';
      }
    }
  }

  supportsJoin(type: JoinType): boolean {
    return this.config.joinTypes.includes(type);
  }
}
