/**
 * PostgreSQL Dialect Implementation
 *
 * - Doubled single quote ('') escaping
 * - `||` between CONCAT arguments
 * - TO_CHAR date formatting
 * - DISTINCT ON support
 */

import { SQLDialect } from './sql-dialect';

import type { DialectConfig } from './sql-dialect';

export class PostgreSQLDialect extends SQLDialect {
  readonly name = 'postgresql';

  readonly config: DialectConfig = {
    concatSeparator: ' || ',
    dateFunctions: {
      dateFormat: (column: string, format: string) => `TO_CHAR(${column}, ${this.escapeString(format)})`,
    },
    supportsDistinctOn: true,
    joinTypes: ['INNER', 'LEFT', 'RIGHT', 'FULL', 'CROSS'],
  };

  escapeString(value: string): string {
    // PostgreSQL uses doubled single quotes for escaping
    return `'${value.replaceAll("'", "''")}'`;
  }

  protected formatDate(value: Date): string {
    return value.toISOString();
  }
}
