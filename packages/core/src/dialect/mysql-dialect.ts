/**
 * MySQL Dialect Implementation
 *
 * - Backslash escaping of quotes and backslashes
 * - Comma separated CONCAT arguments
 * - DATE_FORMAT date formatting
 * - No DISTINCT ON, no FULL OUTER JOIN
 */

import { SQLDialect } from './sql-dialect';

import type { DialectConfig } from './sql-dialect';

export class MySQLDialect extends SQLDialect {
  readonly name = 'mysql';

  readonly config: DialectConfig = {
    concatSeparator: ', ',
    dateFunctions: {
      dateFormat: (column: string, format: string) => `DATE_FORMAT(${column}, ${this.escapeString(format)})`,
    },
    supportsDistinctOn: false,
    joinTypes: ['INNER', 'LEFT', 'RIGHT', 'CROSS'],
  };

  escapeString(value: string): string {
    // Escape single quotes and backslashes
    return `'${value.replaceAll('\\', '\\\\').replaceAll("'", "\\'")}'`;
  }

  protected formatDate(value: Date): string {
    return value.toISOString().slice(0, 19).replace('T', ' ');
  }
}
