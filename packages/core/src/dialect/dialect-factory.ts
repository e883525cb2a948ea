/**
 * Dialect Factory
 *
 * Creates appropriate SQL dialect based on database type.
 */

import { ValidationError } from '../errors';

import { MySQLDialect } from './mysql-dialect';
import { PostgreSQLDialect } from './postgresql-dialect';

import type { SQLDialect } from './sql-dialect';

export type DialectDatabaseType = 'mysql' | 'mariadb' | 'postgresql' | 'postgres';

const dialectCache = new Map<'mysql' | 'postgresql', SQLDialect>();

export class DialectFactory {
  /**
   * Get dialect for database type (cached)
   */
  static getDialect(type: DialectDatabaseType): SQLDialect {
    const normalizedType = this.normalizeType(type);

    const cached = dialectCache.get(normalizedType);
    if (cached) {
      return cached;
    }

    const dialect = this.createDialect(normalizedType);
    dialectCache.set(normalizedType, dialect);
    return dialect;
  }

  /**
   * Create new dialect instance (not cached)
   */
  static createDialect(type: DialectDatabaseType): SQLDialect {
    switch (this.normalizeType(type)) {
      case 'mysql': {
        return new MySQLDialect();
      }
      case 'postgresql': {
        return new PostgreSQLDialect();
      }
    }
  }

  /**
   * Normalize database type aliases
   */
  private static normalizeType(type: DialectDatabaseType): 'mysql' | 'postgresql' {
    switch (type) {
      case 'mysql':
      case 'mariadb': {
        return 'mysql';
      }
      case 'postgresql':
      case 'postgres': {
        return 'postgresql';
      }
      default: {
        throw new ValidationError(`Unknown database type: ${String(type)}`, 'dialect');
      }
    }
  }

  /**
   * Clear dialect cache (useful for testing)
   */
  static clearCache(): void {
    dialectCache.clear();
  }
}
