/**
 * SQL Dialect Abstraction Layer
 *
 * @module dialect
 */

export { SQLDialect, type DialectConfig } from './sql-dialect';
export { MySQLDialect } from './mysql-dialect';
export { PostgreSQLDialect } from './postgresql-dialect';
export { DialectFactory, type DialectDatabaseType } from './dialect-factory';
