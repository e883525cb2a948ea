import { ValidationError } from '../errors';

const IDENTIFIER_REGEX = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

export function validateTableName(tableName: string): void {
  if (!tableName || typeof tableName !== 'string') {
    throw new ValidationError('Table name must be a non-empty string', 'tableName');
  }

  // schema.table is allowed, each part must be a plain identifier
  const parts = tableName.split('.');
  if (parts.length > 2 || !parts.every((part) => IDENTIFIER_REGEX.test(part))) {
    throw new ValidationError(
      `Invalid table name "${tableName}": must start with a letter or underscore and contain only letters, numbers, and underscores`,
      'tableName',
    );
  }
}

export function validateColumnName(columnName: string): void {
  if (!columnName || typeof columnName !== 'string') {
    throw new ValidationError('Column name must be a non-empty string', 'columnName');
  }

  if (!IDENTIFIER_REGEX.test(columnName)) {
    throw new ValidationError(
      `Invalid column name "${columnName}": must start with a letter or underscore and contain only letters, numbers, and underscores`,
      'columnName',
    );
  }
}

export function validateAlias(alias: string): void {
  if (!IDENTIFIER_REGEX.test(alias)) {
    throw new ValidationError(`Invalid alias "${alias}"`, 'alias');
  }
}

export function validateRowCount(value: number, field: 'limit' | 'offset'): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new ValidationError(`${field} must be a non-negative integer, got ${value}`, field);
  }
}
