import { describe, it, expect } from 'vitest';

import { ValidationError } from '../../errors';
import { validateAlias, validateColumnName, validateRowCount, validateTableName } from '../validation';

describe('validation', () => {
  describe('validateTableName', () => {
    it('should accept plain and schema-qualified names', () => {
      expect(() => validateTableName('orders')).not.toThrow();
      expect(() => validateTableName('sales.orders')).not.toThrow();
    });

    it('should reject anything else', () => {
      expect(() => validateTableName('')).toThrow(ValidationError);
      expect(() => validateTableName('1orders')).toThrow(ValidationError);
      expect(() => validateTableName('a.b.c')).toThrow(ValidationError);
      expect(() => validateTableName('orders o')).toThrow(ValidationError);
    });
  });

  describe('validateColumnName', () => {
    it('should accept identifiers', () => {
      expect(() => validateColumnName('_created_at2')).not.toThrow();
    });

    it('should reject dotted names', () => {
      expect(() => validateColumnName('m.id')).toThrow(ValidationError);
    });
  });

  describe('validateAlias', () => {
    it('should reject aliases with spaces', () => {
      expect(() => validateAlias('full name')).toThrow(ValidationError);
    });
  });

  describe('validateRowCount', () => {
    it('should accept zero and positive integers', () => {
      expect(() => validateRowCount(0, 'limit')).not.toThrow();
      expect(() => validateRowCount(25, 'offset')).not.toThrow();
    });

    it('should reject negatives and fractions', () => {
      expect(() => validateRowCount(-1, 'limit')).toThrow('limit must be a non-negative integer, got -1');
      expect(() => validateRowCount(1.5, 'offset')).toThrow(ValidationError);
    });
  });
});
