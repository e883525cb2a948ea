import { describe, it, expect, beforeEach } from 'vitest';

import { QueryStateError, ValidationError } from '../../errors';
import { MetadataResolver } from '../../metadata/metadata-resolver';
import { CriteriaBuilder } from '../criteria-builder';
import { Predicate } from '../fragments';
import { Address, Customer, Order } from '../../__tests__/fixtures/entities';

import type { ConcatPart } from '../criteria-builder';

describe('CriteriaBuilder', () => {
  let cb: CriteriaBuilder;

  beforeEach(() => {
    cb = new CriteriaBuilder({ resolver: new MetadataResolver() });
  });

  describe('roots', () => {
    it('should alias the FROM root as m', () => {
      const order = cb.declareFrom(Order);
      expect(order.alias).toBe('m');
      expect(cb.fromRoot).toBe(order);
    });

    it('should reject a second FROM', () => {
      cb.declareFrom(Order);
      expect(() => cb.declareFrom(Customer)).toThrow(QueryStateError);
      expect(() => cb.declareFrom(Customer)).toThrow('FROM entity is already declared');
    });

    it('should reject a JOIN before FROM', () => {
      const probe = new CriteriaBuilder().declareFrom(Order).column('customerId');
      expect(() => cb.declareJoin(Customer, probe, 'id')).toThrow('FROM entity must be declared before a JOIN');
    });

    it('should assign join aliases j, j1, j2 in declaration order', () => {
      const order = cb.declareFrom(Order);
      const customer = cb.declareJoin(Customer, order.column('customerId'), 'id');
      const address = cb.declareJoin(Address, customer.column('id'), 'customerId');
      const billing = cb.declareJoin(Address, customer.column('id'), 'customerId', 'LEFT');

      expect([customer.alias, address.alias, billing.alias]).toEqual(['j', 'j1', 'j2']);
      expect(cb.joinRoots).toEqual([customer, address, billing]);
    });

    it('should resolve the join target against the new root', () => {
      const order = cb.declareFrom(Order);
      const address = cb.declareJoin(Address, order.column('customerId'), 'customerId');
      expect(address.join?.target.expression).toBe('j.customer_id');
      expect(address.join?.type).toBe('INNER');
    });

    it('should honour configured aliases', () => {
      const custom = new CriteriaBuilder({ fromAlias: 'o', joinAlias: 'c' });
      const order = custom.declareFrom(Order);
      const customer = custom.declareJoin(Customer, order.column('customerId'), 'id');
      expect(order.alias).toBe('o');
      expect(customer.alias).toBe('c');
    });

    it('should not hand out the FROM alias to a join', () => {
      const custom = new CriteriaBuilder({ fromAlias: 'j' });
      const order = custom.declareFrom(Order);
      expect(custom.declareJoin(Customer, order.column('customerId'), 'id').alias).toBe('j1');
    });

    it('should reject join types the dialect cannot run', () => {
      const mysql = new CriteriaBuilder({ dialect: 'mysql' });
      const order = mysql.declareFrom(Order);
      expect(() => mysql.declareJoin(Customer, order.column('customerId'), 'id', 'FULL')).toThrow(
        'FULL JOIN is not supported by mysql',
      );
    });
  });

  describe('getUniqueAlias', () => {
    it('should probe without touching the input', () => {
      const taken = new Set(['j', 'j1']);
      expect(cb.getUniqueAlias(taken, 'j')).toBe('j2');
      expect(taken.size).toBe(2);
    });
  });

  describe('predicates', () => {
    it('should render comparison operators with quoted literals', () => {
      const order = cb.declareFrom(Order);
      const total = order.column('total');

      expect(cb.equals(order.column('status'), 'NEW').condition).toBe(" m.status = 'NEW' ");
      expect(cb.greaterThan(total, 100).condition).toBe(" m.total_amount > '100' ");
      expect(cb.lessThan(total, 100).condition).toBe(" m.total_amount < '100' ");
      expect(cb.greaterThanOrEqual(total, 100).condition).toBe(" m.total_amount >= '100' ");
      expect(cb.lessThanOrEqual(total, 100).condition).toBe(" m.total_amount <= '100' ");
    });

    it('should render IN and NOT IN lists', () => {
      const status = cb.declareFrom(Order).column('status');
      expect(cb.in(status, ['NEW', 'PAID']).condition).toBe(" m.status IN ('NEW','PAID') ");
      expect(cb.notIn(status, ['NEW', 'PAID']).condition).toBe(" m.status NOT IN ('NEW','PAID') ");
    });

    it('should reject empty IN lists', () => {
      const status = cb.declareFrom(Order).column('status');
      expect(() => cb.in(status, [])).toThrow(ValidationError);
      expect(() => cb.notIn(status, [])).toThrow('notIn() requires at least one value');
    });

    it('should place LIKE wildcards by mode', () => {
      const order = cb.declareFrom(Order);
      const email = cb.declareJoin(Customer, order.column('customerId'), 'id').column('email');

      expect(cb.like(email, 'john', 'START').condition).toBe(" j.email LIKE 'john%' ");
      expect(cb.like(email, 'john', 'END').condition).toBe(" j.email LIKE '%john' ");
      expect(cb.like(email, 'john', 'ALL').condition).toBe(" j.email LIKE '%john%' ");
      expect(cb.like(email, 'john').condition).toBe(" j.email LIKE '%john%' ");
      expect(cb.notLike(email, 'john').condition).toBe(" j.email NOT LIKE '%john%' ");
    });

    it('should render BETWEEN', () => {
      const total = cb.declareFrom(Order).column('total');
      expect(cb.between(total, 10, 20).condition).toBe(" m.total_amount BETWEEN '10' and '20' ");
    });

    it('should render NULL checks', () => {
      const status = cb.declareFrom(Order).column('status');
      expect(cb.isNull(status).condition).toBe('m.status IS NULL ');
      expect(cb.isNotNull(status).condition).toBe('m.status IS NOT NULL ');
    });

    it('should render dates the same way in LIKE and comparisons on MySQL', () => {
      const mysql = new CriteriaBuilder({ dialect: 'mysql', resolver: new MetadataResolver() });
      const createdAt = mysql.declareFrom(Order).column('createdAt');
      const day = new Date(Date.UTC(2024, 0, 15, 10, 30));

      expect(mysql.like(createdAt, day, 'START').condition).toBe(" m.created_at LIKE '2024-01-15 10:30:00%' ");
      expect(mysql.equals(createdAt, day).condition).toBe(" m.created_at = '2024-01-15 10:30:00' ");
    });

    it('should reject invalid dates', () => {
      const createdAt = cb.declareFrom(Order).column('createdAt');
      const invalid = new Date('nope');

      expect(() => cb.equals(createdAt, invalid)).toThrow(ValidationError);
      expect(() => cb.like(createdAt, invalid)).toThrow('Invalid date literal');
      expect(() => cb.in(createdAt, [invalid])).toThrow(ValidationError);
    });

    it('should escape quotes inside literals', () => {
      const order = cb.declareFrom(Order);
      const lastName = cb.declareJoin(Customer, order.column('customerId'), 'id').column('lastName');
      expect(cb.equals(lastName, "O'Brien").condition).toBe(" j.last_name = 'O''Brien' ");
      expect(cb.like(lastName, "O'B", 'START').condition).toBe(" j.last_name LIKE 'O''B%' ");
    });
  });

  describe('logical combinators', () => {
    it('should wrap a single predicate in parentheses', () => {
      expect(cb.and(new Predicate('x = 1')).condition).toBe(' (x = 1) ');
      expect(cb.or(new Predicate('x = 1')).condition).toBe(' (x = 1) ');
    });

    it('should join several predicates with the operator', () => {
      const order = cb.declareFrom(Order);
      const status = cb.equals(order.column('status'), 'NEW');
      const active = cb.equals(order.column('active'), true);

      expect(cb.and(status, active).condition).toBe(" ( m.status = 'NEW'  and  m.active = 'true' ) ");
      expect(cb.or(status, active).condition).toBe(" ( m.status = 'NEW'  or  m.active = 'true' ) ");
    });

    it('should nest groups', () => {
      const nested = cb.or(cb.and(new Predicate('a'), new Predicate('b')), new Predicate('c'));
      expect(nested.condition).toBe(' ( (a and b)  or c) ');
    });

    it('should reject empty predicate lists', () => {
      expect(() => cb.and()).toThrow('Predicates is empty in AND');
      expect(() => cb.or()).toThrow('Predicates is empty in OR');
    });
  });

  describe('projections', () => {
    it('should select every column of a root', () => {
      const order = cb.declareFrom(Order);
      expect(cb.select(order).text).toBe('SELECT DISTINCT m.* FROM ');
    });

    it('should keep multiSelect argument order and aliases', () => {
      const order = cb.declareFrom(Order);
      const customer = cb.declareJoin(Customer, order.column('customerId'), 'id');
      const fragment = cb.multiSelect(order.column('id'), customer.column('email', 'customer_email'));
      expect(fragment.text).toBe('SELECT DISTINCT m.id, j.email AS customer_email FROM ');
    });

    it('should count a root or columns', () => {
      const order = cb.declareFrom(Order);
      expect(cb.count(order).text).toBe('SELECT COUNT(DISTINCT m.*) FROM ');
      expect(cb.count(order.column('id'), order.column('status')).text).toBe(
        'SELECT COUNT(DISTINCT m.id, m.status) FROM ',
      );
    });

    it('should reject empty column lists', () => {
      expect(() => cb.multiSelect()).toThrow('multiSelect() requires at least one column');
      expect(() => cb.count()).toThrow(ValidationError);
    });

    it('should build DISTINCT ON fragments', () => {
      const order = cb.declareFrom(Order);
      expect(cb.selectDistinctOn(order.column('customerId'), order.column('status')).text).toBe(
        'DISTINCT ON (m.customer_id, m.status)',
      );
    });

    it('should reject DISTINCT ON on dialects without it', () => {
      const mysql = new CriteriaBuilder({ dialect: 'mysql' });
      const order = mysql.declareFrom(Order);
      expect(() => mysql.selectDistinctOn(order.column('id'))).toThrow('DISTINCT ON is not supported by mysql');
    });
  });

  describe('expressions', () => {
    it('should wrap columns in LOWER and UPPER', () => {
      const status = cb.declareFrom(Order).column('status');
      expect(cb.lower(status).expression).toBe('LOWER(m.status)');
      expect(cb.upper(status).expression).toBe('UPPER(m.status)');
    });

    it('should concat columns and quoted literals', () => {
      const order = cb.declareFrom(Order);
      const customer = cb.declareJoin(Customer, order.column('customerId'), 'id');
      const fullName = cb.concat(customer.column('firstName'), ' ', customer.column('lastName'));
      expect(fullName.expression).toBe("CONCAT(j.first_name || ' ' || j.last_name)");
    });

    it('should concat with commas on MySQL', () => {
      const mysql = new CriteriaBuilder({ dialect: 'mysql' });
      const order = mysql.declareFrom(Order);
      expect(mysql.concat(order.column('status'), '-', order.column('id')).expression).toBe(
        "CONCAT(m.status, '-', m.id)",
      );
    });

    it('should reject parts that are neither columns nor strings', () => {
      const parts: unknown[] = ['a', 42];
      expect(() => cb.concat(...(parts as ConcatPart[]))).toThrow(
        'Only column expressions or strings can be the input to concat()',
      );
    });

    it('should alias derived expressions', () => {
      const status = cb.declareFrom(Order).column('status');
      const lowered = cb.lower(status).as('status_lower');
      expect(lowered.expression).toBe('LOWER(m.status)');
      expect(lowered.alias).toBe('status_lower');
    });
  });

  describe('ordering', () => {
    it('should build sort terms', () => {
      const createdAt = cb.declareFrom(Order).column('createdAt');
      expect(cb.asc(createdAt).direction).toBe('ASC');
      expect(cb.desc(createdAt).direction).toBe('DESC');
      expect(cb.desc(createdAt).column).toBe(createdAt);
    });
  });
});
