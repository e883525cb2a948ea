/**
 * Criteria Builder
 *
 * Per-query context: owns the FROM root and the join roots, and is the
 * factory for every fragment (predicates, projections, expressions, sort
 * terms) fed into a QueryAssembler.
 *
 * Not meant to be shared: alias assignment mutates the builder in place,
 * so create one builder per query.
 *
 * @example
 * ```typescript
 * const cb = new CriteriaBuilder();
 * const order = cb.declareFrom(Order);
 * const customer = cb.declareJoin(Customer, order.column('customerId'), 'id');
 *
 * const sql = cb
 *   .query()
 *   .select(cb.select(order))
 *   .where(cb.and(cb.equals(order.column('active'), true), cb.isNotNull(customer.column('email'))))
 *   .orderBy(cb.desc(order.column('createdAt')))
 *   .limit(20)
 *   .render();
 * ```
 */

import { ALIAS_DEFAULTS, SQL_KEYWORDS } from '../constants';
import { DialectFactory } from '../dialect/dialect-factory';
import { QueryStateError, ValidationError } from '../errors';
import { metadataResolver } from '../metadata/metadata-resolver';
import { getUniqueAlias } from '../utils/alias';
import { validateAlias } from '../utils/validation';

import { ColumnExpr, DistinctOnFragment, OrderTerm, Predicate, SelectFragment } from './fragments';
import { QueryAssembler } from './query-assembler';
import { TableRoot } from './table-root';

import type { DialectDatabaseType } from '../dialect/dialect-factory';
import type { SQLDialect } from '../dialect/sql-dialect';
import type { EntityDescriptor } from '../metadata/entity';
import type { MetadataResolver } from '../metadata/metadata-resolver';
import type { AliasLookup } from '../utils/alias';
import type { JoinType, LikeMode, LiteralValue, Logger } from '../types';

export interface CriteriaBuilderOptions {
  /** Dialect instance or database type (default: postgresql) */
  dialect?: SQLDialect | DialectDatabaseType;
  /** Name resolver (default: the process-wide `metadataResolver`) */
  resolver?: MetadataResolver;
  logger?: Logger;
  /** Alias of the FROM root (default: m) */
  fromAlias?: string;
  /** Base of the join alias sequence (default: j) */
  joinAlias?: string;
}

export type ConcatPart = ColumnExpr | string;

export class CriteriaBuilder {
  readonly dialect: SQLDialect;
  readonly logger?: Logger;
  private readonly resolver: MetadataResolver;
  private readonly fromAlias: string;
  private readonly joinAlias: string;
  private _fromRoot?: TableRoot;
  private readonly _joinRoots = new Map<string, TableRoot>();

  constructor(options: CriteriaBuilderOptions = {}) {
    this.dialect =
      typeof options.dialect === 'string'
        ? DialectFactory.getDialect(options.dialect)
        : (options.dialect ?? DialectFactory.getDialect('postgresql'));
    this.resolver = options.resolver ?? metadataResolver;
    this.logger = options.logger;
    this.fromAlias = options.fromAlias ?? ALIAS_DEFAULTS.FROM;
    this.joinAlias = options.joinAlias ?? ALIAS_DEFAULTS.JOIN;
    validateAlias(this.fromAlias);
    validateAlias(this.joinAlias);
  }

  get fromRoot(): TableRoot | undefined {
    return this._fromRoot;
  }

  /**
   * Join roots in declaration order
   */
  get joinRoots(): readonly TableRoot[] {
    return [...this._joinRoots.values()];
  }

  /**
   * New assembler bound to this builder
   */
  query(): QueryAssembler {
    return new QueryAssembler(this);
  }

  // ============ FROM / JOIN Roots ============

  declareFrom<F extends string, P extends string>(entity: EntityDescriptor<F, P>): TableRoot<F | P> {
    if (this._fromRoot) {
      throw new QueryStateError('FROM entity is already declared');
    }

    const root = new TableRoot<F | P>(entity, this.resolver, this.dialect);
    root.assignAlias(this.fromAlias);
    this._fromRoot = root;

    this.logger?.debug('Declared FROM root', { entity: entity.name, alias: this.fromAlias });
    return root;
  }

  /**
   * Join `entity` on `source = <new alias>.<targetField>`
   */
  declareJoin<F extends string, P extends string>(
    entity: EntityDescriptor<F, P>,
    source: ColumnExpr,
    targetField: F | P,
    joinType: JoinType = 'INNER',
  ): TableRoot<F | P> {
    const from = this._fromRoot;
    if (!from) {
      throw new QueryStateError('FROM entity must be declared before a JOIN');
    }
    if (!this.dialect.supportsJoin(joinType)) {
      throw new ValidationError(`${joinType} JOIN is not supported by ${this.dialect.name}`, 'joinType');
    }

    const taken: AliasLookup = {
      has: (alias) => alias === from.alias || this._joinRoots.has(alias),
    };
    const alias = this.getUniqueAlias(taken, this.joinAlias);

    const root = new TableRoot<F | P>(entity, this.resolver, this.dialect);
    root.assignAlias(alias);
    root.attachJoin(joinType, source, root.column(targetField));
    this._joinRoots.set(alias, root);

    this.logger?.debug('Declared JOIN root', { entity: entity.name, alias, joinType });
    return root;
  }

  getUniqueAlias(existing: AliasLookup, base: string): string {
    return getUniqueAlias(existing, base);
  }

  // ============ Projections ============

  /**
   * `SELECT DISTINCT alias.* FROM `
   */
  select(root: TableRoot): SelectFragment {
    return new SelectFragment(`SELECT ${SQL_KEYWORDS.DISTINCT} ${root.alias}.* FROM `);
  }

  /**
   * `SELECT DISTINCT a, b AS x FROM `, in argument order
   */
  multiSelect(...columns: ColumnExpr[]): SelectFragment {
    this.requireColumns(columns, 'multiSelect');
    const list = columns
      .map((column) => (column.alias ? `${column.expression} AS ${column.alias}` : column.expression))
      .join(', ');
    return new SelectFragment(`SELECT ${SQL_KEYWORDS.DISTINCT} ${list} FROM `);
  }

  count(root: TableRoot): SelectFragment;
  count(...columns: ColumnExpr[]): SelectFragment;
  count(...selections: Array<TableRoot | ColumnExpr>): SelectFragment {
    const [first] = selections;
    if (selections.length === 1 && first instanceof TableRoot) {
      return new SelectFragment(`SELECT COUNT(${SQL_KEYWORDS.DISTINCT} ${first.alias}.*) FROM `);
    }

    const columns = selections.filter((selection): selection is ColumnExpr => selection instanceof ColumnExpr);
    if (columns.length !== selections.length) {
      throw new ValidationError('count() takes either one root or column expressions');
    }
    this.requireColumns(columns, 'count');
    return new SelectFragment(`SELECT COUNT(${SQL_KEYWORDS.DISTINCT} ${this.joinExpressions(columns)}) FROM `);
  }

  selectDistinctOn(...columns: ColumnExpr[]): DistinctOnFragment {
    if (!this.dialect.config.supportsDistinctOn) {
      throw new ValidationError(`DISTINCT ON is not supported by ${this.dialect.name}`);
    }
    this.requireColumns(columns, 'selectDistinctOn');
    return new DistinctOnFragment(`${SQL_KEYWORDS.DISTINCT} ON (${this.joinExpressions(columns)})`);
  }

  // ============ Predicates ============

  equals(column: ColumnExpr, value: LiteralValue): Predicate {
    return this.compare(column, '=', value);
  }

  in(column: ColumnExpr, values: readonly LiteralValue[]): Predicate {
    return new Predicate(` ${column.expression} IN (${this.literalList(values, 'in')}) `);
  }

  notIn(column: ColumnExpr, values: readonly LiteralValue[]): Predicate {
    return new Predicate(` ${column.expression} NOT IN (${this.literalList(values, 'notIn')}) `);
  }

  like(column: ColumnExpr, value: LiteralValue, mode: LikeMode = 'ALL'): Predicate {
    return new Predicate(` ${column.expression} LIKE ${this.likePattern(value, mode)} `);
  }

  notLike(column: ColumnExpr, value: LiteralValue, mode: LikeMode = 'ALL'): Predicate {
    return new Predicate(` ${column.expression} NOT LIKE ${this.likePattern(value, mode)} `);
  }

  between(column: ColumnExpr, from: LiteralValue, to: LiteralValue): Predicate {
    const dialect = this.dialect;
    return new Predicate(
      ` ${column.expression} BETWEEN ${dialect.formatLiteral(from)} and ${dialect.formatLiteral(to)} `,
    );
  }

  greaterThan(column: ColumnExpr, value: LiteralValue): Predicate {
    return this.compare(column, '>', value);
  }

  lessThan(column: ColumnExpr, value: LiteralValue): Predicate {
    return this.compare(column, '<', value);
  }

  greaterThanOrEqual(column: ColumnExpr, value: LiteralValue): Predicate {
    return this.compare(column, '>=', value);
  }

  lessThanOrEqual(column: ColumnExpr, value: LiteralValue): Predicate {
    return this.compare(column, '<=', value);
  }

  isNull(column: ColumnExpr): Predicate {
    return new Predicate(`${column.expression} IS NULL `);
  }

  isNotNull(column: ColumnExpr): Predicate {
    return new Predicate(`${column.expression} IS NOT NULL `);
  }

  // ============ Logical Combinators ============

  and(...predicates: Predicate[]): Predicate {
    return this.group('and', predicates);
  }

  or(...predicates: Predicate[]): Predicate {
    return this.group('or', predicates);
  }

  // ============ Expressions ============

  lower(column: ColumnExpr): ColumnExpr {
    return new ColumnExpr(`LOWER(${column.expression})`);
  }

  upper(column: ColumnExpr): ColumnExpr {
    return new ColumnExpr(`UPPER(${column.expression})`);
  }

  /**
   * CONCAT over column expressions and string literals
   *
   * @example
   * ```typescript
   * cb.concat(c.column('firstName'), ' ', c.column('lastName'));
   * // PostgreSQL: CONCAT(j.first_name || ' ' || j.last_name)
   * ```
   */
  concat(...parts: ConcatPart[]): ColumnExpr {
    const rendered = parts.map((part) => {
      if (part instanceof ColumnExpr) {
        return part.expression;
      }
      if (typeof part === 'string') {
        return this.dialect.escapeString(part);
      }
      throw new ValidationError('Only column expressions or strings can be the input to concat()');
    });
    return new ColumnExpr(`CONCAT(${rendered.join(this.dialect.config.concatSeparator)})`);
  }

  // ============ Ordering ============

  asc(column: ColumnExpr): OrderTerm {
    return new OrderTerm(column, 'ASC');
  }

  desc(column: ColumnExpr): OrderTerm {
    return new OrderTerm(column, 'DESC');
  }

  // ============ Helpers ============

  private compare(column: ColumnExpr, operator: '=' | '>' | '<' | '>=' | '<=', value: LiteralValue): Predicate {
    return new Predicate(` ${column.expression} ${operator} ${this.dialect.formatLiteral(value)} `);
  }

  private group(operator: 'and' | 'or', predicates: Predicate[]): Predicate {
    if (predicates.length === 0) {
      throw new ValidationError(`Predicates is empty in ${operator.toUpperCase()}`);
    }
    const conditions = predicates.map((predicate) => predicate.condition).join(` ${operator} `);
    return new Predicate(` (${conditions}) `);
  }

  private literalList(values: readonly LiteralValue[], operation: 'in' | 'notIn'): string {
    if (values.length === 0) {
      throw new ValidationError(`${operation}() requires at least one value`, 'values');
    }
    return values.map((value) => this.dialect.formatLiteral(value)).join(',');
  }

  private likePattern(value: LiteralValue, mode: LikeMode): string {
    const text = this.dialect.formatValue(value);
    const wildcard = SQL_KEYWORDS.WILDCARD;
    switch (mode) {
      case 'ALL': {
        return this.dialect.escapeString(`${wildcard}${text}${wildcard}`);
      }
      case 'START': {
        return this.dialect.escapeString(`${text}${wildcard}`);
      }
      case 'END': {
        return this.dialect.escapeString(`${wildcard}${text}`);
      }
    }
  }

  private joinExpressions(columns: readonly ColumnExpr[]): string {
    return columns.map((column) => column.expression).join(', ');
  }

  private requireColumns(columns: readonly ColumnExpr[], operation: string): void {
    if (columns.length === 0) {
      throw new ValidationError(`${operation}() requires at least one column`);
    }
  }
}
