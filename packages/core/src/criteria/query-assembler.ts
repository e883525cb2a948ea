/**
 * Query Assembler
 *
 * Fluent accumulator for the fragments produced by a CriteriaBuilder.
 * `render()` emits clauses in a fixed order:
 *
 *   SELECT ... FROM table alias [JOIN ...]* [WHERE] [GROUP BY] [ORDER BY] [LIMIT] [OFFSET]
 *
 * Rendering reads state only, so repeated calls return the same string.
 */

import { SQL_KEYWORDS } from '../constants';
import { QueryStateError, ValidationError } from '../errors';
import { truncateSql } from '../logging/console-logger';
import { validateRowCount } from '../utils/validation';

import type { CriteriaBuilder } from './criteria-builder';
import type { ColumnExpr, DistinctOnFragment, OrderTerm, Predicate, SelectFragment } from './fragments';
import type { OrderDirection } from '../types';

export class QueryAssembler {
  private _criteriaBuilder?: CriteriaBuilder;
  private _select?: SelectFragment;
  private _where?: Predicate;
  private _distinctOn?: DistinctOnFragment;
  private _distinct = false;
  private _orderBy = '';
  private _groupBy = '';
  private _limit = 0;
  private _offset?: number;

  constructor(criteriaBuilder?: CriteriaBuilder) {
    this._criteriaBuilder = criteriaBuilder;
  }

  criteriaBuilder(builder: CriteriaBuilder): this {
    this._criteriaBuilder = builder;
    return this;
  }

  select(selection: SelectFragment): this {
    this._select = selection;
    return this;
  }

  where(predicate: Predicate): this {
    if (predicate.condition.trim().length === 0) {
      throw new ValidationError('Predicates is empty in WHERE', 'where');
    }
    this._where = predicate;
    return this;
  }

  distinctOn(fragment: DistinctOnFragment): this {
    this._distinctOn = fragment;
    return this;
  }

  distinct(isDistinct = true): this {
    this._distinct = isDistinct;
    return this;
  }

  orderBy(...terms: Array<OrderTerm | readonly OrderTerm[]>): this {
    this._orderBy = terms
      .flat()
      .map((term) => ` ${term.column.expression} ${this.directionKeyword(term.direction)}`)
      .join(',');
    return this;
  }

  groupBy(...columns: ColumnExpr[]): this {
    this._groupBy = columns.map((column) => column.expression).join(', ');
    return this;
  }

  /**
   * 0 leaves LIMIT out
   */
  limit(value: number): this {
    validateRowCount(value, 'limit');
    this._limit = value;
    return this;
  }

  offset(value: number): this {
    validateRowCount(value, 'offset');
    this._offset = value;
    return this;
  }

  render(): string {
    const builder = this._criteriaBuilder;
    if (!builder) {
      throw new QueryStateError('QueryAssembler is not bound to a CriteriaBuilder');
    }
    const from = builder.fromRoot;
    if (!from) {
      throw new QueryStateError('FROM entity is not declared');
    }

    const sql = [
      this.buildSelectClause(),
      `${from.tableName} ${from.alias}`,
      this.buildJoinClause(builder),
      this.buildWhereClause(),
      this.buildGroupByClause(),
      this.buildOrderByClause(),
      this.buildLimitClause(),
      this.buildOffsetClause(),
    ].join('');

    builder.logger?.debug('Rendered query', { sql: truncateSql(sql) });
    return sql;
  }

  toString(): string {
    return this.render();
  }

  // ============ Clause Builders ============

  private buildSelectClause(): string {
    if (!this._select) {
      throw new ValidationError('SELECT clause is not set', 'select');
    }
    const text = this._select.text;
    const distinctOn = this._distinctOn?.text ?? '';

    if (this._distinct && distinctOn.trim().length > 0) {
      throw new ValidationError('Either DISTINCT or DISTINCT ON can be used', 'distinct');
    }
    if (!this._distinct && distinctOn.trim().length === 0) {
      return text.replaceAll(`${SQL_KEYWORDS.DISTINCT} `, '');
    }
    if (distinctOn.trim().length > 0) {
      return text.replaceAll(SQL_KEYWORDS.DISTINCT, distinctOn);
    }
    return text;
  }

  private buildJoinClause(builder: CriteriaBuilder): string {
    return builder.joinRoots
      .map((root) => {
        const join = root.join;
        if (!join) {
          throw new QueryStateError(`${root.entity.name} (${root.alias}) has no join wiring`);
        }
        const keyword = builder.dialect.joinKeyword(join.type);
        if (join.type === 'CROSS') {
          return ` ${keyword} ${root.tableName} ${root.alias} `;
        }
        const extra = join.condition ? ` AND ${join.condition.condition}` : '';
        return ` ${keyword} ${root.tableName} ${root.alias} ON ${join.source.expression} = ${join.target.expression}${extra} `;
      })
      .join('');
  }

  private buildWhereClause(): string {
    return this._where ? ` WHERE ${this._where.condition}` : '';
  }

  private buildGroupByClause(): string {
    return this._groupBy.trim().length > 0 ? ` GROUP BY ${this._groupBy}` : '';
  }

  private buildOrderByClause(): string {
    return this._orderBy.trim().length > 0 ? ` ORDER BY ${this._orderBy}` : '';
  }

  private buildLimitClause(): string {
    return this._limit > 0 ? ` LIMIT ${this._limit}` : '';
  }

  private buildOffsetClause(): string {
    if (this._offset === undefined) {
      return '';
    }
    if (this._limit < 1) {
      throw new ValidationError('LIMIT must be at least 1 when OFFSET is set', 'offset');
    }
    return ` OFFSET ${this._offset}`;
  }

  private directionKeyword(direction: OrderDirection): string {
    switch (direction) {
      case 'ASC': {
        return 'asc';
      }
      case 'DESC': {
        return 'desc';
      }
    }
  }
}
