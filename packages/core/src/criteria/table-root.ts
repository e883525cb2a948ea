/**
 * Table Root
 *
 * Binds an entity to a query alias. Roots are the factory for column
 * references scoped to that alias and, for joined tables, carry the
 * join wiring rendered by QueryAssembler.
 *
 * `F` is the union of field names the entity exposes, so
 * `root.column('unknownField')` fails to compile for declared entities.
 *
 * @example
 * ```typescript
 * const order = cb.declareFrom(Order);
 * order.column('customerId');              // m.customer_id
 * order.column('total', 'amount');         // m.total AS amount (in a projection)
 * order.formatDate('createdAt', 'YYYY-MM'); // TO_CHAR(m.created_at, 'YYYY-MM')
 * ```
 */

import { QueryStateError, ValidationError } from '../errors';
import { validateAlias } from '../utils/validation';

import { ColumnExpr } from './fragments';

import type { Predicate } from './fragments';
import type { SQLDialect } from '../dialect/sql-dialect';
import type { EntityDescriptor } from '../metadata/entity';
import type { MetadataResolver } from '../metadata/metadata-resolver';
import type { JoinType } from '../types';

export interface JoinWiring {
  type: JoinType;
  source: ColumnExpr;
  target: ColumnExpr;
  condition?: Predicate;
}

export class TableRoot<F extends string = string> {
  private _alias?: string;
  private _join?: JoinWiring;

  constructor(
    readonly entity: EntityDescriptor,
    private readonly resolver: MetadataResolver,
    private readonly dialect: SQLDialect,
  ) {}

  get alias(): string {
    if (this._alias === undefined) {
      throw new QueryStateError(`Root for ${this.entity.name} has no alias yet`);
    }
    return this._alias;
  }

  get tableName(): string {
    return this.resolver.resolveTable(this.entity);
  }

  get join(): Readonly<JoinWiring> | undefined {
    return this._join;
  }

  /**
   * Set by the owning builder, once
   */
  assignAlias(alias: string): void {
    if (this._alias !== undefined) {
      throw new QueryStateError(`Alias of ${this.entity.name} is already "${this._alias}"`);
    }
    validateAlias(alias);
    this._alias = alias;
  }

  column(field: F, outputAlias?: string): ColumnExpr {
    const name = this.resolver.resolveColumn(this.entity, field);
    return new ColumnExpr(`${this.alias}.${name}`, outputAlias);
  }

  /**
   * `alias.*`
   */
  all(): ColumnExpr {
    return new ColumnExpr(`${this.alias}.*`);
  }

  count(field: F, outputAlias?: string): ColumnExpr {
    return new ColumnExpr(`COUNT(${this.column(field).expression})`, outputAlias);
  }

  formatDate(field: F, pattern: string, outputAlias?: string): ColumnExpr {
    const expression = this.dialect.config.dateFunctions.dateFormat(this.column(field).expression, pattern);
    return new ColumnExpr(expression, outputAlias);
  }

  attachJoin(type: JoinType, source: ColumnExpr, target: ColumnExpr): void {
    if (this._join) {
      throw new QueryStateError(`${this.entity.name} (${this.alias}) is already joined`);
    }
    this._join = { type, source, target };
  }

  /**
   * Extra condition ANDed onto the ON clause
   */
  addJoinCondition(predicate: Predicate): void {
    if (!this._join) {
      throw new QueryStateError(`${this.entity.name} is not a joined table`);
    }
    if (this._join.type === 'CROSS') {
      throw new ValidationError('CROSS JOIN takes no ON condition', 'joinType');
    }
    this._join.condition = predicate;
  }
}
