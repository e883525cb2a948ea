/**
 * Query Fragments
 *
 * Immutable, pre-rendered pieces of SQL produced by TableRoot and
 * CriteriaBuilder factory methods and consumed by QueryAssembler.
 */

import { validateAlias } from '../utils/validation';

import type { OrderDirection } from '../types';

/**
 * A column reference or derived expression, optionally carrying the
 * output alias used when it appears in a projection.
 */
export class ColumnExpr {
  constructor(
    readonly expression: string,
    readonly alias?: string,
  ) {
    if (alias !== undefined) {
      validateAlias(alias);
    }
  }

  /**
   * Copy of this expression tagged with an output alias
   */
  as(alias: string): ColumnExpr {
    return new ColumnExpr(this.expression, alias);
  }

  toString(): string {
    return this.expression;
  }
}

/**
 * Boolean SQL condition
 */
export class Predicate {
  constructor(readonly condition: string) {}

  toString(): string {
    return this.condition;
  }
}

export class OrderTerm {
  constructor(
    readonly column: ColumnExpr,
    readonly direction: OrderDirection,
  ) {}
}

/** `SELECT ... FROM ` text awaiting the FROM/JOIN suffix */
export class SelectFragment {
  constructor(readonly text: string) {}
}

/** `DISTINCT ON (...)` text, exclusive with a plain DISTINCT */
export class DistinctOnFragment {
  constructor(readonly text: string) {}
}
