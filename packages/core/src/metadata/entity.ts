/**
 * Entity Definitions
 *
 * Statically declared table/column mapping for the types a query is built
 * from. An entity lists every field it exposes; a field may name its column
 * explicitly, otherwise the naming convention applies. An entity may extend
 * one parent entity whose fields it inherits.
 *
 * @example
 * ```typescript
 * const BaseEntity = defineEntity('BaseEntity', {
 *   fields: { id: {}, createdAt: {} },
 * });
 *
 * const Order = defineEntity('Order', {
 *   table: 'orders',
 *   extends: BaseEntity,
 *   fields: { customerId: {}, total: { column: 'total_amount' } },
 * });
 * ```
 */

import { ValidationError } from '../errors';
import { validateColumnName, validateTableName } from '../utils/validation';

export interface FieldDefinition {
  /** Explicit column name; empty or missing means snake_case of the field name */
  column?: string;
}

export interface EntityDefinition<F extends string, P extends string> {
  /** Explicit table name; empty or missing means snake_case of the entity name */
  table?: string;
  fields: Record<F, FieldDefinition>;
  extends?: EntityDescriptor<P, string>;
}

/**
 * Frozen metadata for one entity. `F` is the union of its own field names,
 * `P` the union of its parent's own field names.
 */
export interface EntityDescriptor<F extends string = string, P extends string = string> {
  readonly name: string;
  readonly table?: string;
  readonly fields: Readonly<Record<F, FieldDefinition>>;
  readonly parent?: EntityDescriptor<P, string>;
}

export function defineEntity<F extends string, P extends string = never>(
  name: string,
  definition: EntityDefinition<F, P>,
): EntityDescriptor<F, P> {
  if (!name || name.trim().length === 0) {
    throw new ValidationError('Entity name must be a non-empty string', 'name');
  }

  if (definition.table) {
    validateTableName(definition.table);
  }

  for (const field of Object.values<FieldDefinition>(definition.fields)) {
    if (field.column) {
      validateColumnName(field.column);
    }
  }

  return Object.freeze({
    name,
    table: definition.table,
    fields: Object.freeze({ ...definition.fields }),
    parent: definition.extends,
  });
}
