/**
 * Metadata Resolver
 *
 * Maps entities to table names and (entity, field) pairs to column names.
 * Declared names win; otherwise the snake_case convention applies.
 * Field lookup covers the entity and its immediate parent only.
 *
 * Results are memoized. Every value is derived purely from the frozen
 * entity descriptor, so one resolver can be shared by any number of
 * builders and repopulating the cache always yields the same names.
 *
 * Emits:
 * - `resolve` on every cache miss
 */

import { EventEmitter } from 'eventemitter3';

import { FieldNotFoundError } from '../errors';

import { toSnakeCase } from './naming';

import type { EntityDescriptor, FieldDefinition } from './entity';
import type { Logger } from '../types';

export interface ResolveEvent {
  kind: 'table' | 'column';
  entity: string;
  field?: string;
  name: string;
}

export interface MetadataResolverEvents {
  resolve: (event: ResolveEvent) => void;
}

export interface MetadataResolverOptions {
  logger?: Logger;
}

export interface MetadataResolverStatistics {
  hits: number;
  misses: number;
  hitRate: number;
  tables: number;
  columns: number;
}

export class MetadataResolver extends EventEmitter<MetadataResolverEvents> {
  private readonly tableCache = new Map<EntityDescriptor, string>();
  private readonly columnCache = new Map<EntityDescriptor, Map<string, string>>();
  private readonly logger?: Logger;
  private hits = 0;
  private misses = 0;

  constructor(options: MetadataResolverOptions = {}) {
    super();
    this.logger = options.logger;
  }

  resolveTable(entity: EntityDescriptor): string {
    const cached = this.tableCache.get(entity);
    if (cached !== undefined) {
      this.hits++;
      return cached;
    }

    this.misses++;
    const name = entity.table ? entity.table : toSnakeCase(entity.name);
    this.tableCache.set(entity, name);

    this.logger?.debug('Resolved table name', { entity: entity.name, name });
    this.emit('resolve', { kind: 'table', entity: entity.name, name });
    return name;
  }

  /**
   * @throws FieldNotFoundError when neither the entity nor its parent declares `field`
   */
  resolveColumn(entity: EntityDescriptor, field: string): string {
    let columns = this.columnCache.get(entity);
    const cached = columns?.get(field);
    if (cached !== undefined) {
      this.hits++;
      return cached;
    }

    const definition = this.findField(entity, field);
    this.misses++;
    const name = definition.column ? definition.column : toSnakeCase(field);

    if (!columns) {
      columns = new Map();
      this.columnCache.set(entity, columns);
    }
    columns.set(field, name);

    this.logger?.debug('Resolved column name', { entity: entity.name, field, name });
    this.emit('resolve', { kind: 'column', entity: entity.name, field, name });
    return name;
  }

  getStatistics(): MetadataResolverStatistics {
    const total = this.hits + this.misses;
    let columns = 0;
    for (const entry of this.columnCache.values()) {
      columns += entry.size;
    }

    return {
      hits: this.hits,
      misses: this.misses,
      hitRate: total > 0 ? this.hits / total : 0,
      tables: this.tableCache.size,
      columns,
    };
  }

  /**
   * Drop every cached name and reset statistics (useful for testing)
   */
  clear(): void {
    this.tableCache.clear();
    this.columnCache.clear();
    this.hits = 0;
    this.misses = 0;
  }

  private findField(entity: EntityDescriptor, field: string): FieldDefinition {
    if (Object.hasOwn(entity.fields, field)) {
      return entity.fields[field];
    }

    // One level only: the parent's own parent is not consulted
    const parent = entity.parent;
    if (parent && Object.hasOwn(parent.fields, field)) {
      return parent.fields[field];
    }

    throw new FieldNotFoundError(entity.name, field);
  }
}

/**
 * Process-wide resolver used by builders that are not given their own
 */
export const metadataResolver = new MetadataResolver();
