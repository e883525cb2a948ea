export { defineEntity } from './entity';
export type { EntityDefinition, EntityDescriptor, FieldDefinition } from './entity';
export { MetadataResolver, metadataResolver } from './metadata-resolver';
export type {
  MetadataResolverEvents,
  MetadataResolverOptions,
  MetadataResolverStatistics,
  ResolveEvent,
} from './metadata-resolver';
export { toSnakeCase } from './naming';
